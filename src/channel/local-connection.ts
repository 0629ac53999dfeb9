// ============================================================================
// Switchyard — In-Process Agent Connection
// ============================================================================
// Both ends live in the same process: the coordinator side is the
// AgentConnection the channel binds; the agent side subscribes with
// onFrame() and talks back with post() or the report helpers.
// ============================================================================

import { ChannelClosedError } from "../errors.js";
import { describeError, log } from "../logger.js";
import type { AgentConnection, ConnectionSink } from "./agent-channel.js";
import type { InboundFrame, OutboundFrame } from "./protocol.js";

export type FrameListener = (frame: OutboundFrame) => void;
export type CloseListener = (reason: string) => void;

export class LocalConnection implements AgentConnection {
  private sink: ConnectionSink | null = null;
  private open = true;
  private readonly frameListeners = new Set<FrameListener>();
  private readonly closeListeners = new Set<CloseListener>();
  private _closeReason: string | null = null;

  constructor(readonly agentId: string) { }

  get isOpen(): boolean {
    return this.open;
  }

  get closeReason(): string | null {
    return this._closeReason;
  }

  // ─── Coordinator side ─────────────────────────────────────────────

  attach(sink: ConnectionSink): void {
    this.sink = sink;
  }

  async send(frame: OutboundFrame): Promise<void> {
    if (!this.open) throw new ChannelClosedError(this.agentId);
    for (const listener of this.frameListeners) {
      try {
        listener(frame);
      } catch (err) {
        log.error("Local agent frame listener failed", { agentId: this.agentId, frame: frame.type, message: describeError(err) });
      }
    }
  }

  close(reason: string = "closed"): void {
    if (!this.open) return;
    this.open = false;
    this._closeReason = reason;
    this.sink?.closed(reason);
    for (const listener of this.closeListeners) listener(reason);
  }

  // ─── Agent side ───────────────────────────────────────────────────

  /** Subscribe to frames the coordinator sends. Returns an unsubscribe function. */
  onFrame(listener: FrameListener): () => void {
    this.frameListeners.add(listener);
    return () => this.frameListeners.delete(listener);
  }

  onClose(listener: CloseListener): () => void {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  /** Hand a frame to the coordinator as if it had arrived over the wire. */
  post(frame: InboundFrame): void {
    if (!this.open) throw new ChannelClosedError(this.agentId);
    if (!this.sink) {
      log.warn("Local connection is not bound; frame dropped", { agentId: this.agentId, frame: frame.type });
      return;
    }
    this.sink.message(frame);
  }

  heartbeat(): void {
    this.post({ type: "heartbeat" });
  }

  complete(taskId: string, result: unknown): void {
    this.post({ type: "task.result", taskId, status: "completed", result });
  }

  fail(taskId: string, error: string): void {
    this.post({ type: "task.result", taskId, status: "failed", error });
  }
}
