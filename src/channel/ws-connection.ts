// ============================================================================
// Switchyard — WebSocket Agent Connection
// ============================================================================

import { WebSocket } from "ws";
import type { RawData } from "ws";
import { ChannelClosedError, CoordinatorError } from "../errors.js";
import { describeError, log } from "../logger.js";
import type { AgentConnection, ConnectionSink } from "./agent-channel.js";
import { decodeFrame, encodeFrame } from "./protocol.js";
import type { InboundFrame, OutboundFrame } from "./protocol.js";

const MAX_CLOSE_REASON_BYTES = 123;

export function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export function trimCloseReason(reason: string): string {
  let text = reason;
  while (Buffer.byteLength(text, "utf8") > MAX_CLOSE_REASON_BYTES) text = text.slice(0, -1);
  return text;
}

/**
 * Wraps a socket that has already completed the hello handshake.
 * Frames that arrive before the channel attaches are held and replayed.
 */
export class WsConnection implements AgentConnection {
  private sink: ConnectionSink | null = null;
  private backlog: InboundFrame[] = [];
  private closedWith: string | null = null;

  constructor(
    private socket: WebSocket,
    readonly agentId: string,
  ) {
    socket.on("message", (data, isBinary) => this.handleData(data, isBinary));
    socket.on("close", (code, reason) => {
      const text = reason.toString("utf8");
      this.handleClosed(text || `socket closed (${code})`);
    });
    socket.on("error", (err) => {
      log.warn("Agent socket error", { agentId, message: err.message });
    });
  }

  get isOpen(): boolean {
    return this.closedWith === null && this.socket.readyState === WebSocket.OPEN;
  }

  attach(sink: ConnectionSink): void {
    this.sink = sink;
    const pending = this.backlog;
    this.backlog = [];
    for (const frame of pending) sink.message(frame);
    if (this.closedWith !== null) sink.closed(this.closedWith);
  }

  send(frame: OutboundFrame): Promise<void> {
    if (!this.isOpen) return Promise.reject(new ChannelClosedError(this.agentId));
    return new Promise((resolve, reject) => {
      this.socket.send(encodeFrame(frame), (err) => (err ? reject(err) : resolve()));
    });
  }

  close(reason: string = "closed"): void {
    if (this.closedWith !== null) return;
    this.closedWith = reason;
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(1000, trimCloseReason(reason));
    }
  }

  private handleData(data: RawData, isBinary: boolean): void {
    if (isBinary) {
      this.reject("PROTOCOL_ERROR", "Binary frames are not supported.");
      return;
    }
    let frame: InboundFrame;
    try {
      frame = decodeFrame(rawToString(data));
    } catch (err) {
      const code = err instanceof CoordinatorError ? err.code : "PROTOCOL_ERROR";
      this.reject(code, describeError(err));
      return;
    }
    if (frame.type === "hello") {
      this.reject("PROTOCOL_ERROR", "hello is only valid as the first frame.");
      return;
    }
    if (this.sink) this.sink.message(frame);
    else this.backlog.push(frame);
  }

  private handleClosed(reason: string): void {
    if (this.closedWith !== null) return;
    this.closedWith = reason;
    this.sink?.closed(reason);
  }

  /** Answer a bad frame with an error frame; the connection stays up. */
  private reject(code: string, message: string): void {
    log.debug("Rejected agent frame", { agentId: this.agentId, code, message });
    this.send({ type: "error", code, message }).catch((err: unknown) => {
      log.debug("Could not send error frame", { agentId: this.agentId, message: describeError(err) });
    });
  }
}
