// ============================================================================
// Switchyard — Delivery Channel
// ============================================================================
// Owns one connection per agent id. Outbound frames go to exactly one
// connection; inbound frames from every connection are funnelled to a single
// consumer, tagged with the agent they came from.
// ============================================================================

import { ChannelClosedError, CoordinatorError } from "../errors.js";
import { describeError, log } from "../logger.js";
import type { InboundFrame, OutboundFrame } from "./protocol.js";

/** Callbacks a connection uses to hand frames and its closure to the channel. */
export interface ConnectionSink {
  message(frame: InboundFrame): void;
  closed(reason: string): void;
}

/** A persistent, bidirectional link to one agent. */
export interface AgentConnection {
  readonly isOpen: boolean;
  /** Deliver one frame. Rejects if the connection cannot take it. */
  send(frame: OutboundFrame): Promise<void>;
  /** Called once by the channel when the connection is bound. */
  attach(sink: ConnectionSink): void;
  close(reason?: string): void;
}

export type InboundHandler = (agentId: string, frame: InboundFrame) => void;
export type ClosedHandler = (agentId: string, reason: string) => void;

/** What the scheduler needs from the channel. */
export interface DeliveryChannel {
  send(agentId: string, frame: OutboundFrame): Promise<void>;
  isOpen(agentId: string): boolean;
  onMessage(handler: InboundHandler): void;
}

export class AgentChannel implements DeliveryChannel {
  private readonly connections = new Map<string, AgentConnection>();
  private readonly closedHandlers = new Set<ClosedHandler>();
  private messageHandler: InboundHandler | null = null;

  /** Attach a connection to an agent id, closing any connection it replaces. */
  bind(agentId: string, connection: AgentConnection): void {
    const previous = this.connections.get(agentId);
    this.connections.set(agentId, connection);
    if (previous && previous !== connection) previous.close("replaced by a new connection");

    connection.attach({
      message: (frame) => {
        if (this.connections.get(agentId) === connection) this.dispatch(agentId, frame);
      },
      closed: (reason) => {
        if (this.connections.get(agentId) !== connection) return;
        this.connections.delete(agentId);
        log.debug("Agent connection closed", { agentId, reason });
        this.emitClosed(agentId, reason);
      },
    });
  }

  /**
   * Close and forget an agent's connection. Closed handlers are not called:
   * the caller already knows. Returns false when nothing was bound.
   */
  unbind(agentId: string, reason: string): boolean {
    const connection = this.connections.get(agentId);
    if (!connection) return false;
    this.connections.delete(agentId);
    connection.close(reason);
    return true;
  }

  isOpen(agentId: string): boolean {
    return this.connections.get(agentId)?.isOpen ?? false;
  }

  get size(): number {
    return this.connections.size;
  }

  boundAgents(): string[] {
    return [...this.connections.keys()];
  }

  /** At-most-once: a frame that fails to go out is never resent from here. */
  async send(agentId: string, frame: OutboundFrame): Promise<void> {
    const connection = this.connections.get(agentId);
    if (!connection || !connection.isOpen) throw new ChannelClosedError(agentId);
    try {
      await connection.send(frame);
    } catch (err) {
      log.warn("Frame send failed", { agentId, frame: frame.type, message: describeError(err) });
      throw new ChannelClosedError(agentId);
    }
  }

  onMessage(handler: InboundHandler): void {
    if (this.messageHandler) {
      throw new CoordinatorError("The channel already has a message consumer.", "CHANNEL_CONSUMER_TAKEN");
    }
    this.messageHandler = handler;
  }

  onClosed(handler: ClosedHandler): () => void {
    this.closedHandlers.add(handler);
    return () => this.closedHandlers.delete(handler);
  }

  closeAll(reason: string): void {
    const connections = [...this.connections.values()];
    this.connections.clear();
    for (const connection of connections) connection.close(reason);
  }

  private dispatch(agentId: string, frame: InboundFrame): void {
    if (!this.messageHandler) {
      log.warn("Dropping inbound frame: no consumer", { agentId, frame: frame.type });
      return;
    }
    try {
      this.messageHandler(agentId, frame);
    } catch (err) {
      log.error("Inbound frame handler failed", { agentId, frame: frame.type, message: describeError(err) });
    }
  }

  private emitClosed(agentId: string, reason: string): void {
    for (const handler of this.closedHandlers) {
      try {
        handler(agentId, reason);
      } catch (err) {
        log.error("Connection-closed handler failed", { agentId, message: describeError(err) });
      }
    }
  }
}
