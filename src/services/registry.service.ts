// ============================================================================
// Switchyard — Agent Registry Service
// ============================================================================
// Tracks which agents are connected, what they can do, and when they were last
// heard from. Connection handles live in the delivery channel; the registry
// only knows agents by id.
// ============================================================================

import type { AgentsRepo } from "../repositories/agents.repo.js";
import { toAgent } from "../repositories/agents.repo.js";
import { DuplicateActiveAgentError, UnknownAgentError, ValidationError } from "../errors.js";
import { describeError, log } from "../logger.js";
import type { Agent, Clock } from "../types.js";

export interface RegistryOptions {
  livenessWindowMs: number;
  clock?: Clock;
}

export type DisconnectListener = (agentId: string, reason: string) => void;
export type AvailableListener = (agentId: string) => void;

export const LIVENESS_EXPIRED = "liveness window elapsed";

function normalizeCapabilities(capabilities: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of capabilities) {
    const cap = raw.trim();
    if (cap) seen.add(cap);
  }
  return [...seen];
}

export class AgentRegistry {
  private readonly clock: Clock;
  private readonly disconnectListeners = new Set<DisconnectListener>();
  private readonly availableListeners = new Set<AvailableListener>();

  constructor(
    private agents: AgentsRepo,
    private options: RegistryOptions,
  ) {
    this.clock = options.clock ?? Date.now;
  }

  // ─── Lifecycle ────────────────────────────────────────────────────

  /** Create or reactivate an agent. Fails if the id is already connected. */
  register(agentId: string, capabilities: readonly string[]): Agent {
    if (agentId.trim() === "") throw new ValidationError("Agent id must not be empty.");
    const caps = normalizeCapabilities(capabilities);

    if (!this.agents.activate(agentId, caps, this.clock())) {
      throw new DuplicateActiveAgentError(agentId);
    }
    log.info("Agent connected", { agentId, capabilities: caps });
    this.emitAvailable(agentId);
    return this.get(agentId);
  }

  /** Refresh liveness. A disconnected agent must register again. */
  heartbeat(agentId: string): void {
    if (!this.agents.touch(agentId, this.clock())) {
      throw new UnknownAgentError(agentId);
    }
    this.emitAvailable(agentId);
  }

  /**
   * Mark an agent disconnected now. Returns false when it already was;
   * throws UnknownAgentError for an id that was never registered.
   */
  deregister(agentId: string, reason: string = "deregistered"): boolean {
    if (this.agents.deactivate(agentId, this.clock(), reason)) {
      log.info("Agent disconnected", { agentId, reason });
      this.emitDisconnected(agentId, reason);
      return true;
    }
    if (!this.agents.getById(agentId)) throw new UnknownAgentError(agentId);
    return false;
  }

  // ─── Lookup ───────────────────────────────────────────────────────

  /**
   * Connected agents advertising `capability` (every connected agent when it
   * is empty), most recently heard from first. The ids are read when this is
   * called; the generator can be consumed once.
   */
  findCapable(capability?: string | null): Generator<string, void, undefined> {
    const ids = this.agents.findConnected(capability ? capability : null);
    return (function* () {
      yield* ids;
    })();
  }

  get(agentId: string): Agent {
    const row = this.agents.getById(agentId);
    if (!row) throw new UnknownAgentError(agentId);
    return toAgent(row);
  }

  list(): Agent[] {
    return this.agents.getAll().map(toAgent);
  }

  counts(): { connected: number; disconnected: number } {
    return this.agents.countByStatus();
  }

  // ─── Sweeps ───────────────────────────────────────────────────────

  /**
   * Disconnect agents silent for longer than the liveness window.
   * Returns the ids that changed state in this sweep.
   */
  sweep(): string[] {
    const now = this.clock();
    const expired = this.agents.deactivateStale(now - this.options.livenessWindowMs, now, LIVENESS_EXPIRED);
    for (const agentId of expired) {
      log.warn("Agent missed its liveness window", { agentId, windowMs: this.options.livenessWindowMs });
      this.emitDisconnected(agentId, LIVENESS_EXPIRED);
    }
    return expired;
  }

  /** Forget agents that have been disconnected for longer than `retentionMs`. */
  prune(retentionMs: number): number {
    const pruned = this.agents.pruneDisconnected(this.clock() - retentionMs);
    if (pruned > 0) log.info(`Pruned ${pruned} disconnected agent(s)`);
    return pruned;
  }

  // ─── Listeners ────────────────────────────────────────────────────

  onDisconnected(listener: DisconnectListener): () => void {
    this.disconnectListeners.add(listener);
    return () => this.disconnectListeners.delete(listener);
  }

  onAvailable(listener: AvailableListener): () => void {
    this.availableListeners.add(listener);
    return () => this.availableListeners.delete(listener);
  }

  private emitDisconnected(agentId: string, reason: string): void {
    for (const listener of this.disconnectListeners) {
      try {
        listener(agentId, reason);
      } catch (err) {
        log.error("Disconnect listener failed", { agentId, message: describeError(err) });
      }
    }
  }

  private emitAvailable(agentId: string): void {
    for (const listener of this.availableListeners) {
      try {
        listener(agentId);
      } catch (err) {
        log.error("Availability listener failed", { agentId, message: describeError(err) });
      }
    }
  }
}
