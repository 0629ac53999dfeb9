// ============================================================================
// Switchyard — Coordinator
// ============================================================================
// Composition root: wires the task store, agent registry, scheduler and
// delivery channel together and exposes the operations clients and agents
// use. Every public method is safe to call at any time after construction;
// start() only adds the background sweeps and crash recovery.
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import { AgentChannel } from "./channel/agent-channel.js";
import type { AgentConnection } from "./channel/agent-channel.js";
import { LocalConnection } from "./channel/local-connection.js";
import type { InboundFrame, OutboundFrame, TaskResultFrame } from "./channel/protocol.js";
import { DEFAULT_CONFIG, loadConfig } from "./config.js";
import type { Config } from "./config.js";
import {
  CANCELLED,
  DEFAULT_LIST_LIMIT,
  DEFAULT_WAIT_TIMEOUT_MS,
  MAX_LIST_LIMIT,
  MAX_TIMER_DELAY_MS,
  SHUTTING_DOWN,
} from "./constants.js";
import { closeDatabase, openDatabase } from "./database.js";
import {
  ChannelClosedError,
  CoordinatorError,
  StaleTransitionError,
  TaskNotCancellableError,
  UnknownAgentError,
  ValidationError,
  WaitTimeoutError,
} from "./errors.js";
import { describeError, log } from "./logger.js";
import { createRepositories } from "./repositories/index.js";
import type { TasksRepo } from "./repositories/index.js";
import { AgentRegistry } from "./services/registry.service.js";
import { Scheduler } from "./services/scheduler.service.js";
import type { ReportOutcome } from "./services/scheduler.service.js";
import { TERMINAL_STATUSES } from "./types.js";
import type { Agent, Clock, ReportStatus, Task, TaskEvent, TaskStatus } from "./types.js";

export interface CoordinatorOptions {
  db: DatabaseType;
  config?: Config;
  channel?: AgentChannel;
  clock?: Clock;
  /** Close the database in stop(). */
  ownsDatabase?: boolean;
}

export interface CoordinatorStats {
  tasks: Record<TaskStatus, number>;
  agents: { connected: number; disconnected: number };
  openConnections: number;
  activeAssignments: number;
  waiters: number;
}

export interface SweepReport {
  disconnected: string[];
  prunedAgents: number;
  prunedTasks: number;
}

interface Waiter {
  resolve: (task: Task) => void;
  reject: (err: Error) => void;
  timer?: NodeJS.Timeout;
}

function errorFrame(err: unknown): OutboundFrame {
  return {
    type: "error",
    code: err instanceof CoordinatorError ? err.code : "INTERNAL_ERROR",
    message: describeError(err),
  };
}

export class Coordinator {
  readonly config: Config;
  readonly store: TasksRepo;
  readonly registry: AgentRegistry;
  readonly scheduler: Scheduler;
  readonly channel: AgentChannel;

  private readonly db: DatabaseType;
  private readonly clock: Clock;
  private readonly ownsDatabase: boolean;
  private readonly waiters = new Map<string, Set<Waiter>>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private started = false;
  private stopped = false;

  /** Open the configured database and build a coordinator that closes it on stop(). */
  static open(config: Config = loadConfig()): Coordinator {
    const db = openDatabase(config.dbPath);
    log.info("Database ready", { dbPath: config.dbPath });
    return new Coordinator({ db, config, ownsDatabase: true });
  }

  constructor(options: CoordinatorOptions) {
    this.db = options.db;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.clock = options.clock ?? Date.now;
    this.ownsDatabase = options.ownsDatabase ?? false;
    this.channel = options.channel ?? new AgentChannel();

    const repos = createRepositories(this.db, this.clock);
    this.store = repos.tasks;
    this.registry = new AgentRegistry(repos.agents, {
      livenessWindowMs: this.config.livenessWindow,
      clock: this.clock,
    });
    this.scheduler = new Scheduler(this.store, this.registry, this.channel, {
      assignmentTimeoutMs: this.config.assignmentTimeout,
      maxRetries: this.config.maxRetries,
      batchSize: this.config.schedulingBatchSize,
      agentConcurrency: this.config.agentConcurrency,
      clock: this.clock,
    });

    this.registry.onDisconnected((agentId, reason) => {
      this.channel.unbind(agentId, reason);
      const counts = this.scheduler.reclaimAgent(agentId, reason);
      if (counts.requeued + counts.expired > 0) {
        log.info("Reclaimed tasks from disconnected agent", { agentId, ...counts });
      }
    });
    this.registry.onAvailable((agentId) => this.scheduler.trigger(`agent ${agentId} available`));
    this.channel.onMessage((agentId, frame) => this.handleFrame(agentId, frame));
    this.channel.onClosed((agentId, reason) => this.handleConnectionClosed(agentId, reason));
    this.scheduler.onSettled((task) => this.notifyWaiters(task));
  }

  // ─── Tasks ────────────────────────────────────────────────────────

  submitTask(type: string, payload: unknown, capability: string | null = null): string {
    const taskId = this.store.create(type, payload, capability);
    log.info("Task submitted", { taskId, type, capability });
    this.scheduler.trigger("task submitted");
    return taskId;
  }

  getTaskStatus(taskId: string): Task {
    return this.store.get(taskId);
  }

  listTasks(status: TaskStatus, limit: number = DEFAULT_LIST_LIMIT): Task[] {
    const bounded = Math.min(Math.max(1, Math.floor(limit)), MAX_LIST_LIMIT);
    return [...this.store.listByStatus(status, bounded)];
  }

  taskHistory(taskId: string): TaskEvent[] {
    return this.store.history(taskId);
  }

  /** Fail a task that has not been assigned yet. */
  cancelTask(taskId: string): Task {
    const task = this.store.get(taskId);
    if (task.status !== "pending") throw new TaskNotCancellableError(taskId, task.status);
    try {
      const cancelled = this.store.transition(taskId, "pending", "failed", {
        error: CANCELLED,
        detail: "cancelled by client",
      });
      log.info("Task cancelled", { taskId });
      this.notifyWaiters(cancelled);
      return cancelled;
    } catch (err) {
      if (err instanceof StaleTransitionError) throw new TaskNotCancellableError(taskId, err.actual);
      throw err;
    }
  }

  /** Resolve with the task once it reaches a terminal status. */
  async waitForTask(taskId: string, timeoutMs: number = DEFAULT_WAIT_TIMEOUT_MS): Promise<Task> {
    if (!(timeoutMs > 0 && timeoutMs <= MAX_TIMER_DELAY_MS)) {
      throw new ValidationError(`Wait timeout must be between 1 and ${MAX_TIMER_DELAY_MS}ms.`, { timeoutMs });
    }
    const task = this.store.get(taskId);
    if (TERMINAL_STATUSES.has(task.status)) return task;
    if (this.stopped) throw new CoordinatorError(SHUTTING_DOWN, "SHUTTING_DOWN", { taskId }, true);

    return new Promise<Task>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      waiter.timer = setTimeout(() => {
        this.removeWaiter(taskId, waiter);
        reject(new WaitTimeoutError(taskId, timeoutMs));
      }, timeoutMs);
      let set = this.waiters.get(taskId);
      if (!set) {
        set = new Set();
        this.waiters.set(taskId, set);
      }
      set.add(waiter);
    });
  }

  /**
   * Record an agent's report. When `agentId` is given, a report from an
   * agent that no longer holds the task is discarded.
   */
  reportResult(taskId: string, status: ReportStatus, payload: unknown, agentId?: string): ReportOutcome {
    return this.scheduler.reportResult(taskId, status, payload, agentId);
  }

  // ─── Agents ───────────────────────────────────────────────────────

  /**
   * Register an agent and bind its connection. Without a connection an
   * in-process LocalConnection is created and returned.
   */
  connectAgent(agentId: string, capabilities: readonly string[]): Promise<LocalConnection>;
  connectAgent<C extends AgentConnection>(agentId: string, capabilities: readonly string[], connection: C): Promise<C>;
  async connectAgent(
    agentId: string,
    capabilities: readonly string[],
    connection?: AgentConnection,
  ): Promise<AgentConnection> {
    const conn = connection ?? new LocalConnection(agentId);
    if (!conn.isOpen) throw new ChannelClosedError(agentId);

    this.registry.register(agentId, capabilities);
    this.channel.bind(agentId, conn);
    try {
      await this.channel.send(agentId, { type: "welcome", agentId });
    } catch (err) {
      log.warn("Could not greet agent", { agentId, message: describeError(err) });
    }
    this.scheduler.trigger(`agent ${agentId} connected`);
    return conn;
  }

  heartbeat(agentId: string): void {
    this.registry.heartbeat(agentId);
  }

  /** Disconnect an agent and reclaim its tasks. False if it was already disconnected. */
  disconnectAgent(agentId: string, reason: string = "disconnected by request"): boolean {
    return this.registry.deregister(agentId, reason);
  }

  listAgents(): Agent[] {
    return this.registry.list();
  }

  // ─── Maintenance ──────────────────────────────────────────────────

  stats(): CoordinatorStats {
    let waiters = 0;
    for (const set of this.waiters.values()) waiters += set.size;
    return {
      tasks: this.store.countByStatus(),
      agents: this.registry.counts(),
      openConnections: this.channel.size,
      activeAssignments: this.scheduler.activeAssignments().length,
      waiters,
    };
  }

  /** Liveness sweep plus retention pruning. Runs on an interval after start(). */
  sweep(): SweepReport {
    const disconnected = this.registry.sweep();
    const prunedAgents = this.registry.prune(this.config.agentRetention);
    const prunedTasks = this.store.pruneTerminal(this.clock() - this.config.taskRetention);
    if (prunedTasks > 0) log.info(`Pruned ${prunedTasks} settled task(s)`);
    return { disconnected, prunedAgents, prunedTasks };
  }

  /** Resolves when no scheduling pass is running. */
  async settle(): Promise<void> {
    await this.scheduler.idle();
  }

  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;

    this.scheduler.recover();
    this.releaseOrphans();

    this.sweepTimer = setInterval(() => {
      try {
        this.sweep();
      } catch (err) {
        log.error("Sweep failed", { message: describeError(err) });
      }
    }, this.config.sweepInterval);
    this.sweepTimer.unref();

    this.scheduler.trigger("coordinator started");
    log.info("Coordinator started", {
      assignmentTimeout: this.config.assignmentTimeout,
      livenessWindow: this.config.livenessWindow,
      maxRetries: this.config.maxRetries,
    });
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.scheduler.stop();

    for (const agentId of this.channel.boundAgents()) {
      try {
        this.registry.deregister(agentId, SHUTTING_DOWN);
      } catch (err) {
        log.warn("Could not deregister agent during shutdown", { agentId, message: describeError(err) });
      }
    }
    this.channel.closeAll(SHUTTING_DOWN);

    for (const [taskId, set] of this.waiters) {
      for (const waiter of set) {
        clearTimeout(waiter.timer);
        waiter.reject(new CoordinatorError(SHUTTING_DOWN, "SHUTTING_DOWN", { taskId }, true));
      }
    }
    this.waiters.clear();

    if (this.ownsDatabase) closeDatabase(this.db);
    log.info("Coordinator stopped");
  }

  // ─── Inbound frames ───────────────────────────────────────────────

  private handleFrame(agentId: string, frame: InboundFrame): void {
    switch (frame.type) {
      case "heartbeat":
        this.touch(agentId);
        return;
      case "task.result":
        if (this.touch(agentId)) this.handleResult(agentId, frame);
        return;
      case "hello":
        this.reply(agentId, { type: "error", code: "PROTOCOL_ERROR", message: "Agent is already connected." });
        return;
    }
  }

  private handleResult(agentId: string, frame: TaskResultFrame): void {
    try {
      const value = frame.status === "completed" ? frame.result : frame.error;
      const outcome = this.reportResult(frame.taskId, frame.status, value, agentId);
      this.reply(agentId, { type: "ack", taskId: frame.taskId, applied: outcome.applied });
    } catch (err) {
      log.warn("Rejected result report", { agentId, taskId: frame.taskId, message: describeError(err) });
      this.reply(agentId, errorFrame(err));
    }
  }

  /** Any inbound frame counts as a heartbeat. False if the agent must register again. */
  private touch(agentId: string): boolean {
    try {
      this.registry.heartbeat(agentId);
      return true;
    } catch (err) {
      if (!(err instanceof UnknownAgentError)) throw err;
      this.reply(agentId, errorFrame(err));
      return false;
    }
  }

  private reply(agentId: string, frame: OutboundFrame): void {
    this.channel.send(agentId, frame).catch((err: unknown) => {
      log.debug("Reply not delivered", { agentId, frame: frame.type, message: describeError(err) });
    });
  }

  private handleConnectionClosed(agentId: string, reason: string): void {
    try {
      this.registry.deregister(agentId, reason);
    } catch (err) {
      if (!(err instanceof UnknownAgentError)) throw err;
      log.debug("Closed connection belonged to a pruned agent", { agentId, reason });
    }
  }

  /** Agents recorded as connected that have no live connection in this process. */
  private releaseOrphans(): void {
    for (const agent of this.registry.list()) {
      if (agent.status === "connected" && !this.channel.isOpen(agent.id)) {
        this.registry.deregister(agent.id, "no connection after restart");
      }
    }
  }

  // ─── Waiters ──────────────────────────────────────────────────────

  private notifyWaiters(task: Task): void {
    if (!TERMINAL_STATUSES.has(task.status)) return;
    const set = this.waiters.get(task.id);
    if (!set) return;
    this.waiters.delete(task.id);
    for (const waiter of set) {
      clearTimeout(waiter.timer);
      waiter.resolve(task);
    }
  }

  private removeWaiter(taskId: string, waiter: Waiter): void {
    const set = this.waiters.get(taskId);
    if (!set) return;
    set.delete(waiter);
    if (set.size === 0) this.waiters.delete(taskId);
  }
}
