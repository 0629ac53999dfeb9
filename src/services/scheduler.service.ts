// ============================================================================
// Switchyard — Scheduler Service
// ============================================================================
// Matches pending tasks to live, capable agents and watches every assignment
// until a result arrives or its deadline passes.
//
// Passes are coalesced per instance: a trigger while a pass is running asks
// for exactly one more pass. Several schedulers may share one store; the
// store's guarded transition decides every race, and the loser of a claim or
// reclaim simply moves on.
// ============================================================================

import { MAX_RETRIES_EXCEEDED } from "../constants.js";
import { StaleTransitionError, UnknownTaskError } from "../errors.js";
import { describeError, log } from "../logger.js";
import type { DeliveryChannel } from "../channel/agent-channel.js";
import type { TaskStore } from "../repositories/tasks.repo.js";
import type { AgentRegistry } from "./registry.service.js";
import type { Assignment, Clock, ReportStatus, Task } from "../types.js";

export interface SchedulerOptions {
  assignmentTimeoutMs: number;
  maxRetries: number;
  batchSize: number;
  /** Assignments one agent may hold at a time. */
  agentConcurrency: number;
  clock?: Clock;
}

export type ReclaimOutcome = "requeued" | "expired" | "stale";

export interface ReportOutcome {
  /** False when the report arrived for an assignment that no longer exists. */
  applied: boolean;
  task: Task;
}

export type SettledListener = (task: Task) => void;

interface Watch {
  assignment: Assignment;
  timer: NodeJS.Timeout;
}

export class Scheduler {
  private readonly clock: Clock;
  private readonly watches = new Map<string, Watch>();
  private readonly settledListeners = new Set<SettledListener>();
  private current: Promise<void> | null = null;
  private passing = false;
  private rerun = false;
  private stopped = false;

  constructor(
    private store: TaskStore,
    private registry: AgentRegistry,
    private channel: DeliveryChannel,
    private options: SchedulerOptions,
  ) {
    this.clock = options.clock ?? Date.now;
  }

  // ─── Passes ───────────────────────────────────────────────────────

  /** Request a scheduling pass. Never throws; failures are logged. */
  trigger(reason: string): void {
    if (this.stopped) return;
    if (this.passing) {
      this.rerun = true;
      return;
    }
    this.passing = true;
    log.debug("Scheduling pass requested", { reason });
    this.current = this.drain();
  }

  /** Resolves once no pass is running or queued. */
  async idle(): Promise<void> {
    while (this.current) await this.current;
  }

  private async drain(): Promise<void> {
    try {
      do {
        this.rerun = false;
        await this.runPass();
      } while (this.rerun && !this.stopped);
    } catch (err) {
      log.error("Scheduling pass failed; pending tasks wait for the next trigger", { message: describeError(err) });
    } finally {
      this.passing = false;
      this.current = null;
    }
  }

  /**
   * One pass over up to batchSize pending tasks, oldest first.
   * Returns the number of tasks this pass assigned.
   */
  async runPass(): Promise<number> {
    let assigned = 0;
    for (const task of this.store.listByStatus("pending", this.options.batchSize)) {
      if (this.stopped) break;
      const agentId = this.pickAgent(task);
      if (!agentId) continue;

      const claimed = this.claim(task.id, agentId);
      if (!claimed) continue;
      assigned++;
      await this.deliver(claimed);
    }
    return assigned;
  }

  /** First connected, capable agent with an open connection and spare capacity. */
  private pickAgent(task: Task): string | null {
    for (const agentId of this.registry.findCapable(task.capability)) {
      if (!this.channel.isOpen(agentId)) continue;
      if (this.store.countAssignedTo(agentId) < this.options.agentConcurrency) return agentId;
    }
    return null;
  }

  private claim(taskId: string, agentId: string): Task | null {
    try {
      return this.store.transition(taskId, "pending", "assigned", {
        assignedAgent: agentId,
        assignedAt: this.clock(),
      });
    } catch (err) {
      if (err instanceof StaleTransitionError) {
        log.debug("Claim lost to a concurrent transition", { taskId, agentId, actual: err.actual });
        return null;
      }
      throw err;
    }
  }

  private async deliver(task: Task): Promise<void> {
    const agentId = task.assignedAgent;
    if (agentId === null) return;
    const assignedAt = task.assignedAt ?? this.clock();
    const assignment: Assignment = {
      taskId: task.id,
      agentId,
      assignedAt,
      deadline: assignedAt + this.options.assignmentTimeoutMs,
      attempt: task.retryCount + 1,
    };

    // Armed before the send so a reply that arrives during it finds the watch.
    this.watch(assignment);
    try {
      await this.channel.send(agentId, {
        type: "task.assign",
        taskId: task.id,
        taskType: task.type,
        payload: task.payload,
        capability: task.capability,
        deadline: assignment.deadline,
        attempt: assignment.attempt,
      });
      log.info("Task assigned", { taskId: task.id, agentId, attempt: assignment.attempt });
    } catch (err) {
      log.warn("Delivery failed; reclaiming", { taskId: task.id, agentId, message: describeError(err) });
      this.reclaim(task.id, agentId, task.retryCount, "delivery failed");
    }
  }

  // ─── Deadlines ────────────────────────────────────────────────────

  private watch(assignment: Assignment): void {
    this.unwatch(assignment.taskId);
    const delay = Math.max(0, assignment.deadline - this.clock());
    const timer = setTimeout(() => this.onDeadline(assignment), delay);
    timer.unref();
    this.watches.set(assignment.taskId, { assignment, timer });
  }

  /** Drop a task's watch; with `episode`, only if the watch belongs to it. */
  private unwatch(taskId: string, episode?: { agentId: string; attempt: number }): void {
    const existing = this.watches.get(taskId);
    if (!existing) return;
    if (episode && (existing.assignment.agentId !== episode.agentId || existing.assignment.attempt !== episode.attempt)) {
      return;
    }
    clearTimeout(existing.timer);
    this.watches.delete(taskId);
  }

  private onDeadline(assignment: Assignment): void {
    if (this.watches.get(assignment.taskId)?.assignment !== assignment) return;
    this.watches.delete(assignment.taskId);
    try {
      this.reclaim(assignment.taskId, assignment.agentId, assignment.attempt - 1, "assignment deadline elapsed");
    } catch (err) {
      log.error("Reclaim failed; retrying after another timeout", { taskId: assignment.taskId, message: describeError(err) });
      if (!this.stopped) {
        this.watch({ ...assignment, deadline: this.clock() + this.options.assignmentTimeoutMs });
      }
    }
  }

  /**
   * Take a task back from the agent holding it. `retryCount` pins the
   * assignment episode: a task that has since been settled or reassigned
   * is left alone ("stale").
   */
  reclaim(taskId: string, agentId: string, retryCount: number, reason: string): ReclaimOutcome {
    const next = retryCount + 1;
    const guard = { assignedAgent: agentId, retryCount };
    let outcome: ReclaimOutcome;
    try {
      if (next > this.options.maxRetries) {
        const task = this.store.transition(taskId, "assigned", "expired", {
          error: MAX_RETRIES_EXCEEDED,
          retryCount: next,
          detail: reason,
        }, guard);
        log.warn("Task expired", { taskId, agentId, attempts: next, reason });
        this.unwatch(taskId);
        this.emitSettled(task);
        outcome = "expired";
      } else {
        this.store.transition(taskId, "assigned", "pending", { retryCount: next, detail: reason }, guard);
        log.info("Task requeued", { taskId, agentId, retryCount: next, reason });
        this.unwatch(taskId);
        outcome = "requeued";
      }
    } catch (err) {
      if (err instanceof StaleTransitionError || err instanceof UnknownTaskError) {
        log.debug("Reclaim skipped", { taskId, agentId, message: err.message });
        this.unwatch(taskId, { agentId, attempt: retryCount + 1 });
        return "stale";
      }
      throw err;
    }
    this.trigger("reclaim");
    return outcome;
  }

  /** Reclaim every task currently assigned to `agentId`. */
  reclaimAgent(agentId: string, reason: string): Record<ReclaimOutcome, number> {
    const counts: Record<ReclaimOutcome, number> = { requeued: 0, expired: 0, stale: 0 };
    for (const task of this.store.listAssignedTo(agentId)) {
      counts[this.reclaim(task.id, agentId, task.retryCount, reason)]++;
    }
    return counts;
  }

  /**
   * Rebuild deadline watches for tasks left assigned by a previous run.
   * Deadlines already in the past fire on the next tick.
   */
  recover(): number {
    let recovered = 0;
    for (const task of this.store.listByStatus("assigned")) {
      if (task.assignedAgent === null || this.watches.has(task.id)) continue;
      const assignedAt = task.assignedAt ?? this.clock();
      this.watch({
        taskId: task.id,
        agentId: task.assignedAgent,
        assignedAt,
        deadline: assignedAt + this.options.assignmentTimeoutMs,
        attempt: task.retryCount + 1,
      });
      recovered++;
    }
    if (recovered > 0) log.info(`Recovered ${recovered} in-flight assignment(s)`);
    return recovered;
  }

  // ─── Results ──────────────────────────────────────────────────────

  /**
   * Apply a completion or failure report. A report for a task that is no
   * longer assigned, or that another agent now holds, is accepted and
   * discarded.
   */
  reportResult(taskId: string, status: ReportStatus, value: unknown, agentId?: string): ReportOutcome {
    const current = this.store.get(taskId);
    const holder = current.assignedAgent;
    if (current.status !== "assigned" || holder === null) {
      log.info("Discarding report for a task that is no longer assigned", { taskId, status: current.status, agentId });
      return { applied: false, task: current };
    }
    if (agentId !== undefined && agentId !== holder) {
      log.info("Discarding report from an agent that does not hold the task", { taskId, agentId, holder });
      return { applied: false, task: current };
    }

    const changes = status === "completed"
      ? { result: value }
      : { error: describeFailure(value) };
    try {
      const task = this.store.transition(taskId, "assigned", status, changes, {
        assignedAgent: holder,
        retryCount: current.retryCount,
      });
      this.unwatch(taskId);
      log.info("Task settled", { taskId, agentId: holder, status });
      this.emitSettled(task);
      this.trigger("result reported");
      return { applied: true, task };
    } catch (err) {
      if (err instanceof StaleTransitionError) {
        log.debug("Report lost to a concurrent transition", { taskId, agentId: holder });
        return { applied: false, task: this.store.get(taskId) };
      }
      throw err;
    }
  }

  // ─── Lifecycle ────────────────────────────────────────────────────

  activeAssignments(): Assignment[] {
    return [...this.watches.values()].map((w) => w.assignment);
  }

  onSettled(listener: SettledListener): () => void {
    this.settledListeners.add(listener);
    return () => this.settledListeners.delete(listener);
  }

  /** Stop accepting triggers, drop every deadline watch and wait for the running pass. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.idle();
    for (const { timer } of this.watches.values()) clearTimeout(timer);
    this.watches.clear();
  }

  private emitSettled(task: Task): void {
    for (const listener of this.settledListeners) {
      try {
        listener(task);
      } catch (err) {
        log.error("Settled listener failed", { taskId: task.id, message: describeError(err) });
      }
    }
  }
}

function describeFailure(value: unknown): string {
  if (typeof value === "string" && value !== "") return value;
  if (value === undefined || value === null || value === "") return "task failed";
  return JSON.stringify(value);
}
