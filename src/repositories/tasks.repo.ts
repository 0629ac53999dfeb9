// ============================================================================
// Switchyard — Tasks Repository (the task store)
// ============================================================================
//
// Every write to a task goes through transition(): one IMMEDIATE transaction
// that checks the current status (and optional assignment guard), applies the
// UPDATE with the same conditions in its WHERE clause, and appends a row to
// task_events. Two schedulers racing for the same pending task can therefore
// never both succeed.
//
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import { randomUUID } from "crypto";
import { withStore } from "../database.js";
import {
    InvalidTransitionError,
    StaleTransitionError,
    UnknownTaskError,
    ValidationError,
} from "../errors.js";
import { TERMINAL_STATUSES } from "../types.js";
import type {
    Clock,
    Task,
    TaskEvent,
    TaskEventRow,
    TaskRow,
    TaskStatus,
    TransitionChanges,
    TransitionGuard,
} from "../types.js";

export interface TaskStore {
    create(type: string, payload: unknown, capability?: string | null): string;
    get(taskId: string): Task;
    transition(
        taskId: string,
        from: TaskStatus,
        to: TaskStatus,
        changes?: TransitionChanges,
        guard?: TransitionGuard,
    ): Task;
    listByStatus(status: TaskStatus, limit?: number): Generator<Task, void, undefined>;
    listAssignedTo(agentId: string): Task[];
    countAssignedTo(agentId: string): number;
    countByStatus(): Record<TaskStatus, number>;
    history(taskId: string): TaskEvent[];
    pruneTerminal(olderThan: number): number;
}

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
    pending: ["assigned", "failed"],
    assigned: ["pending", "completed", "failed", "expired"],
    completed: [],
    failed: [],
    expired: [],
};

export function isTransitionAllowed(from: TaskStatus, to: TaskStatus): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}

function parseJson(raw: string | null): unknown {
    if (raw === null) return null;
    return JSON.parse(raw);
}

function toTask(row: TaskRow): Task {
    return {
        id: row.id,
        type: row.type,
        payload: parseJson(row.payload),
        capability: row.capability,
        status: row.status,
        assignedAgent: row.assigned_agent,
        retryCount: row.retry_count,
        createdAt: row.created_at,
        assignedAt: row.assigned_at,
        completedAt: row.completed_at,
        result: parseJson(row.result),
        error: row.error,
    };
}

function toEvent(row: TaskEventRow): TaskEvent {
    return {
        taskId: row.task_id,
        at: row.at,
        from: row.from_status,
        to: row.to_status,
        agentId: row.agent_id,
        detail: row.detail,
    };
}

export class TasksRepo implements TaskStore {
    constructor(private db: DatabaseType, private clock: Clock = Date.now) { }

    private run<T>(op: () => T): T {
        return withStore(this.db, op);
    }

    private getRow(taskId: string): TaskRow | null {
        return (this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(taskId) as TaskRow | undefined) ?? null;
    }

    private recordEvent(
        taskId: string,
        at: number,
        from: TaskStatus | null,
        to: TaskStatus,
        agentId: string | null,
        detail: string | null,
    ): void {
        this.db.prepare(
            "INSERT INTO task_events (task_id, at, from_status, to_status, agent_id, detail) VALUES (?, ?, ?, ?, ?, ?)"
        ).run(taskId, at, from, to, agentId, detail);
    }

    create(type: string, payload: unknown, capability: string | null = null): string {
        if (type.trim() === "") throw new ValidationError("Task type must not be empty.");
        const id = randomUUID();
        const now = this.clock();
        const cap = capability === null || capability === "" ? null : capability;

        this.run(() => {
            this.db.transaction(() => {
                this.db.prepare(
                    "INSERT INTO tasks (id, type, payload, capability, status, created_at) VALUES (?, ?, ?, ?, 'pending', ?)"
                ).run(id, type, JSON.stringify(payload ?? null), cap, now);
                this.recordEvent(id, now, null, "pending", null, null);
            })();
        });
        return id;
    }

    get(taskId: string): Task {
        const row = this.run(() => this.getRow(taskId));
        if (!row) throw new UnknownTaskError(taskId);
        return toTask(row);
    }

    transition(
        taskId: string,
        from: TaskStatus,
        to: TaskStatus,
        changes: TransitionChanges = {},
        guard: TransitionGuard = {},
    ): Task {
        if (!isTransitionAllowed(from, to)) throw new InvalidTransitionError(from, to);
        if (to === "assigned" && !changes.assignedAgent) {
            throw new ValidationError("An assignment needs an agent.", { taskId });
        }

        const now = this.clock();
        const sets: string[] = ["status = ?"];
        const params: unknown[] = [to];

        if (to === "assigned") {
            sets.push("assigned_agent = ?", "assigned_at = ?");
            params.push(changes.assignedAgent, changes.assignedAt ?? now);
        } else if (to === "pending") {
            sets.push("assigned_agent = NULL", "assigned_at = NULL");
        } else {
            sets.push("assigned_agent = NULL", "completed_at = ?");
            params.push(changes.completedAt ?? now);
        }
        if (to === "completed") {
            sets.push("result = ?");
            params.push(JSON.stringify(changes.result ?? null));
        }
        if (to === "failed" || to === "expired") {
            sets.push("error = ?");
            params.push(changes.error ?? "unknown error");
        }
        if (changes.retryCount !== undefined) {
            sets.push("retry_count = ?");
            params.push(changes.retryCount);
        }

        const where: string[] = ["id = ?", "status = ?"];
        params.push(taskId, from);
        if (guard.assignedAgent !== undefined) { where.push("assigned_agent = ?"); params.push(guard.assignedAgent); }
        if (guard.retryCount !== undefined) { where.push("retry_count = ?"); params.push(guard.retryCount); }

        const apply = () => this.db.transaction((): TaskRow => {
            const before = this.getRow(taskId);
            if (!before) throw new UnknownTaskError(taskId);
            if (before.status !== from) throw new StaleTransitionError(taskId, from, before.status);
            if (guard.assignedAgent !== undefined && before.assigned_agent !== guard.assignedAgent) {
                throw new StaleTransitionError(taskId, from, before.status, `held by ${before.assigned_agent ?? "nobody"}`);
            }
            if (guard.retryCount !== undefined && before.retry_count !== guard.retryCount) {
                throw new StaleTransitionError(taskId, from, before.status, `attempt ${before.retry_count}, not ${guard.retryCount}`);
            }

            const result = this.db.prepare(
                `UPDATE tasks SET ${sets.join(", ")} WHERE ${where.join(" AND ")}`
            ).run(...params);
            if (result.changes === 0) throw new StaleTransitionError(taskId, from, before.status);

            const agentId = to === "assigned" ? changes.assignedAgent ?? null : before.assigned_agent;
            this.recordEvent(taskId, now, from, to, agentId, changes.detail ?? null);

            const after = this.getRow(taskId);
            if (!after) throw new UnknownTaskError(taskId);
            return after;
        });

        return toTask(this.run(() => apply().immediate()));
    }

    /**
     * Snapshot of tasks in one status, oldest first. Rows are read when this
     * is called; the returned generator converts them lazily and can be
     * consumed once.
     */
    listByStatus(status: TaskStatus, limit?: number): Generator<Task, void, undefined> {
        const rows = this.run(() => {
            if (limit !== undefined) {
                return this.db.prepare(
                    "SELECT * FROM tasks WHERE status = ? ORDER BY seq LIMIT ?"
                ).all(status, limit) as TaskRow[];
            }
            return this.db.prepare("SELECT * FROM tasks WHERE status = ? ORDER BY seq").all(status) as TaskRow[];
        });
        return (function* () {
            for (const row of rows) yield toTask(row);
        })();
    }

    listAssignedTo(agentId: string): Task[] {
        const rows = this.run(() => this.db.prepare(
            "SELECT * FROM tasks WHERE status = 'assigned' AND assigned_agent = ? ORDER BY seq"
        ).all(agentId) as TaskRow[]);
        return rows.map(toTask);
    }

    countAssignedTo(agentId: string): number {
        return this.run(() => (this.db.prepare(
            "SELECT COUNT(*) as c FROM tasks WHERE status = 'assigned' AND assigned_agent = ?"
        ).get(agentId) as { c: number }).c);
    }

    countByStatus(): Record<TaskStatus, number> {
        const rows = this.run(() => this.db.prepare(
            "SELECT status, COUNT(*) as count FROM tasks GROUP BY status"
        ).all() as Array<{ status: TaskStatus; count: number }>);

        const counts: Record<TaskStatus, number> = { pending: 0, assigned: 0, completed: 0, failed: 0, expired: 0 };
        for (const row of rows) counts[row.status] = row.count;
        return counts;
    }

    history(taskId: string): TaskEvent[] {
        const rows = this.run(() => this.db.prepare(
            "SELECT * FROM task_events WHERE task_id = ? ORDER BY id"
        ).all(taskId) as TaskEventRow[]);
        // Every task has at least its creation event.
        if (rows.length === 0) throw new UnknownTaskError(taskId);
        return rows.map(toEvent);
    }

    /** Delete terminal tasks (and their events) that settled before `olderThan` (Unix ms). */
    pruneTerminal(olderThan: number): number {
        const terminal = [...TERMINAL_STATUSES];
        const marks = terminal.map(() => "?").join(", ");
        return this.run(() => this.db.transaction(() => {
            this.db.prepare(
                `DELETE FROM task_events WHERE task_id IN (SELECT id FROM tasks WHERE status IN (${marks}) AND completed_at < ?)`
            ).run(...terminal, olderThan);
            return this.db.prepare(
                `DELETE FROM tasks WHERE status IN (${marks}) AND completed_at < ?`
            ).run(...terminal, olderThan).changes;
        })());
    }
}
