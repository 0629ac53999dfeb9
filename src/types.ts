// ============================================================================
// Switchyard — Type Definitions
// ============================================================================

// ─── Status Unions ──────────────────────────────────────────────────────────

export const TASK_STATUSES = ["pending", "assigned", "completed", "failed", "expired"] as const;
export type TaskStatus = typeof TASK_STATUSES[number];

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(["completed", "failed", "expired"]);

export type AgentStatus = "connected" | "disconnected";

/** Outcome an agent may report for an assigned task. */
export type ReportStatus = "completed" | "failed";

// ─── Database Row Types ─────────────────────────────────────────────────────

export interface TaskRow {
  seq: number;
  id: string;
  type: string;
  payload: string;              // JSON
  capability: string | null;
  status: TaskStatus;
  assigned_agent: string | null;
  retry_count: number;
  created_at: number;           // Unix ms
  assigned_at: number | null;
  completed_at: number | null;
  result: string | null;        // JSON
  error: string | null;
}

export interface AgentRow {
  id: string;
  capabilities: string;         // JSON array
  status: AgentStatus;
  connected_at: number;
  last_heartbeat: number;
  disconnected_at: number | null;
  disconnect_reason: string | null;
}

export interface TaskEventRow {
  id: number;
  task_id: string;
  at: number;
  from_status: TaskStatus | null;
  to_status: TaskStatus;
  agent_id: string | null;
  detail: string | null;
}

// ─── Domain Snapshots ───────────────────────────────────────────────────────

export interface Task {
  id: string;
  type: string;
  payload: unknown;
  capability: string | null;
  status: TaskStatus;
  assignedAgent: string | null;
  retryCount: number;
  createdAt: number;
  assignedAt: number | null;
  completedAt: number | null;
  result: unknown;
  error: string | null;
}

export interface Agent {
  id: string;
  capabilities: string[];
  status: AgentStatus;
  connectedAt: number;
  lastHeartbeat: number;
  disconnectedAt: number | null;
  disconnectReason: string | null;
}

export interface TaskEvent {
  taskId: string;
  at: number;
  from: TaskStatus | null;
  to: TaskStatus;
  agentId: string | null;
  detail: string | null;
}

/** Fields a guarded transition may write alongside the new status. */
export interface TransitionChanges {
  assignedAgent?: string;
  assignedAt?: number;
  completedAt?: number;
  result?: unknown;
  error?: string;
  retryCount?: number;
  /** Free-text note recorded in the task's event history. */
  detail?: string;
}

/** Extra compare-and-set conditions that pin a transition to one assignment. */
export interface TransitionGuard {
  assignedAgent?: string;
  retryCount?: number;
}

/**
 * Ephemeral claim held by the scheduler while a task is assigned.
 * Rebuilt from assigned rows after a restart.
 */
export interface Assignment {
  taskId: string;
  agentId: string;
  assignedAt: number;
  deadline: number;
  attempt: number;
}

export type Clock = () => number;
