// ============================================================================
// Switchyard — Task Tools
// ============================================================================

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DEFAULT_LIST_LIMIT, DEFAULT_WAIT_TIMEOUT_MS, MAX_LIST_LIMIT, TOOL_PREFIX } from "../constants.js";
import type { Coordinator } from "../coordinator.js";
import { success, toolError } from "../response.js";
import { TASK_STATUSES } from "../types.js";

const MAX_WAIT_MS = 300_000;

export function registerTaskTools(server: McpServer, coordinator: Coordinator): void {
  // ─── SUBMIT TASK ────────────────────────────────────────────────────
  server.registerTool(
    `${TOOL_PREFIX}_submit_task`,
    {
      title: "Submit Task",
      description: `Queue a task for the next live agent that advertises the required capability.

Args:
  - type (string): Task type, passed to the agent unchanged
  - payload (any JSON, optional): Opaque task input
  - capability (string, optional): Capability an agent must advertise; omit to accept any agent

Returns:
  The new task id. The task starts PENDING.`,
      inputSchema: {
        type: z.string().min(1).describe("Task type"),
        payload: z.unknown().optional().describe("Opaque JSON payload"),
        capability: z.string().min(1).optional().describe("Required agent capability"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
    async ({ type, payload, capability }) => {
      try {
        const taskId = coordinator.submitTask(type, payload ?? null, capability ?? null);
        return success({ task_id: taskId, status: "pending" });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ─── TASK STATUS ────────────────────────────────────────────────────
  server.registerTool(
    `${TOOL_PREFIX}_task_status`,
    {
      title: "Task Status",
      description: `Get the current snapshot of one task: status, assigned agent, retry count, result or error.`,
      inputSchema: {
        task_id: z.string().min(1).describe("Task id"),
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ task_id }) => {
      try {
        return success({ task: coordinator.getTaskStatus(task_id) });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ─── LIST TASKS ─────────────────────────────────────────────────────
  server.registerTool(
    `${TOOL_PREFIX}_list_tasks`,
    {
      title: "List Tasks",
      description: `List tasks in one status, oldest first.

Args:
  - status: ${TASK_STATUSES.map((s) => `"${s}"`).join(" | ")}
  - limit (number, optional): Maximum rows (default ${DEFAULT_LIST_LIMIT}, max ${MAX_LIST_LIMIT})`,
      inputSchema: {
        status: z.enum(TASK_STATUSES).describe("Task status"),
        limit: z.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ status, limit }) => {
      try {
        const tasks = coordinator.listTasks(status, limit);
        return success({ status, count: tasks.length, tasks });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ─── CANCEL TASK ────────────────────────────────────────────────────
  server.registerTool(
    `${TOOL_PREFIX}_cancel_task`,
    {
      title: "Cancel Task",
      description: `Cancel a task that has not been assigned yet. The task becomes FAILED with error "cancelled". Assigned or settled tasks cannot be cancelled.`,
      inputSchema: {
        task_id: z.string().min(1).describe("Task id"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
    async ({ task_id }) => {
      try {
        return success({ task: coordinator.cancelTask(task_id) });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ─── WAIT FOR TASK ──────────────────────────────────────────────────
  server.registerTool(
    `${TOOL_PREFIX}_wait_task`,
    {
      title: "Wait For Task",
      description: `Block until a task reaches COMPLETED, FAILED or EXPIRED, or the timeout passes (WAIT_TIMEOUT, retryable).`,
      inputSchema: {
        task_id: z.string().min(1).describe("Task id"),
        timeout_ms: z.number().int().min(1).max(MAX_WAIT_MS).default(DEFAULT_WAIT_TIMEOUT_MS),
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ task_id, timeout_ms }) => {
      try {
        return success({ task: await coordinator.waitForTask(task_id, timeout_ms) });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ─── REPORT RESULT ──────────────────────────────────────────────────
  server.registerTool(
    `${TOOL_PREFIX}_report_result`,
    {
      title: "Report Result",
      description: `Record the outcome of an assigned task on behalf of an agent. A report for a task that is no longer assigned is accepted but not applied (applied: false).

Args:
  - task_id (string): Task id
  - status: "completed" | "failed"
  - result (any JSON, optional): Result for a completed task
  - error (string, optional): Error message for a failed task
  - agent_id (string, optional): Reporting agent; reports from an agent that no longer holds the task are discarded`,
      inputSchema: {
        task_id: z.string().min(1),
        status: z.enum(["completed", "failed"]),
        result: z.unknown().optional(),
        error: z.string().optional(),
        agent_id: z.string().min(1).optional(),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ task_id, status, result, error, agent_id }) => {
      try {
        const value = status === "completed" ? result : error;
        const outcome = coordinator.reportResult(task_id, status, value, agent_id);
        return success({ applied: outcome.applied, task: outcome.task });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ─── TASK HISTORY ───────────────────────────────────────────────────
  server.registerTool(
    `${TOOL_PREFIX}_task_history`,
    {
      title: "Task History",
      description: `Every status change of one task, oldest first, with the agent involved and the reason.`,
      inputSchema: {
        task_id: z.string().min(1).describe("Task id"),
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ task_id }) => {
      try {
        const events = coordinator.taskHistory(task_id);
        return success({ task_id, count: events.length, events });
      } catch (err) {
        return toolError(err);
      }
    }
  );
}
