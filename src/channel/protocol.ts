// ============================================================================
// Switchyard — Agent Wire Protocol
// ============================================================================
// One JSON object per frame. Inbound frames come from agents and are validated
// with zod before anything acts on them; outbound frames are built in code.
// ============================================================================

import { z } from "zod";
import { ValidationError } from "../errors.js";

// ─── Agent → Coordinator ─────────────────────────────────────────────

export const HelloFrameSchema = z.object({
  type: z.literal("hello"),
  agentId: z.string().min(1).max(200),
  capabilities: z.array(z.string().min(1).max(100)).max(64).default([]),
});

export const HeartbeatFrameSchema = z.object({
  type: z.literal("heartbeat"),
});

export const TaskResultFrameSchema = z.object({
  type: z.literal("task.result"),
  taskId: z.string().min(1),
  status: z.enum(["completed", "failed"]),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

export const InboundFrameSchema = z.discriminatedUnion("type", [
  HelloFrameSchema,
  HeartbeatFrameSchema,
  TaskResultFrameSchema,
]);

export type HelloFrame = z.infer<typeof HelloFrameSchema>;
export type TaskResultFrame = z.infer<typeof TaskResultFrameSchema>;
export type InboundFrame = z.infer<typeof InboundFrameSchema>;

// ─── Coordinator → Agent ─────────────────────────────────────────────

export interface WelcomeFrame {
  type: "welcome";
  agentId: string;
}

export interface TaskAssignFrame {
  type: "task.assign";
  taskId: string;
  taskType: string;
  payload: unknown;
  capability: string | null;
  /** Unix ms after which the assignment is reclaimed. */
  deadline: number;
  /** 1 for the first delivery, incremented on every reclaim. */
  attempt: number;
}

export interface AckFrame {
  type: "ack";
  taskId: string;
  applied: boolean;
}

export interface ErrorFrame {
  type: "error";
  code: string;
  message: string;
}

export type OutboundFrame = WelcomeFrame | TaskAssignFrame | AckFrame | ErrorFrame;

// ─── Codec ───────────────────────────────────────────────────────────

/** Parse one inbound frame. Throws ValidationError for bad JSON or an unknown shape. */
export function decodeFrame(raw: string): InboundFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError("Frame is not valid JSON.");
  }
  const result = InboundFrameSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "frame"}: ${i.message}`);
    throw new ValidationError(`Invalid frame — ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

export function encodeFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame);
}
