// ============================================================================
// Switchyard — Configuration
// ============================================================================

import * as path from "path";
import { z } from "zod";
import {
  DB_DIR_NAME,
  DB_FILE_NAME,
  DEFAULT_AGENT_CONCURRENCY,
  DEFAULT_AGENT_RETENTION_MS,
  DEFAULT_ASSIGNMENT_TIMEOUT_MS,
  DEFAULT_GATEWAY_PORT,
  DEFAULT_HELLO_TIMEOUT_MS,
  DEFAULT_LIVENESS_WINDOW_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_SCHEDULING_BATCH_SIZE,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_TASK_RETENTION_MS,
  ENV_PREFIX,
  MAX_TIMER_DELAY_MS,
} from "./constants.js";
import { ValidationError } from "./errors.js";

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

/**
 * Parse a duration written as milliseconds ("1500", 1500) or with a unit
 * suffix ("500ms", "30s", "2m", "1h", "7d"). Returns null when unparseable.
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)?\s*$/.exec(value);
  if (!match) return null;
  const amount = Number(match[1]);
  const unit = match[2] ?? "ms";
  return Math.round(amount * UNIT_MS[unit]);
}

const duration = (fallback: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z
    .union([z.number(), z.string()])
    .default(fallback)
    .transform((value, ctx) => {
      const ms = parseDuration(value);
      if (ms === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration: ${String(value)}` });
        return z.NEVER;
      }
      if (ms > max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duration ${String(value)} exceeds the ${max}ms limit` });
        return z.NEVER;
      }
      return ms;
    });

/** Durations that become a setTimeout/setInterval delay. */
const timerDuration = (fallback: number) => duration(fallback, MAX_TIMER_DELAY_MS);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const ConfigSchema = z.object({
  assignmentTimeout: timerDuration(DEFAULT_ASSIGNMENT_TIMEOUT_MS),
  livenessWindow: duration(DEFAULT_LIVENESS_WINDOW_MS),
  maxRetries: z.coerce.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  schedulingBatchSize: positiveInt(DEFAULT_SCHEDULING_BATCH_SIZE),
  agentConcurrency: positiveInt(DEFAULT_AGENT_CONCURRENCY),
  sweepInterval: timerDuration(DEFAULT_SWEEP_INTERVAL_MS),
  agentRetention: duration(DEFAULT_AGENT_RETENTION_MS),
  taskRetention: duration(DEFAULT_TASK_RETENTION_MS),
  dbPath: z.string().min(1).default(path.join(DB_DIR_NAME, DB_FILE_NAME)),
  gatewayPort: z.coerce.number().int().min(0).max(65535).default(DEFAULT_GATEWAY_PORT),
  helloTimeout: timerDuration(DEFAULT_HELLO_TIMEOUT_MS),
  transport: z.enum(["stdio", "none"]).default("stdio"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/** Environment variable suffix for each option, e.g. SWITCHYARD_ASSIGNMENT_TIMEOUT. */
const ENV_KEYS: Record<keyof Config, string> = {
  assignmentTimeout: "ASSIGNMENT_TIMEOUT",
  livenessWindow: "LIVENESS_WINDOW",
  maxRetries: "MAX_RETRIES",
  schedulingBatchSize: "SCHEDULING_BATCH_SIZE",
  agentConcurrency: "AGENT_CONCURRENCY",
  sweepInterval: "SWEEP_INTERVAL",
  agentRetention: "AGENT_RETENTION",
  taskRetention: "TASK_RETENTION",
  dbPath: "DB_PATH",
  gatewayPort: "GATEWAY_PORT",
  helloTimeout: "HELLO_TIMEOUT",
  transport: "TRANSPORT",
};

/**
 * Build a validated config from explicit overrides layered over
 * SWITCHYARD_* environment variables layered over defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ConfigInput> = {},
): Config {
  const raw: Record<string, unknown> = {};
  for (const [key, suffix] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value !== undefined && value !== "") raw[key] = value;
  }
  return parseConfig({ ...raw, ...overrides });
}

export function parseConfig(input: unknown): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new ValidationError(`Invalid configuration — ${issues.join("; ")}`, { issues });
  }
  return result.data;
}
