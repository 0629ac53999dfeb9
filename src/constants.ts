// ============================================================================
// Switchyard — Constants
// ============================================================================

import { existsSync, readFileSync } from "fs";
import { fileURLToPath } from "url";
import path from "path";

/** Nearest package.json above this module: src/ when run from sources, dist/src/ when built. */
function readPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 3; depth++) {
    const candidate = path.join(dir, "package.json");
    if (existsSync(candidate)) {
      return (JSON.parse(readFileSync(candidate, "utf-8")) as { version: string }).version;
    }
    dir = path.dirname(dir);
  }
  return "0.0.0";
}

export const SERVER_NAME = "switchyard";
export const SERVER_VERSION: string = readPackageVersion();
export const TOOL_PREFIX = "switchyard";
export const ENV_PREFIX = "SWITCHYARD_";

// Database
export const DB_DIR_NAME = ".switchyard";
export const DB_FILE_NAME = "coordinator.db";
export const DB_VERSION = 2; // V1 agents + tasks, V2 task_events audit trail

// Scheduling defaults
export const DEFAULT_ASSIGNMENT_TIMEOUT_MS = 30_000;
export const DEFAULT_LIVENESS_WINDOW_MS = 15_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_SCHEDULING_BATCH_SIZE = 32;
export const DEFAULT_AGENT_CONCURRENCY = 1;
export const DEFAULT_SWEEP_INTERVAL_MS = 5_000;
export const DEFAULT_AGENT_RETENTION_MS = 7 * 24 * 60 * 60_000; // 7 days
export const DEFAULT_TASK_RETENTION_MS = 7 * 24 * 60 * 60_000;
/** Largest delay setTimeout/setInterval honour; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

// Gateway
export const DEFAULT_GATEWAY_PORT = 7420;
export const DEFAULT_HELLO_TIMEOUT_MS = 5_000;
export const CLOSE_CODE_PROTOCOL = 4400;
export const CLOSE_CODE_CONFLICT = 4409;
export const CLOSE_CODE_HELLO_TIMEOUT = 4408;

// Error strings persisted on tasks
export const MAX_RETRIES_EXCEEDED = "max retries exceeded";
export const CANCELLED = "cancelled";
export const SHUTTING_DOWN = "coordinator stopped";

// Listing limits
export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 500;
export const DEFAULT_WAIT_TIMEOUT_MS = 30_000;
