// ============================================================================
// Switchyard — Structured Logger
// ============================================================================
// Writes to stderr: stdout belongs to the MCP stdio transport.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
    debug: "DEBUG",
    info: "INFO",
    warn: "WARN",
    error: "ERROR",
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && value in LEVEL_ORDER;
}

const envLevel = process.env.SWITCHYARD_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

function shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMessage(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const parts = [`[Switchyard] [${LEVEL_LABELS[level]}] ${message}`];
    if (context && Object.keys(context).length > 0) {
        parts.push(JSON.stringify(context));
    }
    return parts.join(" ");
}

export const log = {
    debug(message: string, context?: Record<string, unknown>): void {
        if (shouldLog("debug")) console.error(formatMessage("debug", message, context));
    },

    info(message: string, context?: Record<string, unknown>): void {
        if (shouldLog("info")) console.error(formatMessage("info", message, context));
    },

    warn(message: string, context?: Record<string, unknown>): void {
        if (shouldLog("warn")) console.error(formatMessage("warn", message, context));
    },

    error(message: string, context?: Record<string, unknown>): void {
        if (shouldLog("error")) console.error(formatMessage("error", message, context));
    },

    setLevel(level: LogLevel): void {
        currentLevel = level;
    },

    getLevel(): LogLevel {
        return currentLevel;
    },
};

/** Render an unknown thrown value for a log context. */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
