// ============================================================================
// Switchyard — Error Types
// ============================================================================

import type { TaskStatus } from "./types.js";

/**
 * Base error class for all coordinator errors.
 * `retryable` tells a caller whether the same request may succeed later
 * without changing its input.
 */
export class CoordinatorError extends Error {
    readonly code: string;
    readonly retryable: boolean;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: string = "COORDINATOR_ERROR",
        context?: Record<string, unknown>,
        retryable: boolean = false,
    ) {
        super(message);
        this.name = "CoordinatorError";
        this.code = code;
        this.context = context;
        this.retryable = retryable;
    }
}

export class UnknownAgentError extends CoordinatorError {
    constructor(agentId: string) {
        super(`Agent "${agentId}" is not registered.`, "UNKNOWN_AGENT", { agentId });
        this.name = "UnknownAgentError";
    }
}

export class DuplicateActiveAgentError extends CoordinatorError {
    constructor(agentId: string) {
        super(`Agent "${agentId}" is already connected.`, "DUPLICATE_ACTIVE_AGENT", { agentId });
        this.name = "DuplicateActiveAgentError";
    }
}

export class UnknownTaskError extends CoordinatorError {
    constructor(taskId: string) {
        super(`Task ${taskId} not found.`, "UNKNOWN_TASK", { taskId });
        this.name = "UnknownTaskError";
    }
}

/**
 * A guarded transition lost its compare-and-set. Expected under contention;
 * the losing side abandons its attempt.
 */
export class StaleTransitionError extends CoordinatorError {
    readonly expected: TaskStatus;
    readonly actual: TaskStatus;

    constructor(taskId: string, expected: TaskStatus, actual: TaskStatus, reason?: string) {
        super(
            `Task ${taskId} is ${actual}, expected ${expected}${reason ? ` (${reason})` : ""}.`,
            "STALE_TRANSITION",
            { taskId, expected, actual, reason },
        );
        this.name = "StaleTransitionError";
        this.expected = expected;
        this.actual = actual;
    }
}

export class InvalidTransitionError extends CoordinatorError {
    constructor(from: TaskStatus, to: TaskStatus) {
        super(`Transition ${from} → ${to} is not allowed.`, "INVALID_TRANSITION", { from, to });
        this.name = "InvalidTransitionError";
    }
}

export class TaskNotCancellableError extends CoordinatorError {
    constructor(taskId: string, status: TaskStatus) {
        super(`Task ${taskId} is ${status}; only pending tasks can be cancelled.`, "TASK_NOT_CANCELLABLE", { taskId, status });
        this.name = "TaskNotCancellableError";
    }
}

export class ChannelClosedError extends CoordinatorError {
    constructor(agentId: string) {
        super(`No open connection to agent "${agentId}".`, "CHANNEL_CLOSED", { agentId }, true);
        this.name = "ChannelClosedError";
    }
}

export class StoreUnavailableError extends CoordinatorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(`Task store unavailable: ${message}`, "STORE_UNAVAILABLE", context, true);
        this.name = "StoreUnavailableError";
    }
}

export class WaitTimeoutError extends CoordinatorError {
    constructor(taskId: string, timeoutMs: number) {
        super(`Task ${taskId} did not settle within ${timeoutMs}ms.`, "WAIT_TIMEOUT", { taskId, timeoutMs }, true);
        this.name = "WaitTimeoutError";
    }
}

/**
 * Thrown when input validation fails beyond what Zod catches.
 */
export class ValidationError extends CoordinatorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "VALIDATION_ERROR", context);
        this.name = "ValidationError";
    }
}
