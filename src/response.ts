// ============================================================================
// Switchyard — MCP Response Helpers
// ============================================================================

import { CoordinatorError } from "./errors.js";
import { describeError, log } from "./logger.js";

interface McpToolResponse {
    [key: string]: unknown;
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
}

/** JSON replacer that drops null fields from tool output. */
function stripNulls(_key: string, value: unknown): unknown {
    return value === null ? undefined : value;
}

/**
 * Return a successful JSON response (compact, no whitespace, nulls stripped).
 */
export function success(data: Record<string, unknown>): McpToolResponse {
    return {
        content: [{ type: "text", text: JSON.stringify(data, stripNulls) }],
    };
}

/**
 * Return an error response with structured data (compact, nulls stripped).
 */
export function errorWithData(message: string, data: Record<string, unknown>): McpToolResponse {
    return {
        isError: true,
        content: [{ type: "text", text: JSON.stringify({ error: message, ...data }, stripNulls) }],
    };
}

/**
 * Map a thrown value to an error response. Coordinator errors keep their
 * code and retryable flag; anything else is reported as INTERNAL_ERROR.
 */
export function toolError(err: unknown): McpToolResponse {
    if (err instanceof CoordinatorError) {
        return errorWithData(err.message, { code: err.code, retryable: err.retryable });
    }
    log.error("Unexpected tool failure", { message: describeError(err) });
    return errorWithData(describeError(err), { code: "INTERNAL_ERROR", retryable: false });
}
