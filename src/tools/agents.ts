// ============================================================================
// Switchyard — Agent & Stats Tools
// ============================================================================

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DB_VERSION, SERVER_VERSION, TOOL_PREFIX } from "../constants.js";
import type { Coordinator } from "../coordinator.js";
import { success, toolError } from "../response.js";

export function registerAgentTools(server: McpServer, coordinator: Coordinator): void {
    // ─── LIST AGENTS ──────────────────────────────────────────────────
    server.registerTool(
        `${TOOL_PREFIX}_list_agents`,
        {
            title: "List Agents",
            description: `List known agents with their capabilities, status and last heartbeat (Unix ms). Connected agents first when status is omitted.`,
            inputSchema: {
                status: z.enum(["connected", "disconnected"]).optional().describe("Filter by status"),
            },
            annotations: {
                readOnlyHint: true,
                destructiveHint: false,
                idempotentHint: true,
                openWorldHint: false,
            },
        },
        async ({ status }) => {
            try {
                const agents = coordinator.listAgents()
                    .filter((a) => status === undefined || a.status === status)
                    .sort((a, b) => Number(a.status === "disconnected") - Number(b.status === "disconnected"));
                return success({ count: agents.length, agents });
            } catch (err) {
                return toolError(err);
            }
        }
    );

    // ─── DISCONNECT AGENT ─────────────────────────────────────────────
    server.registerTool(
        `${TOOL_PREFIX}_disconnect_agent`,
        {
            title: "Disconnect Agent",
            description: `Close an agent's connection and mark it disconnected. Tasks it holds are requeued, or expired when out of retries.`,
            inputSchema: {
                agent_id: z.string().min(1).describe("Agent id"),
                reason: z.string().min(1).optional().describe("Recorded disconnect reason"),
            },
            annotations: {
                readOnlyHint: false,
                destructiveHint: true,
                idempotentHint: true,
                openWorldHint: false,
            },
        },
        async ({ agent_id, reason }) => {
            try {
                const changed = coordinator.disconnectAgent(agent_id, reason);
                return success({
                    agent_id,
                    disconnected: changed,
                    message: changed ? `Agent "${agent_id}" disconnected.` : `Agent "${agent_id}" was already disconnected.`,
                });
            } catch (err) {
                return toolError(err);
            }
        }
    );

    // ─── STATS ────────────────────────────────────────────────────────
    server.registerTool(
        `${TOOL_PREFIX}_stats`,
        {
            title: "Coordinator Statistics",
            description: `Task counts per status, connected and disconnected agents, open connections, watched assignments and pending waiters.`,
            inputSchema: {},
            annotations: {
                readOnlyHint: true,
                destructiveHint: false,
                idempotentHint: true,
                openWorldHint: false,
            },
        },
        async () => {
            try {
                return success({
                    server_version: SERVER_VERSION,
                    schema_version: DB_VERSION,
                    ...coordinator.stats(),
                });
            } catch (err) {
                return toolError(err);
            }
        }
    );
}
