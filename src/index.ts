#!/usr/bin/env node
// ============================================================================
//
//   Switchyard — task coordination for agent fleets
//   Agent gateway (WebSocket) + Model Context Protocol (MCP) server
//
// ============================================================================

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import { Coordinator } from "./coordinator.js";
import { AgentGateway } from "./gateway.js";
import { describeError, log } from "./logger.js";
import { registerAgentTools } from "./tools/agents.js";
import { registerTaskTools } from "./tools/tasks.js";

const USAGE = `Usage: switchyard [--help] [--version]

Starts the agent gateway and, unless SWITCHYARD_TRANSPORT=none, an MCP server
on stdio. Configuration comes from SWITCHYARD_* environment variables:
  SWITCHYARD_DB_PATH, SWITCHYARD_GATEWAY_PORT, SWITCHYARD_ASSIGNMENT_TIMEOUT,
  SWITCHYARD_LIVENESS_WINDOW, SWITCHYARD_MAX_RETRIES, SWITCHYARD_LOG_LEVEL, ...`;

// ─── Initialize ───────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes("--version") || args.includes("-v")) {
    console.log(SERVER_VERSION);
    return;
  }
  if (args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const coordinator = Coordinator.open(config);
  coordinator.start();

  const gateway = new AgentGateway(coordinator, {
    port: config.gatewayPort,
    helloTimeoutMs: config.helloTimeout,
  });
  await gateway.listen();

  // ─── Connect Transport ───────────────────────────────────────────

  if (config.transport === "stdio") {
    const server = new McpServer({
      name: SERVER_NAME,
      version: SERVER_VERSION,
    });
    registerTaskTools(server, coordinator);
    registerAgentTools(server, coordinator);
    log.info(`${SERVER_NAME} v${SERVER_VERSION} — all tools registered`);

    await server.connect(new StdioServerTransport());
    log.info("Running on stdio transport. Ready.");
  } else {
    log.info("MCP transport disabled; serving agents only.");
  }

  // ─── Shutdown ────────────────────────────────────────────────────

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info(`Received ${signal}, shutting down`);
    await gateway.close();
    await coordinator.stop();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.error("Shutdown failed", { message: describeError(err) });
          process.exit(1);
        },
      );
    });
  }
}

// ─── Run ──────────────────────────────────────────────────────────────

main().catch((error: unknown) => {
  log.error("Fatal error", { message: describeError(error) });
  process.exit(1);
});
