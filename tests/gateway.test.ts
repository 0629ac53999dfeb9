// ============================================================================
// Tests — Agent Gateway (loopback WebSocket)
// ============================================================================

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { WebSocket } from "ws";
import { createTestDb } from "./helpers/test-db.js";
import { Coordinator } from "../src/coordinator.js";
import { parseConfig } from "../src/config.js";
import { AgentGateway } from "../src/gateway.js";
import { rawToString } from "../src/channel/ws-connection.js";

interface TestClient {
  socket: WebSocket;
  frames: Array<Record<string, unknown>>;
  closed: Promise<{ code: number; reason: string }>;
  send(frame: unknown): void;
}

let coordinator: Coordinator;
let cleanup: () => void;
let gateway: AgentGateway | null = null;
const clients: WebSocket[] = [];

async function startGateway(helloTimeoutMs = 2_000): Promise<number> {
  gateway = new AgentGateway(coordinator, { port: 0, host: "127.0.0.1", helloTimeoutMs });
  return gateway.listen();
}

function openClient(port: number): Promise<TestClient> {
  const socket = new WebSocket(`ws://127.0.0.1:${port}`);
  clients.push(socket);
  const frames: Array<Record<string, unknown>> = [];
  socket.on("message", (data) => frames.push(JSON.parse(rawToString(data))));
  const closed = new Promise<{ code: number; reason: string }>((resolve) => {
    socket.on("close", (code, reason) => resolve({ code, reason: reason.toString("utf8") }));
  });
  return new Promise((resolve, reject) => {
    socket.once("error", reject);
    socket.once("open", () => resolve({
      socket,
      frames,
      closed,
      send: (frame) => socket.send(typeof frame === "string" ? frame : JSON.stringify(frame)),
    }));
  });
}

async function hello(port: number, agentId: string, capabilities: string[] = []): Promise<TestClient> {
  const client = await openClient(port);
  client.send({ type: "hello", agentId, capabilities });
  await vi.waitFor(() => expect(client.frames[0]).toEqual({ type: "welcome", agentId }));
  return client;
}

beforeEach(() => {
  const testDb = createTestDb();
  cleanup = testDb.cleanup;
  coordinator = new Coordinator({ db: testDb.db, config: parseConfig({ assignmentTimeout: 60_000 }) });
});

afterEach(async () => {
  for (const socket of clients.splice(0)) socket.terminate();
  await gateway?.close();
  gateway = null;
  await coordinator.stop();
  cleanup();
});

describe("AgentGateway", () => {
  test("registers an agent on hello and carries tasks both ways", async () => {
    const port = await startGateway();
    const client = await hello(port, "remote-1", ["echo"]);
    expect(coordinator.listAgents()[0]).toMatchObject({ id: "remote-1", status: "connected", capabilities: ["echo"] });

    const taskId = coordinator.submitTask("echo", "x", "echo");
    await vi.waitFor(() => expect(client.frames).toHaveLength(2));
    expect(client.frames[1]).toMatchObject({ type: "task.assign", taskId, taskType: "echo", payload: "x", capability: "echo", attempt: 1 });

    client.send({ type: "task.result", taskId, status: "completed", result: "x" });
    await vi.waitFor(() => expect(client.frames[2]).toEqual({ type: "ack", taskId, applied: true }));
    expect(coordinator.getTaskStatus(taskId)).toMatchObject({ status: "completed", result: "x" });
  });

  test("closes a socket whose first frame is not hello", async () => {
    const port = await startGateway();
    const client = await openClient(port);

    client.send({ type: "heartbeat" });

    expect(await client.closed).toEqual({ code: 4400, reason: "The first frame must be hello." });
    expect(client.frames).toEqual([{ type: "error", code: "PROTOCOL_ERROR", message: "The first frame must be hello." }]);
  });

  test("closes a socket whose hello is not JSON", async () => {
    const port = await startGateway();
    const client = await openClient(port);

    client.send("hello?");

    expect((await client.closed).code).toBe(4400);
    expect(client.frames).toEqual([{ type: "error", code: "VALIDATION_ERROR", message: "Frame is not valid JSON." }]);
  });

  test("survives a frame with invalid UTF-8 before hello", async () => {
    const port = await startGateway();
    const client = await openClient(port);

    client.socket.send(Buffer.from([0xff, 0xfe, 0xfd]), { binary: false });

    expect((await client.closed).code).toBe(1007);
    expect(coordinator.listAgents()).toEqual([]);

    await hello(port, "remote-1");
    expect(coordinator.listAgents()[0]).toMatchObject({ id: "remote-1", status: "connected" });
  });

  test("refuses a second connection for a connected agent id", async () => {
    const port = await startGateway();
    const first = await hello(port, "remote-1");
    const second = await openClient(port);

    second.send({ type: "hello", agentId: "remote-1" });

    expect((await second.closed).code).toBe(4409);
    expect(second.frames[0]).toMatchObject({ type: "error", code: "DUPLICATE_ACTIVE_AGENT" });
    expect(first.socket.readyState).toBe(WebSocket.OPEN);
    expect(coordinator.listAgents()[0].status).toBe("connected");
  });

  test("closes a socket that never says hello", async () => {
    const port = await startGateway(50);
    const client = await openClient(port);

    expect(await client.closed).toEqual({ code: 4408, reason: "hello timeout" });
    expect(coordinator.listAgents()).toEqual([]);
  });

  test("answers a malformed frame after hello and keeps the connection", async () => {
    const port = await startGateway();
    const client = await hello(port, "remote-1");

    client.send({ type: "task.result" });

    await vi.waitFor(() => expect(client.frames).toHaveLength(2));
    expect(client.frames[1]).toMatchObject({ type: "error", code: "VALIDATION_ERROR" });
    expect(client.socket.readyState).toBe(WebSocket.OPEN);
  });

  test("disconnects the agent and requeues its task when the socket closes", async () => {
    const port = await startGateway();
    const client = await hello(port, "remote-1");
    const taskId = coordinator.submitTask("echo", "x");
    await vi.waitFor(() => expect(client.frames).toHaveLength(2));

    client.socket.close();

    await vi.waitFor(() => expect(coordinator.listAgents()[0].status).toBe("disconnected"));
    expect(coordinator.listAgents()[0].disconnectReason).toBe("socket closed (1005)");
    expect(coordinator.getTaskStatus(taskId)).toMatchObject({ status: "pending", retryCount: 1 });
  });
});
