// ============================================================================
// Tests — Agent Registry Service
// ============================================================================

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { createTestDb, manualClock } from "../helpers/test-db.js";
import { AgentRegistry, LIVENESS_EXPIRED } from "../../src/services/registry.service.js";
import { DuplicateActiveAgentError, UnknownAgentError, ValidationError } from "../../src/errors.js";

let registry: AgentRegistry;
let clock: ReturnType<typeof manualClock>;
let cleanup: () => void;

beforeEach(() => {
  clock = manualClock(10_000);
  const testDb = createTestDb(clock);
  registry = new AgentRegistry(testDb.repos.agents, { livenessWindowMs: 1_000, clock });
  cleanup = testDb.cleanup;
});

afterEach(() => cleanup());

describe("register", () => {
  test("creates a connected agent with trimmed, de-duplicated capabilities", () => {
    const agent = registry.register("a1", [" echo", "sql", "echo", ""]);

    expect(agent.status).toBe("connected");
    expect(agent.capabilities).toEqual(["echo", "sql"]);
    expect(agent.connectedAt).toBe(10_000);
  });

  test("rejects a second registration while connected", () => {
    registry.register("a1", ["echo"]);
    expect(() => registry.register("a1", ["echo"])).toThrow(DuplicateActiveAgentError);
  });

  test("reactivates an agent after it disconnected", () => {
    registry.register("a1", ["echo"]);
    registry.deregister("a1");
    clock.advance(500);

    const agent = registry.register("a1", ["sql"]);
    expect(agent.capabilities).toEqual(["sql"]);
    expect(agent.connectedAt).toBe(10_500);
  });

  test("rejects an empty id", () => {
    expect(() => registry.register(" ", [])).toThrow(ValidationError);
  });

  test("notifies availability listeners", () => {
    const onAvailable = vi.fn();
    registry.onAvailable(onAvailable);

    registry.register("a1", []);
    expect(onAvailable).toHaveBeenCalledWith("a1");
  });
});

describe("heartbeat", () => {
  test("refreshes the last heartbeat", () => {
    registry.register("a1", []);
    clock.advance(300);
    registry.heartbeat("a1");

    expect(registry.get("a1").lastHeartbeat).toBe(10_300);
  });

  test("rejects an unknown or disconnected agent", () => {
    expect(() => registry.heartbeat("nobody")).toThrow(UnknownAgentError);

    registry.register("a1", []);
    registry.deregister("a1");
    expect(() => registry.heartbeat("a1")).toThrow(UnknownAgentError);
  });
});

describe("deregister", () => {
  test("disconnects once and notifies listeners with the reason", () => {
    const onDisconnected = vi.fn();
    registry.onDisconnected(onDisconnected);
    registry.register("a1", []);

    expect(registry.deregister("a1", "shutting down")).toBe(true);
    expect(registry.deregister("a1", "again")).toBe(false);

    expect(onDisconnected).toHaveBeenCalledTimes(1);
    expect(onDisconnected).toHaveBeenCalledWith("a1", "shutting down");
    expect(registry.get("a1").disconnectReason).toBe("shutting down");
  });

  test("rejects an id that was never registered", () => {
    expect(() => registry.deregister("nobody")).toThrow(UnknownAgentError);
  });

  test("keeps notifying when one listener throws", () => {
    const second = vi.fn();
    registry.onDisconnected(() => { throw new Error("listener broke"); });
    registry.onDisconnected(second);
    registry.register("a1", []);

    expect(registry.deregister("a1")).toBe(true);
    expect(second).toHaveBeenCalledWith("a1", "deregistered");
  });

  test("stops notifying after unsubscribe", () => {
    const listener = vi.fn();
    const unsubscribe = registry.onDisconnected(listener);
    unsubscribe();
    registry.register("a1", []);
    registry.deregister("a1");

    expect(listener).not.toHaveBeenCalled();
  });
});

describe("findCapable", () => {
  test("yields connected agents with the capability, freshest first", () => {
    registry.register("a1", ["echo"]);
    clock.advance(10);
    registry.register("a2", ["echo"]);
    clock.advance(10);
    registry.register("a3", ["sql"]);

    expect([...registry.findCapable("echo")]).toEqual(["a2", "a1"]);
    expect([...registry.findCapable(null)]).toEqual(["a3", "a2", "a1"]);
    expect([...registry.findCapable("")]).toEqual(["a3", "a2", "a1"]);
  });

  test("can be consumed only once", () => {
    registry.register("a1", ["echo"]);
    const candidates = registry.findCapable("echo");

    expect([...candidates]).toEqual(["a1"]);
    expect([...candidates]).toEqual([]);
  });
});

describe("sweep", () => {
  test("disconnects agents silent for longer than the liveness window", () => {
    const onDisconnected = vi.fn();
    registry.onDisconnected(onDisconnected);
    registry.register("quiet", []);
    registry.register("chatty", []);

    clock.advance(800);
    registry.heartbeat("chatty");
    clock.advance(400);

    expect(registry.sweep()).toEqual(["quiet"]);
    expect(onDisconnected).toHaveBeenCalledWith("quiet", LIVENESS_EXPIRED);
    expect(registry.get("chatty").status).toBe("connected");
    expect(registry.sweep()).toEqual([]);
  });

  test("keeps an agent heard from exactly at the window edge", () => {
    registry.register("a1", []);
    clock.advance(1_000);
    expect(registry.sweep()).toEqual([]);
  });
});

describe("prune", () => {
  test("forgets agents disconnected for longer than the retention period", () => {
    registry.register("a1", []);
    registry.register("a2", []);
    registry.deregister("a1");
    clock.advance(5_000);

    expect(registry.prune(1_000)).toBe(1);
    expect(() => registry.get("a1")).toThrow(UnknownAgentError);
    expect(registry.list().map((a) => a.id)).toEqual(["a2"]);
  });

  test("reports counts per status", () => {
    registry.register("a1", []);
    registry.register("a2", []);
    registry.deregister("a2");
    expect(registry.counts()).toEqual({ connected: 1, disconnected: 1 });
  });
});
