// ============================================================================
// Tests — Delivery Channel & Local Connections
// ============================================================================

import { describe, test, expect, beforeEach, vi } from "vitest";
import { AgentChannel } from "../../src/channel/agent-channel.js";
import type { AgentConnection, ConnectionSink } from "../../src/channel/agent-channel.js";
import { LocalConnection } from "../../src/channel/local-connection.js";
import type { OutboundFrame } from "../../src/channel/protocol.js";
import { ChannelClosedError, CoordinatorError } from "../../src/errors.js";

const ACK: OutboundFrame = { type: "ack", taskId: "t1", applied: true };

/** A connection whose transport always fails. */
class BrokenConnection implements AgentConnection {
  readonly isOpen = true;
  attach(_sink: ConnectionSink): void { }
  async send(): Promise<void> {
    throw new Error("socket hang up");
  }
  close(): void { }
}

let channel: AgentChannel;

beforeEach(() => {
  channel = new AgentChannel();
});

describe("send", () => {
  test("delivers a frame to the bound connection", async () => {
    const conn = new LocalConnection("a1");
    const received: OutboundFrame[] = [];
    conn.onFrame((frame) => received.push(frame));
    channel.bind("a1", conn);

    await channel.send("a1", ACK);
    expect(received).toEqual([ACK]);
  });

  test("rejects with ChannelClosedError when nothing is bound", async () => {
    await expect(channel.send("a1", ACK)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  test("rejects with ChannelClosedError when the transport fails", async () => {
    channel.bind("a1", new BrokenConnection());
    await expect(channel.send("a1", ACK)).rejects.toMatchObject({ code: "CHANNEL_CLOSED", retryable: true });
  });
});

describe("inbound frames", () => {
  test("tags each frame with the agent it came from", () => {
    const handler = vi.fn();
    channel.onMessage(handler);
    const a1 = new LocalConnection("a1");
    const a2 = new LocalConnection("a2");
    channel.bind("a1", a1);
    channel.bind("a2", a2);

    a2.heartbeat();
    a1.complete("t1", "x");

    expect(handler.mock.calls).toEqual([
      ["a2", { type: "heartbeat" }],
      ["a1", { type: "task.result", taskId: "t1", status: "completed", result: "x" }],
    ]);
  });

  test("accepts a single consumer", () => {
    channel.onMessage(() => undefined);
    expect(() => channel.onMessage(() => undefined)).toThrow(CoordinatorError);
  });
});

describe("connection lifecycle", () => {
  test("reports a remote close and forgets the connection", async () => {
    const onClosed = vi.fn();
    channel.onClosed(onClosed);
    const conn = new LocalConnection("a1");
    channel.bind("a1", conn);

    conn.close("agent crashed");

    expect(onClosed).toHaveBeenCalledWith("a1", "agent crashed");
    expect(channel.isOpen("a1")).toBe(false);
    expect(channel.size).toBe(0);
    await expect(channel.send("a1", ACK)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  test("closes the connection on unbind without reporting it", () => {
    const onClosed = vi.fn();
    channel.onClosed(onClosed);
    const conn = new LocalConnection("a1");
    channel.bind("a1", conn);

    expect(channel.unbind("a1", "disconnected by request")).toBe(true);
    expect(channel.unbind("a1", "again")).toBe(false);

    expect(conn.isOpen).toBe(false);
    expect(conn.closeReason).toBe("disconnected by request");
    expect(onClosed).not.toHaveBeenCalled();
  });

  test("closes a replaced connection and ignores it afterwards", () => {
    const onClosed = vi.fn();
    channel.onClosed(onClosed);
    const first = new LocalConnection("a1");
    const second = new LocalConnection("a1");
    channel.bind("a1", first);
    channel.bind("a1", second);

    expect(first.closeReason).toBe("replaced by a new connection");
    expect(onClosed).not.toHaveBeenCalled();
    expect(channel.isOpen("a1")).toBe(true);
    expect(() => first.heartbeat()).toThrow(ChannelClosedError);
  });

  test("closes every connection on closeAll", () => {
    const a1 = new LocalConnection("a1");
    const a2 = new LocalConnection("a2");
    channel.bind("a1", a1);
    channel.bind("a2", a2);

    channel.closeAll("coordinator stopped");

    expect(a1.closeReason).toBe("coordinator stopped");
    expect(a2.closeReason).toBe("coordinator stopped");
    expect(channel.boundAgents()).toEqual([]);
  });
});

describe("LocalConnection", () => {
  test("refuses to send once closed", async () => {
    const conn = new LocalConnection("a1");
    const onClose = vi.fn();
    conn.onClose(onClose);
    conn.close();
    conn.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith("closed");
    await expect(conn.send(ACK)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  test("keeps delivering when a frame listener throws", async () => {
    const conn = new LocalConnection("a1");
    const second = vi.fn();
    conn.onFrame(() => { throw new Error("listener broke"); });
    conn.onFrame(second);

    await conn.send(ACK);
    expect(second).toHaveBeenCalledWith(ACK);
  });
});
