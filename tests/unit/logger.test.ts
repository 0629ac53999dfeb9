// ============================================================================
// Unit Tests — Logger
// ============================================================================

import { describe, it, expect, afterEach, vi } from "vitest";
import { describeError, formatMessage, isLogLevel, log } from "../../src/logger.js";

const initialLevel = log.getLevel();

afterEach(() => {
  log.setLevel(initialLevel);
  vi.restoreAllMocks();
});

describe("formatMessage", () => {
  it("should prefix the level and append the context as JSON", () => {
    expect(formatMessage("warn", "Task requeued", { taskId: "t1", retryCount: 1 }))
      .toBe('[Switchyard] [WARN] Task requeued {"taskId":"t1","retryCount":1}');
  });

  it("should omit an empty context", () => {
    expect(formatMessage("info", "Coordinator stopped", {})).toBe("[Switchyard] [INFO] Coordinator stopped");
  });
});

describe("log levels", () => {
  it("should drop messages below the current level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    log.setLevel("error");

    log.warn("quiet");
    log.error("loud");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("[Switchyard] [ERROR] loud");
  });

  it("should recognise level names only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe("describeError", () => {
  it("should use the message of an Error and stringify anything else", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });
});
