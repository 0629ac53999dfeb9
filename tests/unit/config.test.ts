// ============================================================================
// Unit Tests — Configuration
// ============================================================================

import * as path from "path";
import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig, parseConfig, parseDuration } from "../../src/config.js";
import { DB_DIR_NAME, DB_FILE_NAME, MAX_TIMER_DELAY_MS } from "../../src/constants.js";
import { ValidationError } from "../../src/errors.js";

describe("parseDuration", () => {
  it("should accept plain milliseconds as number or string", () => {
    expect(parseDuration(1500)).toBe(1500);
    expect(parseDuration("1500")).toBe(1500);
  });

  it("should apply unit suffixes", () => {
    expect(parseDuration("500ms")).toBe(500);
    expect(parseDuration("30s")).toBe(30_000);
    expect(parseDuration("2m")).toBe(120_000);
    expect(parseDuration("1h")).toBe(3_600_000);
    expect(parseDuration("7d")).toBe(604_800_000);
    expect(parseDuration(" 1.5s ")).toBe(1500);
  });

  it("should reject negative, non-finite and malformed values", () => {
    expect(parseDuration(-1)).toBeNull();
    expect(parseDuration(Number.NaN)).toBeNull();
    expect(parseDuration("-5s")).toBeNull();
    expect(parseDuration("soon")).toBeNull();
    expect(parseDuration("10 weeks")).toBeNull();
  });
});

describe("parseConfig", () => {
  it("should fill every option with its default", () => {
    expect(DEFAULT_CONFIG).toEqual({
      assignmentTimeout: 30_000,
      livenessWindow: 15_000,
      maxRetries: 3,
      schedulingBatchSize: 32,
      agentConcurrency: 1,
      sweepInterval: 5_000,
      agentRetention: 604_800_000,
      taskRetention: 604_800_000,
      dbPath: path.join(DB_DIR_NAME, DB_FILE_NAME),
      gatewayPort: 7420,
      helloTimeout: 5_000,
      transport: "stdio",
    });
  });

  it("should allow zero retries", () => {
    expect(parseConfig({ maxRetries: 0 }).maxRetries).toBe(0);
  });

  it("should accept timer-backed durations up to the timer limit", () => {
    const config = parseConfig({
      assignmentTimeout: MAX_TIMER_DELAY_MS,
      sweepInterval: MAX_TIMER_DELAY_MS,
      helloTimeout: "24d",
    });

    expect(config.assignmentTimeout).toBe(2_147_483_647);
    expect(config.sweepInterval).toBe(2_147_483_647);
    expect(config.helloTimeout).toBe(2_073_600_000);
  });

  it("should reject timer-backed durations past the timer limit", () => {
    expect(() => parseConfig({ assignmentTimeout: MAX_TIMER_DELAY_MS + 1 })).toThrow(
      "Invalid configuration — assignmentTimeout: Duration 2147483648 exceeds the 2147483647ms limit",
    );
    expect(() => parseConfig({ assignmentTimeout: "30d" })).toThrow(/assignmentTimeout: Duration 30d exceeds/);
    expect(() => parseConfig({ sweepInterval: "25d" })).toThrow(/sweepInterval/);
    expect(() => parseConfig({ helloTimeout: "30d" })).toThrow(/helloTimeout/);
  });

  it("should allow retention periods past the timer limit", () => {
    const config = parseConfig({ taskRetention: "30d", agentRetention: "90d" });

    expect(config.taskRetention).toBe(2_592_000_000);
    expect(config.agentRetention).toBe(7_776_000_000);
  });

  it("should throw ValidationError naming the bad option", () => {
    expect(() => parseConfig({ assignmentTimeout: "soon" })).toThrow(ValidationError);
    expect(() => parseConfig({ assignmentTimeout: "soon" })).toThrow(
      "Invalid configuration — assignmentTimeout: Invalid duration: soon",
    );
    expect(() => parseConfig({ agentConcurrency: 0 })).toThrow(/agentConcurrency/);
    expect(() => parseConfig({ transport: "http" })).toThrow(/transport/);
  });
});

describe("loadConfig", () => {
  it("should read SWITCHYARD_* variables and ignore empty ones", () => {
    const config = loadConfig({
      SWITCHYARD_ASSIGNMENT_TIMEOUT: "10s",
      SWITCHYARD_MAX_RETRIES: "5",
      SWITCHYARD_TRANSPORT: "none",
      SWITCHYARD_GATEWAY_PORT: "0",
      SWITCHYARD_LIVENESS_WINDOW: "",
      ASSIGNMENT_TIMEOUT: "1s",
    });

    expect(config.assignmentTimeout).toBe(10_000);
    expect(config.maxRetries).toBe(5);
    expect(config.transport).toBe("none");
    expect(config.gatewayPort).toBe(0);
    expect(config.livenessWindow).toBe(15_000);
  });

  it("should let explicit overrides win over the environment", () => {
    const config = loadConfig({ SWITCHYARD_MAX_RETRIES: "5" }, { maxRetries: 1, dbPath: ":memory:" });

    expect(config.maxRetries).toBe(1);
    expect(config.dbPath).toBe(":memory:");
  });

  it("should reject a malformed variable", () => {
    expect(() => loadConfig({ SWITCHYARD_MAX_RETRIES: "lots" })).toThrow(ValidationError);
  });
});
