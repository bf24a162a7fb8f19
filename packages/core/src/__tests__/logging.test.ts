import { describe, it, expect } from "vitest";
import { z } from "zod";
import { getLogger, getLogLevel, initLogging, parseLogLevel } from "../logging";

const LogLine = z.record(z.unknown());

function captureLogs(level: Parameters<typeof initLogging>[0]["level"]): Array<Record<string, unknown>> {
  const lines: Array<Record<string, unknown>> = [];
  initLogging({
    level,
    destination: {
      write(msg: string) {
        lines.push(LogLine.parse(JSON.parse(msg)));
      },
    },
  });
  return lines;
}

describe("logging", () => {
  it("should emit JSON lines with category and metadata", () => {
    const lines = captureLogs("info");

    getLogger("runner").info("query finished", { target: "us2_0001" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: "info",
      layer: "cli",
      category: "runner",
      target: "us2_0001",
      msg: "query finished",
    });
    expect(lines[0]).not.toHaveProperty("pid");
  });

  it("should respect the level threshold", () => {
    const lines = captureLogs("warn");
    const logger = getLogger();

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(lines.map((l) => l.msg)).toEqual(["shown"]);
  });

  it("should redact secrets", () => {
    const lines = captureLogs("info");

    getLogger().info("credentials resolved", { accessKey: "test-secret" });

    expect(lines[0]?.accessKey).toBe("[redacted]");
  });

  it("should redact secrets nested one level down", () => {
    const lines = captureLogs("debug");

    getLogger().debug("Command flags", { flags: { apikey: "test-id:test-secret", range: "1h" } });

    expect(lines[0]?.flags).toEqual({ apikey: "[redacted]", range: "1h" });
  });

  it("should serialize errors under err", () => {
    const lines = captureLogs("error");

    getLogger().error("failed", new Error("boom"));

    expect(lines[0]).toMatchObject({ msg: "failed", err: { message: "boom" } });
  });

  it("should merge child bindings", () => {
    const lines = captureLogs("info");

    getLogger("cli").child({ category: "executor", meta: { jobId: "J1" } }).info("polling");

    expect(lines[0]).toMatchObject({ category: "executor", jobId: "J1", msg: "polling" });
  });
});

describe("log level helpers", () => {
  it("should parse known levels case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("silent")).toBe("silent");
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(3)).toBeUndefined();
  });

  it("should read the level from the environment", () => {
    expect(getLogLevel({ QPROF_LOG_LEVEL: "warn" })).toBe("warn");
    expect(getLogLevel({ LOG_LEVEL: "error" })).toBe("error");
    expect(getLogLevel({})).toBe("info");
  });
});
