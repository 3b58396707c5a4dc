/**
 * Unit tests for structured logging and in-process metrics
 */

import { describe, it, expect } from "vitest";
import { Logger, parseLogLevel } from "../../observability/logger.js";
import { MetricsRegistry, metrics, recordToolExecution } from "../../observability/metrics.js";

describe("Logger", () => {
  function capture(level: "debug" | "info" | "warn" | "error" = "info") {
    const lines: string[] = [];
    const logger = new Logger(level, (line) => lines.push(line));
    const entries = (): Array<Record<string, unknown>> =>
      lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === "object" && parsed !== null ? { ...parsed } : {};
      });
    return { logger, lines, entries };
  }

  it("should write one JSON object per event", () => {
    const { logger, entries } = capture();
    logger.info("service.init", { data_root: "/tmp/x" });
    expect(entries()).toEqual([
      { ts: expect.any(String), level: "info", event: "service.init", data_root: "/tmp/x" },
    ]);
  });

  it("should drop events below the minimum level", () => {
    const { logger, lines } = capture("warn");
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    expect(lines).toHaveLength(2);
  });

  it("should follow setLevel", () => {
    const { logger, lines } = capture("info");
    logger.setLevel("error");
    logger.warn("ignored");
    expect(lines).toHaveLength(0);
  });

  it("should render bigint values as strings", () => {
    const { logger, entries } = capture();
    logger.info("store.write", { cas: 123n });
    expect(entries()[0]).toMatchObject({ cas: "123" });
  });

  it("should log tool outcomes", () => {
    const { logger, entries } = capture();
    logger.toolCall("subdoc_get", 5, { status: "PathNotFound" });
    logger.toolCall("doc_put", 7, { err: Object.assign(new Error("disk full"), { code: "WRITE_ERROR" }) });
    expect(entries()).toEqual([
      expect.objectContaining({ event: "tool.success", tool: "subdoc_get", status: "PathNotFound" }),
      expect.objectContaining({
        event: "tool.error",
        level: "error",
        tool: "doc_put",
        err_code: "WRITE_ERROR",
        err_message: "disk full",
      }),
    ]);
  });

  it("should parse log levels case-insensitively", () => {
    expect(parseLogLevel(" Warn ")).toBe("warn");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("trace")).toBe("info");
  });
});

describe("MetricsRegistry", () => {
  it("should count by name and labels", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls", { tool: "a" });
    registry.inc("calls", { tool: "a" });
    registry.inc("calls", { tool: "b" });
    expect(registry.getCounter("calls", { tool: "a" })).toBe(2);
    expect(registry.getCounter("calls", { tool: "b" })).toBe(1);
    expect(registry.getCounter("calls")).toBe(0);
  });

  it("should summarize histograms", () => {
    const registry = new MetricsRegistry();
    for (let i = 1; i <= 100; i++) registry.observe("latency", i);
    expect(registry.getHistogram("latency")).toEqual({ count: 100, sum: 5050, p50: 50, p95: 95, p99: 99 });
    expect(registry.getHistogram("missing")).toBeNull();
  });

  it("should keep a bounded window of samples", () => {
    const registry = new MetricsRegistry();
    for (let i = 0; i < 1001; i++) registry.observe("latency", 1);
    expect(registry.getHistogram("latency")).toMatchObject({ count: 1000, sum: 1000 });
  });

  it("should list everything with label keys", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls", { tool: "a", kind: "x" });
    registry.observe("latency", 3, { tool: "a" });
    expect(registry.getAllMetrics()).toEqual({
      counters: { 'calls{kind="x",tool="a"}': 1 },
      histograms: { 'latency{tool="a"}': { count: 1, sum: 3, p50: 3, p95: 3, p99: 3 } },
    });
  });
});

describe("recordToolExecution", () => {
  it("should count statuses and errors separately", () => {
    metrics.reset();
    recordToolExecution("subdoc_get", 4, { status: "Success" });
    recordToolExecution("subdoc_get", 6, { errCode: "ETIMEDOUT" });

    expect(metrics.getCounter("subdoc.tool.calls_total", { tool: "subdoc_get" })).toBe(2);
    expect(metrics.getCounter("subdoc.tool.status_total", { tool: "subdoc_get", status: "Success" })).toBe(1);
    expect(metrics.getCounter("subdoc.tool.errors_total", { tool: "subdoc_get", err_code: "ETIMEDOUT" })).toBe(1);
    expect(metrics.getHistogram("subdoc.tool.latency_ms", { tool: "subdoc_get" })).toMatchObject({ count: 2, sum: 10 });
  });
});
