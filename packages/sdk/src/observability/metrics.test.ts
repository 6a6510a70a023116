import { describe, it, expect } from "vitest";
import { MetricsCollector } from "./metrics.js";

describe("MetricsCollector", () => {
  it("should count operations by kind", () => {
    const metrics = new MetricsCollector();
    metrics.recordOperation("article", "put", 2, 1);
    metrics.recordOperation("article", "put", 1, 2);
    metrics.recordOperation("article", "remove", 0, 3);

    expect(metrics.getMetrics("article")).toEqual({
      puts: 2,
      updates: 0,
      removes: 1,
      fields: 3,
      decodeTimeMs: [1, 2, 3],
      errors: {},
    });
    expect(metrics.getOperationCount("article")).toBe(3);
    expect(metrics.getOperationCount("other")).toBe(0);
  });

  it("should count errors by code", () => {
    const metrics = new MetricsCollector();
    metrics.recordError("article", "E_UNKNOWN_FIELD");
    metrics.recordError("article", "E_UNKNOWN_FIELD");
    metrics.recordError("article", "E_JSON_SYNTAX");
    expect(metrics.getMetrics("article")?.errors).toEqual({ E_UNKNOWN_FIELD: 2, E_JSON_SYNTAX: 1 });
  });

  it("should keep the last 100 samples", () => {
    const metrics = new MetricsCollector();
    for (let i = 1; i <= 105; i++) {
      metrics.recordOperation("article", "update", 1, i);
    }
    const samples = metrics.getMetrics("article")?.decodeTimeMs ?? [];
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(6);
  });

  it("should calculate p95", () => {
    const metrics = new MetricsCollector();
    const values = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(metrics.getP95(values)).toBe(19);
    expect(metrics.getP95([])).toBe(0);

    for (const ms of [5, 1, 3]) {
      metrics.recordOperation("article", "put", 0, ms);
    }
    expect(metrics.getP95DecodeTime("article")).toBe(5);
    expect(metrics.getP95DecodeTime("missing")).toBe(0);
  });

  it("should reset one type or all of them", () => {
    const metrics = new MetricsCollector();
    metrics.recordOperation("a", "put", 0, 1);
    metrics.recordOperation("b", "put", 0, 1);
    metrics.reset("a");
    expect(Array.from(metrics.getAllMetrics().keys())).toEqual(["b"]);
    metrics.reset();
    expect(metrics.getAllMetrics().size).toBe(0);
  });
});
