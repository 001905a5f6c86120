import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdtempSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { MetricsStore, computeTokensPerSecond, recordMetricBestEffort } from "../metricsStore.js";
import { StorageUnavailableError } from "../errors.js";
import type { CalibrationTest } from "../types.js";

const NOW = Date.parse("2025-06-15T12:00:00.000Z");

function makeTest(overrides: Partial<CalibrationTest> = {}): CalibrationTest {
  return {
    testId: "t1",
    modelId: "llama-3.2-3b",
    promptCategory: "coding",
    prompt: "Implement a stack",
    localResponse: "class Stack {}",
    qualityScore: 0.4,
    evaluationNotes: ["Response is brief"],
    tokensPerSecond: 12.5,
    timestamp: "2025-06-15T10:00:00.000Z",
    passed: false,
    ...overrides,
  };
}

/** A path whose parent is a regular file, so the database can never be created. */
function unwritableDbPath(): string {
  const dir = mkdtempSync(join(tmpdir(), "metrics-store-test-"));
  const blocker = join(dir, "not-a-directory");
  writeFileSync(blocker, "x");
  return join(blocker, "metrics.db");
}

describe("computeTokensPerSecond", () => {
  it("divides completion tokens by latency", () => {
    expect(computeTokensPerSecond(20, 2)).toBe(10);
  });

  it("floors latency at 0.1s", () => {
    expect(computeTokensPerSecond(5, 0.05)).toBe(50);
    expect(computeTokensPerSecond(5, 0)).toBe(50);
  });

  it("returns 0 without completion tokens", () => {
    expect(computeTokensPerSecond(0, 3)).toBe(0);
  });
});

describe("MetricsStore", () => {
  let store: MetricsStore;

  afterEach(() => {
    store?.close();
  });

  it("initialize is idempotent and operations work without it", () => {
    store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
    expect(store.getHandoffTriggers()).toEqual([]);
    store.initialize();
    store.initialize();
    expect(store.getCalibrationResults()).toEqual([]);
  });

  describe("recordMetric", () => {
    it("derives total tokens and throughput", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      store.recordMetric({
        modelId: "m1",
        timestamp: "2025-06-15T11:00:00.000Z",
        promptTokens: 10,
        completionTokens: 20,
        latencySeconds: 2,
        useCase: "chat",
      });
      const [record] = store.listMetrics("m1");
      expect(record).toEqual({
        modelId: "m1",
        timestamp: "2025-06-15T11:00:00.000Z",
        promptTokens: 10,
        completionTokens: 20,
        totalTokens: 30,
        latencySeconds: 2,
        tokensPerSecond: 10,
        success: true,
        useCase: "chat",
      });
    });

    it("drops a duplicate (modelId, timestamp) without raising", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      const input = { modelId: "m1", timestamp: "2025-06-15T11:00:00.000Z", completionTokens: 5 };
      expect(store.recordMetric(input)).toBe(true);
      expect(store.recordMetric({ ...input, completionTokens: 50 })).toBe(false);
      const rows = store.listMetrics("m1");
      expect(rows).toHaveLength(1);
      expect(rows[0].completionTokens).toBe(5);
    });

    it("keeps the same timestamp for different models", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      const timestamp = "2025-06-15T11:00:00.000Z";
      expect(store.recordMetric({ modelId: "m1", timestamp })).toBe(true);
      expect(store.recordMetric({ modelId: "m2", timestamp })).toBe(true);
      expect(store.listMetrics()).toHaveLength(2);
    });

    it("stores errorMessage only for failures", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      store.recordMetric({ modelId: "ok", errorMessage: "ignored" });
      store.recordMetric({ modelId: "bad", success: false, errorMessage: "connection refused" });
      expect(store.listMetrics("ok")[0].errorMessage).toBeUndefined();
      expect(store.listMetrics("bad")[0]).toMatchObject({ success: false, errorMessage: "connection refused" });
    });

    it("defaults the timestamp to the store clock", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      store.recordMetric({ modelId: "m1" });
      expect(store.listMetrics("m1")[0].timestamp).toBe("2025-06-15T12:00:00.000Z");
    });
  });

  describe("summarizeMetrics", () => {
    function seed(s: MetricsStore): void {
      s.recordMetric({ modelId: "m1", timestamp: "2025-06-14T09:00:00.000Z", promptTokens: 10, completionTokens: 20, latencySeconds: 2 });
      s.recordMetric({ modelId: "m1", timestamp: "2025-06-14T10:00:00.000Z", promptTokens: 5, completionTokens: 15, latencySeconds: 1 });
      s.recordMetric({ modelId: "m1", timestamp: "2025-06-13T08:00:00.000Z", latencySeconds: 0.5 });
      s.recordMetric({ modelId: "m1", timestamp: "2025-04-01T08:00:00.000Z", promptTokens: 100, completionTokens: 100, latencySeconds: 4 });
      s.recordMetric({
        modelId: "m2",
        timestamp: "2025-06-12T08:00:00.000Z",
        latencySeconds: 3,
        success: false,
        errorMessage: "timeout",
      });
    }

    it("aggregates per model within the window, busiest first", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      seed(store);
      const summary = store.summarizeMetrics(undefined, 30);
      expect(summary.periodDays).toBe(30);
      expect(summary.modelCount).toBe(2);
      const [m1, m2] = summary.models;
      expect(m1.modelId).toBe("m1");
      expect(m1.totalRequests).toBe(3);
      expect(m1.totalTokens).toBe(50);
      expect(m1.avgTokensPerSecond).toBeCloseTo(25 / 3);
      expect(m1.avgLatencySeconds).toBeCloseTo(3.5 / 3);
      expect(m1.errorCount).toBe(0);
      expect(m1.lastUsed).toBe("2025-06-14T10:00:00.000Z");
      expect(m2).toMatchObject({ modelId: "m2", totalRequests: 1, totalTokens: 0, errorCount: 1 });
    });

    it("widens with windowDays", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      seed(store);
      const summary = store.summarizeMetrics("m1", 90);
      expect(summary.models).toHaveLength(1);
      expect(summary.models[0].totalRequests).toBe(4);
      expect(summary.models[0].totalTokens).toBe(250);
    });

    it("filters by model", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      seed(store);
      const summary = store.summarizeMetrics("m2");
      expect(summary.modelCount).toBe(1);
      expect(summary.models[0].modelId).toBe("m2");
    });

    it("returns an empty summary for an unused model", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      expect(store.summarizeMetrics("nobody", 7)).toEqual({ periodDays: 7, models: [], modelCount: 0 });
    });
  });

  describe("calibration results", () => {
    it("upserts by testId, keeping the latest values", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      store.saveCalibrationResult(makeTest());
      store.saveCalibrationResult(
        makeTest({ qualityScore: 0.8, passed: true, evaluationNotes: ["No issues found"], localResponse: "better" })
      );
      const rows = store.getCalibrationResults();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        testId: "t1",
        qualityScore: 0.8,
        passed: true,
        localResponse: "better",
        evaluationNotes: ["No issues found"],
      });
    });

    it("returns most recent first, filtered and limited", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      store.saveCalibrationResult(makeTest({ testId: "a", timestamp: "2025-06-15T08:00:00.000Z" }));
      store.saveCalibrationResult(makeTest({ testId: "b", timestamp: "2025-06-15T09:00:00.000Z" }));
      store.saveCalibrationResult(makeTest({ testId: "c", timestamp: "2025-06-15T07:00:00.000Z", modelId: "other" }));
      expect(store.getCalibrationResults().map((r) => r.testId)).toEqual(["b", "a", "c"]);
      expect(store.getCalibrationResults("llama-3.2-3b").map((r) => r.testId)).toEqual(["b", "a"]);
      expect(store.getCalibrationResults(undefined, 1).map((r) => r.testId)).toEqual(["b"]);
    });
  });

  describe("handoff triggers", () => {
    it("inserts with count 1, then increments and overwrites confidence", () => {
      let now = NOW;
      store = new MetricsStore({ dbPath: ":memory:", clock: () => now });
      const first = store.recordHandoffTrigger("category_failure", "Repeated failures in coding category", 0.3);
      expect(first).toMatchObject({
        triggerCount: 1,
        confidence: 0.3,
        active: true,
        lastTriggered: "2025-06-15T12:00:00.000Z",
      });

      now = NOW + 60_000;
      const second = store.recordHandoffTrigger("category_failure", "Repeated failures in coding category", 0.5);
      expect(second.id).toBe(first.id);
      expect(second).toMatchObject({ triggerCount: 2, confidence: 0.5, lastTriggered: "2025-06-15T12:01:00.000Z" });
      expect(store.getHandoffTriggers(false)).toHaveLength(1);
    });

    it("orders by trigger count and filters inactive", () => {
      store = new MetricsStore({ dbPath: ":memory:", clock: () => NOW });
      store.recordHandoffTrigger("category_failure", "Repeated failures in writing category", 0.3);
      const busy = store.recordHandoffTrigger("manual", "Legal questions", 0.7);
      store.recordHandoffTrigger("manual", "Legal questions", 0.7);

      expect(store.getHandoffTriggers().map((t) => t.patternDescription)).toEqual([
        "Legal questions",
        "Repeated failures in writing category",
      ]);

      expect(store.setHandoffTriggerActive(busy.id, false)).toBe(true);
      expect(store.getHandoffTriggers().map((t) => t.patternType)).toEqual(["category_failure"]);
      expect(store.getHandoffTriggers(false)).toHaveLength(2);
      expect(store.setHandoffTriggerActive(9999, false)).toBe(false);
    });
  });

  describe("storage failures", () => {
    it("raises StorageUnavailableError when the database cannot be created", () => {
      store = new MetricsStore({ dbPath: unwritableDbPath() });
      expect(() => store.initialize()).toThrow(StorageUnavailableError);
      expect(() => store.recordMetric({ modelId: "m1" })).toThrow(StorageUnavailableError);
    });

    it("recordMetricBestEffort logs instead of raising", () => {
      store = new MetricsStore({ dbPath: unwritableDbPath() });
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      expect(() => recordMetricBestEffort(store, { modelId: "m1" }, "Test")).not.toThrow();
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe("[Test] Could not record metric for m1:");
      warn.mockRestore();
    });
  });
});
