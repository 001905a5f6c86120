/**
 * Metrics store: durable storage for model metrics, calibration tests and
 * handoff triggers. Construct once per process and inject into the harness,
 * trigger detector and comparison orchestrator.
 *
 * Every public operation initializes the schema on first use, so callers never
 * need a separate setup step. Any database failure surfaces as
 * StorageUnavailableError; duplicate keys are resolved by conflict clauses.
 */

import { and, desc, eq, gt, sql } from "drizzle-orm";
import { openDb, applySchema, type DbHandle } from "../db/index.js";
import { modelMetrics, calibrationTests, handoffTriggers } from "../db/schema.js";
import { StorageUnavailableError } from "./errors.js";
import { DEFAULT_METRICS_WINDOW_DAYS } from "./config.js";
import type {
  CalibrationTest,
  HandoffTrigger,
  MetricInput,
  MetricRecord,
  MetricsSummary,
  ModelMetricsSummary,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Latency floor for throughput, so near-instant responses do not divide by ~0. */
export const MIN_LATENCY_SECONDS = 0.1;

export function computeTokensPerSecond(completionTokens: number, latencySeconds: number): number {
  if (completionTokens <= 0) return 0;
  return completionTokens / Math.max(latencySeconds, MIN_LATENCY_SECONDS);
}

export interface MetricsStoreOptions {
  /** Database file path, or ":memory:". */
  dbPath: string;
  /** Epoch-ms clock; defaults to Date.now. */
  clock?: () => number;
}

export class MetricsStore {
  private readonly dbPath: string;
  private readonly clock: () => number;
  private handle: DbHandle | null = null;
  private initialized = false;

  constructor(options: MetricsStoreOptions) {
    this.dbPath = options.dbPath;
    this.clock = options.clock ?? Date.now;
  }

  get path(): string {
    return this.dbPath;
  }

  nowISO(): string {
    return new Date(this.clock()).toISOString();
  }

  /** Creates the schema if absent. Idempotent. */
  initialize(): void {
    this.connect();
  }

  private connect(): DbHandle {
    if (this.handle && this.initialized) return this.handle;
    try {
      if (!this.handle) {
        this.handle = openDb(this.dbPath);
      }
      applySchema(this.handle.sqlite);
      this.initialized = true;
      return this.handle;
    } catch (err) {
      throw new StorageUnavailableError("initialize", err);
    }
  }

  private run<T>(operation: string, fn: (handle: DbHandle) => T): T {
    const handle = this.connect();
    try {
      return fn(handle);
    } catch (err) {
      throw new StorageUnavailableError(operation, err);
    }
  }

  /**
   * Insert-or-ignore on (modelId, timestamp). Returns false when the key
   * already existed and nothing was written.
   */
  recordMetric(input: MetricInput): boolean {
    const record = this.toMetricRecord(input);
    return this.run("recordMetric", ({ db }) => {
      const result = db
        .insert(modelMetrics)
        .values({
          modelId: record.modelId,
          timestamp: record.timestamp,
          promptTokens: record.promptTokens,
          completionTokens: record.completionTokens,
          totalTokens: record.totalTokens,
          latencySeconds: record.latencySeconds,
          tokensPerSecond: record.tokensPerSecond,
          success: record.success,
          errorMessage: record.errorMessage ?? null,
          useCase: record.useCase ?? null,
        })
        .onConflictDoNothing({ target: [modelMetrics.modelId, modelMetrics.timestamp] })
        .run();
      return result.changes > 0;
    });
  }

  private toMetricRecord(input: MetricInput): MetricRecord {
    const promptTokens = input.promptTokens ?? 0;
    const completionTokens = input.completionTokens ?? 0;
    const latencySeconds = input.latencySeconds ?? 0;
    const success = input.success ?? true;
    return {
      modelId: input.modelId,
      timestamp: input.timestamp ?? this.nowISO(),
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens,
      latencySeconds,
      tokensPerSecond: computeTokensPerSecond(completionTokens, latencySeconds),
      success,
      ...(!success && input.errorMessage != null && { errorMessage: input.errorMessage }),
      ...(input.useCase != null && { useCase: input.useCase }),
    };
  }

  listMetrics(modelId?: string, limit: number = 100): MetricRecord[] {
    return this.run("listMetrics", ({ db }) => {
      const rows = db
        .select()
        .from(modelMetrics)
        .where(modelId != null ? eq(modelMetrics.modelId, modelId) : undefined)
        .orderBy(desc(modelMetrics.timestamp))
        .limit(limit)
        .all();
      return rows.map((r) => ({
        modelId: r.modelId,
        timestamp: r.timestamp,
        promptTokens: r.promptTokens,
        completionTokens: r.completionTokens,
        totalTokens: r.totalTokens,
        latencySeconds: r.latencySeconds,
        tokensPerSecond: r.tokensPerSecond,
        success: r.success,
        ...(r.errorMessage != null && { errorMessage: r.errorMessage }),
        ...(r.useCase != null && { useCase: r.useCase }),
      }));
    });
  }

  /**
   * Per-model aggregates over records newer than now - windowDays,
   * ordered by request count descending.
   */
  summarizeMetrics(modelId?: string, windowDays: number = DEFAULT_METRICS_WINDOW_DAYS): MetricsSummary {
    const cutoff = new Date(this.clock() - windowDays * DAY_MS).toISOString();
    const models = this.run("summarizeMetrics", ({ db }) => {
      const totalRequests = sql<number>`count(*)`;
      return db
        .select({
          modelId: modelMetrics.modelId,
          totalRequests,
          totalTokens: sql<number>`coalesce(sum(${modelMetrics.totalTokens}), 0)`,
          avgTokensPerSecond: sql<number>`coalesce(avg(${modelMetrics.tokensPerSecond}), 0)`,
          avgLatencySeconds: sql<number>`coalesce(avg(${modelMetrics.latencySeconds}), 0)`,
          errorCount: sql<number>`sum(case when ${modelMetrics.success} = 0 then 1 else 0 end)`,
          lastUsed: sql<string>`max(${modelMetrics.timestamp})`,
        })
        .from(modelMetrics)
        .where(
          and(
            gt(modelMetrics.timestamp, cutoff),
            modelId != null ? eq(modelMetrics.modelId, modelId) : undefined
          )
        )
        .groupBy(modelMetrics.modelId)
        .orderBy(desc(totalRequests), modelMetrics.modelId)
        .all();
    });
    const normalized: ModelMetricsSummary[] = models.map((m) => ({
      modelId: m.modelId,
      totalRequests: Number(m.totalRequests),
      totalTokens: Number(m.totalTokens),
      avgTokensPerSecond: Number(m.avgTokensPerSecond),
      avgLatencySeconds: Number(m.avgLatencySeconds),
      errorCount: Number(m.errorCount),
      lastUsed: m.lastUsed,
    }));
    return { periodDays: windowDays, models: normalized, modelCount: normalized.length };
  }

  /** Upsert by testId; a re-run of the same id replaces the row. */
  saveCalibrationResult(test: CalibrationTest): void {
    const values = {
      testId: test.testId,
      modelId: test.modelId,
      promptCategory: test.promptCategory,
      prompt: test.prompt,
      localResponse: test.localResponse,
      qualityScore: test.qualityScore,
      evaluationNotes: test.evaluationNotes,
      tokensPerSecond: test.tokensPerSecond,
      timestamp: test.timestamp,
      passed: test.passed,
    };
    const { testId: _testId, ...updates } = values;
    this.run("saveCalibrationResult", ({ db }) => {
      db.insert(calibrationTests)
        .values(values)
        .onConflictDoUpdate({ target: calibrationTests.testId, set: updates })
        .run();
    });
  }

  getCalibrationResults(modelId?: string, limit: number = 50): CalibrationTest[] {
    return this.run("getCalibrationResults", ({ db }) => {
      const rows = db
        .select()
        .from(calibrationTests)
        .where(modelId != null ? eq(calibrationTests.modelId, modelId) : undefined)
        .orderBy(desc(calibrationTests.timestamp), desc(calibrationTests.id))
        .limit(limit)
        .all();
      return rows.map((r) => ({
        testId: r.testId,
        modelId: r.modelId,
        promptCategory: r.promptCategory,
        prompt: r.prompt,
        localResponse: r.localResponse,
        qualityScore: r.qualityScore,
        evaluationNotes: r.evaluationNotes,
        tokensPerSecond: r.tokensPerSecond,
        timestamp: r.timestamp,
        passed: r.passed,
      }));
    });
  }

  /**
   * First observation of (patternType, description) inserts with count 1;
   * repeats increment the count and overwrite confidence and lastTriggered.
   */
  recordHandoffTrigger(patternType: string, description: string, confidence: number): HandoffTrigger {
    const now = this.nowISO();
    return this.run("recordHandoffTrigger", ({ db }) => {
      const [row] = db
        .insert(handoffTriggers)
        .values({
          patternType,
          patternDescription: description,
          triggerCount: 1,
          lastTriggered: now,
          confidence,
        })
        .onConflictDoUpdate({
          target: [handoffTriggers.patternType, handoffTriggers.patternDescription],
          set: {
            triggerCount: sql`${handoffTriggers.triggerCount} + 1`,
            confidence,
            lastTriggered: now,
          },
        })
        .returning()
        .all();
      if (!row) {
        throw new Error(`Upsert returned no row for ${patternType}/${description}`);
      }
      return row;
    });
  }

  getHandoffTriggers(activeOnly: boolean = true): HandoffTrigger[] {
    return this.run("getHandoffTriggers", ({ db }) =>
      db
        .select()
        .from(handoffTriggers)
        .where(activeOnly ? eq(handoffTriggers.active, true) : undefined)
        .orderBy(desc(handoffTriggers.triggerCount), handoffTriggers.id)
        .all()
    );
  }

  /** Manual (de)activation. Returns false when no trigger has that id. */
  setHandoffTriggerActive(id: number, active: boolean): boolean {
    return this.run("setHandoffTriggerActive", ({ db }) => {
      const result = db.update(handoffTriggers).set({ active }).where(eq(handoffTriggers.id, id)).run();
      return result.changes > 0;
    });
  }

  close(): void {
    if (this.handle) {
      this.handle.sqlite.close();
      this.handle = null;
      this.initialized = false;
    }
  }
}

/** Metric writes must not fail a calibration run or comparison; storage errors are logged. */
export function recordMetricBestEffort(store: MetricsStore, input: MetricInput, area: string): void {
  try {
    store.recordMetric(input);
  } catch (err) {
    if (err instanceof StorageUnavailableError) {
      console.warn(`[${area}] Could not record metric for ${input.modelId}:`, err.message);
      return;
    }
    throw err;
  }
}
