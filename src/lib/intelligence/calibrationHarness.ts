/**
 * Calibration harness: runs standardized prompts against a local model,
 * scores each response and persists one CalibrationTest per prompt.
 *
 * SelectModel -> SelectPrompts -> for each prompt (Invoke -> Evaluate -> Persist) -> Summarize
 *
 * A failed invocation becomes a failed test entry; it never aborts the run.
 * Calibration rows are required for the summary, so storage errors propagate.
 * Metric rows are best-effort: a storage failure there is logged and skipped.
 */

import { createHash } from "crypto";
import { appendJsonl } from "../../logger.js";
import { debugLog } from "../../utils/debug.js";
import { listAvailableModelIds } from "./availableModels.js";
import {
  CALIBRATION_CATEGORIES,
  CALIBRATION_PROMPTS,
  GENERAL_CATEGORY,
  isCalibrationCategory,
} from "./calibrationPrompts.js";
import { getPassingThreshold, getSidecarConfig } from "./config.js";
import { UnknownCategoryError } from "./errors.js";
import { evaluateResponse } from "./evaluator.js";
import { computeTokensPerSecond, recordMetricBestEffort, type MetricsStore } from "./metricsStore.js";
import type { LocalModelClient } from "../sidecar/types.js";
import type {
  CalibrationRunResult,
  CalibrationSummary,
  CalibrationTest,
  EvaluationResult,
  PromptCategory,
} from "./types.js";

export const CALIBRATION_TEMPERATURE = 0.7;
export const CALIBRATION_MAX_TOKENS = 1024;

export type ResponseEvaluator = (prompt: string, response: string, category: PromptCategory) => EvaluationResult;

export interface CalibrationDeps {
  store: MetricsStore;
  client: LocalModelClient;
  evaluate?: ResponseEvaluator;
  /** Epoch-ms clock; defaults to Date.now. */
  clock?: () => number;
}

export interface CalibrationOptions {
  modelId?: string;
  category?: PromptCategory;
  customPrompt?: string;
  passingThreshold?: number;
  timeoutMs?: number;
  /** Aborting stops scheduling further prompts; the in-flight prompt completes. */
  signal?: AbortSignal;
  /** Append a JSON line describing the run to this file. */
  runLogPath?: string;
}

export interface PlannedPrompt {
  category: PromptCategory;
  prompt: string;
}

export function selectPrompts(category: PromptCategory, customPrompt?: string): PlannedPrompt[] {
  if (customPrompt != null && customPrompt.trim() !== "") {
    return [{ category, prompt: customPrompt }];
  }
  if (category === GENERAL_CATEGORY) {
    return CALIBRATION_CATEGORIES.flatMap((c) => {
      const first = CALIBRATION_PROMPTS[c][0];
      return first ? [{ category: c, prompt: first }] : [];
    });
  }
  if (isCalibrationCategory(category)) {
    return CALIBRATION_PROMPTS[category].map((prompt) => ({ category, prompt }));
  }
  throw new UnknownCategoryError(category, CALIBRATION_CATEGORIES);
}

export function buildTestId(modelId: string, prompt: string, timestamp: string): string {
  return createHash("sha256").update(`${modelId}\n${prompt}\n${timestamp}`).digest("hex").slice(0, 16);
}

export function summarizeResults(tests: CalibrationTest[]): CalibrationSummary {
  const totalTests = tests.length;
  if (totalTests === 0) {
    return { totalTests: 0, passedCount: 0, passRate: 0, averageScore: 0 };
  }
  const passedCount = tests.filter((t) => t.passed).length;
  const averageScore = tests.reduce((s, t) => s + t.qualityScore, 0) / totalTests;
  return {
    totalTests,
    passedCount,
    passRate: (passedCount / totalTests) * 100,
    averageScore,
  };
}

async function runSinglePrompt(
  deps: Required<Pick<CalibrationDeps, "store" | "client" | "evaluate" | "clock">>,
  modelId: string,
  planned: PlannedPrompt,
  passingThreshold: number,
  timeoutMs: number
): Promise<CalibrationTest> {
  const { store, client, evaluate, clock } = deps;
  const start = clock();
  const result = await client.invoke({
    modelId,
    messages: [{ role: "user", content: planned.prompt }],
    temperature: CALIBRATION_TEMPERATURE,
    maxTokens: CALIBRATION_MAX_TOKENS,
    timeoutMs,
  });
  const finished = clock();
  const latencySeconds = Math.max(0, (finished - start) / 1000);
  const timestamp = new Date(finished).toISOString();
  const testId = buildTestId(modelId, planned.prompt, timestamp);

  let test: CalibrationTest;
  if (!result.success) {
    test = {
      testId,
      modelId,
      promptCategory: planned.category,
      prompt: planned.prompt,
      localResponse: "",
      qualityScore: 0,
      evaluationNotes: [`Invocation failed: ${result.error.message}`],
      tokensPerSecond: 0,
      timestamp,
      passed: false,
    };
    recordMetricBestEffort(
      store,
      {
        modelId,
        timestamp,
        latencySeconds,
        success: false,
        errorMessage: result.error.message,
        useCase: "calibration",
      },
      "Calibration"
    );
  } else {
    const evaluation = evaluate(planned.prompt, result.content, planned.category);
    test = {
      testId,
      modelId,
      promptCategory: planned.category,
      prompt: planned.prompt,
      localResponse: result.content,
      qualityScore: evaluation.score,
      evaluationNotes: evaluation.notes,
      tokensPerSecond: computeTokensPerSecond(result.usage.completionTokens, latencySeconds),
      timestamp,
      passed: evaluation.score >= passingThreshold,
    };
    recordMetricBestEffort(
      store,
      {
        modelId,
        timestamp,
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
        latencySeconds,
        success: true,
        useCase: "calibration",
      },
      "Calibration"
    );
  }

  store.saveCalibrationResult(test);
  debugLog("[Calibration]", modelId, planned.category, test.qualityScore, test.passed);
  return test;
}

export async function runCalibration(
  deps: CalibrationDeps,
  options: CalibrationOptions = {}
): Promise<CalibrationRunResult> {
  const clock = deps.clock ?? Date.now;
  const evaluate = deps.evaluate ?? evaluateResponse;
  const category = options.category ?? GENERAL_CATEGORY;
  const passingThreshold = options.passingThreshold ?? getPassingThreshold();
  const timeoutMs = options.timeoutMs ?? getSidecarConfig().timeoutMs;

  const modelId = options.modelId ?? (await listAvailableModelIds(deps.client))[0];
  const prompts = selectPrompts(category, options.customPrompt);

  const tests: CalibrationTest[] = [];
  let aborted = false;
  for (const planned of prompts) {
    if (options.signal?.aborted) {
      aborted = true;
      break;
    }
    tests.push(
      await runSinglePrompt(
        { store: deps.store, client: deps.client, evaluate, clock },
        modelId,
        planned,
        passingThreshold,
        timeoutMs
      )
    );
  }

  const summary = summarizeResults(tests);
  if (options.runLogPath) {
    try {
      await appendJsonl(options.runLogPath, {
        type: "calibration_run",
        tsISO: new Date(clock()).toISOString(),
        modelId,
        category,
        passingThreshold,
        aborted,
        summary,
        testIds: tests.map((t) => t.testId),
      });
    } catch (err) {
      console.warn("[Calibration] Failed to append run ledger:", err instanceof Error ? err.message : err);
    }
  }

  return { modelId, category, passingThreshold, tests, summary, aborted };
}

export interface CategoryHistory {
  category: string;
  totalTests: number;
  passedCount: number;
  passRate: number;
  averageScore: number;
}

export interface CalibrationHistory {
  modelId: string | null;
  results: CalibrationTest[];
  overall: CalibrationSummary;
  byCategory: CategoryHistory[];
}

/** Recent calibration results with per-category pass rates. */
export function getCalibrationHistory(store: MetricsStore, modelId?: string, limit: number = 50): CalibrationHistory {
  const results = store.getCalibrationResults(modelId, limit);
  const grouped = new Map<string, CalibrationTest[]>();
  for (const r of results) {
    const arr = grouped.get(r.promptCategory) ?? [];
    arr.push(r);
    grouped.set(r.promptCategory, arr);
  }
  const byCategory = [...grouped.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([category, tests]) => ({ category, ...summarizeResults(tests) }));
  return { modelId: modelId ?? null, results, overall: summarizeResults(results), byCategory };
}
