/**
 * Model comparison: one prompt fanned out (sequentially) to up to five local
 * models, each response scored, and a winner picked by policy.
 *
 * Policies:
 *   speed    - lowest latency among successful responses
 *   quality  - highest heuristic score
 *   balanced - highest score * 0.6 + speed * 0.4, speed = min(1, 1 / max(latency, 0.1))
 * Ties go to the model encountered first. Failed models never win.
 */

import { listAvailableModelIds } from "./availableModels.js";
import type { ResponseEvaluator } from "./calibrationHarness.js";
import { getComparisonMaxModels, getSidecarConfig } from "./config.js";
import { evaluateResponse } from "./evaluator.js";
import { GENERAL_CATEGORY } from "./calibrationPrompts.js";
import {
  MIN_LATENCY_SECONDS,
  computeTokensPerSecond,
  recordMetricBestEffort,
  type MetricsStore,
} from "./metricsStore.js";
import type { ChatMessage, LocalModelClient } from "../sidecar/types.js";
import type {
  ComparisonEntry,
  ComparisonPolicy,
  ComparisonResult,
  ComparisonWinner,
  PromptCategory,
} from "./types.js";

export const BALANCED_QUALITY_WEIGHT = 0.6;
export const BALANCED_SPEED_WEIGHT = 0.4;
export const COMPARISON_TEMPERATURE = 0.7;
export const COMPARISON_MAX_TOKENS = 1024;

export function balancedScore(qualityScore: number, latencySeconds: number): number {
  const speed = Math.min(1, 1 / Math.max(latencySeconds, MIN_LATENCY_SECONDS));
  return qualityScore * BALANCED_QUALITY_WEIGHT + speed * BALANCED_SPEED_WEIGHT;
}

function rank(entry: ComparisonEntry, policy: ComparisonPolicy): number | null {
  if (!entry.success) return null;
  if (policy === "speed") return entry.latencySeconds;
  if (entry.qualityScore == null) return null;
  return policy === "quality" ? entry.qualityScore : balancedScore(entry.qualityScore, entry.latencySeconds);
}

export function selectWinner(entries: ComparisonEntry[], policy: ComparisonPolicy): ComparisonWinner | null {
  let best: ComparisonWinner | null = null;
  for (const entry of entries) {
    const value = rank(entry, policy);
    if (value == null) continue;
    const better = best == null || (policy === "speed" ? value < best.value : value > best.value);
    if (better) {
      best = { modelId: entry.modelId, policy, value };
    }
  }
  return best;
}

export interface ComparisonDeps {
  store: MetricsStore;
  client: LocalModelClient;
  evaluate?: ResponseEvaluator;
  /** Epoch-ms clock; defaults to Date.now. */
  clock?: () => number;
}

export interface ComparisonOptions {
  prompt: string;
  systemPrompt?: string;
  modelIds?: string[];
  policy?: ComparisonPolicy;
  category?: PromptCategory;
  maxModels?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export async function compareModels(deps: ComparisonDeps, options: ComparisonOptions): Promise<ComparisonResult> {
  const { store, client } = deps;
  const clock = deps.clock ?? Date.now;
  const evaluate = deps.evaluate ?? evaluateResponse;
  const policy = options.policy ?? "balanced";
  const category = options.category ?? GENERAL_CATEGORY;
  const maxModels = options.maxModels ?? getComparisonMaxModels();
  const timeoutMs = options.timeoutMs ?? getSidecarConfig().timeoutMs;

  const requested = options.modelIds?.filter((id) => id.trim() !== "") ?? [];
  const modelIds = (requested.length > 0 ? requested : await listAvailableModelIds(client)).slice(0, maxModels);

  const messages: ChatMessage[] = options.systemPrompt
    ? [
        { role: "system", content: options.systemPrompt },
        { role: "user", content: options.prompt },
      ]
    : [{ role: "user", content: options.prompt }];

  const results: ComparisonEntry[] = [];
  for (const modelId of modelIds) {
    const start = clock();
    const result = await client.invoke({
      modelId,
      messages,
      temperature: COMPARISON_TEMPERATURE,
      maxTokens: options.maxTokens ?? COMPARISON_MAX_TOKENS,
      timeoutMs,
    });
    const finished = clock();
    const latencySeconds = Math.max(0, (finished - start) / 1000);
    const timestamp = new Date(finished).toISOString();

    if (!result.success) {
      results.push({
        modelId,
        success: false,
        latencySeconds,
        promptTokens: 0,
        completionTokens: 0,
        tokensPerSecond: 0,
        error: result.error.message,
      });
      recordMetricBestEffort(
        store,
        { modelId, timestamp, latencySeconds, success: false, errorMessage: result.error.message, useCase: "comparison" },
        "Comparison"
      );
      continue;
    }

    const evaluation = evaluate(options.prompt, result.content, category);
    const { promptTokens, completionTokens } = result.usage;
    results.push({
      modelId,
      success: true,
      response: result.content,
      latencySeconds,
      promptTokens,
      completionTokens,
      tokensPerSecond: computeTokensPerSecond(completionTokens, latencySeconds),
      qualityScore: evaluation.score,
      evaluationNotes: evaluation.notes,
    });
    recordMetricBestEffort(
      store,
      { modelId, timestamp, promptTokens, completionTokens, latencySeconds, success: true, useCase: "comparison" },
      "Comparison"
    );
  }

  return { prompt: options.prompt, policy, results, winner: selectWinner(results, policy) };
}
