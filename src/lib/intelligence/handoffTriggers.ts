/**
 * Handoff trigger detection: turns repeated calibration failures into
 * escalation signals for a more capable remote model.
 *
 * Confidence is recomputed from the failure count at detection time
 * (min(count / 10, 1)); it is not accumulated across detections.
 */

import { getRecentWindow, getTriggerFailureThreshold } from "./config.js";
import type { MetricsStore } from "./metricsStore.js";
import type { HandoffTrigger } from "./types.js";

export const CATEGORY_FAILURE_PATTERN = "category_failure";
export const MANUAL_TRIGGER_CONFIDENCE = 0.7;
/** Failures at which confidence saturates at 1.0. */
export const CONFIDENCE_SATURATION_COUNT = 10;

export function triggerConfidence(failureCount: number): number {
  return Math.min(failureCount / CONFIDENCE_SATURATION_COUNT, 1);
}

export function categoryFailureDescription(category: string): string {
  return `Repeated failures in ${category} category`;
}

export interface DetectOptions {
  recentWindow?: number;
  failureThreshold?: number;
}

export interface DetectedTrigger {
  category: string;
  failureCount: number;
  confidence: number;
  trigger: HandoffTrigger;
}

export interface DetectionResult {
  analyzedResults: number;
  failuresByCategory: Record<string, number>;
  detected: DetectedTrigger[];
  activeTriggers: HandoffTrigger[];
}

export function detectHandoffTriggers(store: MetricsStore, options: DetectOptions = {}): DetectionResult {
  const recentWindow = options.recentWindow ?? getRecentWindow();
  const failureThreshold = options.failureThreshold ?? getTriggerFailureThreshold();
  const results = store.getCalibrationResults(undefined, recentWindow);

  // Categories are free-form labels, so count in a Map rather than on an object.
  const failureCounts = new Map<string, number>();
  for (const r of results) {
    if (!r.passed) {
      failureCounts.set(r.promptCategory, (failureCounts.get(r.promptCategory) ?? 0) + 1);
    }
  }

  const detected: DetectedTrigger[] = [];
  for (const [category, failureCount] of failureCounts) {
    if (failureCount < failureThreshold) continue;
    const confidence = triggerConfidence(failureCount);
    const trigger = store.recordHandoffTrigger(
      CATEGORY_FAILURE_PATTERN,
      categoryFailureDescription(category),
      confidence
    );
    detected.push({ category, failureCount, confidence, trigger });
  }

  if (detected.length > 0) {
    console.log(
      `[HandoffTriggers] ${detected.length} category trigger(s): ${detected.map((d) => `${d.category}=${d.failureCount}`).join(", ")}`
    );
  }

  return {
    analyzedResults: results.length,
    failuresByCategory: Object.fromEntries(failureCounts),
    detected,
    activeTriggers: store.getHandoffTriggers(true),
  };
}

/** Manual observation, recorded through the same upsert path as detected triggers. */
export function recordManualTrigger(
  store: MetricsStore,
  patternType: string,
  description: string,
  confidence: number = MANUAL_TRIGGER_CONFIDENCE
): HandoffTrigger[] {
  store.recordHandoffTrigger(patternType, description, confidence);
  return store.getHandoffTriggers(true);
}
