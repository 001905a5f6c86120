/**
 * Intelligence config: env-based getters with safe parsing and clamped defaults.
 * Defaults are the calibrated values the rest of the layer was tuned against.
 */

import { join } from "path";

export const DEFAULT_PASSING_THRESHOLD = 0.6;
export const DEFAULT_COMPARISON_MAX_MODELS = 5;
export const DEFAULT_TRIGGER_FAILURE_THRESHOLD = 3;
export const DEFAULT_RECENT_WINDOW = 100;
export const DEFAULT_METRICS_WINDOW_DAYS = 30;

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function parseFloatEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseFloat(raw);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

/** Calibration pass mark. Default 0.6. */
export function getPassingThreshold(): number {
  return parseFloatEnv("INTELLIGENCE_PASSING_THRESHOLD", DEFAULT_PASSING_THRESHOLD, 0, 1);
}

/** Models per comparison. Default 5. */
export function getComparisonMaxModels(): number {
  return parseIntEnv("INTELLIGENCE_COMPARISON_MAX_MODELS", DEFAULT_COMPARISON_MAX_MODELS, 1, 5);
}

/** Failures per category before a handoff trigger is recorded. Default 3. */
export function getTriggerFailureThreshold(): number {
  return parseIntEnv("INTELLIGENCE_TRIGGER_FAILURE_THRESHOLD", DEFAULT_TRIGGER_FAILURE_THRESHOLD, 1, 1000);
}

/** Calibration results scanned by trigger detection. Default 100. */
export function getRecentWindow(): number {
  return parseIntEnv("INTELLIGENCE_RECENT_WINDOW", DEFAULT_RECENT_WINDOW, 1, 10_000);
}

export function getDataDir(): string {
  return process.env.INTELLIGENCE_DATA_DIR ?? join(process.cwd(), ".data", "intelligence");
}

export function getMetricsDbPath(): string {
  const explicit = process.env.INTELLIGENCE_DB_PATH;
  if (explicit != null && explicit !== "") return explicit;
  return join(getDataDir(), "metrics.db");
}

export function getRunLogPath(): string {
  return join(getDataDir(), "calibration-runs.jsonl");
}

export interface SidecarConfig {
  host: string;
  port: number;
  timeoutMs: number;
}

export function getSidecarConfig(): SidecarConfig {
  return {
    host: process.env.SIDECAR_HOST || "127.0.0.1",
    port: parseIntEnv("SIDECAR_PORT", 10000, 1, 65_535),
    timeoutMs: parseIntEnv("SIDECAR_TIMEOUT_MS", 120_000, 1_000, 600_000),
  };
}
