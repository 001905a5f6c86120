/**
 * Process-wide wiring: one store and one sidecar client, shared by the API
 * server and the CLI scripts.
 */

import { getMetricsDbPath, getRunLogPath } from "./config.js";
import { MetricsStore } from "./metricsStore.js";
import { SidecarClient } from "../sidecar/sidecarClient.js";
import type { LocalModelClient } from "../sidecar/types.js";

export interface IntelligenceContext {
  store: MetricsStore;
  client: LocalModelClient;
  /** Calibration run ledger (JSONL). */
  runLogPath: string;
}

export function createIntelligenceContext(overrides: Partial<IntelligenceContext> = {}): IntelligenceContext {
  return {
    store: overrides.store ?? new MetricsStore({ dbPath: getMetricsDbPath() }),
    client: overrides.client ?? new SidecarClient(),
    runLogPath: overrides.runLogPath ?? getRunLogPath(),
  };
}
