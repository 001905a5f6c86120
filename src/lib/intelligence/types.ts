/**
 * Intelligence layer types: metrics, calibration, handoff triggers, comparison.
 */

export type CalibrationCategory = "reasoning" | "coding" | "writing" | "analysis" | "creative";

/** Built-in category, "general" (smoke test across categories), or a custom label. */
export type PromptCategory = CalibrationCategory | "general" | (string & {});

export interface MetricRecord {
  modelId: string;
  timestamp: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  latencySeconds: number;
  tokensPerSecond: number;
  success: boolean;
  errorMessage?: string;
  useCase?: string;
}

/**
 * Input for recordMetric. Token counts must be non-negative integers;
 * the store does not validate them.
 */
export interface MetricInput {
  modelId: string;
  /** Defaults to the store clock. */
  timestamp?: string;
  promptTokens?: number;
  completionTokens?: number;
  latencySeconds?: number;
  success?: boolean;
  errorMessage?: string;
  useCase?: string;
}

export interface ModelMetricsSummary {
  modelId: string;
  totalRequests: number;
  totalTokens: number;
  avgTokensPerSecond: number;
  avgLatencySeconds: number;
  errorCount: number;
  lastUsed: string;
}

export interface MetricsSummary {
  periodDays: number;
  models: ModelMetricsSummary[];
  modelCount: number;
}

export interface CalibrationTest {
  testId: string;
  modelId: string;
  promptCategory: PromptCategory;
  prompt: string;
  localResponse: string;
  qualityScore: number;
  evaluationNotes: string[];
  tokensPerSecond: number;
  timestamp: string;
  passed: boolean;
}

export interface HandoffTrigger {
  id: number;
  patternType: string;
  patternDescription: string;
  triggerCount: number;
  lastTriggered: string;
  confidence: number;
  active: boolean;
}

export interface EvaluationResult {
  score: number;
  notes: string[];
  criteriaScores: Record<string, number>;
}

export interface CalibrationSummary {
  totalTests: number;
  passedCount: number;
  passRate: number;
  averageScore: number;
}

export interface CalibrationRunResult {
  modelId: string;
  category: PromptCategory;
  passingThreshold: number;
  tests: CalibrationTest[];
  summary: CalibrationSummary;
  /** True when the caller aborted before every prompt was scheduled. */
  aborted: boolean;
}

export type ComparisonPolicy = "speed" | "quality" | "balanced";

export interface ComparisonEntry {
  modelId: string;
  success: boolean;
  response?: string;
  latencySeconds: number;
  promptTokens: number;
  completionTokens: number;
  tokensPerSecond: number;
  qualityScore?: number;
  evaluationNotes?: string[];
  error?: string;
}

export interface ComparisonWinner {
  modelId: string;
  policy: ComparisonPolicy;
  /** The value the policy ranked on (latency for speed, score otherwise). */
  value: number;
}

export interface ComparisonResult {
  prompt: string;
  policy: ComparisonPolicy;
  results: ComparisonEntry[];
  winner: ComparisonWinner | null;
}
