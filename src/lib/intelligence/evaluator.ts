/**
 * Heuristic response evaluator. Rule-based, no model calls: maps
 * (prompt, response, category) to a score in [0, 1] with notes.
 *
 * Criteria:
 *   length      - brevity and padding penalties (word limits in the prompt are honoured)
 *   structure   - paragraphs, lists, headings, code blocks, reasoning steps
 *   relevance   - coverage of the prompt's key terms; refusals capped at 0.1
 *   formatting  - fence balance, repetition, category expectations
 *
 * The score is the weighted mean of the criteria, clamped and rounded to 3 decimals.
 */

import { debugLog } from "../../utils/debug.js";
import type { EvaluationResult, PromptCategory } from "./types.js";

export const CRITERIA_WEIGHTS = {
  length: 0.25,
  structure: 0.2,
  relevance: 0.35,
  formatting: 0.2,
} as const;

export type Criterion = keyof typeof CRITERIA_WEIGHTS;

const CRITERIA: Criterion[] = ["length", "structure", "relevance", "formatting"];

export const MIN_RESPONSE_CHARS = 10;
export const BRIEF_RESPONSE_CHARS = 50;
export const SHORT_RESPONSE_CHARS = 150;
export const LONG_RESPONSE_CHARS = 6000;
/** Word-limited prompts tolerate this much overshoot before the length penalty. */
export const WORD_LIMIT_SLACK = 1.5;

/** Rubric shown to humans alongside scores. */
export const QUALITY_RUBRIC = {
  accuracy: "Response is factually correct and logically sound",
  completeness: "Response addresses all aspects of the prompt",
  clarity: "Response is clear, well-organised, and easy to understand",
  relevance: "Response stays on topic and provides useful information",
  formatting: "Response uses appropriate formatting and structure",
} as const;

const REFUSAL_PATTERNS = [
  "i don't have access",
  "i do not have access",
  "i can't help with",
  "i cannot help with",
  "as an ai",
  "i'm unable to",
  "i am unable to",
  "i cannot do that",
  "i can't do that",
];

const STOP_WORDS = new Set([
  "about", "after", "again", "also", "been", "before", "being", "both", "could",
  "does", "each", "explain", "from", "give", "have", "here", "include", "into",
  "just", "keep", "less", "like", "make", "more", "most", "much", "must", "only",
  "other", "over", "provide", "same", "should", "show", "some", "such", "than",
  "that", "their", "them", "then", "there", "these", "they", "this", "those",
  "through", "under", "using", "very", "what", "when", "where", "which", "while",
  "will", "with", "word", "words", "would", "write", "your",
]);

// Horizontal whitespace only: `\s` under the m flag rescans runs of blank lines.
const STRUCTURE_SIGNALS: RegExp[] = [
  /\n[ \t]*\n/,
  /^[ \t]*(?:[-*•]|\d+[.)])[ \t]+\S/m,
  /^#{1,6}[ \t]+\S/m,
  /```/,
  /\b(?:step \d|first(?:ly)?,|second(?:ly)?,|then,|finally,|therefore|because)/i,
];

const CODE_HINT = /(?:^|\s)(?:def|function|class|return|const|let|import|public)\s/m;
const CONCLUSION_HINT = /\b(?:therefore|thus|hence|so the|answer|in conclusion)\b|=/i;

export interface EvaluateOptions {
  weights?: Partial<Record<Criterion, number>>;
}

function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

function round3(x: number): number {
  return Math.round(x * 1000) / 1000;
}

/** Lower-cased words of 4+ letters from the prompt, minus stop words. */
export function extractKeyTerms(prompt: string): string[] {
  const words = prompt.toLowerCase().match(/\p{L}{4,}/gu) ?? [];
  return [...new Set(words)].filter((w) => !STOP_WORDS.has(w));
}

function requestedWordLimit(prompt: string): number | null {
  const match = prompt.match(/(\d+)\s+words?\b/i);
  if (!match) return null;
  const n = parseInt(match[1], 10);
  return Number.isNaN(n) || n <= 0 ? null : n;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function scoreLength(prompt: string, response: string, notes: string[]): number {
  const len = response.length;
  const wordLimit = requestedWordLimit(prompt);
  if (len < BRIEF_RESPONSE_CHARS) {
    notes.push("Response may be too brief");
    return 0.3;
  }
  if (wordLimit != null && countWords(response) > wordLimit * WORD_LIMIT_SLACK) {
    notes.push(`Response exceeds the requested ${wordLimit}-word length`);
    return 0.5;
  }
  if (wordLimit == null && len > LONG_RESPONSE_CHARS) {
    notes.push("Response is very long and may be padded");
    return 0.6;
  }
  if (wordLimit == null && len < SHORT_RESPONSE_CHARS) {
    notes.push("Response is brief");
    return 0.7;
  }
  return 1;
}

function scoreStructure(response: string, notes: string[]): number {
  const signals = STRUCTURE_SIGNALS.filter((re) => re.test(response)).length;
  if (signals === 0) {
    notes.push("Response lacks visible structure");
  }
  return clamp(0.4 + 0.2 * signals, 0, 1);
}

function isRefusal(response: string): boolean {
  const lower = response.toLowerCase();
  return REFUSAL_PATTERNS.some((p) => lower.includes(p));
}

function scoreRelevance(prompt: string, response: string, notes: string[]): number {
  const terms = extractKeyTerms(prompt);
  let score = 1;
  if (terms.length > 0) {
    const lower = response.toLowerCase();
    const hits = terms.filter((t) => lower.includes(t)).length;
    const coverage = hits / terms.length;
    score = Math.min(1, coverage * 2);
    if (coverage < 0.25) {
      notes.push("Response shares few key terms with the prompt");
    }
  }
  if (isRefusal(response)) {
    notes.push("Response appears to decline the request");
    score = Math.min(score, 0.1);
  }
  return score;
}

/** Shorter lines (closing braces, `end`, separators) repeat legitimately. */
const MIN_REPEATED_LINE_CHARS = 8;

function hasRepeatedLines(response: string): boolean {
  const counts = new Map<string, number>();
  for (const raw of response.split("\n")) {
    const line = raw.trim();
    if (line.length < MIN_REPEATED_LINE_CHARS) continue;
    const n = (counts.get(line) ?? 0) + 1;
    if (n >= 3) return true;
    counts.set(line, n);
  }
  return false;
}

function scoreFormatting(response: string, category: PromptCategory, notes: string[]): number {
  let score = 1;
  const fences = response.match(/```/g)?.length ?? 0;
  if (fences % 2 === 1) {
    notes.push("Code block is not closed");
    score -= 0.3;
  }
  if (hasRepeatedLines(response)) {
    notes.push("Repeated lines detected");
    score -= 0.3;
  }
  if (category === "coding" && fences === 0 && !CODE_HINT.test(response)) {
    notes.push("No code found for a coding prompt");
    score -= 0.5;
  }
  if (category === "reasoning" && !CONCLUSION_HINT.test(response)) {
    notes.push("No explicit conclusion or answer");
    score -= 0.4;
  }
  return Math.max(0, score);
}

/**
 * Score a response. Never throws; responses under MIN_RESPONSE_CHARS after
 * trimming score exactly 0 without evaluating any criterion.
 */
export function evaluateResponse(
  prompt: string,
  response: string,
  category: PromptCategory,
  options: EvaluateOptions = {}
): EvaluationResult {
  const trimmed = (response ?? "").trim();
  if (trimmed.length < MIN_RESPONSE_CHARS) {
    return { score: 0, notes: ["Response too short or empty"], criteriaScores: {} };
  }
  const safePrompt = prompt ?? "";
  const notes: string[] = [];
  const criteriaScores: Record<Criterion, number> = {
    length: round3(scoreLength(safePrompt, trimmed, notes)),
    structure: round3(scoreStructure(trimmed, notes)),
    relevance: round3(scoreRelevance(safePrompt, trimmed, notes)),
    formatting: round3(scoreFormatting(trimmed, category, notes)),
  };

  const weights = { ...CRITERIA_WEIGHTS, ...options.weights };
  let weighted = 0;
  let totalWeight = 0;
  for (const criterion of CRITERIA) {
    const w = Math.max(0, weights[criterion] ?? 0);
    weighted += w * criteriaScores[criterion];
    totalWeight += w;
  }
  const score = totalWeight > 0 ? round3(clamp(weighted / totalWeight, 0, 1)) : 0;
  if (notes.length === 0) {
    notes.push("No issues found");
  }
  debugLog("[Evaluator]", category, score, criteriaScores);
  return { score, notes, criteriaScores };
}
