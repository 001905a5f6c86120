import { describe, it, expect } from "vitest";
import { evaluateResponse, extractKeyTerms, CRITERIA_WEIGHTS } from "../evaluator.js";

const LRU_PROMPT = "Implement a simple LRU cache in TypeScript with O(1) get and put operations.";
const WORD_LIMIT_PROMPT =
  "Summarise the key benefits of renewable energy in 100 words or less, using British English spelling.";

const LRU_RESPONSE = [
  "An LRU cache evicts the least recently used entry when it is full. A simple implementation keeps entries in a Map, which preserves insertion order.",
  "",
  "```typescript",
  "class LRUCache<K, V> {",
  "  private readonly data = new Map<K, V>();",
  "",
  "  constructor(private readonly capacity: number) {}",
  "",
  "  get(key: K): V | undefined {",
  "    const value = this.data.get(key);",
  "    if (value === undefined) return undefined;",
  "    this.data.delete(key);",
  "    this.data.set(key, value);",
  "    return value;",
  "  }",
  "",
  "  put(key: K, value: V): void {",
  "    this.data.delete(key);",
  "    this.data.set(key, value);",
  "    if (this.data.size > this.capacity) {",
  "      const oldest = this.data.keys().next().value;",
  "      if (oldest !== undefined) this.data.delete(oldest);",
  "    }",
  "  }",
  "}",
  "```",
  "",
  "Both get and put operations run in O(1) time because Map lookups, deletes and inserts are constant time.",
].join("\n");

describe("extractKeyTerms", () => {
  it("keeps distinct 4+ letter words that are not stop words", () => {
    expect(extractKeyTerms(LRU_PROMPT)).toEqual(["implement", "simple", "cache", "typescript", "operations"]);
  });

  it("returns nothing for a prompt of short words", () => {
    expect(extractKeyTerms("Say hi")).toEqual([]);
  });
});

describe("evaluateResponse", () => {
  it("weights sum to 1", () => {
    const total = Object.values(CRITERIA_WEIGHTS).reduce((a, b) => a + b, 0);
    expect(total).toBeCloseTo(1);
  });

  it("scores exactly 0 for a response under 10 characters after trimming", () => {
    expect(evaluateResponse("Say hi", "", "general")).toEqual({
      score: 0,
      notes: ["Response too short or empty"],
      criteriaScores: {},
    });
    expect(evaluateResponse("Say hi", "  012345678  ", "general").score).toBe(0);
  });

  it("evaluates a 10 character response", () => {
    const result = evaluateResponse("Say hi", "0123456789", "general");
    expect(result.score).toBeCloseTo(0.705, 3);
    expect(result.criteriaScores).toEqual({ length: 0.3, structure: 0.4, relevance: 1, formatting: 1 });
    expect(result.notes).toEqual(["Response may be too brief", "Response lacks visible structure"]);
  });

  it("rates a structured, on-topic coding answer highly", () => {
    const result = evaluateResponse(LRU_PROMPT, LRU_RESPONSE, "coding");
    expect(result.criteriaScores).toEqual({ length: 1, structure: 1, relevance: 1, formatting: 1 });
    expect(result.score).toBe(1);
    expect(result.notes).toEqual(["No issues found"]);
  });

  it("penalizes a coding answer without code", () => {
    const response =
      "To build an LRU cache in TypeScript you would keep a map of entries plus a record of recent usage, " +
      "moving each key to the front on every get and put, and evicting the oldest key when the cache is full so " +
      "operations stay simple and fast.";
    const result = evaluateResponse(LRU_PROMPT, response, "coding");
    expect(result.criteriaScores.formatting).toBe(0.5);
    expect(result.notes).toContain("No code found for a coding prompt");
    expect(result.score).toBeCloseTo(0.78, 3);
  });

  it("honours a word limit in the prompt", () => {
    const over = evaluateResponse(WORD_LIMIT_PROMPT, "renewable energy benefits ".repeat(60), "writing");
    expect(over.criteriaScores.length).toBe(0.5);
    expect(over.notes).toContain("Response exceeds the requested 100-word length");

    const within = evaluateResponse(
      WORD_LIMIT_PROMPT,
      "Renewable energy cuts emissions and lowers long-term costs. Its key benefits include energy security, " +
        "local jobs and cleaner air for communities, which makes it a sensible choice.",
      "writing"
    );
    expect(within.criteriaScores.length).toBe(1);
    expect(within.criteriaScores.relevance).toBeCloseTo(0.857, 3);
    expect(within.score).toBeCloseTo(0.83, 3);
  });

  it("penalizes padding when no limit is given", () => {
    const result = evaluateResponse("Describe the weather", "word ".repeat(1500), "general");
    expect(result.criteriaScores.length).toBe(0.6);
    expect(result.criteriaScores.relevance).toBe(0);
    expect(result.notes).toEqual([
      "Response is very long and may be padded",
      "Response lacks visible structure",
      "Response shares few key terms with the prompt",
    ]);
    expect(result.score).toBeCloseTo(0.43, 3);
  });

  it("caps relevance for refusals", () => {
    const response =
      "As an AI, I cannot help with writing a TypeScript LRU cache implementation for get and put operations today, sorry.";
    const result = evaluateResponse(LRU_PROMPT, response, "coding");
    expect(result.criteriaScores.relevance).toBe(0.1);
    expect(result.notes).toContain("Response appears to decline the request");
    expect(result.score).toBeCloseTo(0.39, 3);
  });

  it("expects a conclusion for reasoning prompts", () => {
    const prompt = "If all roses are flowers and some flowers fade quickly, can we conclude that some roses fade quickly?";
    const response =
      "Roses are a subset of flowers. Some flowers fade quickly, but those flowers might not include any roses at all, " +
      "since the fading ones could be tulips or daisies instead of roses in this scenario.";
    const result = evaluateResponse(prompt, response, "reasoning");
    expect(result.criteriaScores.formatting).toBe(0.6);
    expect(result.notes).toContain("No explicit conclusion or answer");
    expect(result.score).toBeCloseTo(0.8, 3);
  });

  it("flags unclosed fences and repeated lines; weights select criteria", () => {
    const response = "Here is the code:\n```js\nconsole.log('hi')\nconsole.log('hi')\nconsole.log('hi')";
    const result = evaluateResponse("Print a greeting three times", response, "general", {
      weights: { length: 0, structure: 0, relevance: 0, formatting: 1 },
    });
    expect(result.criteriaScores.formatting).toBeCloseTo(0.4, 3);
    expect(result.notes).toContain("Code block is not closed");
    expect(result.notes).toContain("Repeated lines detected");
    expect(result.score).toBeCloseTo(0.4, 3);
  });

  it("stays within [0, 1] for unusual input", () => {
    const nonAscii = evaluateResponse(
      "Décrivez les énergies renouvelables",
      "L'énergie solaire et éolienne réduit les émissions de carbone. 再生可能エネルギー 🌞",
      "writing"
    );
    expect(nonAscii.score).toBeGreaterThanOrEqual(0);
    expect(nonAscii.score).toBeLessThanOrEqual(1);

    const huge = evaluateResponse("x", "a".repeat(100_000), "general");
    expect(huge.score).toBeCloseTo(0.78, 3);
  });

  it("scores long runs of blank lines in linear time", () => {
    const response = "answer" + "\n".repeat(200_000) + "done here";
    const started = performance.now();
    const result = evaluateResponse("Explain caching", response, "general");
    expect(performance.now() - started).toBeLessThan(1000);
    expect(result.criteriaScores).toEqual({ length: 0.6, structure: 0.6, relevance: 0, formatting: 1 });
    expect(result.notes).toEqual([
      "Response is very long and may be padded",
      "Response shares few key terms with the prompt",
    ]);
    expect(result.score).toBeCloseTo(0.47, 3);
  });

  it("is deterministic", () => {
    expect(evaluateResponse(LRU_PROMPT, LRU_RESPONSE, "coding")).toEqual(
      evaluateResponse(LRU_PROMPT, LRU_RESPONSE, "coding")
    );
  });
});
