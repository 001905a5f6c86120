import { describe, it, expect } from "vitest";
import {
  UsageError,
  formatPercent,
  parseCalibrateArgs,
  parseCompareArgs,
  parseTriggerArgs,
  readFlags,
} from "../intelligenceArgs.js";

describe("readFlags", () => {
  it("splits flag values, bare flags and positionals", () => {
    const { flags, positionals } = readFlags(["hello", "--model", "m1", "--json", "world"]);
    expect(flags.get("model")).toBe("m1");
    expect(flags.get("json")).toBe(true);
    expect(positionals).toEqual(["hello", "world"]);
  });

  it("a flag followed by another flag is bare", () => {
    const { flags } = readFlags(["--all", "--window", "5"]);
    expect(flags.get("all")).toBe(true);
    expect(flags.get("window")).toBe("5");
  });
});

describe("parseCalibrateArgs", () => {
  it("defaults to the general category", () => {
    expect(parseCalibrateArgs([])).toEqual({ category: "general", json: false });
  });

  it("coerces numeric options", () => {
    expect(parseCalibrateArgs(["--model", "m1", "--category", "coding", "--threshold", "0.7", "--timeout", "30000"])).toEqual({
      model: "m1",
      category: "coding",
      threshold: 0.7,
      timeout: 30000,
      json: false,
    });
  });

  it("rejects a threshold outside [0, 1]", () => {
    expect(() => parseCalibrateArgs(["--threshold", "1.5"])).toThrow(UsageError);
  });
});

describe("parseCompareArgs", () => {
  it("takes the prompt from positionals and splits the model list", () => {
    expect(parseCompareArgs(["Explain", "recursion", "--models", "a, b,,c", "--policy", "speed"])).toEqual({
      prompt: "Explain recursion",
      models: ["a", "b", "c"],
      policy: "speed",
      json: false,
    });
  });

  it("requires a prompt", () => {
    expect(() => parseCompareArgs(["--policy", "quality"])).toThrow("--prompt: a prompt is required");
  });

  it("rejects an unknown policy", () => {
    expect(() => parseCompareArgs(["hi", "--policy", "cheapest"])).toThrow(UsageError);
  });
});

describe("parseTriggerArgs", () => {
  it("parses a manual trigger", () => {
    expect(parseTriggerArgs(["--manual", "Tax law questions", "--confidence", "0.8"])).toEqual({
      manual: "Tax law questions",
      type: "manual",
      confidence: 0.8,
      all: false,
      json: false,
    });
  });

  it("parses detection options", () => {
    expect(parseTriggerArgs(["--window", "50", "--threshold", "5", "--all"])).toMatchObject({
      window: 50,
      threshold: 5,
      all: true,
    });
  });
});

describe("formatPercent", () => {
  it("keeps one decimal", () => {
    expect(formatPercent(25)).toBe("25.0%");
    expect(formatPercent(200 / 3)).toBe("66.7%");
  });
});
