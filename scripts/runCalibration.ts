#!/usr/bin/env node
/**
 * Calibration runner CLI.
 *
 * Usage:
 *   npm run calibrate -- --model llama-3.2-3b
 *   npm run calibrate -- --category coding --threshold 0.7
 *   npm run calibrate -- --model llama-3.2-3b --category translation --prompt "Translate 'thank you' to French"
 *
 * Without --model the first model reported by the sidecar is used.
 * --json prints the full run result instead of the table.
 */

import { runCalibration } from "../src/lib/intelligence/calibrationHarness.js";
import { createIntelligenceContext } from "../src/lib/intelligence/context.js";
import { IntelligenceError } from "../src/lib/intelligence/errors.js";
import { UsageError, formatPercent, parseCalibrateArgs } from "./intelligenceArgs.js";

const USAGE =
  "Usage: npm run calibrate -- [--model <id>] [--category <name>] [--prompt <text>] [--threshold 0..1] [--timeout ms] [--json]";

async function main(): Promise<void> {
  const args = parseCalibrateArgs(process.argv.slice(2));
  const ctx = createIntelligenceContext();

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\n[Calibration] Interrupted; finishing the current prompt...");
    controller.abort();
  });

  try {
    const run = await runCalibration(
      { store: ctx.store, client: ctx.client },
      {
        category: args.category,
        runLogPath: ctx.runLogPath,
        signal: controller.signal,
        ...(args.model && { modelId: args.model }),
        ...(args.prompt && { customPrompt: args.prompt }),
        ...(args.threshold != null && { passingThreshold: args.threshold }),
        ...(args.timeout != null && { timeoutMs: args.timeout }),
      }
    );

    if (args.json) {
      console.log(JSON.stringify(run, null, 2));
      return;
    }

    console.log(`Calibration: ${run.modelId} / ${run.category} (pass mark ${run.passingThreshold})\n`);
    for (const t of run.tests) {
      const mark = t.passed ? "PASS" : "FAIL";
      console.log(`  ${mark}  ${t.promptCategory.padEnd(10)} score=${t.qualityScore.toFixed(3)}  ${t.tokensPerSecond.toFixed(1)} tok/s`);
      for (const note of t.evaluationNotes) {
        console.log(`        - ${note}`);
      }
    }
    const s = run.summary;
    console.log(
      `\n${s.passedCount}/${s.totalTests} passed (${formatPercent(s.passRate)}), average score ${s.averageScore.toFixed(3)}${run.aborted ? " [aborted]" : ""}`
    );
  } finally {
    ctx.store.close();
  }
}

main().catch((e) => {
  if (e instanceof UsageError) {
    console.error(`${e.message}\n${USAGE}`);
  } else if (e instanceof IntelligenceError) {
    console.error(`[Calibration] ${e.code}: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
