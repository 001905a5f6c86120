#!/usr/bin/env node
/**
 * Model comparison CLI.
 *
 * Usage:
 *   npm run compare -- "Explain the CAP theorem in two sentences"
 *   npm run compare -- --prompt "Write a haiku about rain" --models llama-3.2-3b,qwen2.5-7b --policy quality
 *
 * Without --models up to five loaded models are compared.
 */

import { compareModels } from "../src/lib/intelligence/modelComparison.js";
import { createIntelligenceContext } from "../src/lib/intelligence/context.js";
import { IntelligenceError } from "../src/lib/intelligence/errors.js";
import { UsageError, parseCompareArgs } from "./intelligenceArgs.js";

const USAGE =
  "Usage: npm run compare -- <prompt> [--models a,b] [--policy speed|quality|balanced] [--system <text>] [--category <name>] [--json]";

async function main(): Promise<void> {
  const args = parseCompareArgs(process.argv.slice(2));
  const ctx = createIntelligenceContext();
  try {
    const comparison = await compareModels(
      { store: ctx.store, client: ctx.client },
      {
        prompt: args.prompt,
        policy: args.policy,
        ...(args.system && { systemPrompt: args.system }),
        ...(args.models && { modelIds: args.models }),
        ...(args.category && { category: args.category }),
      }
    );

    if (args.json) {
      console.log(JSON.stringify(comparison, null, 2));
      return;
    }

    console.log(`Comparison (${comparison.policy}) across ${comparison.results.length} model(s)\n`);
    for (const r of comparison.results) {
      if (!r.success) {
        console.log(`  ${r.modelId.padEnd(28)} FAILED  ${r.error ?? ""}`);
        continue;
      }
      console.log(
        `  ${r.modelId.padEnd(28)} score=${(r.qualityScore ?? 0).toFixed(3)}  ${r.latencySeconds.toFixed(2)}s  ${r.tokensPerSecond.toFixed(1)} tok/s`
      );
    }
    console.log(
      comparison.winner
        ? `\nWinner: ${comparison.winner.modelId} (${comparison.winner.value.toFixed(3)})`
        : "\nNo winner: every model failed."
    );
  } finally {
    ctx.store.close();
  }
}

main().catch((e) => {
  if (e instanceof UsageError) {
    console.error(`${e.message}\n${USAGE}`);
  } else if (e instanceof IntelligenceError) {
    console.error(`[Comparison] ${e.code}: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
