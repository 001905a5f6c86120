#!/usr/bin/env node
/**
 * Handoff trigger CLI.
 *
 * Usage:
 *   npm run triggers                      detect from recent calibration results
 *   npm run triggers -- --window 50 --threshold 5
 *   npm run triggers -- --manual "Questions about tax law" [--type manual] [--confidence 0.8]
 *   npm run triggers -- --deactivate 3
 *   npm run triggers -- --all             include inactive triggers in the listing
 */

import { detectHandoffTriggers, recordManualTrigger } from "../src/lib/intelligence/handoffTriggers.js";
import { createIntelligenceContext } from "../src/lib/intelligence/context.js";
import { IntelligenceError } from "../src/lib/intelligence/errors.js";
import type { HandoffTrigger } from "../src/lib/intelligence/types.js";
import { UsageError, parseTriggerArgs } from "./intelligenceArgs.js";

const USAGE =
  "Usage: npm run triggers -- [--window N] [--threshold N] [--manual <description> [--type t] [--confidence 0..1]] [--deactivate id] [--all] [--json]";

function printTriggers(triggers: HandoffTrigger[]): void {
  if (triggers.length === 0) {
    console.log("No handoff triggers.");
    return;
  }
  for (const t of triggers) {
    console.log(
      `  #${t.id} ${t.patternType.padEnd(18)} x${t.triggerCount}  confidence=${t.confidence.toFixed(2)}${t.active ? "" : " (inactive)"}  ${t.patternDescription}`
    );
  }
}

async function main(): Promise<void> {
  const args = parseTriggerArgs(process.argv.slice(2));
  const { store } = createIntelligenceContext();
  try {
    if (args.deactivate != null) {
      if (!store.setHandoffTriggerActive(args.deactivate, false)) {
        console.error(`Handoff trigger ${args.deactivate} not found`);
        process.exitCode = 1;
        return;
      }
      console.log(`Deactivated handoff trigger ${args.deactivate}`);
    } else if (args.manual) {
      recordManualTrigger(store, args.type, args.manual, args.confidence);
      console.log(`Recorded ${args.type} trigger: ${args.manual}`);
    } else {
      const detection = detectHandoffTriggers(store, {
        ...(args.window != null && { recentWindow: args.window }),
        ...(args.threshold != null && { failureThreshold: args.threshold }),
      });
      if (args.json) {
        console.log(JSON.stringify(detection, null, 2));
        return;
      }
      console.log(`Analyzed ${detection.analyzedResults} calibration result(s)`);
      for (const [category, count] of Object.entries(detection.failuresByCategory)) {
        console.log(`  ${category.padEnd(12)} ${count} failure(s)`);
      }
      console.log("");
    }

    const triggers = store.getHandoffTriggers(!args.all);
    if (args.json) {
      console.log(JSON.stringify(triggers, null, 2));
    } else {
      printTriggers(triggers);
    }
  } finally {
    store.close();
  }
}

main().catch((e) => {
  if (e instanceof UsageError) {
    console.error(`${e.message}\n${USAGE}`);
  } else if (e instanceof IntelligenceError) {
    console.error(`[HandoffTriggers] ${e.code}: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
