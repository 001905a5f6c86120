/**
 * JSONL logging. Appends one JSON line per event (calibration run ledger).
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";

/**
 * Ensures directory exists (mkdir -p), then appends one JSON line.
 */
export async function appendJsonl(path: string, event: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(event) + "\n", "utf-8");
}
