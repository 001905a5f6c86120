/**
 * Model discovery shared by calibration and comparison.
 */

import { NoModelAvailableError, isLocalModelError } from "./errors.js";
import type { LocalModelClient } from "../sidecar/types.js";

/**
 * Ids reported by the sidecar, in its order. An unreachable sidecar or an
 * empty list raises NoModelAvailableError.
 */
export async function listAvailableModelIds(client: LocalModelClient): Promise<string[]> {
  let ids: string[];
  try {
    ids = (await client.listModels()).map((m) => m.id);
  } catch (err) {
    if (isLocalModelError(err)) {
      throw new NoModelAvailableError("Local model sidecar is unreachable", {
        cause: err.message,
        code: err.code,
      });
    }
    throw err;
  }
  if (ids.length === 0) {
    throw new NoModelAvailableError("Local model sidecar reported no models");
  }
  return ids;
}
