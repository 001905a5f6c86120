/**
 * Controlled debug logging for the intelligence layer.
 * Set DEBUG_INTELLIGENCE=true to enable.
 */

export function isDebugEnabled(): boolean {
  return process.env.DEBUG_INTELLIGENCE === "true" || process.env.DEBUG_INTELLIGENCE === "1";
}

export function debugLog(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log(...args);
  }
}
