/**
 * Built-in calibration prompts by category. "general" runs the first prompt of
 * every category as a broad smoke test.
 */

import type { CalibrationCategory } from "./types.js";

export const GENERAL_CATEGORY = "general";

export const CALIBRATION_PROMPTS: Readonly<Record<CalibrationCategory, readonly string[]>> = {
  reasoning: [
    "A notebook and a pen cost $1.20 in total. The notebook costs $1.00 more than the pen. How much does the pen cost? Explain your reasoning step by step.",
    "If 4 printers print 4 pages in 4 minutes, how long would 80 printers take to print 80 pages? Show your work.",
  ],
  coding: [
    "Write a TypeScript function that returns the longest palindromic substring of a string. Include comments explaining your approach.",
    "Implement a simple LRU cache in TypeScript with O(1) get and put operations.",
  ],
  writing: [
    "Write a professional email declining a meeting invitation because of a scheduling conflict. Keep it concise and courteous.",
    "Summarise the key benefits of renewable energy in 100 words or less, using British English spelling.",
  ],
  analysis: [
    "What are the risks and benefits of moving a company from on-premises servers to cloud hosting? Provide a balanced analysis.",
    "Compare microservices and monolithic architecture. When would you recommend each approach?",
  ],
  creative: [
    "Write a short story opening of about 100 words that hooks the reader immediately.",
    "Create a haiku about a lighthouse keeper.",
  ],
};

export const CALIBRATION_CATEGORIES = Object.keys(CALIBRATION_PROMPTS).filter(isCalibrationCategory);

export function isCalibrationCategory(value: string): value is CalibrationCategory {
  return Object.prototype.hasOwnProperty.call(CALIBRATION_PROMPTS, value);
}
