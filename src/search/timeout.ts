// pattern: Functional Core

import type { RawContentMode, SearchDepth } from "../provider/types.ts";

const BASE_TIMEOUT_SECONDS = 60;
const MAX_TIMEOUT_SECONDS = 180;

export type TimeoutFactors = {
  readonly search_depth: SearchDepth;
  readonly auto_parameters: boolean;
  readonly include_raw_content: RawContentMode;
  readonly max_results: number;
};

/**
 * Seconds to allow a search, scaled by the options that make the provider slower.
 * The result-count bonus is a single step: more than 15 results earns +25 in place of +15.
 */
export function estimateTimeout(factors: TimeoutFactors): number {
  let timeout = BASE_TIMEOUT_SECONDS;

  if (factors.search_depth === "advanced") {
    timeout += 30;
  }
  if (factors.auto_parameters) {
    timeout += 20;
  }
  if (factors.include_raw_content) {
    timeout += 20;
  }

  let resultBonus = 0;
  if (factors.max_results > 10) {
    resultBonus = 15;
  }
  if (factors.max_results > 15) {
    resultBonus = 25;
  }
  timeout += resultBonus;

  return Math.min(timeout, MAX_TIMEOUT_SECONDS);
}
