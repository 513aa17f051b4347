// pattern: Functional Core

import type { AnswerMode, RawContentMode, SearchRequest } from "../provider/types.ts";
import type { LadderRung } from "./types.ts";

const REDUCED_MAX_RESULTS = 5;
const MINIMAL_MAX_RESULTS = 3;
const MINIMAL_TIMEOUT_SECONDS = 30;

/**
 * Same query with the expensive options turned down.
 * Everything not listed here, including the timeout, carries over.
 */
export function reduceComplexity(request: SearchRequest): SearchRequest {
  const { chunks_per_source: _dropped, ...rest } = request;
  const reduced: SearchRequest = {
    ...rest,
    search_depth: "basic",
    auto_parameters: false,
    max_results: Math.min(request.max_results, REDUCED_MAX_RESULTS),
  };

  const answer: AnswerMode | undefined =
    request.include_answer === "advanced" ? "basic" : request.include_answer;
  const rawContent: RawContentMode | undefined = request.include_raw_content
    ? false
    : request.include_raw_content;

  return {
    ...reduced,
    ...(answer !== undefined ? { include_answer: answer } : {}),
    ...(rawContent !== undefined ? { include_raw_content: rawContent } : {}),
  };
}

export function minimalRequest(request: SearchRequest): SearchRequest {
  return {
    query: request.query,
    search_depth: "basic",
    max_results: MINIMAL_MAX_RESULTS,
    timeout: MINIMAL_TIMEOUT_SECONDS,
  };
}

export function buildFallbackLadder(request: SearchRequest): ReadonlyArray<LadderRung> {
  return [
    { tier: "primary", request },
    { tier: "reduced_complexity", request: reduceComplexity(request) },
    { tier: "minimal", request: minimalRequest(request) },
  ];
}
