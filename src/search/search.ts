// pattern: Imperative Shell

import type { SearchPayload, TavilyClient } from "../provider/types.ts";
import { validateSearchParams } from "./validate.ts";
import { normalizeSearchRequest } from "./normalize.ts";
import { executeWithFallback } from "./orchestrator.ts";
import type { FallbackOptions } from "./orchestrator.ts";
import { classifyError, diagnoseError } from "./classify.ts";
import type { SearchArgs, SearchFailure } from "./types.ts";
import { errorMessage, validationFailure } from "./types.ts";
import { isoDate } from "./date.ts";

export type SearchResult = SearchPayload | SearchFailure;

export async function tavilySearch(
  client: TavilyClient,
  args: SearchArgs,
  options: FallbackOptions = {},
): Promise<SearchResult> {
  const problem = validateSearchParams(args);
  if (problem !== null) {
    return validationFailure(problem);
  }

  const request = normalizeSearchRequest(args);
  const outcome = await executeWithFallback(client, request, options);
  return outcome.ok ? outcome.response : outcome.failure;
}

export type HealthReport =
  | {
      readonly status: "healthy";
      readonly api_accessible: true;
      readonly response_time_seconds: number;
      readonly test_query_successful: true;
      readonly results_count: number;
      readonly timestamp: string;
    }
  | {
      readonly status: "unhealthy";
      readonly api_accessible: false;
      readonly error: string;
      readonly error_type: string;
      readonly diagnosis: string;
      readonly fix_suggestion: string;
      readonly timestamp: string;
    };

type Clock = () => number;

/**
 * One small search against the provider, outside the fallback ladder.
 */
export async function healthCheck(
  client: TavilyClient,
  options: { readonly clock?: Clock; readonly signal?: AbortSignal } = {},
): Promise<HealthReport> {
  const clock = options.clock ?? Date.now;
  const started = clock();

  try {
    const result = await client.search(
      { query: "test", max_results: 1, search_depth: "basic", timeout: 10 },
      options.signal,
    );
    const elapsedSeconds = (clock() - started) / 1000;

    return {
      status: "healthy",
      api_accessible: true,
      response_time_seconds: Math.round(elapsedSeconds * 100) / 100,
      test_query_successful: true,
      results_count: result.results.length,
      timestamp: isoDate(new Date(clock())),
    };
  } catch (error) {
    const { diagnosis, fix_suggestion } = diagnoseError(error);
    return {
      status: "unhealthy",
      api_accessible: false,
      error: errorMessage(error),
      error_type: classifyError(error),
      diagnosis,
      fix_suggestion,
      timestamp: isoDate(new Date(clock())),
    };
  }
}
