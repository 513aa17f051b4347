// pattern: Imperative Shell

/**
 * Tiered fallback for search calls.
 * Walks the fallback ladder one rung at a time until a rung succeeds, the provider
 * reports a quota problem, or the ladder runs out. Provider failures always resolve
 * to a structured outcome.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { FallbackTier, SearchRequest, TavilyClient } from "../provider/types.ts";
import { buildFallbackLadder } from "./ladder.ts";
import { classifyError } from "./classify.ts";
import type { ErrorKind, SearchFailure, SearchOutcome, Troubleshooting } from "./types.ts";
import { errorMessage } from "./types.ts";

const DEFAULT_BACKOFF_BASE_MS = 1000;

// An upstream error gets one more rung; a second one is surfaced.
const MAX_UPSTREAM_FAILURES = 2;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type AttemptFailure = {
  readonly error: unknown;
  readonly kind: ErrorKind;
  readonly tier: FallbackTier;
  readonly attempt: number;
};

export type FallbackOptions = {
  readonly backoffBaseMs?: number;
  readonly signal?: AbortSignal;
  readonly sleep?: Sleep;
  readonly onAttemptFailed?: (failure: AttemptFailure) => void;
};

const TROUBLESHOOTING: Troubleshooting = {
  check_api_key: "Verify TAVILY_API_KEY is valid",
  check_network: "Ensure internet connectivity to api.tavily.com",
  reduce_complexity: "Try search_depth='basic' and fewer max_results",
};

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

function quotaFailure(error: unknown, attempts: number, tier: FallbackTier): SearchFailure {
  return {
    error: `API quota/credit limit reached: ${errorMessage(error)}`,
    error_type: "QuotaExceeded",
    suggestion:
      "Check your Tavily API usage limits and billing status. Try using search_depth='basic' to reduce credit consumption.",
    fallback_action: "Use qna_search for simple questions to save credits",
    attempts,
    rung: tier,
  };
}

function cancelledFailure(attempts: number, tier: FallbackTier): SearchFailure {
  return {
    error: "Search cancelled before it completed",
    error_type: "Cancelled",
    attempts,
    rung: tier,
  };
}

function exhaustedFailure(
  error: unknown,
  kind: ErrorKind,
  attempts: number,
  tier: FallbackTier,
): SearchFailure {
  return {
    error: `All search attempts failed: ${errorMessage(error)}`,
    error_type: kind,
    attempts,
    rung: tier,
    suggestion: "Try simplifying your query or using qna_search for basic questions",
    troubleshooting: TROUBLESHOOTING,
  };
}

export function backoffDelay(kind: ErrorKind, attempt: number, baseMs: number): number {
  return kind === "Timeout" ? baseMs * Math.pow(2, attempt) : baseMs;
}

export async function executeWithFallback(
  client: TavilyClient,
  request: SearchRequest,
  options: FallbackOptions = {},
): Promise<SearchOutcome> {
  const { signal, onAttemptFailed } = options;
  const sleep = options.sleep ?? defaultSleep;
  const baseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
  const ladder = buildFallbackLadder(request);

  let lastError: unknown = undefined;
  let lastKind: ErrorKind = "UpstreamError";
  let upstreamFailures = 0;
  let attempts = 0;
  let tier: FallbackTier = "primary";

  for (const [index, rung] of ladder.entries()) {
    tier = rung.tier;
    if (signal?.aborted) {
      return { ok: false, failure: cancelledFailure(attempts, tier) };
    }

    attempts++;
    try {
      const response = await client.search(rung.request, signal);
      if (rung.tier === "primary") {
        return { ok: true, response };
      }
      return {
        ok: true,
        response: {
          ...response,
          fallback_used: rung.tier,
          original_error: errorMessage(lastError),
        },
      };
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, failure: cancelledFailure(attempts, tier) };
      }

      lastError = error;
      lastKind = classifyError(error);
      if (onAttemptFailed) {
        onAttemptFailed({ error, kind: lastKind, tier: rung.tier, attempt: index });
      }

      if (lastKind === "QuotaExceeded") {
        return { ok: false, failure: quotaFailure(error, attempts, tier) };
      }

      if (lastKind === "UpstreamError") {
        upstreamFailures++;
        if (upstreamFailures >= MAX_UPSTREAM_FAILURES) {
          break;
        }
      }

      if (index < ladder.length - 1) {
        try {
          await sleep(backoffDelay(lastKind, index, baseMs), signal);
        } catch (sleepError) {
          if (signal?.aborted) {
            return { ok: false, failure: cancelledFailure(attempts, tier) };
          }
          throw sleepError;
        }
      }
    }
  }

  return { ok: false, failure: exhaustedFailure(lastError, lastKind, attempts, tier) };
}
