// pattern: Functional Core

import { TavilyApiError } from "../provider/types.ts";
import type { ErrorKind } from "./types.ts";

const QUOTA_STATUSES = new Set([429, 432, 433]);
const TIMEOUT_STATUSES = new Set([408, 504]);

const QUOTA_KEYWORDS = ["credit", "quota", "limit", "billing"];
const TIMEOUT_KEYWORDS = ["timeout", "time out", "timed out", "took too long"];
const TRANSPORT_KEYWORDS = [
  "network",
  "connection",
  "econnrefused",
  "econnreset",
  "enotfound",
  "fetch failed",
  "socket hang up",
];

function includesAny(text: string, keywords: ReadonlyArray<string>): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

/**
 * Map whatever the provider threw onto the failure taxonomy.
 * Status codes are trusted first; message keywords cover errors without one.
 * Never returns ValidationError or Cancelled: those are decided before or around the call.
 */
export function classifyError(error: unknown): Exclude<ErrorKind, "ValidationError" | "Cancelled"> {
  if (error instanceof TavilyApiError) {
    if (QUOTA_STATUSES.has(error.status)) return "QuotaExceeded";
    if (TIMEOUT_STATUSES.has(error.status)) return "Timeout";
  }

  if (error instanceof Error && error.name === "TimeoutError") {
    return "Timeout";
  }

  const text = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (includesAny(text, QUOTA_KEYWORDS)) return "QuotaExceeded";
  if (includesAny(text, TIMEOUT_KEYWORDS)) return "Timeout";
  if (includesAny(text, TRANSPORT_KEYWORDS)) return "TransportError";

  // undici reports DNS and socket failures as a bare TypeError with the cause attached
  if (error instanceof TypeError && error.cause !== undefined) return "TransportError";

  return "UpstreamError";
}

export type Diagnosis = {
  readonly diagnosis: string;
  readonly fix_suggestion: string;
};

/** Human-readable cause for the health check. */
export function diagnoseError(error: unknown): Diagnosis {
  const text = (error instanceof Error ? error.message : String(error)).toLowerCase();
  const unauthorized =
    error instanceof TavilyApiError && (error.status === 401 || error.status === 403);

  if (unauthorized || (text.includes("api") && (text.includes("key") || text.includes("auth")))) {
    return {
      diagnosis: "Invalid or missing API key",
      fix_suggestion: "Check TAVILY_API_KEY environment variable",
    };
  }

  const kind = classifyError(error);
  if (kind === "TransportError" || kind === "Timeout") {
    return {
      diagnosis: "Network connectivity issue",
      fix_suggestion: "Check internet connection and firewall settings",
    };
  }
  if (kind === "QuotaExceeded") {
    return {
      diagnosis: "API quota or billing issue",
      fix_suggestion: "Check Tavily account usage and billing status",
    };
  }
  return {
    diagnosis: "Unknown API issue",
    fix_suggestion: "Check Tavily service status",
  };
}
