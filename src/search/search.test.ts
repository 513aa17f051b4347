// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createMemoryClient } from "../provider/memory.ts";
import { TavilyApiError } from "../provider/types.ts";
import { healthCheck, tavilySearch } from "./search.ts";
import { SEARCH_ARG_DEFAULTS } from "./types.ts";

function sequenceClock(values: Array<number>): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index++;
    return value;
  };
}

describe("tavilySearch", () => {
  it("should reject out-of-range max_results without calling the provider", async () => {
    const client = createMemoryClient();

    const result = await tavilySearch(client, { ...SEARCH_ARG_DEFAULTS, query: "q", max_results: 25 });

    expect(result).toEqual({
      error:
        "Parameter validation error: max_results must be between 0 and 20, got 25. " +
        "Use 5-10 for most searches, 15-20 for comprehensive research.",
      error_type: "ValidationError",
      fix_suggestion: "Check the parameter requirements in the error message above",
    });
    expect(client.calls.search).toHaveLength(0);
  });

  it("should reject country with the news topic without calling the provider", async () => {
    const client = createMemoryClient();

    const result = await tavilySearch(client, {
      ...SEARCH_ARG_DEFAULTS,
      query: "elections",
      topic: "news",
      country: "germany",
    });

    expect("error_type" in result && result.error_type).toBe("ValidationError");
    expect(client.calls.search).toHaveLength(0);
  });

  it("should send the normalized request and return the payload", async () => {
    const client = createMemoryClient();
    client.script.search.push({
      value: {
        query: "rust borrow checker",
        results: [{ title: "Ownership", url: "https://doc.example.org/own", snippet: "Each value has an owner", score: 0.9 }],
      },
    });

    const result = await tavilySearch(client, {
      ...SEARCH_ARG_DEFAULTS,
      query: "rust borrow checker",
      start_date: "2025-02-02",
      end_date: "2025-02-02",
    });

    expect(result).toEqual({
      query: "rust borrow checker",
      results: [{ title: "Ownership", url: "https://doc.example.org/own", snippet: "Each value has an owner", score: 0.9 }],
    });
    expect(client.calls.search[0]?.time_window).toEqual({ kind: "days", days: 1 });
    expect(client.calls.search[0]?.timeout).toBe(60);
  });
});

describe("healthCheck", () => {
  const noon = new Date(2025, 2, 14, 12, 0, 0).getTime();

  it("should report healthy with the rounded response time", async () => {
    const client = createMemoryClient();
    client.script.search.push({
      value: { query: "test", results: [{ title: "t", url: "https://example.com", snippet: "s", score: 1 }] },
    });

    const report = await healthCheck(client, { clock: sequenceClock([noon, noon + 1234]) });

    expect(report).toEqual({
      status: "healthy",
      api_accessible: true,
      response_time_seconds: 1.23,
      test_query_successful: true,
      results_count: 1,
      timestamp: "2025-03-14",
    });
    expect(client.calls.search).toEqual([{ query: "test", max_results: 1, search_depth: "basic", timeout: 10 }]);
  });

  it("should diagnose a rejected key without falling back", async () => {
    const client = createMemoryClient();
    client.script.search.push({ error: new TavilyApiError(401, "tavily /search failed: 401 Unauthorized - bad key") });

    const report = await healthCheck(client, { clock: sequenceClock([noon]) });

    expect(report).toEqual({
      status: "unhealthy",
      api_accessible: false,
      error: "tavily /search failed: 401 Unauthorized - bad key",
      error_type: "UpstreamError",
      diagnosis: "Invalid or missing API key",
      fix_suggestion: "Check TAVILY_API_KEY environment variable",
      timestamp: "2025-03-14",
    });
    expect(client.calls.search).toHaveLength(1);
  });

  it("should diagnose a network failure", async () => {
    const client = createMemoryClient();
    client.script.search.push({ error: new TypeError("fetch failed") });

    const report = await healthCheck(client, { clock: sequenceClock([noon]) });

    expect(report.status).toBe("unhealthy");
    if (report.status === "unhealthy") {
      expect(report.error_type).toBe("TransportError");
      expect(report.diagnosis).toBe("Network connectivity issue");
    }
  });
});
