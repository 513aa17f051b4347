// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createMemoryClient } from "../provider/memory.ts";
import { TavilyApiError } from "../provider/types.ts";
import { isWebUrl, PARTIAL_EXTRACTION_NOTE, tavilyCrawl, tavilyExtract, tavilyMap } from "./extract.ts";

describe("isWebUrl", () => {
  it("should accept absolute http and https URLs", () => {
    expect(isWebUrl("https://example.com/a?b=c")).toBe(true);
    expect(isWebUrl("http://localhost:8080")).toBe(true);
  });

  it("should reject other schemes and bare words", () => {
    expect(isWebUrl("ftp://example.com")).toBe(false);
    expect(isWebUrl("example.com")).toBe(false);
    expect(isWebUrl("")).toBe(false);
  });
});

describe("tavilyExtract", () => {
  it("should reject input with no usable URL without calling the provider", async () => {
    const client = createMemoryClient();

    const result = await tavilyExtract(client, { urls: ["not-a-url", "ftp://x"] });

    expect(result).toEqual({
      error: "No valid URLs provided. tavily_extract requires actual URLs (starting with http:// or https://)",
      error_type: "ValidationError",
      invalid_urls: ["not-a-url", "ftp://x"],
      provided_input: ["not-a-url", "ftp://x"],
      help: "Use tavily_search first to get URLs, then extract content from those URLs",
    });
    expect(client.calls.extract).toHaveLength(0);
  });

  it("should accept a single URL string and apply defaults", async () => {
    const client = createMemoryClient();

    const result = await tavilyExtract(client, { urls: "https://blog.example.com/post" });

    expect(result).toEqual({ results: [], failed_results: [] });
    expect(client.calls.extract).toEqual([
      {
        urls: ["https://blog.example.com/post"],
        include_images: false,
        extract_depth: "basic",
        format: "markdown",
        timeout: 60,
        include_favicon: false,
      },
    ]);
  });

  it("should use the configured default timeout", async () => {
    const client = createMemoryClient();

    await tavilyExtract(client, { urls: "https://blog.example.com/post" }, { defaultTimeout: 45 });

    expect(client.calls.extract[0]?.timeout).toBe(45);
  });

  it("should note partial failures and list skipped inputs", async () => {
    const client = createMemoryClient();
    client.script.extract.push({
      value: {
        results: [{ url: "https://a.example/page", raw_content: "# Page" }],
        failed_results: [{ url: "https://b.example/paywall", error: "blocked" }],
      },
    });

    const result = await tavilyExtract(client, {
      urls: ["https://a.example/page", "https://b.example/paywall", "nope"],
    });

    expect(result).toEqual({
      results: [{ url: "https://a.example/page", raw_content: "# Page" }],
      failed_results: [{ url: "https://b.example/paywall", error: "blocked" }],
      extraction_note: PARTIAL_EXTRACTION_NOTE,
      skipped_urls: ["nope"],
    });
    expect(client.calls.extract[0]?.urls).toEqual(["https://a.example/page", "https://b.example/paywall"]);
  });

  it("should turn a provider failure into a structured error", async () => {
    const client = createMemoryClient();
    client.script.extract.push({ error: new TavilyApiError(500, "boom") });

    const result = await tavilyExtract(client, { urls: ["https://a.example/page"] });

    expect(result).toEqual({
      error: "Tavily extract error: boom",
      error_type: "UpstreamError",
      valid_urls: ["https://a.example/page"],
      suggestion: "Try using tavily_search with include_raw_content=True for better content access",
    });
  });
});

describe("tavilyCrawl", () => {
  it("should fill crawl defaults and pass instructions through", async () => {
    const client = createMemoryClient();

    const result = await tavilyCrawl(client, { url: "https://docs.example.com", instructions: "API pages only" });

    expect(result).toEqual({ base_url: "https://docs.example.com", results: [] });
    expect(client.calls.crawl).toEqual([
      {
        url: "https://docs.example.com",
        instructions: "API pages only",
        max_depth: 1,
        max_breadth: 20,
        limit: 50,
        allow_external: true,
        include_images: false,
        extract_depth: "basic",
      },
    ]);
  });

  it("should report crawl failures with the URL", async () => {
    const client = createMemoryClient();
    client.script.crawl.push({ error: new Error("Request timeout") });

    expect(await tavilyCrawl(client, { url: "https://docs.example.com" })).toEqual({
      error: "Tavily crawl error: Request timeout",
      error_type: "Timeout",
      url: "https://docs.example.com",
    });
  });
});

describe("tavilyMap", () => {
  it("should fill map defaults", async () => {
    const client = createMemoryClient();
    client.script.map.push({
      value: { base_url: "https://docs.example.com", results: ["https://docs.example.com/a"] },
    });

    const result = await tavilyMap(client, { url: "https://docs.example.com", limit: 5 });

    expect(result).toEqual({ base_url: "https://docs.example.com", results: ["https://docs.example.com/a"] });
    expect(client.calls.map).toEqual([{ url: "https://docs.example.com", max_depth: 2, limit: 5 }]);
  });

  it("should report map failures with the URL", async () => {
    const client = createMemoryClient();
    client.script.map.push({ error: new TypeError("fetch failed") });

    expect(await tavilyMap(client, { url: "https://docs.example.com" })).toEqual({
      error: "Tavily map error: fetch failed",
      error_type: "TransportError",
      url: "https://docs.example.com",
    });
  });
});
