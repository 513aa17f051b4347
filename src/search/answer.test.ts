// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createMemoryClient } from "../provider/memory.ts";
import { TavilyApiError, UnsupportedParameterError } from "../provider/types.ts";
import { getSearchContext, NO_ANSWER_MESSAGE, qnaSearch } from "./answer.ts";

describe("qnaSearch", () => {
  it("should return the provider's answer", async () => {
    const client = createMemoryClient();
    client.script.qnaSearch.push({ value: "Canberra" });

    expect(await qnaSearch(client, "capital of australia")).toBe("Canberra");
    expect(client.calls.qnaSearch).toEqual(["capital of australia"]);
  });

  it("should replace a blank answer with guidance", async () => {
    const client = createMemoryClient();
    client.script.qnaSearch.push({ value: "   " });

    expect(await qnaSearch(client, "q")).toBe(NO_ANSWER_MESSAGE);
  });

  it("should explain quota failures", async () => {
    const client = createMemoryClient();
    client.script.qnaSearch.push({ error: new TavilyApiError(429, "rate exceeded") });

    expect(await qnaSearch(client, "q")).toBe(
      "QNA search quota exceeded: rate exceeded. This uses fewer credits than regular search - check your Tavily account.",
    );
  });

  it("should explain timeouts", async () => {
    const client = createMemoryClient();
    client.script.qnaSearch.push({ error: new Error("Request timeout") });

    expect(await qnaSearch(client, "q")).toBe(
      "QNA search timed out: Request timeout. Try a simpler question or use tavily_search instead.",
    );
  });

  it("should explain other failures", async () => {
    const client = createMemoryClient();
    client.script.qnaSearch.push({ error: new Error("boom") });

    expect(await qnaSearch(client, "q")).toBe(
      "QNA search error: boom. Try using tavily_search for this query, which may have better error handling.",
    );
  });
});

describe("getSearchContext", () => {
  it("should ask the provider with the default token budget", async () => {
    const client = createMemoryClient();
    client.script.getSearchContext.push({ value: '[{"url":"https://a.example","content":"alpha"}]' });

    const context = await getSearchContext(client, { query: "alpha" });

    expect(context).toBe('[{"url":"https://a.example","content":"alpha"}]');
    expect(client.calls.getSearchContext).toEqual([{ query: "alpha", search_depth: "basic", max_tokens: 4000 }]);
  });

  it("should retry without max_tokens when the provider refuses it", async () => {
    const client = createMemoryClient();
    client.script.getSearchContext.push(
      { error: new UnsupportedParameterError("max_tokens") },
      { value: "context" },
    );

    const context = await getSearchContext(client, { query: "alpha", max_tokens: 500, search_depth: "advanced" });

    expect(context).toBe("context");
    expect(client.calls.getSearchContext).toEqual([
      { query: "alpha", search_depth: "advanced", max_tokens: 500 },
      { query: "alpha", search_depth: "advanced" },
    ]);
    expect(client.calls.search).toHaveLength(0);
  });

  it("should build context from a plain search when the provider call fails", async () => {
    const client = createMemoryClient();
    client.script.getSearchContext.push({ error: new Error("boom") });
    client.script.search.push({
      value: {
        query: "alpha",
        answer: "Alpha is first.",
        results: [
          { title: "Greek letters", url: "https://a.example", snippet: "Alpha leads the alphabet.", score: 0.8 },
          { title: "", url: "https://b.example", snippet: "First letter.", score: 0.5 },
          { title: "Empty", url: "https://c.example", snippet: "", score: 0.1 },
        ],
      },
    });

    const context = await getSearchContext(client, { query: "alpha" });

    expect(context).toBe(
      "Summary: Alpha is first.\n\nSource (Greek letters): Alpha leads the alphabet.\n\nSource (Unknown): First letter.",
    );
    expect(client.calls.search[0]?.include_answer).toBe("advanced");
    expect(client.calls.search[0]?.include_raw_content).toBe("text");
    expect(client.calls.search[0]?.max_results).toBe(5);
  });

  it("should report both failures when the fallback also fails", async () => {
    const client = createMemoryClient();
    client.script.getSearchContext.push({ error: new Error("context down") });
    client.script.search.push({ error: new Error("search down") });

    expect(await getSearchContext(client, { query: "alpha" })).toBe(
      "Context generation error: context down. Fallback error: search down",
    );
  });
});
