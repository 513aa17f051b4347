// pattern: Imperative Shell

import type { SearchDepth, TavilyClient } from "../provider/types.ts";
import { UnsupportedParameterError } from "../provider/types.ts";
import { normalizeSearchRequest } from "./normalize.ts";
import { classifyError } from "./classify.ts";
import { errorMessage, SEARCH_ARG_DEFAULTS } from "./types.ts";

export const NO_ANSWER_MESSAGE =
  "No answer found for this query. Try using tavily_search for more comprehensive results.";

/** Direct answer as text. Failures come back as explanatory strings, never as throws. */
export async function qnaSearch(
  client: TavilyClient,
  query: string,
  signal?: AbortSignal,
): Promise<string> {
  try {
    const answer = await client.qnaSearch(query, signal);
    if (answer.trim() === "") {
      return NO_ANSWER_MESSAGE;
    }
    return answer;
  } catch (error) {
    const message = errorMessage(error);
    const kind = classifyError(error);

    if (kind === "QuotaExceeded") {
      return `QNA search quota exceeded: ${message}. This uses fewer credits than regular search - check your Tavily account.`;
    }
    if (kind === "Timeout") {
      return `QNA search timed out: ${message}. Try a simpler question or use tavily_search instead.`;
    }
    return `QNA search error: ${message}. Try using tavily_search for this query, which may have better error handling.`;
  }
}

export type SearchContextArgs = {
  readonly query: string;
  readonly max_tokens?: number;
  readonly search_depth?: SearchDepth;
};

async function providerContext(
  client: TavilyClient,
  query: string,
  searchDepth: SearchDepth,
  maxTokens: number,
  signal: AbortSignal | undefined,
): Promise<string> {
  try {
    return await client.getSearchContext(
      { query, search_depth: searchDepth, max_tokens: maxTokens },
      signal,
    );
  } catch (error) {
    if (error instanceof UnsupportedParameterError && error.parameter === "max_tokens") {
      return client.getSearchContext({ query, search_depth: searchDepth }, signal);
    }
    throw error;
  }
}

/**
 * Context text for retrieval-augmented prompting.
 * Prefers the provider's context call; if that fails, runs a plain search and
 * stitches the answer and each source's content together.
 */
export async function getSearchContext(
  client: TavilyClient,
  args: SearchContextArgs,
  signal?: AbortSignal,
): Promise<string> {
  const searchDepth = args.search_depth ?? "basic";
  const maxTokens = args.max_tokens ?? 4000;

  try {
    return await providerContext(client, args.query, searchDepth, maxTokens, signal);
  } catch (error) {
    try {
      const request = normalizeSearchRequest({
        ...SEARCH_ARG_DEFAULTS,
        query: args.query,
        search_depth: searchDepth,
        include_answer: "advanced",
        include_raw_content: "text",
        max_results: 5,
      });
      const result = await client.search(request, signal);

      const parts: Array<string> = [];
      if (result.answer) {
        parts.push(`Summary: ${result.answer}`);
      }
      for (const entry of result.results) {
        if (entry.snippet) {
          parts.push(`Source (${entry.title || "Unknown"}): ${entry.snippet}`);
        }
      }
      return parts.join("\n\n");
    } catch (fallbackError) {
      return `Context generation error: ${errorMessage(error)}. Fallback error: ${errorMessage(fallbackError)}`;
    }
  }
}
