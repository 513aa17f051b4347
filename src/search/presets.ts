// pattern: Imperative Shell

/**
 * Fixed-parameter variants of tavilySearch for the two common agent intents:
 * in-depth news coverage and "just find the best results".
 */

import type { AnswerMode, RawContentMode, TavilyClient } from "../provider/types.ts";
import { tavilySearch } from "./search.ts";
import type { SearchResult } from "./search.ts";
import type { FallbackOptions } from "./orchestrator.ts";
import { SEARCH_ARG_DEFAULTS } from "./types.ts";

const PRESET_TIMEOUT_SECONDS = 120;

export type NewsSearchArgs = {
  readonly query: string;
  readonly days?: number;
  readonly max_results?: number;
  readonly country?: string;
  readonly include_international_sources?: boolean;
};

export type SmartSearchArgs = {
  readonly query: string;
  readonly max_results?: number;
  readonly include_answer?: AnswerMode;
  readonly include_raw_content?: RawContentMode;
};

/**
 * International-first: the country filter is dropped unless the caller opts out.
 * The preset always searches the news topic, so a kept country is rejected by validation.
 */
export async function detailedNewsSearch(
  client: TavilyClient,
  args: NewsSearchArgs,
  options: FallbackOptions = {},
): Promise<SearchResult> {
  const includeInternational = args.include_international_sources ?? true;
  const country = includeInternational ? undefined : args.country;

  return tavilySearch(
    client,
    {
      ...SEARCH_ARG_DEFAULTS,
      query: args.query,
      search_depth: "advanced",
      topic: "news",
      auto_parameters: true,
      days: args.days ?? 7,
      max_results: args.max_results ?? 10,
      include_answer: "advanced",
      include_raw_content: "markdown",
      include_image_descriptions: true,
      include_favicon: true,
      timeout: PRESET_TIMEOUT_SECONDS,
      ...(country !== undefined ? { country } : {}),
    },
    options,
  );
}

export async function smartSearch(
  client: TavilyClient,
  args: SmartSearchArgs,
  options: FallbackOptions = {},
): Promise<SearchResult> {
  return tavilySearch(
    client,
    {
      ...SEARCH_ARG_DEFAULTS,
      query: args.query,
      auto_parameters: true,
      max_results: args.max_results ?? 10,
      include_answer: args.include_answer ?? "advanced",
      include_raw_content: args.include_raw_content ?? "markdown",
      include_images: true,
      include_image_descriptions: true,
      include_favicon: true,
      timeout: PRESET_TIMEOUT_SECONDS,
    },
    options,
  );
}
