// pattern: Functional Core

import type { SearchDepth, SearchTopic } from "../provider/types.ts";

export const MAX_RESULTS_LIMIT = 20;
export const MIN_CHUNKS_PER_SOURCE = 1;
export const MAX_CHUNKS_PER_SOURCE = 3;

export type ValidatedFields = {
  readonly query: string;
  readonly search_depth: SearchDepth;
  readonly chunks_per_source?: number;
  readonly max_results: number;
  readonly topic: SearchTopic;
  readonly country?: string;
};

/**
 * Reject parameter combinations the provider would refuse or silently ignore.
 * Returns the first problem found, or null. Never touches the network.
 */
export function validateSearchParams(fields: ValidatedFields): string | null {
  if (fields.query.trim() === "") {
    return "query must not be empty. Provide the words or question to search for.";
  }

  if (fields.max_results < 0 || fields.max_results > MAX_RESULTS_LIMIT) {
    return (
      `max_results must be between 0 and ${MAX_RESULTS_LIMIT}, got ${fields.max_results}. ` +
      "Use 5-10 for most searches, 15-20 for comprehensive research."
    );
  }

  if (fields.chunks_per_source !== undefined) {
    if (fields.search_depth !== "advanced") {
      return (
        `chunks_per_source only available with search_depth='advanced', got search_depth='${fields.search_depth}'. ` +
        "Either set search_depth='advanced' or remove chunks_per_source parameter."
      );
    }
    if (
      fields.chunks_per_source < MIN_CHUNKS_PER_SOURCE ||
      fields.chunks_per_source > MAX_CHUNKS_PER_SOURCE
    ) {
      return (
        `chunks_per_source must be between ${MIN_CHUNKS_PER_SOURCE} and ${MAX_CHUNKS_PER_SOURCE}, got ${fields.chunks_per_source}. ` +
        "Use 1 for brief snippets, 3 for detailed content extraction."
      );
    }
  }

  if (fields.country !== undefined && fields.topic !== "general") {
    return (
      `country parameter only available with topic='general', got topic='${fields.topic}'. ` +
      "Use topic='general' for country-specific searches, or remove country parameter."
    );
  }

  return null;
}
