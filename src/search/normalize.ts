// pattern: Functional Core

import type { SearchRequest, TimeWindow } from "../provider/types.ts";
import type { SearchArgs } from "./types.ts";
import { estimateTimeout } from "./timeout.ts";

type TimeFields = Pick<SearchArgs, "days" | "time_range" | "start_date" | "end_date">;

/**
 * Pick the single time window the request will carry.
 * Explicit dates win over a day count, which wins over a named range.
 * A zero-length date range means "today" and becomes a one-day window.
 */
export function resolveTimeWindow(fields: TimeFields): TimeWindow | undefined {
  const { start_date, end_date } = fields;

  if (start_date && end_date && start_date === end_date) {
    return { kind: "days", days: 1 };
  }
  if (start_date || end_date) {
    return {
      kind: "dates",
      ...(start_date ? { start_date } : {}),
      ...(end_date ? { end_date } : {}),
    };
  }
  if (fields.days !== undefined) {
    return { kind: "days", days: fields.days };
  }
  if (fields.time_range !== undefined) {
    return { kind: "range", time_range: fields.time_range };
  }
  return undefined;
}

export function normalizeSearchRequest(args: SearchArgs): SearchRequest {
  const timeWindow = resolveTimeWindow(args);
  const timeout =
    args.timeout ??
    estimateTimeout({
      search_depth: args.search_depth,
      auto_parameters: args.auto_parameters,
      include_raw_content: args.include_raw_content,
      max_results: args.max_results,
    });

  return {
    query: args.query,
    search_depth: args.search_depth,
    topic: args.topic,
    auto_parameters: args.auto_parameters,
    max_results: args.max_results,
    include_images: args.include_images,
    include_image_descriptions: args.include_image_descriptions,
    include_answer: args.include_answer,
    include_raw_content: args.include_raw_content,
    include_domains: args.include_domains ?? [],
    exclude_domains: args.exclude_domains ?? [],
    include_favicon: args.include_favicon,
    timeout,
    ...(timeWindow ? { time_window: timeWindow } : {}),
    ...(args.chunks_per_source !== undefined ? { chunks_per_source: args.chunks_per_source } : {}),
    ...(args.country !== undefined ? { country: args.country } : {}),
  };
}
