// pattern: Functional Core

/**
 * Caller-facing types for the search core: the flat argument set a tool receives,
 * the failure taxonomy, and the discriminated outcome every operation resolves to.
 */

import type {
  AnswerMode,
  FallbackTier,
  RawContentMode,
  SearchDepth,
  SearchPayload,
  SearchRequest,
  SearchTopic,
  TimeRange,
} from "../provider/types.ts";

export type SearchArgs = {
  readonly query: string;
  readonly search_depth: SearchDepth;
  readonly topic: SearchTopic;
  readonly auto_parameters: boolean;
  readonly days?: number;
  readonly time_range?: TimeRange;
  readonly start_date?: string;
  readonly end_date?: string;
  readonly max_results: number;
  readonly chunks_per_source?: number;
  readonly include_images: boolean;
  readonly include_image_descriptions: boolean;
  readonly include_answer: AnswerMode;
  readonly include_raw_content: RawContentMode;
  readonly include_domains?: ReadonlyArray<string>;
  readonly exclude_domains?: ReadonlyArray<string>;
  readonly country?: string;
  readonly timeout?: number;
  readonly include_favicon: boolean;
};

export const SEARCH_ARG_DEFAULTS = {
  search_depth: "basic",
  topic: "general",
  auto_parameters: false,
  max_results: 5,
  include_images: false,
  include_image_descriptions: false,
  include_answer: false,
  include_raw_content: false,
  include_favicon: false,
} as const satisfies Omit<SearchArgs, "query">;

export type ErrorKind =
  | "ValidationError"
  | "QuotaExceeded"
  | "Timeout"
  | "TransportError"
  | "UpstreamError"
  | "Cancelled";

export type Troubleshooting = {
  readonly check_api_key: string;
  readonly check_network: string;
  readonly reduce_complexity: string;
};

export type SearchFailure = {
  readonly error: string;
  readonly error_type: ErrorKind;
  readonly suggestion?: string;
  readonly fix_suggestion?: string;
  readonly fallback_action?: string;
  readonly attempts?: number;
  readonly rung?: FallbackTier;
  readonly troubleshooting?: Troubleshooting;
};

export type SearchOutcome =
  | { readonly ok: true; readonly response: SearchPayload }
  | { readonly ok: false; readonly failure: SearchFailure };

export type LadderRung = {
  readonly tier: FallbackTier;
  readonly request: SearchRequest;
};

export function validationFailure(message: string): SearchFailure {
  return {
    error: `Parameter validation error: ${message}`,
    error_type: "ValidationError",
    fix_suggestion: "Check the parameter requirements in the error message above",
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
