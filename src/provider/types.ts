// pattern: Functional Core

/**
 * Port interface for the upstream search provider.
 * The networked adapter and the in-memory adapter both normalise to these shapes,
 * so the search core never sees raw API payloads.
 */

export type SearchDepth = "basic" | "advanced";

export type SearchTopic = "general" | "news" | "finance" | "health" | "scientific" | "travel";

export type TimeRange = "day" | "week" | "month" | "year" | "d" | "w" | "m" | "y";

export type AnswerMode = boolean | "basic" | "advanced";

export type RawContentMode = boolean | "markdown" | "text";

export type TimeWindow =
  | { readonly kind: "days"; readonly days: number }
  | { readonly kind: "range"; readonly time_range: TimeRange }
  | { readonly kind: "dates"; readonly start_date?: string; readonly end_date?: string };

export type SearchRequest = {
  readonly query: string;
  readonly search_depth: SearchDepth;
  readonly max_results: number;
  /** Seconds. Enforced client-side by the adapter. */
  readonly timeout: number;
  readonly topic?: SearchTopic;
  readonly auto_parameters?: boolean;
  readonly time_window?: TimeWindow;
  readonly chunks_per_source?: number;
  readonly include_images?: boolean;
  readonly include_image_descriptions?: boolean;
  readonly include_favicon?: boolean;
  readonly include_answer?: AnswerMode;
  readonly include_raw_content?: RawContentMode;
  readonly include_domains?: ReadonlyArray<string>;
  readonly exclude_domains?: ReadonlyArray<string>;
  readonly country?: string;
};

export type SearchResultEntry = {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly score: number;
  readonly raw_content?: string;
  readonly favicon?: string;
};

export type SearchImage = string | { readonly url: string; readonly description?: string };

export type FallbackTier = "primary" | "reduced_complexity" | "minimal";

export type SearchPayload = {
  readonly query: string;
  readonly results: ReadonlyArray<SearchResultEntry>;
  readonly answer?: string;
  readonly images?: ReadonlyArray<SearchImage>;
  readonly follow_up_questions?: ReadonlyArray<string>;
  readonly response_time?: number;
  readonly request_id?: string;
  readonly fallback_used?: Exclude<FallbackTier, "primary">;
  readonly original_error?: string;
};

export type ExtractDepth = "basic" | "advanced";

export type ExtractRequest = {
  readonly urls: ReadonlyArray<string>;
  readonly include_images: boolean;
  readonly extract_depth: ExtractDepth;
  readonly format: "markdown" | "text";
  readonly timeout: number;
  readonly include_favicon: boolean;
};

export type ExtractedPage = {
  readonly url: string;
  readonly raw_content: string;
  readonly images?: ReadonlyArray<string>;
  readonly favicon?: string;
};

export type FailedExtraction = {
  readonly url: string;
  readonly error: string;
};

export type ExtractPayload = {
  readonly results: ReadonlyArray<ExtractedPage>;
  readonly failed_results: ReadonlyArray<FailedExtraction>;
  readonly response_time?: number;
};

export type CrawlRequest = {
  readonly url: string;
  readonly max_depth: number;
  readonly max_breadth: number;
  readonly limit: number;
  readonly instructions?: string;
  readonly select_paths?: ReadonlyArray<string>;
  readonly select_domains?: ReadonlyArray<string>;
  readonly exclude_paths?: ReadonlyArray<string>;
  readonly exclude_domains?: ReadonlyArray<string>;
  readonly allow_external: boolean;
  readonly include_images: boolean;
  readonly categories?: ReadonlyArray<string>;
  readonly extract_depth: ExtractDepth;
};

export type CrawlPayload = {
  readonly base_url: string;
  readonly results: ReadonlyArray<ExtractedPage>;
  readonly response_time?: number;
};

export type MapRequest = {
  readonly url: string;
  readonly max_depth: number;
  readonly limit: number;
  readonly instructions?: string;
};

export type MapPayload = {
  readonly base_url: string;
  readonly results: ReadonlyArray<string>;
  readonly response_time?: number;
};

export type SearchContextRequest = {
  readonly query: string;
  readonly search_depth: SearchDepth;
  readonly max_tokens?: number;
};

export interface TavilyClient {
  search(request: SearchRequest, signal?: AbortSignal): Promise<SearchPayload>;
  extract(request: ExtractRequest, signal?: AbortSignal): Promise<ExtractPayload>;
  crawl(request: CrawlRequest, signal?: AbortSignal): Promise<CrawlPayload>;
  map(request: MapRequest, signal?: AbortSignal): Promise<MapPayload>;
  qnaSearch(query: string, signal?: AbortSignal): Promise<string>;
  getSearchContext(request: SearchContextRequest, signal?: AbortSignal): Promise<string>;
}

/** Non-2xx response from the provider. */
export class TavilyApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "TavilyApiError";
  }
}

/**
 * The provider (or this version of it) does not accept an optional parameter.
 * The HTTP adapter trims `max_tokens` itself and never raises this; it is part of the
 * port for clients that forward such options upstream. getSearchContext retries
 * without the parameter when it sees this.
 */
export class UnsupportedParameterError extends Error {
  constructor(public readonly parameter: string) {
    super(`unsupported parameter: ${parameter}`);
    this.name = "UnsupportedParameterError";
  }
}
