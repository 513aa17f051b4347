// pattern: Imperative Shell

import { z } from "zod";
import type {
  CrawlPayload,
  CrawlRequest,
  ExtractPayload,
  ExtractRequest,
  MapPayload,
  MapRequest,
  SearchContextRequest,
  SearchPayload,
  SearchRequest,
  SearchResultEntry,
  TavilyClient,
} from "./types.ts";
import { TavilyApiError } from "./types.ts";

const CONTEXT_MAX_RESULTS = 5;
const CONTEXT_TIMEOUT_SECONDS = 60;
const QNA_TIMEOUT_SECONDS = 60;
const CHARS_PER_TOKEN = 4;

const SearchResultSchema = z.object({
  title: z.string().default(""),
  url: z.string(),
  content: z.string().default(""),
  score: z.number().default(0),
  raw_content: z.string().nullish(),
  favicon: z.string().nullish(),
});

const SearchImageSchema = z.union([
  z.string(),
  z.object({ url: z.string(), description: z.string().nullish() }),
]);

const SearchResponseSchema = z.object({
  query: z.string().default(""),
  answer: z.string().nullish(),
  images: z.array(SearchImageSchema).nullish(),
  follow_up_questions: z.array(z.string()).nullish(),
  results: z.array(SearchResultSchema).default([]),
  response_time: z.coerce.number().nullish(),
  request_id: z.string().nullish(),
});

const ExtractedPageSchema = z.object({
  url: z.string(),
  raw_content: z.string().nullish(),
  images: z.array(z.string()).nullish(),
  favicon: z.string().nullish(),
});

const ExtractResponseSchema = z.object({
  results: z.array(ExtractedPageSchema).default([]),
  failed_results: z
    .array(z.object({ url: z.string(), error: z.string().default("extraction failed") }))
    .default([]),
  response_time: z.coerce.number().nullish(),
});

const CrawlResponseSchema = z.object({
  base_url: z.string().default(""),
  results: z.array(ExtractedPageSchema).default([]),
  response_time: z.coerce.number().nullish(),
});

const MapResponseSchema = z.object({
  base_url: z.string().default(""),
  results: z.array(z.string()).default([]),
  response_time: z.coerce.number().nullish(),
});

const ErrorBodySchema = z.object({
  detail: z.union([z.string(), z.object({ error: z.string() })]),
});

type ExtractedPageData = z.infer<typeof ExtractedPageSchema>;

/**
 * Flatten a normalised request into the JSON body the search endpoint takes.
 * Absent optional fields stay absent; the provider treats "missing" and "empty" differently.
 */
export function toSearchBody(request: SearchRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    query: request.query,
    search_depth: request.search_depth,
    max_results: request.max_results,
  };

  const optional = {
    topic: request.topic,
    auto_parameters: request.auto_parameters,
    chunks_per_source: request.chunks_per_source,
    include_images: request.include_images,
    include_image_descriptions: request.include_image_descriptions,
    include_favicon: request.include_favicon,
    include_answer: request.include_answer,
    include_raw_content: request.include_raw_content,
    include_domains: request.include_domains,
    exclude_domains: request.exclude_domains,
    country: request.country,
  };
  for (const [key, value] of Object.entries(optional)) {
    if (value !== undefined) {
      body[key] = value;
    }
  }

  const window = request.time_window;
  if (window?.kind === "days") {
    body["days"] = window.days;
  } else if (window?.kind === "range") {
    body["time_range"] = window.time_range;
  } else if (window?.kind === "dates") {
    if (window.start_date !== undefined) body["start_date"] = window.start_date;
    if (window.end_date !== undefined) body["end_date"] = window.end_date;
  }

  return body;
}

function toPage(page: ExtractedPageData) {
  return {
    url: page.url,
    raw_content: page.raw_content ?? "",
    ...(page.images ? { images: page.images } : {}),
    ...(page.favicon ? { favicon: page.favicon } : {}),
  };
}

function describeErrorBody(text: string): string {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const detail = parsed.data.detail;
      return typeof detail === "string" ? detail : detail.error;
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return text;
}

/**
 * Trim serialized sources to roughly fit a token budget.
 * Whole sources are dropped from the end rather than cut mid-way.
 */
export function fitSourcesToTokens(
  sources: ReadonlyArray<{ url: string; content: string }>,
  maxTokens: number,
): string {
  const kept = [...sources];
  let serialized = JSON.stringify(kept);
  while (kept.length > 0 && serialized.length / CHARS_PER_TOKEN > maxTokens) {
    kept.pop();
    serialized = JSON.stringify(kept);
  }
  return serialized;
}

export function createTavilyAdapter(apiKey: string, baseUrl = "https://api.tavily.com"): TavilyClient {
  async function post(
    path: string,
    body: Record<string, unknown>,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const timeoutSignal = AbortSignal.timeout(timeoutSeconds * 1000);
    const response = await fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: {
        "Authorization": `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal: signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal,
    });

    if (!response.ok) {
      const text = await response.text();
      const detail = describeErrorBody(text);
      throw new TavilyApiError(
        response.status,
        `tavily ${path.slice(1)} failed: ${response.status} ${response.statusText}${detail ? ` - ${detail}` : ""}`,
      );
    }

    return response.json();
  }

  async function search(request: SearchRequest, signal?: AbortSignal): Promise<SearchPayload> {
    const data = SearchResponseSchema.parse(
      await post("/search", toSearchBody(request), request.timeout, signal),
    );

    const results: Array<SearchResultEntry> = data.results.map((r) => ({
      title: r.title,
      url: r.url,
      snippet: r.content,
      score: r.score,
      ...(r.raw_content ? { raw_content: r.raw_content } : {}),
      ...(r.favicon ? { favicon: r.favicon } : {}),
    }));

    return {
      query: data.query || request.query,
      results,
      ...(data.answer ? { answer: data.answer } : {}),
      ...(data.images && data.images.length > 0
        ? {
            images: data.images.map((image) =>
              typeof image === "string"
                ? image
                : { url: image.url, ...(image.description ? { description: image.description } : {}) },
            ),
          }
        : {}),
      ...(data.follow_up_questions ? { follow_up_questions: data.follow_up_questions } : {}),
      ...(data.response_time != null ? { response_time: data.response_time } : {}),
      ...(data.request_id ? { request_id: data.request_id } : {}),
    };
  }

  return {
    search,

    async extract(request: ExtractRequest, signal?: AbortSignal): Promise<ExtractPayload> {
      const data = ExtractResponseSchema.parse(
        await post(
          "/extract",
          {
            urls: request.urls,
            include_images: request.include_images,
            extract_depth: request.extract_depth,
            format: request.format,
            include_favicon: request.include_favicon,
          },
          request.timeout,
          signal,
        ),
      );

      return {
        results: data.results.map(toPage),
        failed_results: data.failed_results,
        ...(data.response_time != null ? { response_time: data.response_time } : {}),
      };
    },

    async crawl(request: CrawlRequest, signal?: AbortSignal): Promise<CrawlPayload> {
      const body: Record<string, unknown> = { ...request };
      const data = CrawlResponseSchema.parse(await post("/crawl", body, 150, signal));
      return {
        base_url: data.base_url || request.url,
        results: data.results.map(toPage),
        ...(data.response_time != null ? { response_time: data.response_time } : {}),
      };
    },

    async map(request: MapRequest, signal?: AbortSignal): Promise<MapPayload> {
      const body: Record<string, unknown> = { ...request };
      const data = MapResponseSchema.parse(await post("/map", body, 150, signal));
      return {
        base_url: data.base_url || request.url,
        results: data.results,
        ...(data.response_time != null ? { response_time: data.response_time } : {}),
      };
    },

    async qnaSearch(query: string, signal?: AbortSignal): Promise<string> {
      const response = await search(
        {
          query,
          search_depth: "advanced",
          topic: "general",
          max_results: 5,
          include_answer: true,
          timeout: QNA_TIMEOUT_SECONDS,
        },
        signal,
      );
      return response.answer ?? "";
    },

    async getSearchContext(request: SearchContextRequest, signal?: AbortSignal): Promise<string> {
      const response = await search(
        {
          query: request.query,
          search_depth: request.search_depth,
          topic: "general",
          max_results: CONTEXT_MAX_RESULTS,
          timeout: CONTEXT_TIMEOUT_SECONDS,
        },
        signal,
      );
      const sources = response.results.map((r) => ({ url: r.url, content: r.snippet }));
      return request.max_tokens === undefined
        ? JSON.stringify(sources)
        : fitSourcesToTokens(sources, request.max_tokens);
    },
  };
}
