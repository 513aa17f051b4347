// pattern: Imperative Shell

/**
 * In-process TavilyClient for tests and offline runs.
 * Each method replays a queue of scripted steps and records the requests it saw.
 */

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
  TavilyClient,
} from "./types.ts";

export type ScriptStep<T> = { readonly value: T } | { readonly error: unknown };

export type Script = {
  search: Array<ScriptStep<SearchPayload>>;
  extract: Array<ScriptStep<ExtractPayload>>;
  crawl: Array<ScriptStep<CrawlPayload>>;
  map: Array<ScriptStep<MapPayload>>;
  qnaSearch: Array<ScriptStep<string>>;
  getSearchContext: Array<ScriptStep<string>>;
};

export type RecordedCalls = {
  readonly search: Array<SearchRequest>;
  readonly extract: Array<ExtractRequest>;
  readonly crawl: Array<CrawlRequest>;
  readonly map: Array<MapRequest>;
  readonly qnaSearch: Array<string>;
  readonly getSearchContext: Array<SearchContextRequest>;
};

export type MemoryClient = TavilyClient & {
  /** Pending steps per method; an empty queue answers with an empty success. */
  readonly script: Script;
  readonly calls: RecordedCalls;
};

export function emptySearchPayload(query: string): SearchPayload {
  return { query, results: [] };
}

function waitOrAbort(signal: AbortSignal | undefined): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }
  return Promise.resolve();
}

export function createMemoryClient(): MemoryClient {
  const script: Script = {
    search: [],
    extract: [],
    crawl: [],
    map: [],
    qnaSearch: [],
    getSearchContext: [],
  };

  const calls: RecordedCalls = {
    search: [],
    extract: [],
    crawl: [],
    map: [],
    qnaSearch: [],
    getSearchContext: [],
  };

  async function next<T>(
    queue: Array<ScriptStep<T>>,
    fallback: T,
    signal: AbortSignal | undefined,
  ): Promise<T> {
    await waitOrAbort(signal);
    const step = queue.shift() ?? { value: fallback };
    if ("error" in step) {
      throw step.error;
    }
    return step.value;
  }

  return {
    script,
    calls,

    async search(request, signal) {
      calls.search.push(request);
      return next(script.search, emptySearchPayload(request.query), signal);
    },

    async extract(request, signal) {
      calls.extract.push(request);
      return next(script.extract, { results: [], failed_results: [] }, signal);
    },

    async crawl(request, signal) {
      calls.crawl.push(request);
      return next(script.crawl, { base_url: request.url, results: [] }, signal);
    },

    async map(request, signal) {
      calls.map.push(request);
      return next(script.map, { base_url: request.url, results: [] }, signal);
    },

    async qnaSearch(query, signal) {
      calls.qnaSearch.push(query);
      return next(script.qnaSearch, "", signal);
    },

    async getSearchContext(request, signal) {
      calls.getSearchContext.push(request);
      return next(script.getSearchContext, "[]", signal);
    },
  };
}
