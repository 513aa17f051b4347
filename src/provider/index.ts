// pattern: Functional Core

export type {
  AnswerMode,
  CrawlPayload,
  CrawlRequest,
  ExtractDepth,
  ExtractPayload,
  ExtractRequest,
  ExtractedPage,
  FailedExtraction,
  FallbackTier,
  MapPayload,
  MapRequest,
  RawContentMode,
  SearchContextRequest,
  SearchDepth,
  SearchImage,
  SearchPayload,
  SearchRequest,
  SearchResultEntry,
  SearchTopic,
  TimeRange,
  TimeWindow,
  TavilyClient,
} from "./types.ts";
export { TavilyApiError, UnsupportedParameterError } from "./types.ts";
export { createTavilyAdapter, toSearchBody, fitSourcesToTokens } from "./tavily.ts";
export { createMemoryClient, emptySearchPayload } from "./memory.ts";
export type { MemoryClient, Script, ScriptStep, RecordedCalls } from "./memory.ts";
