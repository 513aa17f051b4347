// pattern: Functional Core

export type {
  SearchArgs,
  SearchFailure,
  SearchOutcome,
  ErrorKind,
  LadderRung,
  Troubleshooting,
} from "./types.ts";
export { SEARCH_ARG_DEFAULTS, validationFailure, errorMessage } from "./types.ts";
export { validateSearchParams } from "./validate.ts";
export { estimateTimeout } from "./timeout.ts";
export { normalizeSearchRequest, resolveTimeWindow } from "./normalize.ts";
export { buildFallbackLadder, reduceComplexity, minimalRequest } from "./ladder.ts";
export { classifyError, diagnoseError } from "./classify.ts";
export { executeWithFallback, backoffDelay, defaultSleep } from "./orchestrator.ts";
export type { FallbackOptions, AttemptFailure, Sleep } from "./orchestrator.ts";
export { tavilySearch, healthCheck } from "./search.ts";
export type { SearchResult, HealthReport } from "./search.ts";
export { detailedNewsSearch, smartSearch } from "./presets.ts";
export type { NewsSearchArgs, SmartSearchArgs } from "./presets.ts";
export { qnaSearch, getSearchContext, NO_ANSWER_MESSAGE } from "./answer.ts";
export type { SearchContextArgs } from "./answer.ts";
export { tavilyExtract, tavilyCrawl, tavilyMap, isWebUrl, PARTIAL_EXTRACTION_NOTE } from "./extract.ts";
export type { ExtractArgs, ExtractResult, CrawlArgs, MapArgs, LinkFailure } from "./extract.ts";
export { getCurrentDate, isoDate } from "./date.ts";
export type { CurrentDate } from "./date.ts";
