// pattern: Imperative Shell

/**
 * Built-in Tavily tools: search, presets, answers, extraction and link-following.
 * Handlers parse their arguments with zod, delegate to the search operations,
 * and serialise whatever structured payload comes back.
 */

import { z } from 'zod';
import type { TavilyClient } from '../../provider/types.ts';
import {
  detailedNewsSearch,
  getCurrentDate,
  getSearchContext,
  healthCheck,
  qnaSearch,
  smartSearch,
  tavilyCrawl,
  tavilyExtract,
  tavilyMap,
  tavilySearch,
} from '../../search/index.ts';
import type { AttemptFailure, FallbackOptions } from '../../search/index.ts';
import type { Tool, ToolResult } from '../types.ts';

export type TavilyToolOptions = {
  readonly client: TavilyClient;
  readonly backoffBaseMs?: number;
  readonly extractTimeout?: number;
  readonly now?: () => Date;
};

/** Treat an explicit null the same as an absent value. */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const DepthSchema = z.enum(['basic', 'advanced']);
const TopicSchema = z.enum(['general', 'news', 'finance', 'health', 'scientific', 'travel']);
const TimeRangeSchema = z.enum(['day', 'week', 'month', 'year', 'd', 'w', 'm', 'y']);
const AnswerSchema = z.union([z.boolean(), z.enum(['basic', 'advanced'])]);
const RawContentSchema = z.union([z.boolean(), z.enum(['markdown', 'text'])]);
const DateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const StringListSchema = z.array(z.string());

const SearchParamsSchema = z.object({
  query: z.string(),
  search_depth: DepthSchema.default('basic'),
  topic: TopicSchema.default('general'),
  auto_parameters: z.boolean().default(false),
  days: optional(z.number().int().positive()),
  time_range: optional(TimeRangeSchema),
  start_date: optional(DateSchema),
  end_date: optional(DateSchema),
  max_results: z.number().int().default(5),
  chunks_per_source: optional(z.number().int()),
  include_images: z.boolean().default(false),
  include_image_descriptions: z.boolean().default(false),
  include_answer: AnswerSchema.default(false),
  include_raw_content: RawContentSchema.default(false),
  include_domains: optional(StringListSchema),
  exclude_domains: optional(StringListSchema),
  country: optional(z.string().min(1)),
  timeout: optional(z.number().int().positive()),
  include_favicon: z.boolean().default(false),
});

const ContextParamsSchema = z.object({
  query: z.string(),
  max_tokens: optional(z.number().int().positive()),
  search_depth: optional(DepthSchema),
});

const NewsParamsSchema = z.object({
  query: z.string(),
  days: optional(z.number().int().positive()),
  max_results: optional(z.number().int()),
  country: optional(z.string().min(1)),
  include_international_sources: optional(z.boolean()),
});

const SmartParamsSchema = z.object({
  query: z.string(),
  max_results: optional(z.number().int()),
  include_answer: optional(AnswerSchema),
  include_raw_content: optional(RawContentSchema),
});

const ExtractParamsSchema = z.object({
  urls: z.union([z.string(), StringListSchema]),
  include_images: optional(z.boolean()),
  extract_depth: optional(DepthSchema),
  format: optional(z.enum(['markdown', 'text'])),
  timeout: optional(z.number().positive()),
  include_favicon: optional(z.boolean()),
});

const CrawlParamsSchema = z.object({
  url: z.string().url(),
  max_depth: optional(z.number().int().positive()),
  max_breadth: optional(z.number().int().positive()),
  limit: optional(z.number().int().positive()),
  instructions: optional(z.string()),
  select_paths: optional(StringListSchema),
  select_domains: optional(StringListSchema),
  exclude_paths: optional(StringListSchema),
  exclude_domains: optional(StringListSchema),
  allow_external: optional(z.boolean()),
  include_images: optional(z.boolean()),
  categories: optional(StringListSchema),
  extract_depth: optional(DepthSchema),
});

const MapParamsSchema = z.object({
  url: z.string().url(),
  max_depth: optional(z.number().int().positive()),
  limit: optional(z.number().int().positive()),
  instructions: optional(z.string()),
});

function invalidArguments(error: z.ZodError): ToolResult {
  const message = error.issues
    .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
    .join('; ');
  const payload = {
    error: `Parameter validation error: ${message}`,
    error_type: 'ValidationError',
    fix_suggestion: 'Check the parameter requirements in the error message above',
  };
  return { success: false, output: JSON.stringify(payload, null, 2), error: payload.error };
}

/** Structured failures carry an `error` field; everything else is a success payload. */
function toToolResult(payload: object): ToolResult {
  const output = JSON.stringify(payload, null, 2);
  if ('error' in payload && typeof payload.error === 'string') {
    return { success: false, output, error: payload.error };
  }
  return { success: true, output };
}

async function withParsed<Args>(
  schema: z.ZodType<Args, z.ZodTypeDef, unknown>,
  params: Record<string, unknown>,
  run: (args: Args) => Promise<ToolResult>,
): Promise<ToolResult> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    return invalidArguments(parsed.error);
  }
  return run(parsed.data);
}

export function createTavilyTools(options: TavilyToolOptions): Array<Tool> {
  const { client, backoffBaseMs, extractTimeout } = options;
  const now = options.now ?? (() => new Date());

  function fallbackOptions(signal: AbortSignal | undefined): FallbackOptions {
    return {
      ...(backoffBaseMs !== undefined ? { backoffBaseMs } : {}),
      ...(signal ? { signal } : {}),
      onAttemptFailed: (failure: AttemptFailure) => {
        const message = failure.error instanceof Error ? failure.error.message : String(failure.error);
        console.warn(`[search] ${failure.tier} attempt failed (${failure.kind}): ${message}`);
      },
    };
  }

  const get_current_date: Tool = {
    definition: {
      name: 'get_current_date',
      description:
        "Get the current date and time information. Useful for understanding what 'today', 'recent', 'current' means in context.",
      parameters: [],
    },
    handler: async () => toToolResult(getCurrentDate(now())),
  };

  const tavily_search: Tool = {
    definition: {
      name: 'tavily_search',
      description: [
        'Search the web using Tavily with full parameter control.',
        `Today's date is ${getCurrentDate(now()).current_date}.`,
        'Use auto_parameters=true to let Tavily pick depth, topic and time range.',
        'search_depth="advanced" costs 2 credits instead of 1; chunks_per_source requires it.',
        'country only works with topic="general".',
        'Time filters: days=N, time_range, or start_date/end_date (YYYY-MM-DD).',
        'Failures come back as JSON with error, error_type and suggestion fields.',
      ].join(' '),
      parameters: [
        { name: 'query', type: 'string', description: 'Search query', required: true },
        { name: 'search_depth', type: 'string', description: 'Search depth', required: false, enum_values: ['basic', 'advanced'], default: 'basic' },
        { name: 'topic', type: 'string', description: 'Search category', required: false, enum_values: ['general', 'news', 'finance', 'health', 'scientific', 'travel'], default: 'general' },
        { name: 'auto_parameters', type: 'boolean', description: 'Let Tavily choose optimal parameters for the query', required: false, default: false },
        { name: 'days', type: 'integer', description: 'Only include content from the last N days', required: false },
        { name: 'time_range', type: 'string', description: 'Named time window', required: false, enum_values: ['day', 'week', 'month', 'year', 'd', 'w', 'm', 'y'] },
        { name: 'start_date', type: 'string', description: 'Earliest publish date (YYYY-MM-DD)', required: false },
        { name: 'end_date', type: 'string', description: 'Latest publish date (YYYY-MM-DD)', required: false },
        { name: 'max_results', type: 'integer', description: 'Number of results, 0-20 (default 5)', required: false, default: 5 },
        { name: 'chunks_per_source', type: 'integer', description: 'Content chunks per source, 1-3 (advanced depth only)', required: false },
        { name: 'include_images', type: 'boolean', description: 'Include related images', required: false, default: false },
        { name: 'include_image_descriptions', type: 'boolean', description: 'Include AI descriptions of images', required: false, default: false },
        { name: 'include_answer', type: ['boolean', 'string'], description: 'Include an AI-generated answer (true, "basic" or "advanced")', required: false, enum_values: ['basic', 'advanced'], default: false },
        { name: 'include_raw_content', type: ['boolean', 'string'], description: 'Include full page content (true, "markdown" or "text")', required: false, enum_values: ['markdown', 'text'], default: false },
        { name: 'include_domains', type: 'array', items: 'string', description: 'Only search these domains', required: false },
        { name: 'exclude_domains', type: 'array', items: 'string', description: 'Never return results from these domains', required: false },
        { name: 'country', type: 'string', description: 'Boost results from this country (topic="general" only)', required: false },
        { name: 'timeout', type: 'integer', description: 'Timeout in seconds; estimated from the other options when omitted', required: false },
        { name: 'include_favicon', type: 'boolean', description: 'Include each source favicon URL', required: false, default: false },
      ],
    },
    handler: async (params, signal) =>
      withParsed(SearchParamsSchema, params, async (args) =>
        toToolResult(await tavilySearch(client, args, fallbackOptions(signal))),
      ),
  };

  const tavily_health_check: Tool = {
    definition: {
      name: 'tavily_health_check',
      description:
        'Check the Tavily API connection with a minimal search. Reports API key validity, connectivity, and response time.',
      parameters: [],
    },
    handler: async (_params, signal) => {
      const report = await healthCheck(client, signal ? { signal } : {});
      return { success: report.status === 'healthy', output: JSON.stringify(report, null, 2) };
    },
  };

  const qna_search: Tool = {
    definition: {
      name: 'qna_search',
      description:
        'Get a direct, concise answer to a question without full search results. Returns plain text.',
      parameters: [
        { name: 'query', type: 'string', description: 'Question to answer', required: true },
      ],
    },
    handler: async (params, signal) =>
      withParsed(z.object({ query: z.string() }), params, async ({ query }) => ({
        success: true,
        output: await qnaSearch(client, query, signal),
      })),
  };

  const get_search_context: Tool = {
    definition: {
      name: 'get_search_context',
      description:
        'Generate a context string from web sources, ready to feed into a prompt for retrieval-augmented generation.',
      parameters: [
        { name: 'query', type: 'string', description: 'Search query', required: true },
        { name: 'max_tokens', type: 'integer', description: 'Approximate token budget for the context (default 4000)', required: false, default: 4000 },
        { name: 'search_depth', type: 'string', description: 'Search depth', required: false, enum_values: ['basic', 'advanced'], default: 'basic' },
      ],
    },
    handler: async (params, signal) =>
      withParsed(ContextParamsSchema, params, async (args) => ({
        success: true,
        output: await getSearchContext(client, args, signal),
      })),
  };

  const detailed_news_search: Tool = {
    definition: {
      name: 'detailed_news_search',
      description:
        'Comprehensive news coverage: advanced depth, full article content, and an AI summary. International sources are included by default. A country filter only works with topic="general", so use tavily_search for country-specific news.',
      parameters: [
        { name: 'query', type: 'string', description: 'News search query', required: true },
        { name: 'days', type: 'integer', description: 'How many days back to search (default 7)', required: false, default: 7 },
        { name: 'max_results', type: 'integer', description: 'Number of results, 0-20 (default 10)', required: false, default: 10 },
        { name: 'country', type: 'string', description: 'Country to keep when international sources are excluded (rejected on the news topic)', required: false },
        { name: 'include_international_sources', type: 'boolean', description: 'Ignore the country filter to get broader coverage (default true)', required: false, default: true },
      ],
    },
    handler: async (params, signal) =>
      withParsed(NewsParamsSchema, params, async (args) =>
        toToolResult(await detailedNewsSearch(client, args, fallbackOptions(signal))),
      ),
  };

  const smart_search: Tool = {
    definition: {
      name: 'smart_search',
      description:
        'Search with Tavily choosing depth, topic and time range from the query, plus images and favicons. May use advanced search (2 credits).',
      parameters: [
        { name: 'query', type: 'string', description: 'Search query', required: true },
        { name: 'max_results', type: 'integer', description: 'Number of results, 0-20 (default 10)', required: false, default: 10 },
        { name: 'include_answer', type: ['boolean', 'string'], description: 'AI answer mode (default "advanced")', required: false, enum_values: ['basic', 'advanced'], default: 'advanced' },
        { name: 'include_raw_content', type: ['boolean', 'string'], description: 'Full content format (default "markdown")', required: false, enum_values: ['markdown', 'text'], default: 'markdown' },
      ],
    },
    handler: async (params, signal) =>
      withParsed(SmartParamsSchema, params, async (args) =>
        toToolResult(await smartSearch(client, args, fallbackOptions(signal))),
      ),
  };

  const tavily_extract: Tool = {
    definition: {
      name: 'tavily_extract',
      description:
        'Extract content from specific URLs (http:// or https:// only). Use tavily_search first to find URLs. Partial failures are reported in failed_results.',
      parameters: [
        { name: 'urls', type: ['string', 'array'], items: 'string', description: 'A URL or list of URLs', required: true },
        { name: 'include_images', type: 'boolean', description: 'Include images found on the pages', required: false, default: false },
        { name: 'extract_depth', type: 'string', description: 'Extraction depth', required: false, enum_values: ['basic', 'advanced'], default: 'basic' },
        { name: 'format', type: 'string', description: 'Content format', required: false, enum_values: ['markdown', 'text'], default: 'markdown' },
        { name: 'timeout', type: 'number', description: 'Timeout in seconds', required: false },
        { name: 'include_favicon', type: 'boolean', description: 'Include each page favicon URL', required: false, default: false },
      ],
    },
    handler: async (params, signal) =>
      withParsed(ExtractParamsSchema, params, async (args) =>
        toToolResult(
          await tavilyExtract(client, args, {
            ...(extractTimeout !== undefined ? { defaultTimeout: extractTimeout } : {}),
            ...(signal ? { signal } : {}),
          }),
        ),
      ),
  };

  const tavily_crawl: Tool = {
    definition: {
      name: 'tavily_crawl',
      description: 'Crawl a site from a starting URL, following links and extracting page content (beta).',
      parameters: [
        { name: 'url', type: 'string', description: 'Root URL to crawl', required: true },
        { name: 'max_depth', type: 'integer', description: 'How many links deep to follow (default 1)', required: false, default: 1 },
        { name: 'max_breadth', type: 'integer', description: 'Links to follow per page (default 20)', required: false, default: 20 },
        { name: 'limit', type: 'integer', description: 'Total pages to process (default 50)', required: false, default: 50 },
        { name: 'instructions', type: 'string', description: 'Natural-language guidance for the crawler', required: false },
        { name: 'select_paths', type: 'array', items: 'string', description: 'Regex path patterns to include', required: false },
        { name: 'select_domains', type: 'array', items: 'string', description: 'Regex domain patterns to include', required: false },
        { name: 'exclude_paths', type: 'array', items: 'string', description: 'Regex path patterns to skip', required: false },
        { name: 'exclude_domains', type: 'array', items: 'string', description: 'Regex domain patterns to skip', required: false },
        { name: 'allow_external', type: 'boolean', description: 'Follow links to other domains (default true)', required: false, default: true },
        { name: 'include_images', type: 'boolean', description: 'Include images', required: false, default: false },
        { name: 'categories', type: 'array', items: 'string', description: 'Page categories to focus on', required: false },
        { name: 'extract_depth', type: 'string', description: 'Extraction depth', required: false, enum_values: ['basic', 'advanced'], default: 'basic' },
      ],
    },
    handler: async (params, signal) =>
      withParsed(CrawlParamsSchema, params, async (args) =>
        toToolResult(await tavilyCrawl(client, args, signal)),
      ),
  };

  const tavily_map: Tool = {
    definition: {
      name: 'tavily_map',
      description: 'List the URLs of a site reachable from a starting URL, without extracting content (beta).',
      parameters: [
        { name: 'url', type: 'string', description: 'Root URL to map', required: true },
        { name: 'max_depth', type: 'integer', description: 'How many links deep to follow (default 2)', required: false, default: 2 },
        { name: 'limit', type: 'integer', description: 'Total URLs to return (default 30)', required: false, default: 30 },
        { name: 'instructions', type: 'string', description: 'Natural-language guidance for the mapper', required: false },
      ],
    },
    handler: async (params, signal) =>
      withParsed(MapParamsSchema, params, async (args) =>
        toToolResult(await tavilyMap(client, args, signal)),
      ),
  };

  return [
    get_current_date,
    tavily_search,
    tavily_health_check,
    qna_search,
    get_search_context,
    detailed_news_search,
    smart_search,
    tavily_extract,
    tavily_crawl,
    tavily_map,
  ];
}
