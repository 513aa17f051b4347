// pattern: Imperative Shell

import type {
  CrawlPayload,
  CrawlRequest,
  ExtractDepth,
  ExtractPayload,
  MapPayload,
  MapRequest,
  TavilyClient,
} from "../provider/types.ts";
import { classifyError } from "./classify.ts";
import type { ErrorKind } from "./types.ts";
import { errorMessage } from "./types.ts";

export const PARTIAL_EXTRACTION_NOTE =
  "Some URLs failed to extract. This is common with news sites that block crawlers or have paywalls.";

export type ExtractArgs = {
  readonly urls: string | ReadonlyArray<string>;
  readonly include_images?: boolean;
  readonly extract_depth?: ExtractDepth;
  readonly format?: "markdown" | "text";
  readonly timeout?: number;
  readonly include_favicon?: boolean;
};

export type ExtractFailure = {
  readonly error: string;
  readonly error_type: ErrorKind;
  readonly invalid_urls?: ReadonlyArray<string>;
  readonly provided_input?: string | ReadonlyArray<string>;
  readonly valid_urls?: ReadonlyArray<string>;
  readonly help?: string;
  readonly suggestion?: string;
};

export type ExtractResult =
  | (ExtractPayload & {
      readonly extraction_note?: string;
      readonly skipped_urls?: ReadonlyArray<string>;
    })
  | ExtractFailure;

export function isWebUrl(input: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch {
    return false;
  }
  return (parsed.protocol === "http:" || parsed.protocol === "https:") && parsed.hostname !== "";
}

/**
 * Extract page content for a batch of URLs.
 * Inputs that are not absolute http(s) URLs are skipped; if none are left the
 * call is rejected without reaching the provider. Per-URL provider failures are
 * part of a successful result.
 */
export async function tavilyExtract(
  client: TavilyClient,
  args: ExtractArgs,
  options: { readonly defaultTimeout?: number; readonly signal?: AbortSignal } = {},
): Promise<ExtractResult> {
  const inputs: ReadonlyArray<string> = typeof args.urls === "string" ? [args.urls] : args.urls;
  const validUrls = inputs.filter(isWebUrl);
  const invalidUrls = inputs.filter((input) => !isWebUrl(input));

  if (validUrls.length === 0) {
    return {
      error:
        "No valid URLs provided. tavily_extract requires actual URLs (starting with http:// or https://)",
      error_type: "ValidationError",
      invalid_urls: invalidUrls,
      provided_input: args.urls,
      help: "Use tavily_search first to get URLs, then extract content from those URLs",
    };
  }

  try {
    const payload = await client.extract(
      {
        urls: validUrls,
        include_images: args.include_images ?? false,
        extract_depth: args.extract_depth ?? "basic",
        format: args.format ?? "markdown",
        timeout: args.timeout ?? options.defaultTimeout ?? 60,
        include_favicon: args.include_favicon ?? false,
      },
      options.signal,
    );

    return {
      ...payload,
      ...(payload.failed_results.length > 0 ? { extraction_note: PARTIAL_EXTRACTION_NOTE } : {}),
      ...(invalidUrls.length > 0 ? { skipped_urls: invalidUrls } : {}),
    };
  } catch (error) {
    return {
      error: `Tavily extract error: ${errorMessage(error)}`,
      error_type: classifyError(error),
      valid_urls: validUrls,
      suggestion: "Try using tavily_search with include_raw_content=True for better content access",
    };
  }
}

export type LinkFailure = {
  readonly error: string;
  readonly error_type: ErrorKind;
  readonly url: string;
};

export type CrawlArgs = Partial<Omit<CrawlRequest, "url">> & { readonly url: string };

export type MapArgs = Partial<Omit<MapRequest, "url">> & { readonly url: string };

export async function tavilyCrawl(
  client: TavilyClient,
  args: CrawlArgs,
  signal?: AbortSignal,
): Promise<CrawlPayload | LinkFailure> {
  const request: CrawlRequest = {
    ...args,
    max_depth: args.max_depth ?? 1,
    max_breadth: args.max_breadth ?? 20,
    limit: args.limit ?? 50,
    allow_external: args.allow_external ?? true,
    include_images: args.include_images ?? false,
    extract_depth: args.extract_depth ?? "basic",
  };

  try {
    return await client.crawl(request, signal);
  } catch (error) {
    return {
      error: `Tavily crawl error: ${errorMessage(error)}`,
      error_type: classifyError(error),
      url: args.url,
    };
  }
}

export async function tavilyMap(
  client: TavilyClient,
  args: MapArgs,
  signal?: AbortSignal,
): Promise<MapPayload | LinkFailure> {
  const request: MapRequest = {
    ...args,
    max_depth: args.max_depth ?? 2,
    limit: args.limit ?? 30,
  };

  try {
    return await client.map(request, signal);
  } catch (error) {
    return {
      error: `Tavily map error: ${errorMessage(error)}`,
      error_type: classifyError(error),
      url: args.url,
    };
  }
}
