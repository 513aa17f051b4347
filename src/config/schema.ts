// pattern: Functional Core
import { z } from "zod";

const TavilyConfigSchema = z.object({
  api_key: z.string({ required_error: "TAVILY_API_KEY env var is required" }).min(1, "TAVILY_API_KEY env var is required"),
  base_url: z.string().url().default("https://api.tavily.com"),
});

const ServerConfigSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().positive().max(65535).default(8000),
  path: z.string().startsWith("/").default("/mcp"),
});

const SearchConfigSchema = z.object({
  backoff_base_ms: z.number().int().nonnegative().default(1000),
  extract_timeout: z.number().positive().default(60),
});

const AppConfigSchema = z.object({
  tavily: TavilyConfigSchema,
  server: ServerConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type TavilyConfig = z.infer<typeof TavilyConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export { AppConfigSchema, TavilyConfigSchema, ServerConfigSchema, SearchConfigSchema };
