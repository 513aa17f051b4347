// pattern: Functional Core

export { loadConfig } from "./config.ts";
export type { AppConfig, TavilyConfig, ServerConfig, SearchConfig } from "./schema.ts";
export { AppConfigSchema } from "./schema.ts";
