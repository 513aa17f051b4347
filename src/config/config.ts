// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

type Section = Record<string, unknown>;

function section(parsed: Section, name: string): Section {
  const value = parsed[name];
  const copy: Section = {};
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = entry;
    }
  }
  return copy;
}

/**
 * Load configuration from an optional TOML file, then let the environment override it.
 * The file is only required when a path is given explicitly.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const explicitPath = configPath ?? env["CONFIG_PATH"];
  const resolvedPath = resolve(explicitPath ?? "config.toml");

  let parsed: Section = {};
  if (explicitPath !== undefined || existsSync(resolvedPath)) {
    parsed = TOML.parse(readFileSync(resolvedPath, "utf-8"));
  }

  // Environment variable overrides for secrets and binding
  const tavily = section(parsed, "tavily");
  if (env["TAVILY_API_KEY"]) {
    tavily["api_key"] = env["TAVILY_API_KEY"];
  }
  if (env["TAVILY_BASE_URL"]) {
    tavily["base_url"] = env["TAVILY_BASE_URL"];
  }

  const server = section(parsed, "server");
  if (env["MCP_HOST"]) {
    server["host"] = env["MCP_HOST"];
  }
  const port = env["MCP_PORT"] ?? env["PORT"];
  if (port) {
    server["port"] = port;
  }

  return AppConfigSchema.parse({ ...parsed, tavily, server });
}
