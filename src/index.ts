// pattern: Imperative Shell

/**
 * Tavily tool server entry point.
 * Composition root: loads config, wires the provider into the tool registry,
 * and serves the tools over streamable HTTP.
 */

import http from 'node:http';
import { pathToFileURL } from 'node:url';
import { loadConfig } from './config/index.ts';
import type { AppConfig } from './config/index.ts';
import { createTavilyAdapter } from './provider/index.ts';
import type { TavilyClient } from './provider/index.ts';
import { createToolRegistry, createTavilyTools } from './tool/index.ts';
import type { ToolRegistry } from './tool/index.ts';
import { createApp } from './server/app.ts';

export const SERVER_INFO = { name: 'tavily-tool-server', version: '0.1.0' } as const;

export function createRegistry(client: TavilyClient, config: AppConfig): ToolRegistry {
  const registry = createToolRegistry();
  const tools = createTavilyTools({
    client,
    backoffBaseMs: config.search.backoff_base_ms,
    extractTimeout: config.search.extract_timeout,
  });
  for (const tool of tools) {
    registry.register(tool);
  }
  return registry;
}

/** Close the listener and exit once in-flight requests finish. */
export function createShutdownHandler(server: http.Server): (signal: string) => void {
  return (signal: string) => {
    console.log(`[server] received ${signal}, shutting down...`);
    server.close((err) => {
      if (err) {
        console.error('[server] error while closing:', err);
        process.exit(1);
      }
      console.log('[server] closed');
      process.exit(0);
    });
  };
}

function main(): void {
  // Fails before binding when the key is missing
  const config = loadConfig();

  const client = createTavilyAdapter(config.tavily.api_key, config.tavily.base_url);
  const registry = createRegistry(client, config);
  const app = createApp({ registry, info: SERVER_INFO, path: config.server.path });

  const server = http.createServer(app);
  server.listen(config.server.port, config.server.host, () => {
    console.log(
      `[server] ${registry.getDefinitions().length} tools on http://${config.server.host}:${config.server.port}${config.server.path}`,
    );
  });

  const shutdown = createShutdownHandler(server);
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  try {
    main();
  } catch (error) {
    console.error('[server] failed to start:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
