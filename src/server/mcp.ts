// pattern: Imperative Shell

/**
 * MCP server over the tool registry: tools/list advertises the registry's JSON Schema,
 * tools/call dispatches to it. initialize and ping are answered by the SDK.
 * A tool failure comes back as a result with isError set, never as a protocol error.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ToolRegistry } from '../tool/types.ts';

export type ServerInfo = {
  readonly name: string;
  readonly version: string;
};

/**
 * `signal` aborts every tool call alongside the SDK's own per-request cancellation,
 * e.g. when the HTTP client behind this server goes away.
 */
export function createMcpServer(registry: ToolRegistry, info: ServerInfo, signal?: AbortSignal): Server {
  const server = new Server(
    { name: info.name, version: info.version },
    { capabilities: { tools: { listChanged: false } } },
  );

  server.setRequestHandler(ListToolsRequestSchema, () => ({ tools: registry.toModelTools() }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const callSignal = signal ? AbortSignal.any([signal, extra.signal]) : extra.signal;
    const result = await registry.dispatch(request.params.name, request.params.arguments ?? {}, callSignal);
    const text = result.output !== '' ? result.output : (result.error ?? '');
    return {
      content: [{ type: 'text' as const, text }],
      isError: !result.success,
    };
  });

  return server;
}
