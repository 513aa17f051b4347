// pattern: Imperative Shell

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { ToolRegistry } from '../tool/types.ts';
import { createMcpServer } from './mcp.ts';
import type { ServerInfo } from './mcp.ts';

export type AppOptions = {
  readonly registry: ToolRegistry;
  readonly info: ServerInfo;
  readonly path: string;
};

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

function rpcError(code: ErrorCode, message: string) {
  return { jsonrpc: '2.0', id: null, error: { code, message } };
}

/**
 * Stateless streamable HTTP: every POST gets a fresh server and transport, answered with JSON.
 * No sessions and no server-initiated stream, so GET on the endpoint is refused.
 */
export function createApp(options: AppOptions): express.Express {
  const { registry, info, path } = options;
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true, time: new Date().toISOString() });
  });

  app.post(path, async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    const server = createMcpServer(registry, info, controller.signal);
    server.onerror = (error) => {
      console.warn('[server] transport error:', error.message);
    };
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
      server.close().catch((err: unknown) => {
        console.error('[server] error while closing transport:', err);
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      next(err);
    }
  });

  app.all(path, (_req, res) => {
    res.set('Allow', 'POST').status(405).json(rpcError(ErrorCode.InvalidRequest, 'method not allowed'));
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json(rpcError(ErrorCode.ParseError, 'parse error'));
      return;
    }
    console.error('[server] unhandled error', err);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json(rpcError(ErrorCode.InternalError, 'internal error'));
  });

  return app;
}
