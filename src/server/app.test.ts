// pattern: Imperative Shell

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'node:http';
import { createToolRegistry } from '../tool/registry.ts';
import { createApp } from './app.ts';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('HTTP binding', () => {
  let server: http.Server;
  let baseUrl: string;
  const waitStarted = deferred();
  const waitAborted = deferred();

  beforeAll(async () => {
    const registry = createToolRegistry();
    registry.register({
      definition: { name: 'noop', description: 'Does nothing', parameters: [] },
      handler: async () => ({ success: true, output: 'done' }),
    });
    registry.register({
      definition: { name: 'wait', description: 'Waits until cancelled', parameters: [] },
      handler: (_params, signal) =>
        new Promise((resolve) => {
          signal?.addEventListener(
            'abort',
            () => {
              waitAborted.resolve();
              resolve({ success: false, output: '', error: 'cancelled' });
            },
            { once: true },
          );
          waitStarted.resolve();
        }),
    });
    const app = createApp({ registry, info: { name: 'test', version: '0.0.0' }, path: '/mcp' });

    server = http.createServer(app);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  function post(body: string, signal?: AbortSignal): Promise<Response> {
    return fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json, text/event-stream' },
      body,
      ...(signal ? { signal } : {}),
    });
  }

  it('should answer a request with JSON', async () => {
    const response = await post(
      JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'noop', arguments: {} } }),
    );

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('application/json');
    expect(await response.json()).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { content: [{ type: 'text', text: 'done' }], isError: false },
    });
  });

  it('should list the registered tools', async () => {
    const response = await post(JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'tools/list' }));

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({ id: 2, result: { tools: [{ name: 'noop' }, { name: 'wait' }] } });
  });

  it('should accept a notification with 202 and no body', async () => {
    const response = await post(JSON.stringify({ jsonrpc: '2.0', method: 'notifications/initialized' }));

    expect(response.status).toBe(202);
    expect(await response.text()).toBe('');
  });

  it('should abort the tool call when the client disconnects', async () => {
    const client = new AbortController();
    const outcome = post(
      JSON.stringify({ jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'wait', arguments: {} } }),
      client.signal,
    ).then(
      () => 'completed',
      (err: unknown) => (typeof err === 'object' && err !== null && 'name' in err ? err.name : 'unknown'),
    );

    await waitStarted.promise;
    client.abort();

    await waitAborted.promise;
    expect(await outcome).toBe('AbortError');
  });

  it('should refuse GET on the endpoint', async () => {
    const response = await fetch(`${baseUrl}/mcp`);

    expect(response.status).toBe(405);
    expect(response.headers.get('allow')).toBe('POST');
  });

  it('should answer malformed JSON with a parse error', async () => {
    const response = await post('{"jsonrpc": ');

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'parse error' },
    });
  });

  it('should report liveness', async () => {
    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ ok: true });
  });
});
