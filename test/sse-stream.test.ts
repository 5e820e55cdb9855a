// This test suite drives the SSE and message endpoints over a real loopback socket the way an MCP client would.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ToolRegistry } from '../src/mcp/tool-registry.js';
import { registerAzureDevOpsTools } from '../src/mcp/tools.js';
import { createServer, type ServerResources } from '../src/server.js';
import type { TransportSettings } from '../src/types/domain.js';
import { fakeAzureDevOpsClient, testTransport } from './helpers/fixtures.js';
import { SseReader } from './helpers/sse.js';

interface OpenStream {
  reader: SseReader;
  endpoint: string;
  abort: AbortController;
  headers: Headers;
}

let resources: ServerResources | undefined;
let baseUrl = '';
const openStreams: OpenStream[] = [];

async function startServer(transport: TransportSettings = testTransport): Promise<ServerResources> {
  const registry = new ToolRegistry();
  registerAzureDevOpsTools(registry, fakeAzureDevOpsClient());

  resources = createServer({ registry, transport, logger: false });
  baseUrl = await resources.app.listen({ host: '127.0.0.1', port: 0 });
  return resources;
}

async function openStream(): Promise<OpenStream> {
  const abort = new AbortController();
  const response = await fetch(`${baseUrl}/sse`, { signal: abort.signal });
  if (!response.body) {
    throw new Error('SSE response has no body');
  }

  const reader = new SseReader(response.body.getReader());
  const first = await reader.next();
  expect(first.event).toBe('endpoint');

  const stream = { reader, endpoint: first.data, abort, headers: response.headers };
  openStreams.push(stream);
  return stream;
}

async function post(endpoint: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${endpoint}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body)
  });
}

afterEach(async () => {
  for (const stream of openStreams.splice(0)) {
    stream.abort.abort();
  }

  await resources?.app.close();
  resources = undefined;
});

describe('sse stream lifecycle', () => {
  it('sends the endpoint event first with event-stream headers', async () => {
    const { sessions } = await startServer();

    const stream = await openStream();

    expect(stream.endpoint).toMatch(/^\/message\?sessionId=[0-9a-f-]{36}$/);
    expect(stream.headers.get('content-type')).toBe('text/event-stream');
    expect(stream.headers.get('cache-control')).toBe('no-cache');
    expect(sessions.size).toBe(1);
  });

  it('gives concurrent streams distinct session ids', async () => {
    const { sessions } = await startServer();

    const streams = await Promise.all([openStream(), openStream(), openStream(), openStream(), openStream()]);

    expect(new Set(streams.map((stream) => stream.endpoint)).size).toBe(5);
    expect(sessions.size).toBe(5);
  });

  it('delivers initialize and tools/list responses on the stream', async () => {
    await startServer();
    const stream = await openStream();

    const initAck = await post(stream.endpoint, { jsonrpc: '2.0', id: 1, method: 'initialize', params: {} });
    expect(initAck.status).toBe(202);
    const initialized = await stream.reader.next();
    expect(initialized.event).toBe('message');
    expect(JSON.parse(initialized.data)).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { protocolVersion: '2024-11-05', serverInfo: { name: 'ado-mcp' } }
    });

    const listAck = await post(stream.endpoint, { jsonrpc: '2.0', id: 2, method: 'tools/list' });
    expect(listAck.status).toBe(202);
    const listed = JSON.parse((await stream.reader.next()).data);
    expect(listed.id).toBe(2);
    expect(listed.result.tools.map((tool: { name: string }) => tool.name)).toEqual([
      'get_build',
      'get_build_logs',
      'get_release',
      'get_release_logs',
      'get_resource_from_url',
      'list_builds',
      'list_releases'
    ]);
  });

  it('emits nothing for a notification and keeps following requests flowing', async () => {
    await startServer();
    const stream = await openStream();

    expect((await post(stream.endpoint, { jsonrpc: '2.0', method: 'notifications/initialized' })).status).toBe(202);
    expect((await post(stream.endpoint, { jsonrpc: '2.0', id: 7, method: 'ping' })).status).toBe(202);

    const next = await stream.reader.next();
    expect(JSON.parse(next.data)).toEqual({ jsonrpc: '2.0', id: 7, result: {} });
  });

  it('routes responses only to the session that submitted the request', async () => {
    await startServer();
    const first = await openStream();
    const second = await openStream();

    await post(second.endpoint, { jsonrpc: '2.0', id: 'second', method: 'ping' });
    await post(first.endpoint, { jsonrpc: '2.0', id: 'first', method: 'ping' });

    expect(JSON.parse((await first.reader.next()).data).id).toBe('first');
    expect(JSON.parse((await second.reader.next()).data).id).toBe('second');
  });

  it('deregisters the session when the client disconnects', async () => {
    const { sessions } = await startServer();
    const stream = await openStream();
    expect(sessions.size).toBe(1);

    stream.abort.abort();
    await vi.waitFor(() => expect(sessions.size).toBe(0));

    const late = await post(stream.endpoint, { jsonrpc: '2.0', id: 1, method: 'ping' });
    expect(late.status).toBe(404);
  });

  it('ends open streams on shutdown', async () => {
    const { app, sessions } = await startServer();
    const stream = await openStream();

    // A socket torn down by the forced close also counts as the end of the stream.
    const ended = stream.reader.ended().catch(() => true);
    await app.close();
    resources = undefined;

    await expect(ended).resolves.toBe(true);
    expect(sessions.size).toBe(0);
  });

  it('writes keep-alive comments without producing events', async () => {
    await startServer({ sessionQueueCapacity: 10, keepAliveMs: 20 });
    const stream = await openStream();

    await new Promise((resolve) => setTimeout(resolve, 60));
    await post(stream.endpoint, { jsonrpc: '2.0', id: 'after-ping', method: 'ping' });

    expect(JSON.parse((await stream.reader.next()).data).id).toBe('after-ping');
  });
});
