import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocket } from 'ws';
import { createGateway, type Gateway } from '../app.js';
import { loadConfig } from '../config.js';
import { isRecord } from '../utils/records.js';
import {
  FakeBackend,
  ScriptedLLM,
  TEST_TOKEN,
  finalStep,
  jsonResponse,
  textResponse,
  toolStep,
} from '../testing/fakes.js';

const USER = { _id: 'user-1', email: 'ada@example.com', fullName: 'Ada Tester', created_at: '2024-01-01T00:00:00Z' };

interface StreamClient {
  socket: WebSocket;
  events: Array<Record<string, unknown>>;
}

describe('ToolServer', () => {
  let backend: FakeBackend;
  let llm: ScriptedLLM;
  let gateway: Gateway;
  let baseUrl: string;
  const sockets: WebSocket[] = [];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    backend = new FakeBackend().on('GET', '/api/v1/auth/me', (request) =>
      request.headers.get('authorization') === `Bearer ${TEST_TOKEN}`
        ? jsonResponse(USER)
        : jsonResponse({ detail: 'Could not validate credentials' }, 401)
    );
    llm = new ScriptedLLM();
    gateway = createGateway({
      config: { ...loadConfig({}), port: 0 },
      llm,
      fetch: backend.fetch,
      host: '127.0.0.1',
      auditSink: () => undefined,
    });
    await gateway.server.start();
    baseUrl = `http://127.0.0.1:${gateway.server.port}`;
  });

  afterEach(async () => {
    for (const socket of sockets.splice(0)) {
      socket.terminate();
    }
    await gateway.server.stop();
    vi.restoreAllMocks();
  });

  async function rpc(body: unknown): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    return { status: response.status, body: await response.json() };
  }

  async function callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    const { body } = await rpc({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name, arguments: args } });
    return body;
  }

  function textOfResult(body: unknown): string {
    if (isRecord(body) && isRecord(body.result) && Array.isArray(body.result.content)) {
      const [item] = body.result.content;
      if (isRecord(item) && typeof item.text === 'string') {
        return item.text;
      }
    }
    throw new Error(`not a tool result: ${JSON.stringify(body)}`);
  }

  function openStream(threadId: string): Promise<StreamClient> {
    const socket = new WebSocket(`ws://127.0.0.1:${gateway.server.port}/ws?threadId=${threadId}`);
    sockets.push(socket);
    const client: StreamClient = { socket, events: [] };
    return new Promise((resolve, reject) => {
      socket.on('message', (data) => {
        const event: unknown = JSON.parse(data.toString());
        if (isRecord(event)) {
          client.events.push(event);
          if (event.type === 'connected') {
            resolve(client);
          }
        }
      });
      socket.on('error', reject);
    });
  }

  it('reports service status', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(await response.json()).toEqual({
      service: 'Agent Tool Gateway',
      status: 'running',
      tools: gateway.dispatcher.toolCount,
    });
  });

  it('answers initialize', async () => {
    const { status, body } = await rpc({ jsonrpc: '2.0', id: 'init-1', method: 'initialize', params: {} });

    expect(status).toBe(200);
    expect(body).toEqual({
      jsonrpc: '2.0',
      id: 'init-1',
      result: {
        protocolVersion: '1.0',
        serverInfo: { name: 'Agent Tool Gateway', version: '1.0.0' },
        capabilities: { tools: {} },
      },
    });
  });

  it('lists every catalog tool', async () => {
    const { body } = await rpc({ jsonrpc: '2.0', id: 2, method: 'tools/list' });

    expect(isRecord(body) && isRecord(body.result) && Array.isArray(body.result.tools)).toBe(true);
    if (isRecord(body) && isRecord(body.result) && Array.isArray(body.result.tools)) {
      expect(body.result.tools).toHaveLength(gateway.dispatcher.toolCount);
    }
  });

  it('rejects malformed JSON with a parse error', async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"jsonrpc": ',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
  });

  it('rejects an envelope without a method', async () => {
    const { status, body } = await rpc({ jsonrpc: '2.0', id: 5 });

    expect(status).toBe(400);
    expect(body).toEqual({ jsonrpc: '2.0', id: 5, error: { code: -32600, message: 'Invalid Request' } });
  });

  it('reports unknown methods', async () => {
    const { status, body } = await rpc({ jsonrpc: '2.0', id: 6, method: 'resources/list' });

    expect(status).toBe(200);
    expect(body).toEqual({ jsonrpc: '2.0', id: 6, error: { code: -32601, message: 'Method not found' } });
  });

  it('returns tool failures inside the result envelope', async () => {
    const { status, body } = await rpc({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'nope', arguments: {} } });

    expect(status).toBe(200);
    expect(body).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { content: [{ type: 'text', text: '{"error":"Unknown tool: nope"}' }], isError: true },
    });
  });

  it('reports a rejected token with its status', async () => {
    const body = await callTool('volvox_auth_get_user', { token: 'other-token' });

    expect(textOfResult(body)).toBe('{"error":"Could not validate credentials","status":401}');
  });

  it('resolves the caller from the token', async () => {
    const body = await callTool('volvox_auth_get_user', { token: TEST_TOKEN });

    expect(JSON.parse(textOfResult(body))).toEqual(USER);
  });

  it('accepts multipart calls with an attached file', async () => {
    backend.on('POST', '/api/v1/research/', () => jsonResponse({ _id: 'r1', researchName: 'Solar' }));
    const form = new FormData();
    form.append(
      'jsonrpc',
      JSON.stringify({
        jsonrpc: '2.0',
        id: 9,
        method: 'tools/call',
        params: { name: 'volvox_research_create', arguments: { token: TEST_TOKEN, researchName: 'Solar' } },
      })
    );
    form.append('file', new Blob([Buffer.from('%PDF-1.4')], { type: 'application/pdf' }), 'solar.pdf');

    const response = await fetch(`${baseUrl}/mcp`, { method: 'POST', body: form });
    const body: unknown = await response.json();

    expect(JSON.parse(textOfResult(body))).toEqual({ _id: 'r1', researchName: 'Solar' });
    const upstream = backend.requestsTo('/api/v1/research/')[0].body;
    expect(upstream).toBeInstanceOf(FormData);
    if (upstream instanceof FormData) {
      expect(upstream.get('user_id')).toBe('user-1');
      expect(upstream.get('researchName')).toBe('Solar');
      const file = upstream.get('file');
      expect(file instanceof Blob ? await file.text() : null).toBe('%PDF-1.4');
    }
  });

  it('rejects a multipart call without the jsonrpc field', async () => {
    const form = new FormData();
    form.append('file', new Blob(['x']), 'x.txt');

    const response = await fetch(`${baseUrl}/mcp`, { method: 'POST', body: form });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32600, message: 'Missing jsonrpc field' },
    });
  });

  it('streams a workflow run to the thread listener', async () => {
    backend
      .on('POST', '/chat/messageQuery', () => jsonResponse({ answer: 'solar is growing' }))
      .on('POST', '/api/v1/chat/summarize-content', () => jsonResponse({ summary: 'growing' }));
    llm.enqueue(
      toolStep(['smart_deep_search', { question: 'solar' }]),
      toolStep(['volvox_summarize_content', { content: 'solar is growing' }]),
      finalStep('Solar is growing.')
    );

    const stream = await openStream('wf-1');
    const closed = new Promise<number>((resolve) => {
      stream.socket.on('close', (code) => resolve(code));
    });
    const body = await callTool('run_agent_smart_search', { token: TEST_TOKEN, query: 'solar', thread_id: 'wf-1' });

    expect(JSON.parse(textOfResult(body))).toEqual({ status: 'started', thread_id: 'wf-1' });
    await vi.waitFor(() => {
      expect(stream.events.map((event) => event.type)).toContain('workflow_complete');
    });
    expect(stream.events.map((event) => event.type)).toEqual([
      'connected',
      'tool_start',
      'tool_end',
      'tool_start',
      'tool_end',
      'workflow_complete',
    ]);
    expect(stream.events.at(-1)).toMatchObject({
      thread_id: 'wf-1',
      success: true,
      result: { response: 'Solar is growing.', thread_id: 'wf-1', tool_calls_count: 2 },
    });
    expect(await closed).toBe(1000);
    expect(gateway.streams.has('wf-1')).toBe(false);
  });

  it('closes stream connections without a thread id', async () => {
    const socket = new WebSocket(`ws://127.0.0.1:${gateway.server.port}/ws`);
    sockets.push(socket);

    const code = await new Promise<number>((resolve) => {
      socket.on('close', (closeCode) => resolve(closeCode));
    });

    expect(code).toBe(1008);
  });

  it('serves a health check', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(isRecord(body) && body.status).toBe('ok');
  });

  it('surfaces backend text errors through tools/call', async () => {
    backend.on('POST', '/chat/messageQuery', () => textResponse('maintenance', 503));

    const body = await callTool('smart_message_query', { token: TEST_TOKEN, question: 'q' });

    expect(textOfResult(body)).toBe('{"error":"Smart responded 503: maintenance","status":503}');
  });
});
