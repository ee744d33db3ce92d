/**
 * In-process stand-ins shared by the test suites: a routed fetch for the
 * backends, a scripted reasoning backend, a token table for identity and
 * a stream listener that records what it receives.
 */

import type { FetchLike } from '../backends/http.js';
import { stripBearer } from '../auth/identity.js';
import {
  AuthenticationError,
  type AuthSession,
  type IdentityService,
  type LoginRequest,
  type Principal,
  type SignupRequest,
} from '../auth/types.js';
import type { LLMMessage, LLMOptions, LLMProvider, LLMResponseWithTools, LLMToolUse } from '../llm/types.js';
import type { DeliveredEvent, StreamListener } from '../streaming/types.js';

export const TEST_PRINCIPAL: Principal = {
  id: 'user-1',
  email: 'ada@example.com',
  fullName: 'Ada Tester',
  createdAt: '2024-01-01T00:00:00Z',
};

export const TEST_TOKEN = 'test-token';

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: string | FormData | undefined;
  signal: AbortSignal | undefined;
}

type RouteHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function textResponse(text: string, status = 200, contentType = 'text/plain'): Response {
  return new Response(text, { status, headers: { 'content-type': contentType } });
}

/**
 * Answers backend requests from a `METHOD /path` routing table.
 * Unrouted requests get a 404.
 */
export class FakeBackend {
  readonly requests: RecordedRequest[] = [];
  private routes: Map<string, RouteHandler> = new Map();

  on(method: string, pathname: string, handler: RouteHandler): this {
    this.routes.set(`${method} ${pathname}`, handler);
    return this;
  }

  requestsTo(pathname: string): RecordedRequest[] {
    return this.requests.filter((request) => request.url.pathname === pathname);
  }

  readonly fetch: FetchLike = async (input, init) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const body = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: new URL(href),
      headers: new Headers(init?.headers),
      body: typeof body === 'string' || body instanceof FormData ? body : undefined,
      signal: init?.signal ?? undefined,
    };
    this.requests.push(request);

    const handler = this.routes.get(`${request.method} ${request.url.pathname}`);
    if (!handler) {
      return jsonResponse({ detail: 'Not Found' }, 404);
    }
    return handler(request);
  };
}

/** Never answers; rejects once the request is aborted. */
export function hangUntilAborted(request: RecordedRequest): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = request.signal;
    if (!signal) {
      return;
    }
    const abort = (): void => {
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      reject(error);
    };
    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener('abort', abort, { once: true });
    }
  });
}

type ScriptedStep =
  | LLMResponseWithTools
  | ((messages: LLMMessage[], options?: LLMOptions) => LLMResponseWithTools | Promise<LLMResponseWithTools>);

/**
 * Reasoning backend that replays a fixed list of steps. Once the script
 * runs out every further step answers 'done' with no tool calls.
 */
export class ScriptedLLM implements LLMProvider {
  readonly name = 'scripted';
  readonly model = 'scripted-1';
  readonly calls: Array<{ messages: LLMMessage[]; options?: LLMOptions }> = [];

  constructor(private steps: ScriptedStep[] = []) {}

  enqueue(...steps: ScriptedStep[]): void {
    this.steps.push(...steps);
  }

  async completeWithTools(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponseWithTools> {
    this.calls.push({ messages: [...messages], options });
    const step = this.steps.shift();
    if (!step) {
      return finalStep('done');
    }
    return typeof step === 'function' ? step(messages, options) : step;
  }
}

let toolCallCounter = 0;

export function toolStep(...calls: Array<[name: string, input: Record<string, unknown>]>): LLMResponseWithTools {
  const toolUse: LLMToolUse[] = calls.map(([name, input]) => ({
    id: `call_${++toolCallCounter}`,
    name,
    input,
  }));
  return { content: '', toolUse, stopReason: 'tool_use', model: 'scripted-1' };
}

export function finalStep(content: string): LLMResponseWithTools {
  return { content, stopReason: 'end_turn', model: 'scripted-1' };
}

/**
 * Identity service over a fixed token table.
 */
export class FakeIdentityService implements IdentityService {
  private tokens: Map<string, Principal>;

  constructor(tokens: Record<string, Principal> = { [TEST_TOKEN]: TEST_PRINCIPAL }) {
    this.tokens = new Map(Object.entries(tokens));
  }

  async signup(request: SignupRequest): Promise<AuthSession> {
    return this.session(request.email, request.fullName);
  }

  async login(request: LoginRequest): Promise<AuthSession> {
    return this.session(request.email, '');
  }

  async resolve(token: string | undefined): Promise<Principal> {
    const bare = stripBearer(token);
    if (!bare) {
      throw new AuthenticationError('Token missing');
    }
    const principal = this.tokens.get(bare);
    if (!principal) {
      throw new AuthenticationError('Could not validate credentials');
    }
    return principal;
  }

  private session(email: string, fullName: string): AuthSession {
    return {
      access_token: TEST_TOKEN,
      token_type: 'bearer',
      user: { _id: TEST_PRINCIPAL.id, email, fullName, created_at: TEST_PRINCIPAL.createdAt },
    };
  }
}

export class RecordingListener implements StreamListener {
  readonly events: DeliveredEvent[] = [];
  failing = false;
  closed = 0;

  constructor(readonly id: string = 'listener-1') {}

  send(event: DeliveredEvent): void {
    if (this.failing) {
      throw new Error('listener gone');
    }
    this.events.push(event);
  }

  close(): void {
    this.closed += 1;
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}
