/**
 * Backend HTTP Client
 *
 * Thin wrapper over fetch shared by every remote operation adapter.
 * One instance per backend; undici keeps connections alive between calls.
 * Responses are read in one of four shapes: JSON, plain text, a
 * newline-delimited event stream, or raw bytes.
 */

import type { JsonValue } from '../tools/types.js';

export type FetchLike = typeof fetch;

export type QueryValue = string | number | boolean | undefined | null;

export interface BackendRequest {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  query?: Record<string, QueryValue>;
  body?: JsonValue;
  form?: FormData;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface BackendClientConfig {
  /** Service name used in error messages and logs */
  service: string;
  baseUrl: string;
  /** Per-request timeout in ms (default: 300000) */
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class BackendError extends Error {
  readonly service: string;
  readonly status?: number;

  constructor(service: string, message: string, status?: number) {
    super(message);
    this.name = 'BackendError';
    this.service = service;
    this.status = status;
  }
}

export class BackendClient {
  readonly service: string;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(config: BackendClientConfig) {
    this.service = config.service;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs || 300_000;
    this.fetchImpl = config.fetch || fetch;
  }

  /**
   * Request and parse a JSON body. An empty body reads as null.
   */
  async json(path: string, request: BackendRequest = {}): Promise<JsonValue> {
    const response = await this.send(path, request, 'application/json');
    const text = await response.text();
    if (!text.trim()) {
      return null;
    }
    try {
      const data: JsonValue = JSON.parse(text);
      return data;
    } catch {
      throw new BackendError(this.service, `${this.service} returned invalid JSON: ${text.slice(0, 200)}`, response.status);
    }
  }

  /**
   * Request a plain-text body, trimmed.
   */
  async text(path: string, request: BackendRequest = {}): Promise<string> {
    const response = await this.send(path, request, 'text/plain, */*');
    return (await response.text()).trim();
  }

  /**
   * Request a server-sent event stream and collect its non-blank lines,
   * joined with newlines.
   */
  async eventStream(path: string, request: BackendRequest = {}): Promise<string> {
    const response = await this.send(path, request, 'text/event-stream');
    const body = await response.text();
    return collectStreamLines(body);
  }

  /**
   * Request raw bytes (e.g. a generated PDF).
   */
  async binary(path: string, request: BackendRequest = {}): Promise<{ bytes: Uint8Array; mimeType: string }> {
    const response = await this.send(path, request, 'application/pdf, application/octet-stream');
    const buffer = await response.arrayBuffer();
    const mimeType = (response.headers.get('content-type') || 'application/octet-stream').split(';')[0].trim();
    return { bytes: new Uint8Array(buffer), mimeType };
  }

  buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined || value === null || value === '') continue;
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async send(path: string, request: BackendRequest, accept: string): Promise<Response> {
    const method = request.method || 'GET';
    const url = this.buildUrl(path, request.query);
    const headers: Record<string, string> = { Accept: accept, ...request.headers };

    let body: string | FormData | undefined;
    if (request.form) {
      body = request.form;
    } else if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method, headers, body, signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new BackendError(this.service, `${this.service} timed out after ${this.timeoutMs}ms`);
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new BackendError(this.service, `${this.service} request aborted`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BackendError(this.service, `${this.service} request failed: ${message}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      console.warn(`[Backend] ${this.service} ${method} ${path} → ${response.status}`);
      throw new BackendError(
        this.service,
        `${this.service} responded ${response.status}: ${detail.slice(0, 500) || response.statusText}`,
        response.status
      );
    }

    return response;
  }
}

export function collectStreamLines(body: string): string {
  return body
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .join('\n');
}

/**
 * Build a multipart form with a single file part plus plain fields.
 */
export function fileForm(
  file: { filename: string; mimeType: string; bytes: Uint8Array },
  fields: Record<string, string | undefined> = {}
): FormData {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      form.append(key, value);
    }
  }
  form.append('file', new Blob([file.bytes], { type: file.mimeType }), file.filename);
  return form;
}
