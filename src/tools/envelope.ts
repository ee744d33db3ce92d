/**
 * Result envelope
 *
 * Renders a NormalizedResult as the tools/call result body: a single text
 * content item plus an isError flag. The text is always JSON: plain text
 * becomes a JSON string and binary payloads travel as base64 inside it.
 */

import type { JsonValue, NormalizedResult, ResultPayload } from './types.js';

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

export function resultText(result: NormalizedResult): string {
  if (!result.success) {
    return JSON.stringify(
      result.status === undefined ? { error: result.error } : { error: result.error, status: result.status }
    );
  }

  const payload = result.payload;
  switch (payload.kind) {
    case 'json':
      return JSON.stringify(payload.data);
    case 'text':
      return JSON.stringify(payload.text);
    case 'binary':
      return JSON.stringify({ mime_type: payload.mimeType, data_base64: encodeBase64(payload.bytes) });
  }
}

export function toToolResult(result: NormalizedResult): ToolCallResult {
  try {
    return {
      content: [{ type: 'text', text: resultText(result) }],
      isError: !result.success,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[Dispatch] Result could not be serialized:', message);
    return {
      content: [{ type: 'text', text: JSON.stringify({ error: `Result could not be serialized: ${message}` }) }],
      isError: true,
    };
  }
}

/**
 * Compact JSON view of a payload for progress events: binary content is
 * described, not included.
 */
export function describePayload(payload: ResultPayload): JsonValue {
  switch (payload.kind) {
    case 'json':
      return payload.data;
    case 'text':
      return payload.text;
    case 'binary':
      return { mime_type: payload.mimeType, size_bytes: payload.bytes.byteLength };
  }
}
