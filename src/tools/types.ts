/**
 * Tool System Types
 *
 * Core type definitions shared by the dispatcher, the tool catalog and
 * the workflow runner: definitions, the tagged result payload, the
 * normalized result and the error taxonomy.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// Tool definition as advertised by tools/list and to the reasoning backend
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

// File attached to a tools/call request out-of-band (multipart)
export interface UploadedFile {
  filename: string;
  mimeType: string;
  bytes: Buffer;
}

// Successful tool output, tagged by shape
export type ResultPayload =
  | { kind: 'json'; data: JsonValue }
  | { kind: 'text'; text: string }
  | { kind: 'binary'; bytes: Uint8Array; mimeType: string };

export type ToolErrorCode =
  | 'authentication_failed'
  | 'tool_not_found'
  | 'missing_required_argument'
  | 'invalid_arguments'
  | 'adapter_failure'
  | 'serialization_failure'
  | 'workflow_conflict'
  | 'internal_error';

// Uniform outcome of every tool execution
export type NormalizedResult =
  | { success: true; payload: ResultPayload }
  | { success: false; error: string; code: ToolErrorCode; status?: number };

export class ToolError extends Error {
  readonly code: ToolErrorCode;
  readonly status?: number;

  constructor(code: ToolErrorCode, message: string, status?: number) {
    super(message);
    this.name = 'ToolError';
    this.code = code;
    this.status = status;
  }
}

export function jsonPayload(data: JsonValue): ResultPayload {
  return { kind: 'json', data };
}

export function textPayload(text: string): ResultPayload {
  return { kind: 'text', text };
}

export function binaryPayload(bytes: Uint8Array, mimeType: string): ResultPayload {
  return { kind: 'binary', bytes, mimeType };
}

export function failure(code: ToolErrorCode, error: string, status?: number): NormalizedResult {
  return status === undefined
    ? { success: false, error, code }
    : { success: false, error, code, status };
}
