import { describe, it, expect } from 'vitest';
import { describePayload, encodeBase64, resultText, toToolResult } from './envelope.js';
import { binaryPayload, failure, jsonPayload, textPayload } from './types.js';

describe('toToolResult', () => {
  it('serializes JSON payloads as the text item', () => {
    const result = toToolResult({ success: true, payload: jsonPayload({ items: [1, 2], total: 2 }) });

    expect(result).toEqual({
      content: [{ type: 'text', text: '{"items":[1,2],"total":2}' }],
      isError: false,
    });
  });

  it('encodes text payloads as a JSON string', () => {
    const result = toToolResult({ success: true, payload: textPayload('Feasibility: high') });
    expect(result.content[0].text).toBe('"Feasibility: high"');
  });

  it('keeps text that looks like JSON distinct from a JSON payload', () => {
    const text = toToolResult({ success: true, payload: textPayload('42') });
    const json = toToolResult({ success: true, payload: jsonPayload(42) });

    expect(text.content[0].text).toBe('"42"');
    expect(json.content[0].text).toBe('42');
  });

  it('decodes multi-line text back to the original string', () => {
    const report = 'Roadmap\n1. "Pilot" phase\n2. Scale';
    const result = toToolResult({ success: true, payload: textPayload(report) });

    expect(JSON.parse(result.content[0].text)).toBe(report);
  });

  it('wraps binary payloads as base64 with their mime type', () => {
    const bytes = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x2d, 0x31, 0x2e, 0x34, 0x0a, 0x00]);
    const result = toToolResult({ success: true, payload: binaryPayload(bytes, 'application/pdf') });

    const body: unknown = JSON.parse(result.content[0].text);
    expect(body).toEqual({ mime_type: 'application/pdf', data_base64: 'JVBERi0xLjQKAA==' });
    expect(Buffer.from('JVBERi0xLjQKAA==', 'base64').equals(Buffer.from(bytes))).toBe(true);
    expect(result.isError).toBe(false);
  });

  it('renders failures with error and status', () => {
    const result = toToolResult(failure('adapter_failure', 'Volvox responded 502: bad gateway', 502));

    expect(result).toEqual({
      content: [{ type: 'text', text: '{"error":"Volvox responded 502: bad gateway","status":502}' }],
      isError: true,
    });
  });

  it('omits status when the failure has none', () => {
    expect(resultText(failure('tool_not_found', 'Unknown tool: nope'))).toBe('{"error":"Unknown tool: nope"}');
  });
});

describe('encodeBase64', () => {
  it('respects the view offset of a sliced buffer', () => {
    const backing = new Uint8Array([1, 2, 3, 4, 5]);
    expect(encodeBase64(backing.subarray(1, 3))).toBe(Buffer.from([2, 3]).toString('base64'));
  });
});

describe('describePayload', () => {
  it('describes binary content instead of including it', () => {
    expect(describePayload(binaryPayload(new Uint8Array(42), 'application/pdf'))).toEqual({
      mime_type: 'application/pdf',
      size_bytes: 42,
    });
  });

  it('returns JSON and text payloads as-is', () => {
    expect(describePayload(jsonPayload({ a: 1 }))).toEqual({ a: 1 });
    expect(describePayload(textPayload('hi'))).toBe('hi');
  });
});
