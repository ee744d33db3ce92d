import { describe, it, expect } from 'vitest';
import { formatToolResultBlocks, payloadTextForModel } from './tool-results.js';
import { stripBinaryData } from './strip-binary.js';
import { binaryPayload, failure, jsonPayload, textPayload } from '../tools/types.js';

const BLOB = 'A'.repeat(2048);

describe('stripBinaryData', () => {
  it('replaces inline file content with a placeholder', () => {
    expect(stripBinaryData({ name: 'p.pdf', pdf_base64: BLOB, pages: 3 })).toEqual({
      name: 'p.pdf',
      pdf_base64: '[Binary data: 2KB - delivered to user]',
      pages: 3,
    });
  });

  it('leaves short strings alone', () => {
    expect(stripBinaryData({ base64: 'abc', list: ['x'] })).toEqual({ base64: 'abc', list: ['x'] });
  });

  it('replaces data URLs anywhere', () => {
    expect(stripBinaryData(['data:image/png;base64,AAAA'])).toEqual(['[Binary data: 0KB - delivered to user]']);
  });
});

describe('payloadTextForModel', () => {
  it('renders each payload kind as text', () => {
    expect(payloadTextForModel(jsonPayload({ a: 1 }))).toBe('{"a":1}');
    expect(payloadTextForModel(textPayload('plain'))).toBe('plain');
    expect(payloadTextForModel(binaryPayload(new Uint8Array(5), 'application/pdf'))).toBe(
      '[Binary document: application/pdf, 5 bytes - delivered to user]'
    );
  });
});

describe('formatToolResultBlocks', () => {
  it('builds one tool_result block per call', () => {
    const blocks = formatToolResultBlocks([
      { toolUse: { id: 'c1', name: 'a', input: {} }, result: { success: true, payload: textPayload('ok') } },
      { toolUse: { id: 'c2', name: 'b', input: {} }, result: failure('adapter_failure', 'down') },
    ]);

    expect(blocks).toEqual([
      { type: 'tool_result', tool_use_id: 'c1', tool_name: 'a', content: 'ok', is_error: false },
      { type: 'tool_result', tool_use_id: 'c2', tool_name: 'b', content: 'Error: down', is_error: true },
    ]);
  });
});
