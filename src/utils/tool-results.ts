import type { NormalizedResult, ResultPayload } from '../tools/types.js';
import type { LLMContentBlock, LLMToolUse } from '../llm/types.js';
import { stripBinaryData } from './strip-binary.js';

// Model-facing text of a payload; binary content is never shown to the model
export function payloadTextForModel(payload: ResultPayload): string {
  switch (payload.kind) {
    case 'json': {
      const stripped = stripBinaryData(payload.data);
      return typeof stripped === 'string' ? stripped : JSON.stringify(stripped);
    }
    case 'text': {
      const stripped = stripBinaryData(payload.text);
      return typeof stripped === 'string' ? stripped : JSON.stringify(stripped);
    }
    case 'binary':
      return `[Binary document: ${payload.mimeType}, ${payload.bytes.byteLength} bytes - delivered to user]`;
  }
}

export function formatToolResultBlocks(
  entries: Array<{ toolUse: LLMToolUse; result: NormalizedResult }>
): LLMContentBlock[] {
  return entries.map(({ toolUse, result }): LLMContentBlock => ({
    type: 'tool_result',
    tool_use_id: toolUse.id,
    tool_name: toolUse.name,
    content: result.success ? payloadTextForModel(result.payload) : `Error: ${result.error || 'Unknown error'}`,
    is_error: !result.success,
  }));
}
