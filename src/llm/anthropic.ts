import Anthropic from '@anthropic-ai/sdk';
import { isRecord } from '../utils/records.js';
import type {
  LLMProvider,
  LLMMessage,
  LLMOptions,
  LLMResponseWithTools,
  LLMToolUse,
} from './types.js';
import { textOf } from './types.js';

// Type alias for the Anthropic content block parameters this provider sends
type ContentBlockParam = Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam | Anthropic.ToolResultBlockParam;
const DEBUG_LLM = ['1', 'true', 'yes', 'on'].includes((process.env.DEBUG_LLM || '').toLowerCase());

/**
 * Sanitize tool name to match Anthropic's pattern: ^[a-zA-Z0-9_-]{1,128}$
 * Replaces dots and other invalid characters with underscores.
 */
function sanitizeToolName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 128);
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly model: string;

  private client: Anthropic;

  constructor(apiKey: string, model: string = 'claude-sonnet-4-20250514') {
    this.model = model;
    this.client = new Anthropic({ apiKey });
  }

  /**
   * Format messages for Anthropic API
   */
  private formatMessagesForApi(messages: LLMMessage[]): Anthropic.MessageParam[] {
    return messages
      .filter((m) => m.role !== 'system')
      .map((m): Anthropic.MessageParam => {
        const role = m.role === 'assistant' ? 'assistant' : 'user';
        const blocks: ContentBlockParam[] = [];

        if (typeof m.content === 'string') {
          if (m.content.trim()) {
            blocks.push({ type: 'text', text: m.content });
          }
        } else {
          for (const block of m.content) {
            if (block.type === 'text') {
              if (block.text.trim()) {
                blocks.push({ type: 'text', text: block.text });
              }
            } else {
              blocks.push({
                type: 'tool_result',
                tool_use_id: block.tool_use_id,
                content: block.content,
                is_error: block.is_error,
              });
            }
          }
        }

        for (const tu of m.toolUse ?? []) {
          blocks.push({
            type: 'tool_use',
            id: tu.id,
            name: sanitizeToolName(tu.name),
            input: tu.input,
          });
        }

        // Plain text turns can stay strings
        if (!m.toolUse?.length && typeof m.content === 'string') {
          return { role, content: m.content };
        }
        return { role, content: blocks };
      });
  }

  /**
   * Complete with tool use support
   */
  async completeWithTools(
    messages: LLMMessage[],
    options?: LLMOptions
  ): Promise<LLMResponseWithTools> {
    const systemMessage = messages.find((m) => m.role === 'system');
    const systemContent = systemMessage ? textOf(systemMessage.content) : undefined;
    const conversationMessages = this.formatMessagesForApi(messages);

    // Build reverse map: sanitized name -> original name
    const toolNameMap = new Map<string, string>();
    const tools = options?.tools?.map((t): Anthropic.Tool => {
      const sanitized = sanitizeToolName(t.name);
      toolNameMap.set(sanitized, t.name);
      const inputSchema: Anthropic.Tool.InputSchema = { ...t.input_schema, type: 'object' };
      return {
        name: sanitized,
        description: t.description,
        input_schema: inputSchema,
      };
    });

    if (DEBUG_LLM) {
      console.log('[Anthropic] completeWithTools request:', {
        model: this.model,
        messageCount: conversationMessages.length,
        toolCount: tools?.length || 0,
      });
    }

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options?.maxTokens ?? 4096,
        system: options?.systemPrompt ?? systemContent,
        messages: conversationMessages,
        temperature: options?.temperature,
        tools,
        tool_choice: tools?.length ? { type: 'auto' } : undefined,
      },
      { signal: options?.signal }
    );

    // Extract text content
    const textContent = response.content
      .map((c) => (c.type === 'text' ? c.text : ''))
      .join('');

    // Extract tool_use content and map sanitized names back to original
    const toolUse: LLMToolUse[] = [];
    for (const block of response.content) {
      if (block.type === 'tool_use') {
        toolUse.push({
          id: block.id,
          name: toolNameMap.get(block.name) || block.name,
          input: isRecord(block.input) ? block.input : {},
        });
      }
    }

    return {
      content: textContent,
      toolUse: toolUse.length > 0 ? toolUse : undefined,
      stopReason: response.stop_reason ?? undefined,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model: response.model,
    };
  }
}
