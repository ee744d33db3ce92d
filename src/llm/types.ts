// LLM service abstraction types

export type LLMContentBlock =
  | { type: 'text'; text: string }
  | {
      type: 'tool_result';
      tool_use_id: string;
      // Gemini matches function responses by name, not id
      tool_name: string;
      content: string;
      is_error?: boolean;
    };

export interface LLMMessage {
  role: 'user' | 'assistant' | 'system';
  content: string | LLMContentBlock[];
  // For tool use responses
  toolUse?: LLMToolUse[];
}

// Tool use block from LLM response
export interface LLMToolUse {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface LLMToolDefinition {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface LLMOptions {
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  tools?: LLMToolDefinition[];
  signal?: AbortSignal;
}

export interface LLMResponseWithTools {
  content: string;
  toolUse?: LLMToolUse[];
  stopReason?: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  model: string;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;

  // One reasoning step: text and/or requested tool calls
  completeWithTools(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponseWithTools>;
}

export function textOf(content: LLMMessage['content']): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .filter(Boolean)
    .join('\n');
}
