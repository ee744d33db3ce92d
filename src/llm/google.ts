import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { LLMProvider, LLMMessage, LLMOptions, LLMResponseWithTools, LLMToolUse } from './types.js';
import { textOf } from './types.js';

type GeminiPart =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: Record<string, unknown> } };

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

const generateContentResponse = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  functionCall: z
                    .object({
                      name: z.string(),
                      args: z.record(z.string(), z.unknown()).optional(),
                    })
                    .optional(),
                })
              )
              .default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
    })
    .optional(),
});

// JSON Schema keywords the Gemini function declaration format rejects
const UNSUPPORTED_SCHEMA_KEYS = new Set(['$schema', 'additionalProperties']);

/**
 * Google Gemini LLM Provider
 *
 * Function calling through the generateContent REST endpoint.
 * Supports gemini-2.5-flash-lite, gemini-2.5-flash and gemini-2.5-pro.
 */
export class GoogleProvider implements LLMProvider {
  readonly name = 'google';
  readonly model: string;

  private apiKey: string;
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(
    apiKey: string,
    model: string = 'gemini-2.5-flash',
    fetchImpl: typeof fetch = fetch
  ) {
    this.apiKey = apiKey;
    this.model = model;
    this.fetchImpl = fetchImpl;
    this.baseUrl = 'https://generativelanguage.googleapis.com/v1beta';
  }

  async completeWithTools(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponseWithTools> {
    const systemMessage = messages.find((m) => m.role === 'system');
    const systemPrompt = options?.systemPrompt || (systemMessage ? textOf(systemMessage.content) : undefined);

    const requestBody: Record<string, unknown> = {
      contents: this.convertMessages(messages),
      generationConfig: {
        maxOutputTokens: options?.maxTokens ?? 4096,
        temperature: options?.temperature ?? 0,
      },
    };
    if (systemPrompt) {
      requestBody.systemInstruction = { parts: [{ text: systemPrompt }] };
    }
    if (options?.tools?.length) {
      requestBody.tools = [
        {
          functionDeclarations: options.tools.map((t) => ({
            name: t.name,
            description: t.description,
            parameters: cleanSchema(t.input_schema),
          })),
        },
      ];
    }

    const url = `${this.baseUrl}/models/${this.model}:generateContent?key=${this.apiKey}`;

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(requestBody),
      signal: options?.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Gemini API error: ${response.status} ${error}`);
    }

    const parsed = generateContentResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Gemini API returned an unexpected response: ${parsed.error.message}`);
    }

    const candidate = parsed.data.candidates[0];
    const parts = candidate?.content?.parts ?? [];

    const content = parts.map((part) => part.text ?? '').join('');
    const toolUse: LLMToolUse[] = [];
    for (const part of parts) {
      if (part.functionCall) {
        toolUse.push({
          id: `call_${uuid()}`,
          name: part.functionCall.name,
          input: part.functionCall.args ?? {},
        });
      }
    }

    const usage = parsed.data.usageMetadata;
    return {
      content,
      toolUse: toolUse.length > 0 ? toolUse : undefined,
      stopReason: toolUse.length > 0 ? 'tool_use' : candidate?.finishReason,
      usage: usage
        ? {
            inputTokens: usage.promptTokenCount || 0,
            outputTokens: usage.candidatesTokenCount || 0,
          }
        : undefined,
      model: this.model,
    };
  }

  private convertMessages(messages: LLMMessage[]): GeminiContent[] {
    const contents: GeminiContent[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        continue; // Sent as systemInstruction
      }

      const parts: GeminiPart[] = [];
      if (typeof msg.content === 'string') {
        if (msg.content) {
          parts.push({ text: msg.content });
        }
      } else {
        for (const block of msg.content) {
          if (block.type === 'text') {
            parts.push({ text: block.text });
          } else {
            parts.push({
              functionResponse: {
                name: block.tool_name,
                response: block.is_error ? { error: block.content } : { content: block.content },
              },
            });
          }
        }
      }

      for (const tu of msg.toolUse ?? []) {
        parts.push({ functionCall: { name: tu.name, args: tu.input } });
      }

      if (parts.length > 0) {
        contents.push({ role: msg.role === 'assistant' ? 'model' : 'user', parts });
      }
    }

    return contents;
  }
}

export function cleanSchema(schema: unknown): unknown {
  if (Array.isArray(schema)) {
    return schema.map(cleanSchema);
  }
  if (typeof schema === 'object' && schema !== null) {
    const cleaned: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(schema)) {
      if (!UNSUPPORTED_SCHEMA_KEYS.has(key)) {
        cleaned[key] = cleanSchema(value);
      }
    }
    return cleaned;
  }
  return schema;
}
