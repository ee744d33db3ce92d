import { describe, it, expect } from 'vitest';
import { GoogleProvider, cleanSchema } from './google.js';
import { FakeBackend, jsonResponse } from '../testing/fakes.js';

const ENDPOINT = '/v1beta/models/gemini-2.5-flash:generateContent';

describe('GoogleProvider', () => {
  it('maps function calls to tool uses', async () => {
    const backend = new FakeBackend().on('POST', ENDPOINT, () =>
      jsonResponse({
        candidates: [
          {
            content: { parts: [{ text: 'Searching.' }, { functionCall: { name: 'smart_deep_search', args: { question: 'q' } } }] },
            finishReason: 'STOP',
          },
        ],
        usageMetadata: { promptTokenCount: 10, candidatesTokenCount: 4 },
      })
    );
    const provider = new GoogleProvider('test-key', 'gemini-2.5-flash', backend.fetch);

    const response = await provider.completeWithTools([{ role: 'user', content: 'find' }], {
      systemPrompt: 'Be brief',
      tools: [
        {
          name: 'smart_deep_search',
          description: 'search',
          input_schema: { type: 'object', additionalProperties: false, properties: { question: { type: 'string' } } },
        },
      ],
    });

    expect(response.content).toBe('Searching.');
    expect(response.stopReason).toBe('tool_use');
    expect(response.usage).toEqual({ inputTokens: 10, outputTokens: 4 });
    expect(response.toolUse).toHaveLength(1);
    expect(response.toolUse?.[0]).toMatchObject({ name: 'smart_deep_search', input: { question: 'q' } });

    const request = backend.requests[0];
    expect(request.url.searchParams.get('key')).toBe('test-key');
    expect(typeof request.body === 'string' ? JSON.parse(request.body) : null).toMatchObject({
      systemInstruction: { parts: [{ text: 'Be brief' }] },
      tools: [{ functionDeclarations: [{ name: 'smart_deep_search', parameters: { type: 'object', properties: { question: { type: 'string' } } } }] }],
    });
  });

  it('sends tool results as function responses by tool name', async () => {
    const backend = new FakeBackend().on('POST', ENDPOINT, () =>
      jsonResponse({ candidates: [{ content: { parts: [{ text: 'Done' }] }, finishReason: 'STOP' }] })
    );
    const provider = new GoogleProvider('test-key', 'gemini-2.5-flash', backend.fetch);

    const response = await provider.completeWithTools([
      { role: 'user', content: 'find' },
      { role: 'assistant', content: '', toolUse: [{ id: 'call_1', name: 'generate_roadmap', input: { summary: 's' } }] },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'call_1', tool_name: 'generate_roadmap', content: 'boom', is_error: true }],
      },
    ]);

    expect(response.toolUse).toBeUndefined();
    expect(response.stopReason).toBe('STOP');
    const body: unknown = typeof backend.requests[0].body === 'string' ? JSON.parse(backend.requests[0].body) : null;
    expect(body).toMatchObject({
      contents: [
        { role: 'user', parts: [{ text: 'find' }] },
        { role: 'model', parts: [{ functionCall: { name: 'generate_roadmap', args: { summary: 's' } } }] },
        { role: 'user', parts: [{ functionResponse: { name: 'generate_roadmap', response: { error: 'boom' } } }] },
      ],
    });
  });

  it('raises on API errors', async () => {
    const backend = new FakeBackend().on('POST', ENDPOINT, () => jsonResponse({ error: 'quota' }, 429));
    const provider = new GoogleProvider('test-key', 'gemini-2.5-flash', backend.fetch);

    await expect(provider.completeWithTools([{ role: 'user', content: 'x' }])).rejects.toThrow(
      'Gemini API error: 429 {"error":"quota"}'
    );
  });
});

describe('cleanSchema', () => {
  it('drops unsupported keywords at every depth', () => {
    expect(
      cleanSchema({
        $schema: 'https://json-schema.org/draft/2020-12/schema',
        type: 'object',
        additionalProperties: false,
        properties: { nested: { type: 'object', additionalProperties: {} } },
      })
    ).toEqual({ type: 'object', properties: { nested: { type: 'object' } } });
  });
});
