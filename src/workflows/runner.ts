/**
 * Workflow Runner
 *
 * The agent loop: a reasoning step asks the model what to do next; when
 * it requests tools, an acting step runs them one at a time in the order
 * given and feeds every result back. A reply with no tool calls ends the
 * run. Progress is published on the run's thread.
 */

import type { Principal } from '../auth/types.js';
import type { LLMContentBlock, LLMMessage, LLMProvider, LLMToolDefinition, LLMToolUse } from '../llm/types.js';
import type { StreamRegistry } from '../streaming/registry.js';
import { describePayload, encodeBase64 } from '../tools/envelope.js';
import { failure, type NormalizedResult, type ResultPayload } from '../tools/types.js';
import { withoutIdentityFields } from '../utils/records.js';
import { formatToolResultBlocks } from '../utils/tool-results.js';
import type { AgentTool, AgentToolbox } from './toolbox.js';
import {
  WorkflowCancelledError,
  WorkflowError,
  type WorkflowDefinition,
  type WorkflowOutcome,
} from './types.js';

export interface WorkflowRunnerConfig {
  llm: LLMProvider;
  toolbox: AgentToolbox;
  streams: StreamRegistry;
  /** Reasoning steps allowed per run (default: 12) */
  maxIterations?: number;
  maxTokens?: number;
}

export interface WorkflowRun {
  threadId: string;
  principal: Principal;
  definition: WorkflowDefinition;
  prompt: string;
  signal?: AbortSignal;
}

type BinaryPayload = Extract<ResultPayload, { kind: 'binary' }>;

export class WorkflowRunner {
  private llm: LLMProvider;
  private toolbox: AgentToolbox;
  private streams: StreamRegistry;
  private maxIterations: number;
  private maxTokens: number;

  constructor(config: WorkflowRunnerConfig) {
    this.llm = config.llm;
    this.toolbox = config.toolbox;
    this.streams = config.streams;
    this.maxIterations = config.maxIterations ?? 12;
    this.maxTokens = config.maxTokens ?? 4096;
  }

  async run(run: WorkflowRun): Promise<WorkflowOutcome> {
    const { threadId, principal, definition, signal } = run;
    const tools = new Map<string, AgentTool>(
      this.toolbox.select(definition.tools).map((tool): [string, AgentTool] => [tool.definition.name, tool])
    );
    const llmTools: LLMToolDefinition[] = Array.from(tools.values(), (tool) => ({
      name: tool.definition.name,
      description: tool.definition.description,
      input_schema: tool.definition.inputSchema,
    }));

    const messages: LLMMessage[] = [{ role: 'user', content: run.prompt }];
    let toolCallsCount = 0;
    let document: BinaryPayload | undefined;

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      throwIfCancelled(signal);

      const llmStartTime = Date.now();
      const response = await this.llm.completeWithTools(messages, {
        systemPrompt: definition.systemPrompt,
        tools: llmTools,
        maxTokens: this.maxTokens,
        signal,
      });
      const requested = response.toolUse ?? [];
      console.log(
        `[Workflow] ${definition.name}/${threadId} step ${iteration} (${Date.now() - llmStartTime}ms) → ${
          requested.length > 0 ? `${requested.length} tool(s)` : 'done'
        }`
      );

      if (requested.length === 0) {
        if (definition.expectsDocument && !document) {
          throw new WorkflowError('Workflow finished without producing a document');
        }
        return {
          response: response.content,
          thread_id: threadId,
          tool_calls_count: toolCallsCount,
          document: document && { mime_type: document.mimeType, data_base64: encodeBase64(document.bytes) },
        };
      }

      messages.push({ role: 'assistant', content: response.content || '', toolUse: requested });

      const results: Array<{ toolUse: LLMToolUse; result: NormalizedResult }> = [];
      for (const toolUse of requested) {
        throwIfCancelled(signal);
        toolCallsCount++;
        const result = await this.executeTool(threadId, toolUse, tools, principal, signal);
        if (result.success && result.payload.kind === 'binary') {
          document = result.payload;
        }
        results.push({ toolUse, result });
      }

      // tool_result content must be text
      const toolResultBlocks: LLMContentBlock[] = formatToolResultBlocks(results);
      messages.push({ role: 'user', content: toolResultBlocks });
    }

    throw new WorkflowError(`Workflow exceeded ${this.maxIterations} reasoning steps`);
  }

  /**
   * Run one requested tool. Failures become error results; only
   * cancellation propagates.
   */
  private async executeTool(
    threadId: string,
    toolUse: LLMToolUse,
    tools: Map<string, AgentTool>,
    principal: Principal,
    signal?: AbortSignal
  ): Promise<NormalizedResult> {
    const input = withoutIdentityFields(toolUse.input);
    this.streams.publish(threadId, { type: 'tool_start', tool_name: toolUse.name, input });

    const tool = tools.get(toolUse.name);
    if (!tool) {
      const error = `Unknown tool: ${toolUse.name}`;
      this.streams.publish(threadId, { type: 'tool_error', tool_name: toolUse.name, error });
      return failure('tool_not_found', error);
    }

    const startTime = Date.now();
    try {
      const payload = await tool.execute(input, principal, signal);
      console.log(`[Workflow] ✓ ${toolUse.name} (${Date.now() - startTime}ms)`);
      this.streams.publish(threadId, { type: 'tool_end', tool_name: toolUse.name, response: describePayload(payload) });
      return { success: true, payload };
    } catch (error) {
      if (signal?.aborted) {
        throw new WorkflowCancelledError();
      }
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Workflow] ✗ ${toolUse.name} (${message})`);
      this.streams.publish(threadId, { type: 'tool_error', tool_name: toolUse.name, error: message });
      return failure('adapter_failure', message);
    }
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new WorkflowCancelledError();
  }
}
