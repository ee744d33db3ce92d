/**
 * Agent toolbox
 *
 * Tools the reasoning backend may call during a workflow run. Each wraps
 * one remote operation; the principal comes from the run, never from the
 * model's arguments.
 */

import { z } from 'zod';
import type { Principal } from '../auth/types.js';
import type { RemoteOperations } from '../backends/index.js';
import { parseArguments, renderInputSchema } from '../tools/define.js';
import {
  binaryPayload,
  jsonPayload,
  textPayload,
  type ResultPayload,
  type ToolDefinition,
} from '../tools/types.js';
import type { AgentToolName } from './types.js';

export interface AgentTool {
  readonly definition: ToolDefinition;
  execute(input: Record<string, unknown>, principal: Principal, signal?: AbortSignal): Promise<ResultPayload>;
}

function defineAgentTool<S extends z.ZodType>(options: {
  name: AgentToolName;
  description: string;
  parameters: S;
  execute: (args: z.output<S>, principal: Principal, signal?: AbortSignal) => Promise<ResultPayload>;
}): AgentTool {
  return {
    definition: {
      name: options.name,
      description: options.description,
      inputSchema: renderInputSchema(options.parameters),
    },
    execute: (input, principal, signal) =>
      options.execute(parseArguments(options.name, options.parameters, input), principal, signal),
  };
}

export class AgentToolbox {
  private tools: Map<string, AgentTool>;

  constructor(remote: RemoteOperations) {
    const { volvox, smart, innoscope, kickstart } = remote;

    const tools = [
      defineAgentTool({
        name: 'smart_deep_search',
        description: 'Ask the research assistant about a topic; it searches the knowledge base in depth',
        parameters: z.object({ question: z.string().min(1) }),
        execute: async (args, _principal, signal) => jsonPayload(await smart.messageQuery(args.question, 'deep', signal)),
      }),

      defineAgentTool({
        name: 'volvox_summarize_content',
        description: 'Summarize a long text',
        parameters: z.object({ content: z.string().min(1) }),
        execute: async (args, _principal, signal) => jsonPayload(await volvox.summarizeContent(args.content, signal)),
      }),

      defineAgentTool({
        name: 'volvox_search_documents',
        description: "List and search the user's research documents",
        parameters: z.object({
          limit: z.number().int().positive().default(20),
          offset: z.number().int().min(0).default(0),
          search: z.string().optional(),
          start_date: z.string().optional(),
          end_date: z.string().optional(),
        }),
        execute: async (args, principal, signal) =>
          jsonPayload(
            await volvox.listResearch(
              principal,
              {
                limit: args.limit,
                offset: args.offset,
                search: args.search,
                startDate: args.start_date,
                endDate: args.end_date,
              },
              signal
            )
          ),
      }),

      defineAgentTool({
        name: 'volvox_summarize_documents',
        description: 'Summarize several research documents by id',
        parameters: z.object({ document_ids: z.array(z.string()).min(1) }),
        execute: async (args, _principal, signal) =>
          jsonPayload(await volvox.summarizeResearch(args.document_ids, signal)),
      }),

      defineAgentTool({
        name: 'volvox_chat_ask',
        description: 'Ask the document assistant a question using RAG; can continue a chat and use web search',
        parameters: z.object({
          question: z.string().min(1),
          document_id: z.string().optional(),
          chat_id: z.string().optional(),
          web_search: z.boolean().optional(),
        }),
        execute: async (args, principal, signal) =>
          jsonPayload(
            await volvox.askChat(
              principal,
              {
                question: args.question,
                documentId: args.document_id,
                chatId: args.chat_id,
                webSearch: args.web_search,
              },
              signal
            )
          ),
      }),

      defineAgentTool({
        name: 'generate_feasibility',
        description: 'Generate a feasibility assessment from a project summary',
        parameters: z.object({ summary: z.string().min(1) }),
        execute: async (args, _principal, signal) =>
          textPayload(await innoscope.feasibilityFromSummary(args.summary, signal)),
      }),

      defineAgentTool({
        name: 'generate_roadmap',
        description: 'Generate a roadmap from a project summary',
        parameters: z.object({ summary: z.string().min(1) }),
        execute: async (args, _principal, signal) =>
          textPayload(await innoscope.roadmapFromSummary(args.summary, signal)),
      }),

      defineAgentTool({
        name: 'generate_proposal_from_text',
        description: 'Generate a funding proposal PDF from a feasibility report text',
        parameters: z.object({ report_text: z.string().min(1) }),
        execute: async (args, _principal, signal) => {
          const document = await kickstart.proposalPdfFromText(args.report_text, signal);
          return binaryPayload(document.bytes, document.mimeType);
        },
      }),
    ];

    this.tools = new Map(tools.map((tool): [string, AgentTool] => [tool.definition.name, tool]));
  }

  select(names: readonly AgentToolName[]): AgentTool[] {
    const selected: AgentTool[] = [];
    for (const name of names) {
      const tool = this.tools.get(name);
      if (!tool) {
        throw new Error(`Agent tool not registered: ${name}`);
      }
      selected.push(tool);
    }
    return selected;
  }
}
