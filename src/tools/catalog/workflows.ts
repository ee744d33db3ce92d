/**
 * Background workflow tools
 *
 * Each returns {status: 'started', thread_id} at once; progress and the
 * final outcome are streamed on /ws?threadId=<thread_id>.
 */

import { z } from 'zod';
import type { RemoteOperations } from '../../backends/index.js';
import { isRecord } from '../../utils/records.js';
import { defineTool, defineWorkflowTool, type RegisteredTool } from '../define.js';
import { jsonPayload, ToolError } from '../types.js';
import { RESEARCH_FILE_REQUIRED } from './volvox.js';

// Cancellation handle of the supervisor, as seen by the control tool
export interface WorkflowControl {
  cancel(threadId: string): boolean;
}

const query = z.string().min(1).describe('User query to perform tasks');

export function workflowTools(remote: RemoteOperations, control: WorkflowControl): RegisteredTool[] {
  return [
    defineWorkflowTool({
      name: 'run_agent_smart_search',
      description: 'Run an agent that deep-searches the knowledge base for a query and summarizes the findings',
      parameters: z.object({ query }),
      workflow: 'smart_search',
      prepare: async (args) =>
        [
          `Based on the query "${args.query}" the user has provided, perform a smart deep search on it,`,
          'then summarize the result of the deep search.',
        ].join('\n'),
    }),

    defineWorkflowTool({
      name: 'run_agent_smart_qa',
      description: 'Run an agent that deep-searches a topic and hands the result to the document chat as context',
      parameters: z.object({ query }),
      workflow: 'smart_qa',
      prepare: async (args) =>
        [
          `Based on the query "${args.query}" the user has provided, perform a smart deep search on it,`,
          'then pass the result to volvox_chat_ask and ask the assistant to remember that context.',
        ].join('\n'),
    }),

    defineWorkflowTool({
      name: 'run_agent_market_intelligence',
      description: 'Run an agent that produces a market intelligence report: research, feasibility, roadmap and a funding proposal PDF',
      parameters: z.object({ query }),
      workflow: 'market_intelligence',
      prepare: async (args) =>
        [
          'You are an expert market intelligence analyst. Follow these steps exactly, in this order:',
          '1. Call `smart_deep_search` with the original user query.',
          '2. Call `volvox_summarize_content` on the full search result to get a concise summary.',
          '3. Call `generate_feasibility` with that summary.',
          '4. Call `generate_roadmap` with the same summary.',
          '5. Combine the full feasibility text and roadmap text into one string.',
          '6. Call `generate_proposal_from_text` with that combined string.',
          '7. Reply that the market intelligence report with feasibility, roadmap and funding proposal (PDF) is ready.',
          'Never skip steps and never answer before the PDF is generated.',
          `Original user query: ${args.query}`,
        ].join('\n'),
    }),

    defineWorkflowTool({
      name: 'run_agent_business_proposal',
      description: 'Upload a research document, then run an agent that turns it into a business proposal PDF (multipart/form-data)',
      parameters: z.object({
        researchName: z.string().min(1),
        query: z.string().optional().describe('Optional focus for the proposal'),
      }),
      workflow: 'business_proposal',
      attachment: 'required',
      attachmentMessage: RESEARCH_FILE_REQUIRED,
      prepare: async (args, principal, file) => {
        if (!file) {
          throw new ToolError('missing_required_argument', RESEARCH_FILE_REQUIRED);
        }
        const created = await remote.volvox.createResearch(principal, args.researchName, file);
        const researchId = isRecord(created) && typeof created._id === 'string' ? created._id : undefined;
        if (!researchId) {
          throw new ToolError('adapter_failure', 'Failed to create research: no id returned');
        }
        return [
          `Generate a business proposal from the research document "${args.researchName}" (id ${researchId}).`,
          args.query ? `Focus: ${args.query}` : '',
          '1. Call `volvox_summarize_documents` with that document id.',
          '2. Call `generate_feasibility` with the summary.',
          '3. Call `generate_roadmap` with the same summary.',
          '4. Call `generate_proposal_from_text` with the feasibility and roadmap texts combined.',
          'Reply once the proposal PDF is generated.',
        ]
          .filter(Boolean)
          .join('\n');
      },
    }),

    defineTool({
      name: 'workflow_cancel',
      description: 'Cancel a running background workflow',
      parameters: z.object({
        thread_id: z.string().min(1),
      }),
      handler: async (args) =>
        jsonPayload({ thread_id: args.thread_id, cancelled: control.cancel(args.thread_id) }),
    }),
  ];
}
