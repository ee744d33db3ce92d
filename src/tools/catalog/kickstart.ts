import { z } from 'zod';
import type { RemoteOperations } from '../../backends/index.js';
import { defineTool, type RegisteredTool } from '../define.js';
import { binaryPayload, jsonPayload } from '../types.js';

const fields = z.record(z.string(), z.json());

export function kickstartTools(remote: RemoteOperations): RegisteredTool[] {
  const { kickstart } = remote;

  return [
    defineTool({
      name: 'kickstart_create_proposal',
      description: 'Create a project proposal',
      parameters: z.object({
        proposal_data: fields.describe('Proposal fields (title, description, budget, ...)'),
      }),
      handler: async (args, principal) => jsonPayload(await kickstart.createProposal(principal, args.proposal_data)),
    }),

    defineTool({
      name: 'kickstart_list_proposals',
      description: "List the user's proposals",
      parameters: z.object({}),
      handler: async (_args, principal) => jsonPayload(await kickstart.listProposals(principal)),
    }),

    defineTool({
      name: 'kickstart_get_proposal',
      description: 'Get one proposal',
      parameters: z.object({
        proposal_id: z.string().min(1),
      }),
      handler: async (args, principal) => jsonPayload(await kickstart.getProposal(principal, args.proposal_id)),
    }),

    defineTool({
      name: 'kickstart_update_proposal',
      description: 'Update the fields of a proposal',
      parameters: z.object({
        proposal_id: z.string().min(1),
        update_data: fields,
      }),
      handler: async (args, principal) =>
        jsonPayload(await kickstart.updateProposal(principal, args.proposal_id, args.update_data)),
    }),

    defineTool({
      name: 'kickstart_delete_proposal',
      description: 'Delete a proposal',
      parameters: z.object({
        proposal_id: z.string().min(1),
      }),
      handler: async (args, principal) => jsonPayload(await kickstart.deleteProposal(principal, args.proposal_id)),
    }),

    defineTool({
      name: 'kickstart_generate_proposal_ai',
      description: 'Generate AI content for an existing proposal',
      parameters: z.object({
        proposal_id: z.string().min(1),
        generation_data: fields.default({}),
      }),
      handler: async (args) =>
        jsonPayload(await kickstart.generateProposalContent(args.proposal_id, args.generation_data)),
    }),

    defineTool({
      name: 'kickstart_edit_proposal_ai',
      description: 'Edit a proposal with AI instructions',
      parameters: z.object({
        proposal_id: z.string().min(1),
        edit_data: fields,
      }),
      handler: async (args) => jsonPayload(await kickstart.editProposalContent(args.proposal_id, args.edit_data)),
    }),

    defineTool({
      name: 'kickstart_generate_proposal_from_text',
      description: 'Generate a funding proposal PDF from a feasibility report text',
      parameters: z.object({
        report_text: z.string().min(1),
      }),
      handler: async (args) => {
        const document = await kickstart.proposalPdfFromText(args.report_text);
        return binaryPayload(document.bytes, document.mimeType);
      },
    }),
  ];
}
