import { z } from 'zod';
import type { RemoteOperations } from '../../backends/index.js';
import { defineTool, type RegisteredTool } from '../define.js';
import { jsonPayload, textPayload, ToolError } from '../types.js';

const FILE_REQUIRED = 'File is required';

export function innoscopeTools(remote: RemoteOperations): RegisteredTool[] {
  const { innoscope } = remote;

  return [
    defineTool({
      name: 'innoscope_send_message',
      description: 'Send a message to the innovation assistant, optionally continuing a session',
      parameters: z.object({
        message: z.string().min(1),
        session_id: z.string().optional(),
      }),
      handler: async (args, principal) =>
        jsonPayload(await innoscope.sendMessage(principal, args.message, args.session_id)),
    }),

    defineTool({
      name: 'innoscope_list_sessions',
      description: "List the user's innovation assistant sessions",
      parameters: z.object({}),
      handler: async (_args, principal) => jsonPayload(await innoscope.listSessions(principal)),
    }),

    defineTool({
      name: 'innoscope_get_session_messages',
      description: 'Get the messages of an innovation assistant session',
      parameters: z.object({
        session_id: z.string().min(1),
      }),
      handler: async (args, principal) =>
        jsonPayload(await innoscope.getSessionMessages(principal, args.session_id)),
    }),

    defineTool({
      name: 'innoscope_generate_feasibility',
      description: 'Generate a feasibility assessment from a project summary',
      parameters: z.object({
        summary: z.string().min(1),
      }),
      handler: async (args) => textPayload(await innoscope.feasibilityFromSummary(args.summary)),
    }),

    defineTool({
      name: 'innoscope_feasibility_from_chat',
      description: 'Generate a feasibility assessment from an innovation assistant session',
      parameters: z.object({
        session_id: z.string().min(1),
      }),
      handler: async (args) => textPayload(await innoscope.feasibilityFromChat(args.session_id)),
    }),

    defineTool({
      name: 'innoscope_feasibility_from_file',
      description: 'Generate a feasibility assessment from an uploaded document (multipart/form-data)',
      parameters: z.object({}),
      attachment: 'required',
      attachmentMessage: FILE_REQUIRED,
      handler: async (_args, _principal, file) => {
        if (!file) {
          throw new ToolError('missing_required_argument', FILE_REQUIRED);
        }
        return textPayload(await innoscope.feasibilityFromFile(file));
      },
    }),

    defineTool({
      name: 'innoscope_generate_roadmap',
      description: 'Generate a roadmap from a project summary',
      parameters: z.object({
        summary: z.string().min(1),
      }),
      handler: async (args) => textPayload(await innoscope.roadmapFromSummary(args.summary)),
    }),

    defineTool({
      name: 'innoscope_roadmap_from_chat',
      description: 'Generate a roadmap from an innovation assistant session',
      parameters: z.object({
        session_id: z.string().min(1),
      }),
      handler: async (args) => jsonPayload(await innoscope.roadmapFromChat(args.session_id)),
    }),

    defineTool({
      name: 'innoscope_roadmap_from_file',
      description: 'Generate a roadmap from an uploaded document (multipart/form-data)',
      parameters: z.object({}),
      attachment: 'required',
      attachmentMessage: FILE_REQUIRED,
      handler: async (_args, _principal, file) => {
        if (!file) {
          throw new ToolError('missing_required_argument', FILE_REQUIRED);
        }
        return jsonPayload(await innoscope.roadmapFromFile(file));
      },
    }),

    defineTool({
      name: 'innoscope_summarize_text',
      description: 'Summarize a block of text',
      parameters: z.object({
        text: z.string().min(1),
      }),
      handler: async (args) => jsonPayload(await innoscope.summarizeText(args.text)),
    }),

    defineTool({
      name: 'innoscope_summarize_file',
      description: 'Summarize an uploaded document (multipart/form-data)',
      parameters: z.object({}),
      attachment: 'required',
      attachmentMessage: FILE_REQUIRED,
      handler: async (_args, _principal, file) => {
        if (!file) {
          throw new ToolError('missing_required_argument', FILE_REQUIRED);
        }
        return jsonPayload(await innoscope.summarizeFile(file));
      },
    }),
  ];
}
