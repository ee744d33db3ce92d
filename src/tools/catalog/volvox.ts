import { z } from 'zod';
import type { RemoteOperations } from '../../backends/index.js';
import { defineTool, type RegisteredTool } from '../define.js';
import { jsonPayload, ToolError } from '../types.js';

export const RESEARCH_FILE_REQUIRED = 'File is required for research creation';

export function volvoxTools(remote: RemoteOperations): RegisteredTool[] {
  const { volvox } = remote;

  return [
    defineTool({
      name: 'volvox_research_list',
      description: "List the user's research documents with optional filters",
      parameters: z.object({
        limit: z.number().int().positive().default(20),
        offset: z.number().int().min(0).default(0),
        search: z.string().optional().describe('Search query'),
        start_date: z.string().optional().describe('ISO date string'),
        end_date: z.string().optional().describe('ISO date string'),
      }),
      handler: async (args, principal) =>
        jsonPayload(
          await volvox.listResearch(principal, {
            limit: args.limit,
            offset: args.offset,
            search: args.search,
            startDate: args.start_date,
            endDate: args.end_date,
          })
        ),
    }),

    defineTool({
      name: 'volvox_research_create',
      description: 'Upload a new research document (PDF, DOCX, etc.). Send as multipart/form-data with the file in "file".',
      parameters: z.object({
        researchName: z.string().min(1),
      }),
      attachment: 'required',
      attachmentMessage: RESEARCH_FILE_REQUIRED,
      handler: async (args, principal, file) => {
        if (!file) {
          throw new ToolError('missing_required_argument', RESEARCH_FILE_REQUIRED);
        }
        return jsonPayload(await volvox.createResearch(principal, args.researchName, file));
      },
    }),

    defineTool({
      name: 'volvox_research_update',
      description: 'Rename a research document and/or replace its file. Use multipart/form-data when uploading a new file.',
      parameters: z.object({
        research_id: z.string().min(1),
        researchName: z.string().optional(),
      }),
      attachment: 'optional',
      handler: async (args, principal, file) =>
        jsonPayload(
          await volvox.updateResearch(principal, args.research_id, {
            researchName: args.researchName,
            file,
          })
        ),
    }),

    defineTool({
      name: 'volvox_research_delete',
      description: 'Delete a research document',
      parameters: z.object({
        research_id: z.string().min(1),
      }),
      handler: async (args, principal) => jsonPayload(await volvox.deleteResearch(principal, args.research_id)),
    }),

    defineTool({
      name: 'volvox_chat_ask',
      description: 'Ask the AI assistant a question about documents using RAG',
      parameters: z.object({
        question: z.string().min(1),
        document_id: z.string().optional().describe('Optional: specific document'),
        chat_id: z.string().optional().describe('Optional: continue conversation'),
        web_search: z.boolean().optional().describe('Optional: include web search'),
      }),
      handler: async (args, principal) =>
        jsonPayload(
          await volvox.askChat(principal, {
            question: args.question,
            documentId: args.document_id,
            chatId: args.chat_id,
            webSearch: args.web_search,
          })
        ),
    }),

    defineTool({
      name: 'volvox_chat_history_list',
      description: 'Get the list of all chat conversations',
      parameters: z.object({}),
      handler: async (_args, principal) => jsonPayload(await volvox.listChatHistory(principal)),
    }),

    defineTool({
      name: 'volvox_chat_history_get',
      description: 'Get the full chat history of one conversation',
      parameters: z.object({
        chat_id: z.string().min(1),
      }),
      handler: async (args, principal) => jsonPayload(await volvox.getChatHistory(principal, args.chat_id)),
    }),

    defineTool({
      name: 'volvox_chat_history_delete',
      description: 'Delete the chat history of one conversation',
      parameters: z.object({
        chat_id: z.string().min(1),
      }),
      handler: async (args, principal) => jsonPayload(await volvox.deleteChatHistory(principal, args.chat_id)),
    }),

    defineTool({
      name: 'volvox_summarize_research',
      description: 'Generate an AI summary of several research documents',
      parameters: z.object({
        document_ids: z.array(z.string()).min(1).describe('Array of document IDs'),
      }),
      handler: async (args) => jsonPayload(await volvox.summarizeResearch(args.document_ids)),
    }),

    defineTool({
      name: 'volvox_summarize_content',
      description: 'Generate an AI summary of a large text',
      parameters: z.object({
        content: z.string().min(1),
      }),
      handler: async (args) => jsonPayload(await volvox.summarizeContent(args.content)),
    }),

    defineTool({
      name: 'volvox_summarize_video',
      description: 'Generate an AI summary of a video transcript',
      parameters: z.object({
        video_url: z.url(),
      }),
      handler: async (args) => jsonPayload(await volvox.summarizeVideo(args.video_url)),
    }),
  ];
}
