import { z } from 'zod';
import type { RemoteOperations } from '../../backends/index.js';
import { defineTool, type RegisteredTool } from '../define.js';
import { jsonPayload } from '../types.js';

const searchMode = z.enum(['simple', 'deep']).default('simple').describe('Search depth');

export function smartTools(remote: RemoteOperations): RegisteredTool[] {
  const { smart } = remote;

  return [
    defineTool({
      name: 'smart_new_chat',
      description: 'Start a new smart search chat session',
      parameters: z.object({}),
      handler: async (_args, principal) => jsonPayload(await smart.newChat(principal)),
    }),

    defineTool({
      name: 'smart_send_message',
      description: 'Send a message in a smart search chat session',
      parameters: z.object({
        session_id: z.string().min(1),
        message: z.string().min(1),
        mode: searchMode,
      }),
      handler: async (args, principal) =>
        jsonPayload(await smart.sendMessage(principal, args.session_id, args.message, args.mode)),
    }),

    defineTool({
      name: 'smart_message_query',
      description: 'Ask the AI assistant a question about a topic; it searches the knowledge base',
      parameters: z.object({
        question: z.string().min(1),
        mode: searchMode,
      }),
      handler: async (args) => jsonPayload(await smart.messageQuery(args.question, args.mode)),
    }),

    defineTool({
      name: 'smart_get_history',
      description: 'Get the messages of a smart search chat session',
      parameters: z.object({
        session_id: z.string().min(1),
      }),
      handler: async (args) => jsonPayload(await smart.getHistory(args.session_id)),
    }),

    defineTool({
      name: 'smart_get_history_titles',
      description: "List the titles of the user's smart search chat sessions",
      parameters: z.object({}),
      handler: async (_args, principal) => jsonPayload(await smart.getHistoryTitles(principal)),
    }),
  ];
}
