/**
 * Volvox API adapter
 *
 * Document store, RAG chat, chat history and summarization endpoints.
 * Identity-scoped calls take the authenticated principal explicitly; the
 * user id sent upstream always comes from it.
 */

import type { Principal } from '../auth/types.js';
import type { JsonValue, UploadedFile } from '../tools/types.js';
import { BackendClient, fileForm } from './http.js';

export interface ResearchListQuery {
  limit: number;
  offset: number;
  search?: string;
  startDate?: string;
  endDate?: string;
}

export interface ChatAskQuery {
  question: string;
  documentId?: string;
  chatId?: string;
  webSearch?: boolean;
}

export class VolvoxApi {
  constructor(private readonly client: BackendClient) {}

  listResearch(principal: Principal, query: ResearchListQuery, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/research/', {
      query: {
        user_id: principal.id,
        limit: query.limit,
        offset: query.offset,
        search: query.search,
        start: query.startDate,
        end: query.endDate,
      },
      signal,
    });
  }

  createResearch(principal: Principal, researchName: string, file: UploadedFile, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/research/', {
      method: 'POST',
      form: fileForm(file, { user_id: principal.id, researchName }),
      signal,
    });
  }

  updateResearch(
    principal: Principal,
    researchId: string,
    changes: { researchName?: string; file?: UploadedFile },
    signal?: AbortSignal
  ): Promise<JsonValue> {
    const path = `/research/${encodeURIComponent(researchId)}`;
    if (changes.file) {
      return this.client.json(path, {
        method: 'PUT',
        form: fileForm(changes.file, { user_id: principal.id, researchName: changes.researchName }),
        signal,
      });
    }

    const form = new FormData();
    form.append('user_id', principal.id);
    if (changes.researchName) {
      form.append('researchName', changes.researchName);
    }
    return this.client.json(path, { method: 'PUT', form, signal });
  }

  deleteResearch(principal: Principal, researchId: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/research/${encodeURIComponent(researchId)}`, {
      method: 'DELETE',
      query: { user_id: principal.id },
      signal,
    });
  }

  askChat(principal: Principal, query: ChatAskQuery, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/chat/ask', {
      method: 'POST',
      query: {
        user_id: principal.id,
        question: query.question,
        document_id: query.documentId,
        chat_id: query.chatId,
        web_search: query.webSearch,
      },
      body: {},
      signal,
    });
  }

  listChatHistory(principal: Principal, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/chat/chatHistory', {
      query: { user_id: principal.id },
      signal,
    });
  }

  getChatHistory(principal: Principal, chatId: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/chat/chatHistory/${encodeURIComponent(chatId)}`, {
      query: { user_id: principal.id },
      signal,
    });
  }

  deleteChatHistory(principal: Principal, chatId: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/chat/deleteChat/${encodeURIComponent(chatId)}`, {
      method: 'DELETE',
      query: { user_id: principal.id },
      signal,
    });
  }

  summarizeResearch(documentIds: string[], signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/chat/summarize-research', {
      method: 'POST',
      body: { documents: documentIds },
      signal,
    });
  }

  summarizeContent(content: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/chat/summarize-content', {
      method: 'POST',
      body: { content },
      signal,
    });
  }

  // The video endpoint answers with a plain-text summary
  async summarizeVideo(videoUrl: string, signal?: AbortSignal): Promise<JsonValue> {
    const summary = await this.client.text('/chat/summarize-video', {
      method: 'POST',
      query: { video_url: videoUrl },
      signal,
    });
    return { summary };
  }
}
