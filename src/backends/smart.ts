/**
 * Smart research answering API adapter
 */

import type { Principal } from '../auth/types.js';
import type { JsonValue } from '../tools/types.js';
import type { BackendClient } from './http.js';

export type SearchMode = 'simple' | 'deep';

export class SmartSearchApi {
  constructor(private readonly client: BackendClient) {}

  newChat(principal: Principal, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/chat/new', {
      method: 'POST',
      body: { userId: principal.id },
      signal,
    });
  }

  sendMessage(
    principal: Principal,
    sessionId: string,
    message: string,
    mode: SearchMode,
    signal?: AbortSignal
  ): Promise<JsonValue> {
    return this.client.json('/chat/message', {
      method: 'POST',
      body: { session_id: sessionId, message, user_id: principal.id, mode },
      signal,
    });
  }

  // Stateless query, no session
  messageQuery(message: string, mode: SearchMode, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/chat/messageQuery', {
      method: 'POST',
      body: { message, mode },
      signal,
    });
  }

  getHistory(sessionId: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/chat/history/${encodeURIComponent(sessionId)}`, { signal });
  }

  getHistoryTitles(principal: Principal, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/chat/getHistoryTitle/${encodeURIComponent(principal.id)}`, { signal });
  }
}
