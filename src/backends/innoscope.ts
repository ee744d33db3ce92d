/**
 * Innoscope API adapter
 *
 * Feasibility and roadmap generation. The *-stream endpoints answer with
 * server-sent events; their lines are collected into one string.
 */

import type { Principal } from '../auth/types.js';
import type { JsonValue, UploadedFile } from '../tools/types.js';
import { BackendClient, fileForm } from './http.js';

export class InnoscopeApi {
  constructor(private readonly client: BackendClient) {}

  sendMessage(principal: Principal, message: string, sessionId?: string, signal?: AbortSignal): Promise<JsonValue> {
    const body: Record<string, JsonValue> = { user_id: principal.id, message };
    if (sessionId) {
      body.session_id = sessionId;
    }
    return this.client.json('/chat/send-message', { method: 'POST', body, signal });
  }

  listSessions(principal: Principal, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/chat/sessions', {
      query: { user_id: principal.id },
      signal,
    });
  }

  getSessionMessages(principal: Principal, sessionId: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/chat/sessions/${encodeURIComponent(sessionId)}/messages`, {
      query: { user_id: principal.id },
      signal,
    });
  }

  feasibilityFromSummary(summary: string, signal?: AbortSignal): Promise<string> {
    return this.client.eventStream('/feasibility/assess-from-summary-stream', {
      method: 'POST',
      body: { summary },
      signal,
    });
  }

  feasibilityFromChat(sessionId: string, signal?: AbortSignal): Promise<string> {
    return this.client.eventStream(`/feasibility/from-chat/${encodeURIComponent(sessionId)}/stream`, {
      method: 'POST',
      signal,
    });
  }

  feasibilityFromFile(file: UploadedFile, signal?: AbortSignal): Promise<string> {
    return this.client.eventStream('/feasibility/generate-stream', {
      method: 'POST',
      form: fileForm(file),
      signal,
    });
  }

  roadmapFromSummary(summary: string, signal?: AbortSignal): Promise<string> {
    return this.client.eventStream('/roadmap/generate-from-summary-stream', {
      method: 'POST',
      body: { summary },
      signal,
    });
  }

  roadmapFromChat(sessionId: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/roadmap/from-chat/${encodeURIComponent(sessionId)}`, {
      method: 'POST',
      signal,
    });
  }

  roadmapFromFile(file: UploadedFile, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/roadmap/generate', {
      method: 'POST',
      form: fileForm(file),
      signal,
    });
  }

  summarizeText(text: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/summarize/text', {
      method: 'POST',
      body: { text },
      signal,
    });
  }

  summarizeFile(file: UploadedFile, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/summarize/file', {
      method: 'POST',
      form: fileForm(file),
      signal,
    });
  }
}
