import type { IncomingMessage } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { v4 as uuid } from 'uuid';
import type { StreamRegistry } from '../streaming/registry.js';
import type { DeliveredEvent, StreamListener } from '../streaming/types.js';

// Close code for a connection that violates endpoint policy
export const POLICY_VIOLATION = 1008;
export const WORKFLOW_COMPLETE = 1000;

export class WebSocketListener implements StreamListener {
  readonly id: string;

  constructor(private readonly ws: WebSocket) {
    this.id = uuid();
  }

  send(event: DeliveredEvent): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new Error(`socket ${this.id} is not open`);
    }
    this.ws.send(JSON.stringify(event), (error) => {
      if (error) {
        // Socket may have closed between the readyState check and the write
        console.warn(`[Streams] Failed to send to listener ${this.id}:`, error.message);
      }
    });
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(WORKFLOW_COMPLETE, 'Workflow complete');
    }
  }
}

/**
 * WebSocket front of the stream registry.
 * Clients connect to /ws?threadId=<id> and receive that thread's events.
 */
export class StreamChannel {
  private wss: WebSocketServer | null = null;
  private sockets: Set<WebSocket> = new Set();

  constructor(private readonly registry: StreamRegistry) {}

  attachToServer(wss: WebSocketServer): void {
    this.wss = wss;

    this.wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
      const threadId = threadIdFrom(request.url);
      if (!threadId) {
        ws.close(POLICY_VIOLATION, 'threadId query parameter is required');
        return;
      }

      const listener = new WebSocketListener(ws);
      this.sockets.add(ws);
      console.log(`[Streams] Listener ${listener.id} attached to thread ${threadId}`);

      // Inbound messages carry nothing; reading them only keeps the socket drained
      ws.on('message', () => undefined);

      ws.on('close', () => {
        this.sockets.delete(ws);
        this.registry.detach(threadId, listener);
      });

      ws.on('error', (error) => {
        console.error(`[Streams] Listener error (${listener.id}):`, error.message);
        this.sockets.delete(ws);
        this.registry.detach(threadId, listener);
      });

      this.registry.attach(threadId, listener);
    });
  }

  closeAll(): void {
    for (const ws of this.sockets) {
      ws.close(1001, 'Server shutting down');
    }
    this.sockets.clear();
  }
}

export function threadIdFrom(url: string | undefined): string | null {
  if (!url) {
    return null;
  }
  const threadId = new URL(url, 'http://localhost').searchParams.get('threadId');
  return threadId && threadId.trim() ? threadId.trim() : null;
}
