/**
 * Stream Registry
 *
 * Routes workflow progress events to at most one live listener per
 * thread id. Delivery is best-effort: a thread without a listener is the
 * normal case, and a listener that fails to take an event is dropped.
 * Constructed once at startup and shared by the stream endpoint, the
 * workflow runner and the supervisor.
 */

import type { DeliveredEvent, StreamEvent, StreamListener } from './types.js';

export class StreamRegistry {
  private listeners: Map<string, StreamListener> = new Map();

  /**
   * Make `listener` the current listener for the thread, replacing any
   * previous one, and acknowledge with a `connected` event.
   */
  attach(threadId: string, listener: StreamListener): void {
    const previous = this.listeners.get(threadId);
    if (previous && previous !== listener) {
      console.warn(`[Streams] Listener ${previous.id} on thread ${threadId} replaced by ${listener.id}`);
    }
    this.listeners.set(threadId, listener);
    this.publish(threadId, { type: 'connected' });
  }

  /**
   * Remove the thread's listener. With `listener` given, only that exact
   * listener is removed, so a stale connection closing late cannot drop
   * its replacement.
   */
  detach(threadId: string, listener?: StreamListener): boolean {
    const current = this.listeners.get(threadId);
    if (!current) {
      return false;
    }
    if (listener && current !== listener) {
      return false;
    }
    this.listeners.delete(threadId);
    return true;
  }

  /**
   * Release the thread's listener after its last event and let it close.
   */
  end(threadId: string): void {
    const listener = this.listeners.get(threadId);
    if (!listener) {
      return;
    }
    this.listeners.delete(threadId);
    try {
      listener.close?.();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Streams] Listener ${listener.id} on thread ${threadId} failed to close: ${message}`);
    }
  }

  /**
   * Deliver an event to the thread's listener, if any.
   * Returns whether a listener took it. Never throws.
   */
  publish(threadId: string, event: StreamEvent): boolean {
    const listener = this.listeners.get(threadId);
    if (!listener) {
      return false;
    }

    const delivered: DeliveredEvent = {
      ...event,
      thread_id: threadId,
      timestamp: new Date().toISOString(),
    };

    try {
      listener.send(delivered);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Streams] Dropping ${event.type} for thread ${threadId}: ${message}`);
      this.detach(threadId, listener);
      return false;
    }
  }

  has(threadId: string): boolean {
    return this.listeners.has(threadId);
  }

  get size(): number {
    return this.listeners.size;
  }
}
