// Progress events pushed to the listener of a workflow thread

import type { JsonValue } from '../tools/types.js';

export type StreamEvent =
  | { type: 'connected' }
  | { type: 'tool_start'; tool_name: string; input: Record<string, unknown> }
  | { type: 'tool_end'; tool_name: string; response: JsonValue }
  | { type: 'tool_error'; tool_name: string; error: string }
  | WorkflowCompleteEvent;

export interface WorkflowCompleteEvent {
  type: 'workflow_complete';
  success: boolean;
  result?: JsonValue;
  error?: string;
  cancelled?: boolean;
}

// What a listener actually receives: the event stamped at delivery
export type DeliveredEvent = StreamEvent & {
  thread_id: string;
  timestamp: string;
};

/**
 * A live consumer of one thread's events.
 * `send` must not block; throwing means the listener is gone.
 * `close` is called once the thread has nothing more to deliver.
 */
export interface StreamListener {
  readonly id: string;
  send(event: DeliveredEvent): void;
  close?(): void;
}
