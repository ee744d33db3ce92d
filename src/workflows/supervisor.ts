/**
 * Workflow Supervisor
 *
 * Owns every background run, keyed by thread id. A run always ends with
 * exactly one workflow_complete event on its thread, whether it succeeds,
 * fails or is cancelled, after which the thread's listener is released.
 */

import type { StreamRegistry } from '../streaming/registry.js';
import type { WorkflowCompleteEvent } from '../streaming/types.js';
import { ToolError, type JsonValue } from '../tools/types.js';
import { WorkflowCancelledError, type WorkflowOutcome } from './types.js';

export type WorkflowTask = (signal: AbortSignal) => Promise<WorkflowOutcome>;

interface RunningWorkflow {
  controller: AbortController;
  done: Promise<void>;
  startedAt: Date;
}

export class WorkflowSupervisor {
  private running: Map<string, RunningWorkflow> = new Map();

  constructor(private readonly streams: StreamRegistry) {}

  launch(threadId: string, task: WorkflowTask): void {
    if (this.running.has(threadId)) {
      throw new ToolError('workflow_conflict', `A workflow is already running on thread ${threadId}`);
    }

    const controller = new AbortController();
    const done = this.supervise(threadId, task, controller);
    this.running.set(threadId, { controller, done, startedAt: new Date() });
  }

  cancel(threadId: string): boolean {
    const entry = this.running.get(threadId);
    if (!entry) {
      return false;
    }
    console.log(`[Supervisor] Cancelling workflow on thread ${threadId} after ${Date.now() - entry.startedAt.getTime()}ms`);
    entry.controller.abort();
    return true;
  }

  isRunning(threadId: string): boolean {
    return this.running.has(threadId);
  }

  /** Resolves once the thread's run has published its terminal event */
  settled(threadId: string): Promise<void> | undefined {
    return this.running.get(threadId)?.done;
  }

  get activeCount(): number {
    return this.running.size;
  }

  async cancelAll(): Promise<void> {
    const pending = Array.from(this.running.values());
    for (const entry of pending) {
      entry.controller.abort();
    }
    await Promise.all(pending.map((entry) => entry.done));
  }

  private async supervise(threadId: string, task: WorkflowTask, controller: AbortController): Promise<void> {
    const startTime = Date.now();
    let event: WorkflowCompleteEvent;

    try {
      const outcome = await task(controller.signal);
      event = { type: 'workflow_complete', success: true, result: outcomeJson(outcome) };
      console.log(`[Supervisor] Thread ${threadId} completed (${Date.now() - startTime}ms, ${outcome.tool_calls_count} tool calls)`);
    } catch (error) {
      if (controller.signal.aborted || error instanceof WorkflowCancelledError) {
        event = { type: 'workflow_complete', success: false, error: 'Workflow cancelled', cancelled: true };
        console.log(`[Supervisor] Thread ${threadId} cancelled`);
      } else {
        const message = error instanceof Error ? error.message : String(error);
        event = { type: 'workflow_complete', success: false, error: message };
        console.error(`[Supervisor] Thread ${threadId} failed:`, message);
      }
    }

    if (this.running.get(threadId)?.controller === controller) {
      this.running.delete(threadId);
    }
    this.streams.publish(threadId, event);
    this.streams.end(threadId);
  }
}

function outcomeJson(outcome: WorkflowOutcome): JsonValue {
  const json: { [key: string]: JsonValue } = {
    response: outcome.response,
    thread_id: outcome.thread_id,
    tool_calls_count: outcome.tool_calls_count,
  };
  if (outcome.document) {
    json.document = { mime_type: outcome.document.mime_type, data_base64: outcome.document.data_base64 };
  }
  return json;
}
