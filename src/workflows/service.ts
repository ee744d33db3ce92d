import type { WorkflowControl } from '../tools/catalog/index.js';
import type { WorkflowLauncher } from '../tools/dispatcher.js';
import { WORKFLOWS } from './definitions.js';
import type { WorkflowRunner } from './runner.js';
import type { WorkflowSupervisor } from './supervisor.js';
import type { WorkflowRequest } from './types.js';

/**
 * Joins the runner to the supervisor: what the dispatcher launches and
 * what workflow_cancel cancels.
 */
export class WorkflowService implements WorkflowLauncher, WorkflowControl {
  constructor(
    private readonly runner: WorkflowRunner,
    private readonly supervisor: WorkflowSupervisor
  ) {}

  start(threadId: string, request: WorkflowRequest): void {
    const definition = WORKFLOWS[request.workflow];
    this.supervisor.launch(threadId, (signal) =>
      this.runner.run({
        threadId,
        principal: request.principal,
        definition,
        prompt: request.prompt,
        signal,
      })
    );
  }

  isRunning(threadId: string): boolean {
    return this.supervisor.isRunning(threadId);
  }

  cancel(threadId: string): boolean {
    return this.supervisor.cancel(threadId);
  }
}
