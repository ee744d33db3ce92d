/**
 * Tool Dispatcher
 *
 * Single entry point for tools/call. Resolves the caller's identity,
 * validates arguments against the tool's schema, then either awaits the
 * tool or hands a workflow to the launcher and returns at once. Every
 * outcome, including thrown errors, comes back as a NormalizedResult.
 */

import { v4 as uuid } from 'uuid';
import { AuthenticationError, type IdentityService, type Principal } from '../auth/types.js';
import { BackendError } from '../backends/http.js';
import { withoutIdentityFields } from '../utils/records.js';
import type { WorkflowRequest } from '../workflows/types.js';
import { AuditLog } from './audit.js';
import type { RegisteredTool, ToolCall } from './define.js';
import {
  failure,
  jsonPayload,
  ToolError,
  type NormalizedResult,
  type ToolDefinition,
  type UploadedFile,
} from './types.js';

export interface WorkflowLauncher {
  isRunning(threadId: string): boolean;
  /** Start a supervised background run; throws ToolError('workflow_conflict') if the thread is busy */
  start(threadId: string, request: WorkflowRequest): void;
}

export interface ToolDispatcherConfig {
  tools: RegisteredTool[];
  identity: IdentityService;
  workflows: WorkflowLauncher;
  audit?: AuditLog;
}

export class ToolDispatcher {
  private tools: Map<string, RegisteredTool> = new Map();
  private identity: IdentityService;
  private workflows: WorkflowLauncher;
  private audit: AuditLog;

  constructor(config: ToolDispatcherConfig) {
    for (const tool of config.tools) {
      this.tools.set(tool.definition.name, tool);
    }
    this.identity = config.identity;
    this.workflows = config.workflows;
    this.audit = config.audit ?? new AuditLog(300);
  }

  listTools(): ToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  get toolCount(): number {
    return this.tools.size;
  }

  async execute(toolName: string, args: Record<string, unknown>, attachment?: UploadedFile): Promise<NormalizedResult> {
    const startedAt = new Date();
    const result = await this.dispatch(toolName, args, attachment);

    this.audit.record({
      tool: toolName,
      startedAt,
      durationMs: Date.now() - startedAt.getTime(),
      args,
      result,
      attachment: attachment && { filename: attachment.filename, size: attachment.bytes.byteLength },
    });
    return result;
  }

  private async dispatch(toolName: string, args: Record<string, unknown>, attachment?: UploadedFile): Promise<NormalizedResult> {
    const tool = this.tools.get(toolName);
    if (!tool) {
      return failure('tool_not_found', `Unknown tool: ${toolName}`);
    }

    try {
      let principal: Principal | null = null;
      if (tool.access === 'authenticated') {
        principal = await this.identity.resolve(typeof args.token === 'string' ? args.token : undefined);
      }

      if (tool.attachment === 'required' && !attachment) {
        throw new ToolError('missing_required_argument', tool.attachmentMessage);
      }

      const { token: _token, ...rest } = args;
      const call = tool.bind(withoutIdentityFields(rest));
      const file = tool.attachment === 'none' ? undefined : attachment;

      if (call.mode === 'sync') {
        return { success: true, payload: await call.run(principal, file) };
      }

      if (!principal) {
        throw new ToolError('authentication_failed', 'Token missing');
      }
      return await this.launchWorkflow(toolName, call, principal, file);
    } catch (error) {
      return toFailure(error);
    }
  }

  private async launchWorkflow(
    toolName: string,
    call: Extract<ToolCall, { mode: 'workflow' }>,
    principal: Principal,
    file: UploadedFile | undefined
  ): Promise<NormalizedResult> {
    const threadId = call.threadId ?? uuid();
    if (this.workflows.isRunning(threadId)) {
      throw new ToolError('workflow_conflict', `A workflow is already running on thread ${threadId}`);
    }

    const prompt = await call.prepare(principal, file);
    this.workflows.start(threadId, { workflow: call.workflow, prompt, principal });
    console.log(`[Dispatch] ${toolName} started workflow ${call.workflow} on thread ${threadId}`);

    return { success: true, payload: jsonPayload({ status: 'started', thread_id: threadId }) };
  }
}

export function toFailure(error: unknown): NormalizedResult {
  if (error instanceof ToolError) {
    return failure(error.code, error.message, error.status);
  }
  if (error instanceof AuthenticationError) {
    return failure('authentication_failed', error.message, error.status);
  }
  if (error instanceof BackendError) {
    return failure('adapter_failure', error.message, error.status);
  }
  if (error instanceof Error) {
    return failure('adapter_failure', error.message);
  }
  return failure('internal_error', String(error));
}
