/**
 * Tool definition helpers
 *
 * Each catalog entry is declared once with its zod parameters and handler.
 * The helpers render the advertised JSON Schema from the same parameters
 * and erase the argument type behind `RegisteredTool.bind`, so the
 * dispatcher can hold one table of heterogeneous tools.
 */

import { z } from 'zod';
import type { Principal } from '../auth/types.js';
import { isRecord } from '../utils/records.js';
import type { WorkflowName } from '../workflows/types.js';
import {
  ToolError,
  type ResultPayload,
  type ToolDefinition,
  type UploadedFile,
} from './types.js';

export type ToolAccess = 'public' | 'authenticated';
export type AttachmentPolicy = 'none' | 'optional' | 'required';

// A tool call with validated arguments, ready to run
export type ToolCall =
  | {
      mode: 'sync';
      run(principal: Principal | null, file: UploadedFile | undefined): Promise<ResultPayload>;
    }
  | {
      mode: 'workflow';
      workflow: WorkflowName;
      threadId?: string;
      // Inline steps before launch; resolves to the request the agent works on
      prepare(principal: Principal, file: UploadedFile | undefined): Promise<string>;
    };

export interface RegisteredTool {
  readonly definition: ToolDefinition;
  readonly access: ToolAccess;
  readonly attachment: AttachmentPolicy;
  readonly attachmentMessage: string;
  /** Validate raw arguments; throws ToolError('invalid_arguments') */
  bind(args: Record<string, unknown>): ToolCall;
}

interface ToolOptions<S extends z.ZodType> {
  name: string;
  description: string;
  parameters: S;
  attachment?: AttachmentPolicy;
  attachmentMessage?: string;
}

export interface AuthenticatedToolOptions<S extends z.ZodType> extends ToolOptions<S> {
  handler: (args: z.output<S>, principal: Principal, file: UploadedFile | undefined) => Promise<ResultPayload>;
}

export interface PublicToolOptions<S extends z.ZodType> extends ToolOptions<S> {
  handler: (args: z.output<S>) => Promise<ResultPayload>;
}

export interface WorkflowToolOptions<S extends z.ZodType> extends ToolOptions<S> {
  workflow: WorkflowName;
  prepare: (args: z.output<S>, principal: Principal, file: UploadedFile | undefined) => Promise<string>;
}

const TOKEN_PROPERTY = {
  type: 'string',
  description: 'Bearer token returned by volvox_auth_login',
};

const THREAD_ID_PROPERTY = {
  type: 'string',
  description: 'Thread id to stream progress on (/ws?threadId=...). Generated when omitted.',
};

/**
 * Tool that needs an authenticated principal. Advertises a required
 * `token` argument in addition to its own parameters.
 */
export function defineTool<S extends z.ZodType>(options: AuthenticatedToolOptions<S>): RegisteredTool {
  return {
    definition: {
      name: options.name,
      description: options.description,
      inputSchema: renderInputSchema(options.parameters, { token: true }),
    },
    access: 'authenticated',
    attachment: options.attachment ?? 'none',
    attachmentMessage: options.attachmentMessage ?? 'File is required',
    bind(args) {
      const parsed = parseArguments(options.name, options.parameters, args);
      return {
        mode: 'sync',
        run: async (principal, file) => {
          if (!principal) {
            throw new ToolError('authentication_failed', 'Token missing');
          }
          return options.handler(parsed, principal, file);
        },
      };
    },
  };
}

/**
 * Identity bootstrap tool (signup, login). Runs without a token.
 */
export function definePublicTool<S extends z.ZodType>(options: PublicToolOptions<S>): RegisteredTool {
  return {
    definition: {
      name: options.name,
      description: options.description,
      inputSchema: renderInputSchema(options.parameters),
    },
    access: 'public',
    attachment: options.attachment ?? 'none',
    attachmentMessage: options.attachmentMessage ?? 'File is required',
    bind(args) {
      const parsed = parseArguments(options.name, options.parameters, args);
      return { mode: 'sync', run: () => options.handler(parsed) };
    },
  };
}

/**
 * Background workflow tool. Returns immediately with a thread id; the
 * outcome arrives on that thread's stream.
 */
export function defineWorkflowTool<S extends z.ZodType>(options: WorkflowToolOptions<S>): RegisteredTool {
  return {
    definition: {
      name: options.name,
      description: options.description,
      inputSchema: renderInputSchema(options.parameters, { token: true, threadId: true }),
    },
    access: 'authenticated',
    attachment: options.attachment ?? 'none',
    attachmentMessage: options.attachmentMessage ?? 'File is required',
    bind(args) {
      const parsed = parseArguments(options.name, options.parameters, args);
      const threadId = typeof args.thread_id === 'string' && args.thread_id.trim()
        ? args.thread_id.trim()
        : undefined;
      return {
        mode: 'workflow',
        workflow: options.workflow,
        threadId,
        prepare: (principal, file) => options.prepare(parsed, principal, file),
      };
    },
  };
}

export function parseArguments<S extends z.ZodType>(
  toolName: string,
  schema: S,
  args: Record<string, unknown>
): z.output<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new ToolError('invalid_arguments', `Invalid arguments for ${toolName}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Render zod parameters as the JSON Schema advertised by tools/list,
 * optionally prefixed with the token and thread id arguments.
 */
export function renderInputSchema(
  parameters: z.ZodType,
  extras: { token?: boolean; threadId?: boolean } = {}
): Record<string, unknown> {
  const schema: Record<string, unknown> = { ...z.toJSONSchema(parameters, { io: 'input' }) };
  delete schema.$schema;

  const properties: Record<string, unknown> = isRecord(schema.properties) ? { ...schema.properties } : {};
  const required = Array.isArray(schema.required)
    ? schema.required.filter((key): key is string => typeof key === 'string')
    : [];

  if (extras.threadId) {
    properties.thread_id = THREAD_ID_PROPERTY;
  }

  if (extras.token) {
    schema.properties = { token: TOKEN_PROPERTY, ...properties };
    schema.required = ['token', ...required];
  } else {
    schema.properties = properties;
    schema.required = required;
  }
  return schema;
}
