import type { AppConfig } from './config.js';
import { HttpIdentityService } from './auth/identity.js';
import { createBackendClients, createRemoteOperations, type FetchLike, type RemoteOperations } from './backends/index.js';
import type { LLMProvider } from './llm/index.js';
import { ToolServer } from './server/index.js';
import { StreamRegistry } from './streaming/registry.js';
import { AuditLog, type AuditSink } from './tools/audit.js';
import { buildCatalog } from './tools/catalog/index.js';
import { ToolDispatcher } from './tools/dispatcher.js';
import { WorkflowRunner } from './workflows/runner.js';
import { WorkflowService } from './workflows/service.js';
import { WorkflowSupervisor } from './workflows/supervisor.js';
import { AgentToolbox } from './workflows/toolbox.js';

export interface GatewayOptions {
  config: AppConfig;
  llm: LLMProvider;
  /** Replaces global fetch for every backend call */
  fetch?: FetchLike;
  auditSink?: AuditSink;
  host?: string;
}

export interface Gateway {
  server: ToolServer;
  dispatcher: ToolDispatcher;
  streams: StreamRegistry;
  supervisor: WorkflowSupervisor;
  remote: RemoteOperations;
}

export function createGateway(options: GatewayOptions): Gateway {
  const { config, llm } = options;

  const clients = createBackendClients(config, options.fetch);
  const remote = createRemoteOperations(clients);
  const identity = new HttpIdentityService(clients.volvox);

  const streams = new StreamRegistry();
  const supervisor = new WorkflowSupervisor(streams);
  const runner = new WorkflowRunner({
    llm,
    toolbox: new AgentToolbox(remote),
    streams,
    maxIterations: config.maxWorkflowIterations,
  });
  const workflows = new WorkflowService(runner, supervisor);

  const dispatcher = new ToolDispatcher({
    tools: buildCatalog({ identity, remote, workflows }),
    identity,
    workflows,
    audit: new AuditLog(config.auditResultChars, options.auditSink),
  });

  const server = new ToolServer({
    port: config.port,
    host: options.host,
    serverName: config.serverName,
    serverVersion: config.serverVersion,
    dispatcher,
    streams,
    supervisor,
    maxUploadBytes: config.maxUploadBytes,
  });

  return { server, dispatcher, streams, supervisor, remote };
}
