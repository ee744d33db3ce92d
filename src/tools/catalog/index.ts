import type { IdentityService } from '../../auth/types.js';
import type { RemoteOperations } from '../../backends/index.js';
import type { RegisteredTool } from '../define.js';
import { authTools } from './auth.js';
import { innoscopeTools } from './innoscope.js';
import { kickstartTools } from './kickstart.js';
import { smartTools } from './smart.js';
import { volvoxTools } from './volvox.js';
import { workflowTools, type WorkflowControl } from './workflows.js';

export type { WorkflowControl } from './workflows.js';

export interface CatalogDeps {
  identity: IdentityService;
  remote: RemoteOperations;
  workflows: WorkflowControl;
}

/**
 * Every tool the gateway exposes, in advertised order.
 * Throws on a duplicate name.
 */
export function buildCatalog(deps: CatalogDeps): RegisteredTool[] {
  const tools = [
    ...workflowTools(deps.remote, deps.workflows),
    ...authTools(deps.identity),
    ...volvoxTools(deps.remote),
    ...smartTools(deps.remote),
    ...innoscopeTools(deps.remote),
    ...kickstartTools(deps.remote),
  ];

  const seen = new Set<string>();
  for (const tool of tools) {
    if (seen.has(tool.definition.name)) {
      throw new Error(`Duplicate tool name: ${tool.definition.name}`);
    }
    seen.add(tool.definition.name);
  }
  return tools;
}
