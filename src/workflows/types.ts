import type { Principal } from '../auth/types.js';

export type WorkflowName = 'smart_search' | 'smart_qa' | 'market_intelligence' | 'business_proposal';

export type AgentToolName =
  | 'smart_deep_search'
  | 'volvox_summarize_content'
  | 'volvox_search_documents'
  | 'volvox_summarize_documents'
  | 'volvox_chat_ask'
  | 'generate_feasibility'
  | 'generate_roadmap'
  | 'generate_proposal_from_text';

export interface WorkflowDefinition {
  name: WorkflowName;
  systemPrompt: string;
  tools: readonly AgentToolName[];
  // The run must end with a binary document (PDF) among its tool results
  expectsDocument: boolean;
}

export interface WorkflowDocument {
  mime_type: string;
  data_base64: string;
}

export interface WorkflowOutcome {
  response: string;
  thread_id: string;
  tool_calls_count: number;
  document?: WorkflowDocument;
}

// What a workflow tool hands to the launcher once its arguments are settled
export interface WorkflowRequest {
  workflow: WorkflowName;
  prompt: string;
  principal: Principal;
}

export class WorkflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class WorkflowCancelledError extends WorkflowError {
  constructor(message: string = 'Workflow cancelled') {
    super(message);
    this.name = 'WorkflowCancelledError';
  }
}
