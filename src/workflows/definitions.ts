import type { AgentToolName, WorkflowDefinition, WorkflowName } from './types.js';

const RULES = `RULES:
- Always use tools when the user wants to see, search or ask about their documents.
- The user's identity is already known and passed to every tool. Never ask for it.
- Never say "I don't have access".
- Answer helpfully and directly.
- If no documents exist, say: "You haven't uploaded any research yet."`;

const TOOL_LINES: Record<AgentToolName, string> = {
  smart_deep_search: 'smart_deep_search: ask about a topic and search the knowledge base in depth',
  volvox_summarize_content: 'volvox_summarize_content: summarize a long text',
  volvox_search_documents: "volvox_search_documents: list and search the user's research documents",
  volvox_summarize_documents: 'volvox_summarize_documents: summarize several documents',
  volvox_chat_ask: 'volvox_chat_ask: ask the document assistant a question (RAG, chat history, optional web search)',
  generate_feasibility: 'generate_feasibility: feasibility assessment from a project summary',
  generate_roadmap: 'generate_roadmap: roadmap from a project summary',
  generate_proposal_from_text: 'generate_proposal_from_text: funding proposal PDF from a report text',
};

function systemPrompt(tools: readonly AgentToolName[]): string {
  return [
    'You are Volvox AI, an expert research assistant with access to the user\'s research library and chat history.',
    '',
    'Your available tools:',
    ...tools.map((tool) => `- ${TOOL_LINES[tool]}`),
    '',
    RULES,
  ].join('\n');
}

function workflow(name: WorkflowName, tools: readonly AgentToolName[], expectsDocument: boolean): WorkflowDefinition {
  return { name, tools, expectsDocument, systemPrompt: systemPrompt(tools) };
}

export const WORKFLOWS: Record<WorkflowName, WorkflowDefinition> = {
  smart_search: workflow('smart_search', ['smart_deep_search', 'volvox_summarize_content'], false),
  smart_qa: workflow(
    'smart_qa',
    ['smart_deep_search', 'volvox_search_documents', 'volvox_chat_ask', 'volvox_summarize_documents', 'volvox_summarize_content'],
    false
  ),
  market_intelligence: workflow(
    'market_intelligence',
    ['smart_deep_search', 'volvox_summarize_content', 'generate_feasibility', 'generate_roadmap', 'generate_proposal_from_text'],
    true
  ),
  business_proposal: workflow(
    'business_proposal',
    ['volvox_search_documents', 'volvox_summarize_documents', 'generate_feasibility', 'generate_roadmap', 'generate_proposal_from_text'],
    true
  ),
};
