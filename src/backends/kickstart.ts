/**
 * Kickstart proposal API adapter
 */

import type { Principal } from '../auth/types.js';
import type { JsonValue } from '../tools/types.js';
import type { BackendClient } from './http.js';

export type ProposalFields = { [key: string]: JsonValue };

export class KickstartApi {
  constructor(private readonly client: BackendClient) {}

  createProposal(principal: Principal, fields: ProposalFields, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json('/api/proposals/', {
      method: 'POST',
      body: { ...fields, userid: principal.id },
      signal,
    });
  }

  listProposals(principal: Principal, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/api/proposals/${encodeURIComponent(principal.id)}`, { signal });
  }

  getProposal(principal: Principal, proposalId: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(
      `/api/proposals/${encodeURIComponent(principal.id)}/${encodeURIComponent(proposalId)}`,
      { signal }
    );
  }

  updateProposal(principal: Principal, proposalId: string, fields: ProposalFields, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/api/proposals/${encodeURIComponent(proposalId)}`, {
      method: 'PUT',
      body: { ...fields, userid: principal.id },
      signal,
    });
  }

  deleteProposal(principal: Principal, proposalId: string, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(
      `/api/proposals/${encodeURIComponent(principal.id)}/${encodeURIComponent(proposalId)}`,
      { method: 'DELETE', signal }
    );
  }

  generateProposalContent(proposalId: string, options: ProposalFields, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/api/proposals/${encodeURIComponent(proposalId)}/generate`, {
      method: 'POST',
      body: options,
      signal,
    });
  }

  editProposalContent(proposalId: string, edit: ProposalFields, signal?: AbortSignal): Promise<JsonValue> {
    return this.client.json(`/api/proposals/${encodeURIComponent(proposalId)}/edit`, {
      method: 'POST',
      body: edit,
      signal,
    });
  }

  // Answers with the generated funding proposal as PDF bytes
  proposalPdfFromText(reportText: string, signal?: AbortSignal): Promise<{ bytes: Uint8Array; mimeType: string }> {
    return this.client.binary('/api/proposals/generate-from-text', {
      method: 'POST',
      body: { report_text: reportText },
      signal,
    });
  }
}
