import { describePayload, resultText } from './envelope.js';
import type { NormalizedResult } from './types.js';

const MASKED_KEYS = new Set(['password', 'token', 'access_token', 'authorization']);

export interface AuditEntry {
  tool: string;
  startedAt: Date;
  durationMs: number;
  args: Record<string, unknown>;
  result: NormalizedResult;
  attachment?: { filename: string; size: number };
}

export type AuditSink = (line: string) => void;

/**
 * One log line per tools/call. Writing the line can never fail the call.
 */
export class AuditLog {
  constructor(
    private readonly resultChars: number,
    private readonly sink: AuditSink = (line) => console.log(line)
  ) {}

  record(entry: AuditEntry): void {
    try {
      const status = entry.result.success ? 'ok' : `error:${entry.result.code}`;
      const fields = [
        `[Dispatch] ${entry.tool}`,
        entry.startedAt.toISOString(),
        `status=${status}`,
        `duration=${entry.durationMs}ms`,
        `args=${JSON.stringify(maskSecrets(entry.args))}`,
      ];
      if (entry.attachment) {
        fields.push(`file=${entry.attachment.filename} (${entry.attachment.size} bytes)`);
      }
      fields.push(`result=${truncate(auditText(entry.result), this.resultChars)}`);
      this.sink(fields.join(' '));
    } catch (error) {
      console.warn(`[Dispatch] Audit log failed for ${entry.tool}:`, error instanceof Error ? error.message : error);
    }
  }
}

// Binary results are logged by type and size, never by content
function auditText(result: NormalizedResult): string {
  if (result.success && result.payload.kind === 'binary') {
    return JSON.stringify(describePayload(result.payload));
  }
  return resultText(result);
}

export function maskSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(maskSecrets);
  }
  if (typeof value === 'object' && value !== null) {
    const masked: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      masked[key] = MASKED_KEYS.has(key.toLowerCase()) ? '***' : maskSecrets(inner);
    }
    return masked;
  }
  return value;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}... (${text.length} chars)` : text;
}
