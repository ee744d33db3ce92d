/**
 * Gateway configuration
 *
 * Everything comes from the environment (loaded by dotenv in index.ts).
 * Numeric values that are missing, malformed or non-positive fall back
 * to their defaults.
 */

export type LLMProviderName = 'anthropic' | 'google';

export interface AppConfig {
  port: number;
  serverName: string;
  serverVersion: string;

  // Backend base URLs
  volvoxApiUrl: string;
  smartApiUrl: string;
  innoscopeApiUrl: string;
  kickstartApiUrl: string;
  backendTimeoutMs: number;

  // Reasoning backend
  mainProvider: LLMProviderName;
  mainModel: string;
  anthropicApiKey: string;
  googleApiKey: string;
  maxWorkflowIterations: number;

  // Front door limits
  maxUploadBytes: number;
  auditResultChars: number;
}

const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  google: 'gemini-2.5-flash',
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const mainProvider: LLMProviderName = (env.MAIN_PROVIDER || '').toLowerCase() === 'google'
    ? 'google'
    : 'anthropic';

  return {
    port: parseInteger(env.PORT, 4000),
    serverName: 'Agent Tool Gateway',
    serverVersion: '1.0.0',

    volvoxApiUrl: trimTrailingSlash(env.VOLVOX_API_URL || 'http://localhost:8000/api/v1'),
    smartApiUrl: trimTrailingSlash(env.SMART_API_URL || 'http://localhost:8100'),
    innoscopeApiUrl: trimTrailingSlash(env.INNOSCOPE_API_URL || 'http://localhost:8200'),
    kickstartApiUrl: trimTrailingSlash(env.KICKSTART_API_URL || 'http://localhost:5000'),
    backendTimeoutMs: parseInteger(env.BACKEND_TIMEOUT_MS, 300_000),

    mainProvider,
    mainModel: env.MAIN_MODEL || DEFAULT_MODELS[mainProvider],
    anthropicApiKey: env.ANTHROPIC_API_KEY || '',
    googleApiKey: env.GOOGLE_API_KEY || '',
    maxWorkflowIterations: parseInteger(env.MAX_WORKFLOW_ITERATIONS, 12),

    maxUploadBytes: parseInteger(env.MAX_UPLOAD_BYTES, 25 * 1024 * 1024),
    auditResultChars: parseInteger(env.AUDIT_RESULT_CHARS, 300),
  };
}

function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
