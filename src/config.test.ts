import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(4000);
    expect(config.mainProvider).toBe('anthropic');
    expect(config.mainModel).toBe('claude-sonnet-4-20250514');
    expect(config.maxWorkflowIterations).toBe(12);
    expect(config.volvoxApiUrl).toBe('http://localhost:8000/api/v1');
  });

  it('reads overrides and trims trailing slashes', () => {
    const config = loadConfig({
      PORT: '8080',
      MAIN_PROVIDER: 'Google',
      VOLVOX_API_URL: 'https://volvox.test/api/v1/',
      MAX_WORKFLOW_ITERATIONS: '5',
    });

    expect(config.port).toBe(8080);
    expect(config.mainProvider).toBe('google');
    expect(config.mainModel).toBe('gemini-2.5-flash');
    expect(config.volvoxApiUrl).toBe('https://volvox.test/api/v1');
    expect(config.maxWorkflowIterations).toBe(5);
  });

  it('falls back on malformed numbers', () => {
    expect(loadConfig({ PORT: 'abc', BACKEND_TIMEOUT_MS: '-3' })).toMatchObject({ port: 4000, backendTimeoutMs: 300_000 });
  });
});
