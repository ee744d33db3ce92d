import type { AppConfig } from '../config.js';
import { AnthropicProvider } from './anthropic.js';
import { GoogleProvider } from './google.js';
import type { LLMProvider } from './types.js';

export * from './types.js';
export { AnthropicProvider } from './anthropic.js';
export { GoogleProvider } from './google.js';

export function createLLMProvider(
  config: Pick<AppConfig, 'mainProvider' | 'mainModel' | 'anthropicApiKey' | 'googleApiKey'>
): LLMProvider {
  switch (config.mainProvider) {
    case 'google':
      if (!config.googleApiKey) {
        throw new Error('GOOGLE_API_KEY required for Google provider');
      }
      return new GoogleProvider(config.googleApiKey, config.mainModel);

    case 'anthropic':
    default:
      if (!config.anthropicApiKey) {
        throw new Error('ANTHROPIC_API_KEY required for Anthropic provider');
      }
      return new AnthropicProvider(config.anthropicApiKey, config.mainModel);
  }
}
