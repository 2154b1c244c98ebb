import { ProviderAdapter, ProviderName, ProviderOptions, PROVIDER_NAMES } from '../core/provider.js';
import { ConfigurationError } from '../core/errors.js';
import { AnthropicAdapter } from './anthropic.js';
import { OneApiAdapter, OpenRouterAdapter } from './openai-compatible.js';

const PROVIDERS: Record<ProviderName, (options: ProviderOptions) => ProviderAdapter> = {
  anthropic: () => new AnthropicAdapter(),
  openrouter: (options) => new OpenRouterAdapter(options),
  oneapi: () => new OneApiAdapter(),
};

export function isProviderName(name: string): name is ProviderName {
  return PROVIDER_NAMES.some(p => p === name);
}

/**
 * Look up the adapter for a provider name.
 * Throws ConfigurationError for anything but anthropic | openrouter | oneapi.
 */
export function resolveProvider(name: string, options: ProviderOptions = {}): ProviderAdapter {
  if (!isProviderName(name)) {
    throw new ConfigurationError(`Unsupported provider "${name}". Use: ${PROVIDER_NAMES.join(', ')}`);
  }
  return PROVIDERS[name](options);
}
