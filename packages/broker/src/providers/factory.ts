import { AnthropicAdapter, OpenAICompatibleAdapter, type ProviderAdapter } from '@ai-request/llm';
import { InvalidConfigurationError, err, ok, type ProviderConfig, type Result } from '../types/index.js';

export type AdapterFactory = (config: ProviderConfig) => Result<ProviderAdapter, InvalidConfigurationError>;

function checkBaseUrl(baseUrl: string): InvalidConfigurationError | null {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (error) {
    return new InvalidConfigurationError(
      `Invalid base URL '${baseUrl}': ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return new InvalidConfigurationError(`Invalid base URL '${baseUrl}': expected http or https`);
  }
  return null;
}

/** Builds the adapter serving a resolved provider configuration. */
export const createAdapter: AdapterFactory = (config) => {
  const invalid = checkBaseUrl(config.baseUrl);
  if (invalid) {
    return err(invalid);
  }

  switch (config.provider) {
    case 'anthropic':
      return ok(new AnthropicAdapter(config.apiKey, { baseUrl: config.baseUrl }));
    case 'openai':
      return ok(new OpenAICompatibleAdapter(config.apiKey, config.baseUrl, { name: 'openai' }));
    case 'local':
      return ok(new OpenAICompatibleAdapter(config.apiKey, config.baseUrl, { name: 'local' }));
  }
};
