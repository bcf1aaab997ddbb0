/**
 * Provider registry: factory that creates the correct provider from config.
 *
 * Dependency direction: registry.ts → types.ts, anthropic.ts, ollama.ts, errors.ts
 * Used by: agent factory, CLI doctor command
 */

import type { LLMProvider, LLMProviderName } from './types.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';
import type { ProviderConfig } from '../core/config/types.js';
import { ProviderError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

export const SUPPORTED_PROVIDERS: readonly LLMProviderName[] = ['anthropic', 'ollama'];

type ProviderFactory = (config: ProviderConfig, env: NodeJS.ProcessEnv) => LLMProvider;

const PROVIDER_FACTORIES: Record<LLMProviderName, ProviderFactory> = {
  anthropic: (config, env) => {
    const apiKey = config.anthropic?.apiKey ?? env['ANTHROPIC_API_KEY'];
    if (!apiKey) {
      throw new ProviderError(
        'Anthropic provider needs an API key: set providers.anthropic.apiKey or ANTHROPIC_API_KEY',
        { provider: 'anthropic' },
      );
    }
    return new AnthropicProvider({
      apiKey,
      baseUrl: config.anthropic?.baseUrl,
      apiVersion: config.anthropic?.apiVersion,
    });
  },

  ollama: (config) => new OllamaProvider({ baseUrl: config.ollama?.baseUrl }),
};

/** One instance per provider name for the life of the process. */
const providerCache = new Map<LLMProviderName, LLMProvider>();

/**
 * Create (or return cached) a provider instance by name.
 *
 * @throws {ProviderError} if the provider's configuration is incomplete
 */
export function createProvider(
  name: LLMProviderName,
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env,
): LLMProvider {
  const cached = providerCache.get(name);
  if (cached) return cached;

  logger.debug(`Creating provider: ${name}`);
  const provider = PROVIDER_FACTORIES[name](config, env);
  providerCache.set(name, provider);
  return provider;
}

/** Clear the provider cache (after config changes, and between tests). */
export function clearProviderCache(): void {
  providerCache.clear();
}

/**
 * Check every provider that can be built from the config.
 * Providers that fail to build report false.
 */
export async function validateAllProviders(
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Record<LLMProviderName, boolean>> {
  const results: Record<LLMProviderName, boolean> = { anthropic: false, ollama: false };

  for (const name of SUPPORTED_PROVIDERS) {
    try {
      results[name] = await createProvider(name, config, env).validateConnection();
    } catch (err) {
      logger.debug(`Provider ${name} unavailable: ${err instanceof Error ? err.message : String(err)}`);
      results[name] = false;
    }
  }

  return results;
}
