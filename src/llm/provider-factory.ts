import {
  LLMProvider,
  LLMProviderName,
  LLMProviderConfig,
  LLM_PROVIDER_NAMES,
  ROUTING_STRATEGIES,
  RoutingStrategy,
} from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { logger } from '../observability/logger';

export function isProviderName(value: string): value is LLMProviderName {
  return LLM_PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Parse an optional provider setting. Empty means "not configured";
 * anything else must name a supported provider.
 */
export function parseProviderName(value: string, setting: string): LLMProviderName | undefined {
  if (!value) return undefined;
  if (!isProviderName(value)) {
    throw new Error(`${setting}="${value}" is not a supported provider (${LLM_PROVIDER_NAMES.join(', ')})`);
  }
  return value;
}

export function parseRoutingStrategy(value: string): RoutingStrategy {
  const strategy = ROUTING_STRATEGIES.find((s) => s === value);
  if (!strategy) {
    throw new Error(`LLM_ROUTING_STRATEGY="${value}" is not one of: ${ROUTING_STRATEGIES.join(', ')}`);
  }
  return strategy;
}

/**
 * Create a single LLM provider by name.
 */
export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Build all configured providers. Only creates providers whose API keys are set.
 */
export function buildProviders(
  envConfig: Record<LLMProviderName, LLMProviderConfig>,
): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  for (const name of LLM_PROVIDER_NAMES) {
    const config = envConfig[name];
    if (!config.apiKey) continue;
    providers.set(name, createProvider(name, config));
    log.info({ provider: name, model: config.model }, 'LLM provider initialized');
  }

  if (providers.size === 0) {
    throw new Error(
      'No LLM providers configured. Set at least one of: OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY',
    );
  }

  log.info({ providers: Array.from(providers.keys()) }, `${providers.size} LLM provider(s) initialized`);
  return providers;
}
