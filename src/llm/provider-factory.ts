import { LLMProvider, LLMProviderName, LLMProviderConfig, ModelRouterConfig, isProviderName } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { env } from '../config/env';
import { logger } from '../observability/logger';

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
 * Build all configured providers from environment configuration.
 * Only creates providers whose API keys are set.
 */
export function buildProviders(envConfig: Record<LLMProviderName, LLMProviderConfig>): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  for (const name of ['openai', 'anthropic', 'gemini'] as const) {
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

function providerFromEnv(value: string, key: string): LLMProviderName | undefined {
  if (!value) return undefined;
  if (!isProviderName(value)) {
    throw new Error(`${key} must be one of openai, anthropic, gemini (got "${value}")`);
  }
  return value;
}

/** Router configuration from LLM_* environment variables. */
export function routerConfigFromEnv(): ModelRouterConfig {
  const primaryProvider = providerFromEnv(env.llm.primaryProvider, 'LLM_PRIMARY_PROVIDER') ?? 'openai';
  const rewriteProvider = providerFromEnv(env.llm.rewriteProvider, 'LLM_REWRITE_PROVIDER');

  return {
    primaryProvider,
    secondaryProvider: providerFromEnv(env.llm.secondaryProvider, 'LLM_SECONDARY_PROVIDER'),
    tertiaryProvider: providerFromEnv(env.llm.tertiaryProvider, 'LLM_TERTIARY_PROVIDER'),
    purposeRouting: rewriteProvider
      ? { rewrite: rewriteProvider, classify: rewriteProvider, goal: rewriteProvider }
      : undefined,
    defaultMaxTokens: env[primaryProvider].maxTokens,
  };
}
