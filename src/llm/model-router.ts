import {
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRouterConfig,
} from './types';
import { GenerateOptions, GenerationPurpose, Generator } from '../engine/types';
import { logger } from '../observability/logger';
import { llmRequestDuration, llmProviderFailovers, llmTokenUsage } from '../observability/metrics';

const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60_000;

interface CircuitBreakerState {
  failures: number;
  openUntil: number;
}

/** System instruction carrying a generation's exclusion list. */
export function exclusionInstruction(exclusionList: string[]): string | undefined {
  const names = [...new Set(exclusionList.map((n) => n.trim()).filter(Boolean))];
  if (names.length === 0) return undefined;
  return (
    `Do not mention any of the following entities, and do not restate what was said about them: ${names.join(', ')}. ` +
    'Cover different entities or new information instead.'
  );
}

/**
 * Model Router — decides which LLM provider handles each request.
 *
 * Purpose overrides (e.g. a cheaper model for rewrites) go first, then the
 * primary → secondary → tertiary failover chain. Includes per-provider
 * circuit breakers. Implements the engine's Generator.
 */
export class ModelRouter implements Generator {
  private providers: Map<LLMProviderName, LLMProvider>;
  private config: ModelRouterConfig;
  private circuitBreakers: Map<LLMProviderName, CircuitBreakerState>;
  private log = logger.child({ component: 'model-router' });

  constructor(config: ModelRouterConfig, providers: Map<LLMProviderName, LLMProvider>) {
    this.config = config;
    this.providers = providers;
    this.circuitBreakers = new Map();

    // Validate primary provider exists
    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
        `Configured providers: ${Array.from(providers.keys()).join(', ')}`,
      );
    }

    this.log.info({
      primary: config.primaryProvider,
      secondary: config.secondaryProvider,
      tertiary: config.tertiaryProvider,
      purposeRouting: config.purposeRouting,
      availableProviders: Array.from(providers.keys()),
    }, 'Model router initialized');
  }

  /** Generator entry point: the exclusion list becomes a system instruction. */
  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const response = await this.complete(
      {
        system: exclusionInstruction(options.exclusionList ?? []),
        prompt,
        temperature: options.temperature,
        maxTokens: options.maxTokens ?? this.config.defaultMaxTokens,
        signal: options.signal,
      },
      options.purpose,
    );
    return response.content;
  }

  /**
   * Route a completion request to the appropriate provider(s) with failover.
   */
  async complete(request: LLMCompletionRequest, purpose?: GenerationPurpose): Promise<LLMCompletionResponse> {
    const providerOrder = this.resolveProviderOrder(purpose);
    let lastError: Error | undefined;
    let lastTried: LLMProviderName | undefined;

    for (const providerName of providerOrder) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      if (request.signal?.aborted) {
        throw lastError ?? new Error('Generation aborted');
      }

      // Check circuit breaker
      const cb = this.circuitBreakers.get(providerName);
      if (cb && Date.now() < cb.openUntil) {
        this.log.debug({ provider: providerName }, 'Circuit breaker open, skipping');
        continue;
      }

      const timer = llmRequestDuration.startTimer({
        provider: providerName,
        model: provider.model,
      });

      try {
        const response = await provider.complete(request);

        // Success closes the breaker
        this.resetCircuitBreaker(providerName);
        timer({ status: 'success' });

        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'prompt' },
          response.usage.promptTokens,
        );
        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'completion' },
          response.usage.completionTokens,
        );

        if (lastTried) {
          llmProviderFailovers.inc({ from_provider: lastTried, to_provider: providerName });
          this.log.info({ from: lastTried, to: providerName }, 'Failed over to next provider');
        }

        return response;
      } catch (err) {
        timer({ status: 'error' });
        lastError = err instanceof Error ? err : new Error(String(err));

        // A cancelled call says nothing about the provider's health
        if (request.signal?.aborted) throw lastError;

        this.recordFailure(providerName);
        lastTried = providerName;
        this.log.warn(
          { provider: providerName, err: lastError.message, purpose },
          'Provider failed, trying next',
        );
      }
    }

    // All providers failed
    throw new Error(
      `All LLM providers failed. Last error: ${lastError?.message ?? 'unknown'}`,
    );
  }

  /**
   * Health check across all configured providers.
   */
  async healthCheck(): Promise<Record<string, { status: string; latencyMs: number }>> {
    const results: Record<string, { status: string; latencyMs: number }> = {};

    for (const [name, provider] of this.providers) {
      const start = Date.now();
      const healthy = await provider.healthCheck();
      results[name] = {
        status: healthy ? 'ok' : 'error',
        latencyMs: Date.now() - start,
      };
    }

    return results;
  }

  /**
   * Check if the circuit breaker is open for ALL providers (complete outage).
   */
  isFullyOpen(): boolean {
    const now = Date.now();
    for (const [name] of this.providers) {
      const cb = this.circuitBreakers.get(name);
      if (!cb || now >= cb.openUntil) return false;
    }
    return true;
  }

  // ─── Private ──────────────────────────────────────────────────

  /**
   * Determine the ordered list of providers to try for this request.
   */
  private resolveProviderOrder(purpose?: GenerationPurpose): LLMProviderName[] {
    const order: LLMProviderName[] = [];

    const override = purpose ? this.config.purposeRouting?.[purpose] : undefined;
    if (override && this.providers.has(override)) {
      order.push(override);
    }

    // Always ensure the full failover chain is present
    for (const name of [this.config.primaryProvider, this.config.secondaryProvider, this.config.tertiaryProvider]) {
      if (name && !order.includes(name)) order.push(name);
    }

    return order;
  }

  private recordFailure(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider) ?? { failures: 0, openUntil: 0 };
    cb.failures++;

    if (cb.failures >= CIRCUIT_BREAKER_THRESHOLD) {
      cb.openUntil = Date.now() + CIRCUIT_BREAKER_RESET_MS;
      this.log.error(
        { provider, failures: cb.failures, resetMs: CIRCUIT_BREAKER_RESET_MS },
        'Circuit breaker opened for provider',
      );
    }

    this.circuitBreakers.set(provider, cb);
  }

  private resetCircuitBreaker(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider);
    if (cb) {
      cb.failures = 0;
      cb.openUntil = 0;
    }
  }
}
