import Anthropic from '@anthropic-ai/sdk';
import {
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';
import { logger } from '../../observability/logger';

/**
 * Anthropic Claude provider adapter.
 *
 * The system text goes in the separate `system` parameter; the prompt is a
 * single user message.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;
  private log = logger.child({ component: 'anthropic-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
    });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system || undefined,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal },
    );

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new Error('Anthropic returned no text content');
    }

    return {
      content: textBlock.text,
      model: response.model ?? this.model,
      provider: 'anthropic',
      usage: {
        promptTokens: response.usage?.input_tokens ?? 0,
        completionTokens: response.usage?.output_tokens ?? 0,
        totalTokens: (response.usage?.input_tokens ?? 0) + (response.usage?.output_tokens ?? 0),
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      // Minimal request to confirm the key works
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return response.content.length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Anthropic health check failed');
      return false;
    }
  }
}
