import { ModelRouter, exclusionInstruction } from '../../src/llm/model-router';
import { LLMCompletionRequest, LLMCompletionResponse, LLMProvider, LLMProviderName } from '../../src/llm/types';

type FakeProvider = LLMProvider & { complete: jest.Mock<Promise<LLMCompletionResponse>, [LLMCompletionRequest]> };

function fakeProvider(name: LLMProviderName, content = `${name} answer`): FakeProvider {
  return {
    name,
    model: `${name}-test-model`,
    complete: jest.fn(async (_request: LLMCompletionRequest) => ({
      content,
      model: `${name}-test-model`,
      provider: name,
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      latencyMs: 1,
    })),
    healthCheck: jest.fn(async () => true),
  };
}

function providers(...list: FakeProvider[]): Map<LLMProviderName, LLMProvider> {
  return new Map(list.map((p) => [p.name, p]));
}

describe('exclusionInstruction', () => {
  it('should list each name once', () => {
    expect(exclusionInstruction(['Platform A', ' Platform B ', 'Platform A'])).toBe(
      'Do not mention any of the following entities, and do not restate what was said about them: Platform A, Platform B. ' +
        'Cover different entities or new information instead.',
    );
  });

  it('should be absent for an empty list', () => {
    expect(exclusionInstruction([])).toBeUndefined();
    expect(exclusionInstruction(['  '])).toBeUndefined();
  });
});

describe('ModelRouter', () => {
  it('should refuse a primary provider that is not configured', () => {
    expect(() => new ModelRouter({ primaryProvider: 'openai', defaultMaxTokens: 100 }, new Map())).toThrow(
      /Primary provider "openai" not available/,
    );
  });

  it('should pass the exclusion list to the provider as a system instruction', async () => {
    const openai = fakeProvider('openai');
    const router = new ModelRouter({ primaryProvider: 'openai', defaultMaxTokens: 100 }, providers(openai));

    const answer = await router.generate('Who buys documentaries?', {
      temperature: 0.7,
      exclusionList: ['Platform A'],
      purpose: 'synthesis',
    });

    expect(answer).toBe('openai answer');
    const request = openai.complete.mock.calls[0][0];
    expect(request.prompt).toBe('Who buys documentaries?');
    expect(request.temperature).toBe(0.7);
    expect(request.maxTokens).toBe(100);
    expect(request.system).toBe(exclusionInstruction(['Platform A']));
  });

  it('should fail over to the secondary provider', async () => {
    const openai = fakeProvider('openai');
    openai.complete.mockRejectedValue(new Error('503'));
    const anthropic = fakeProvider('anthropic');
    const router = new ModelRouter(
      { primaryProvider: 'openai', secondaryProvider: 'anthropic', defaultMaxTokens: 100 },
      providers(openai, anthropic),
    );

    await expect(router.generate('q', { temperature: 0 })).resolves.toBe('anthropic answer');
    expect(openai.complete).toHaveBeenCalledTimes(1);
  });

  it('should report the last error when every provider fails', async () => {
    const openai = fakeProvider('openai');
    openai.complete.mockRejectedValue(new Error('quota exceeded'));
    const router = new ModelRouter({ primaryProvider: 'openai', defaultMaxTokens: 100 }, providers(openai));

    await expect(router.generate('q', { temperature: 0 })).rejects.toThrow(
      'All LLM providers failed. Last error: quota exceeded',
    );
  });

  it('should route a purpose to its own provider first', async () => {
    const openai = fakeProvider('openai');
    const gemini = fakeProvider('gemini');
    const router = new ModelRouter(
      { primaryProvider: 'openai', purposeRouting: { rewrite: 'gemini' }, defaultMaxTokens: 100 },
      providers(openai, gemini),
    );

    await expect(router.generate('q', { temperature: 0, purpose: 'rewrite' })).resolves.toBe('gemini answer');
    await expect(router.generate('q', { temperature: 0, purpose: 'synthesis' })).resolves.toBe('openai answer');
  });

  it('should not fail over a cancelled call', async () => {
    const controller = new AbortController();
    const openai = fakeProvider('openai');
    openai.complete.mockImplementation(async () => {
      controller.abort();
      throw new Error('aborted');
    });
    const anthropic = fakeProvider('anthropic');
    const router = new ModelRouter(
      { primaryProvider: 'openai', secondaryProvider: 'anthropic', defaultMaxTokens: 100 },
      providers(openai, anthropic),
    );

    await expect(router.generate('q', { temperature: 0, signal: controller.signal })).rejects.toThrow('aborted');
    expect(anthropic.complete).not.toHaveBeenCalled();
  });

  it('should skip a provider whose circuit breaker is open', async () => {
    const openai = fakeProvider('openai');
    openai.complete.mockRejectedValue(new Error('503'));
    const anthropic = fakeProvider('anthropic');
    const router = new ModelRouter(
      { primaryProvider: 'openai', secondaryProvider: 'anthropic', defaultMaxTokens: 100 },
      providers(openai, anthropic),
    );

    for (let i = 0; i < 6; i++) await router.generate('q', { temperature: 0 });

    expect(openai.complete).toHaveBeenCalledTimes(5);
    expect(anthropic.complete).toHaveBeenCalledTimes(6);
    expect(router.isFullyOpen()).toBe(false);
  });

  it('should report per-provider health', async () => {
    const openai = fakeProvider('openai');
    const gemini = fakeProvider('gemini');
    gemini.healthCheck = jest.fn(async () => false);
    const router = new ModelRouter({ primaryProvider: 'openai', defaultMaxTokens: 100 }, providers(openai, gemini));

    const health = await router.healthCheck();

    expect(health.openai.status).toBe('ok');
    expect(health.gemini.status).toBe('error');
  });
});
