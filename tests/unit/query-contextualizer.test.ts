import { ModelQueryClassifier, RuleBasedQueryClassifier } from '../../src/contextualizer/query-classifier';
import { QueryContextualizer, cleanRewrite } from '../../src/contextualizer/query-contextualizer';
import { TurnCancelledError } from '../../src/engine/errors';
import { GenerateOptions, Generator } from '../../src/engine/types';
import { EntityExtractor } from '../../src/extraction/entity-extractor';
import { loadLexicon, loadSlotVocabulary } from '../../src/knowledge/vocabulary';
import { shortTermEntry } from '../helpers/fixtures';
import { scriptedGenerator } from '../helpers/fakes';

const history = [
  shortTermEntry(1, {
    query: 'Who are the top streaming executives in MENA?',
    rewrittenQuery: 'Who are the top streaming executives in MENA?',
    answerExcerpt: 'Platform A and Platform B lead documentary buying.',
    entities: ['Platform A', 'Platform B'],
  }),
];

describe('RuleBasedQueryClassifier', () => {
  const classifier = new RuleBasedQueryClassifier();

  it('should label the first query initial', () => {
    expect(classifier.classifySync('What other platforms are there?', [])).toBe('initial');
  });

  it.each([
    ['Switching gears, what about festival funding?', 'new_topic'],
    ['How does Platform A compare with Platform B?', 'compare'],
    ['What do you mean by co-production?', 'clarify'],
    ['Tell me more about Sarah Chen', 'deepen'],
    ['What other platforms are there?', 'expand'],
  ] as const)('should read lexical cues: %s', (query, expected) => {
    expect(classifier.classifySync(query, history)).toBe(expected);
  });

  it('should treat a long query unrelated to recent turns as a new topic', () => {
    expect(classifier.classifySync('Which festivals accept short documentaries from first-time filmmakers', history)).toBe(
      'new_topic',
    );
  });

  it('should read short unmatched follow-ups as drill-downs', () => {
    expect(classifier.classifySync('And her budget?', history)).toBe('deepen');
  });

  it('should read longer follow-ups with references as expansions', () => {
    expect(classifier.classifySync('Does she handle unscripted formats and live events too', history)).toBe('expand');
  });
});

describe('ModelQueryClassifier', () => {
  const rules = new RuleBasedQueryClassifier();

  it('should use a known label from the Generator', async () => {
    const classifier = new ModelQueryClassifier(scriptedGenerator({ classify: () => ' Compare\n' }), rules, 200);

    await expect(classifier.classify('And her budget?', history)).resolves.toBe('compare');
  });

  it('should fall back to the rules on an unknown label', async () => {
    const classifier = new ModelQueryClassifier(scriptedGenerator({ classify: () => 'banana' }), rules, 200);

    await expect(classifier.classify('And her budget?', history)).resolves.toBe('deepen');
  });

  it('should fall back to the rules when the Generator fails', async () => {
    const generator: Generator = { generate: jest.fn().mockRejectedValue(new Error('down')) };
    const classifier = new ModelQueryClassifier(generator, rules, 200);

    await expect(classifier.classify('What other platforms are there?', history)).resolves.toBe('expand');
  });

  it('should not call the Generator for the first query', async () => {
    const generator = scriptedGenerator({});
    const classifier = new ModelQueryClassifier(generator, rules, 200);

    await expect(classifier.classify('Anything', [])).resolves.toBe('initial');
    expect(generator.generate).not.toHaveBeenCalled();
  });
});

describe('cleanRewrite', () => {
  it('should strip labels, quotes and trailing lines', () => {
    expect(cleanRewrite('Standalone question: "Which platforms buy documentaries?"\nExtra line')).toBe(
      'Which platforms buy documentaries?',
    );
  });
});

describe('QueryContextualizer', () => {
  const extractor = new EntityExtractor(loadLexicon(), loadSlotVocabulary());
  const config = { rewriteBudgetMs: 100, rewriteHistoryTurns: 2, rewriteAnswerChars: 200, rewriteTemperature: 0 };

  function contextualizer(generator: Generator): QueryContextualizer {
    return new QueryContextualizer(generator, new RuleBasedQueryClassifier(), extractor, config);
  }

  it('should pass the first query through unchanged', async () => {
    const generator = scriptedGenerator({});
    const result = await contextualizer(generator).contextualize('Who buys documentaries in MENA?', []);

    expect(result).toEqual({
      rawQuery: 'Who buys documentaries in MENA?',
      rewrittenQuery: 'Who buys documentaries in MENA?',
      queryType: 'initial',
      rewritten: false,
      queryEntities: ['MENA'],
    });
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('should use the cleaned rewrite for a follow-up', async () => {
    const generator = scriptedGenerator({
      rewrite: () => 'Standalone question: "Which MENA platforms besides Platform A and Platform B buy documentaries?"',
    });
    const result = await contextualizer(generator).contextualize('What other platforms are there?', history);

    expect(result.queryType).toBe('expand');
    expect(result.rewritten).toBe(true);
    expect(result.rewrittenQuery).toBe('Which MENA platforms besides Platform A and Platform B buy documentaries?');
    expect(generator.calls('rewrite')[0]).toMatchObject({ temperature: 0, purpose: 'rewrite' });
  });

  it('should name the already covered entities on an expand rewrite that dropped them', async () => {
    const generator = scriptedGenerator({ rewrite: () => 'Which other streaming platforms operate in MENA?' });
    const result = await contextualizer(generator).contextualize('What other platforms are there?', history);

    expect(result.rewrittenQuery).toBe('Which other streaming platforms operate in MENA besides Platform A, Platform B?');
  });

  it('should keep both subjects of a comparison', async () => {
    const generator = scriptedGenerator({ rewrite: () => 'How does Platform C stack up?' });
    const result = await contextualizer(generator).contextualize('How does Platform C compare?', history);

    expect(result.queryType).toBe('compare');
    expect(result.queryEntities).toEqual(['Platform C']);
    expect(result.rewrittenQuery).toBe('How does Platform C stack up (comparing Platform C with Platform A)?');
  });

  it('should fall back to the raw query when the rewrite times out', async () => {
    const generator: Generator = {
      generate: (_prompt: string, options: GenerateOptions) =>
        new Promise<string>((_, reject) =>
          options.signal?.addEventListener('abort', () => reject(new Error('aborted'))),
        ),
    };
    const result = await contextualizer(generator).contextualize('What other platforms are there?', history);

    expect(result.rewrittenQuery).toBe('What other platforms are there?');
    expect(result.rewritten).toBe(false);
    expect(result.fallbackReason).toBe('timeout');
  });

  it('should fall back to the raw query when the rewrite fails', async () => {
    const generator: Generator = { generate: jest.fn().mockRejectedValue(new Error('down')) };
    const result = await contextualizer(generator).contextualize('What other platforms are there?', history);

    expect(result.fallbackReason).toBe('error');
    expect(result.rewrittenQuery).toBe('What other platforms are there?');
  });

  it('should fall back to the raw query on an empty rewrite', async () => {
    const generator = scriptedGenerator({ rewrite: () => '  \n' });
    const result = await contextualizer(generator).contextualize('What other platforms are there?', history);

    expect(result.fallbackReason).toBe('empty');
  });

  it('should propagate cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const generator = scriptedGenerator({ rewrite: () => 'unused' });

    await expect(
      contextualizer(generator).contextualize('What other platforms are there?', history, controller.signal),
    ).rejects.toBeInstanceOf(TurnCancelledError);
  });

  it('should give identical results for identical inputs', async () => {
    const generator = scriptedGenerator({ rewrite: () => 'Which other streaming platforms operate in MENA?' });
    const ctx = contextualizer(generator);

    const first = await ctx.contextualize('What other platforms are there?', history);
    const second = await ctx.contextualize('What other platforms are there?', history);

    expect(second).toEqual(first);
  });

  it('should share one time budget between classification and rewrite', async () => {
    const generator: Generator = {
      generate: jest.fn(async (_prompt: string, options: GenerateOptions) => {
        await new Promise((resolve) => setTimeout(resolve, 70));
        return options.purpose === 'classify' ? 'expand' : 'Which other streaming platforms operate in MENA?';
      }),
    };
    const ctx = new QueryContextualizer(
      generator,
      new ModelQueryClassifier(generator, new RuleBasedQueryClassifier(), config.rewriteBudgetMs),
      extractor,
      config,
    );

    const result = await ctx.contextualize('What other platforms are there?', history);

    expect(result.queryType).toBe('expand');
    expect(result.rewritten).toBe(false);
    expect(result.fallbackReason).toBe('timeout');
  });

  it('should use the rules when no classification budget is left', async () => {
    const generator = scriptedGenerator({ classify: () => 'compare' });
    const classifier = new ModelQueryClassifier(generator, new RuleBasedQueryClassifier(), 200);

    await expect(classifier.classify('What other platforms are there?', history, { budgetMs: 0 })).resolves.toBe(
      'expand',
    );
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('should name only prior entities of the kind the expand query asks for', async () => {
    const withExecutive = [
      shortTermEntry(1, {
        answerExcerpt: 'Sarah Chen at Platform A commissions documentaries.',
        entities: ['Sarah Chen', 'Platform A'],
      }),
    ];
    const generator = scriptedGenerator({ rewrite: () => 'Which other streaming platforms accept MENA documentary pitches?' });
    const result = await contextualizer(generator).contextualize('What other platforms are there?', withExecutive);

    expect(result.rewrittenQuery).toBe('Which other streaming platforms accept MENA documentary pitches besides Platform A?');
  });

  it('should truncate prior answers in the rewrite prompt', () => {
    const long = [shortTermEntry(1, { answerExcerpt: 'x'.repeat(300) })];
    const prompt = contextualizer(scriptedGenerator({})).buildRewritePrompt('And her budget?', 'deepen', long);

    expect(prompt).toContain(`Assistant: ${'x'.repeat(200)}\n`);
    expect(prompt).not.toContain('x'.repeat(201));
  });
});
