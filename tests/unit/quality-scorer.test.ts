import { loadLexicon } from '../../src/knowledge/vocabulary';
import { HeuristicQualityScorer, QualityInput } from '../../src/quality/quality-scorer';

function input(overrides: Partial<QualityInput> = {}): QualityInput {
  return { answer: '', entities: [], history: [], repetitionScore: 0, ...overrides };
}

const history = (n: number) => Array.from({ length: n }, (_, i) => ({ query: `q${i}`, entities: [] }));

describe('HeuristicQualityScorer', () => {
  const scorer = new HeuristicQualityScorer(loadLexicon());

  it('should score an empty answer on novelty and context alone', () => {
    const scores = scorer.score(input());

    expect(scores.specificity).toBe(0);
    expect(scores.actionability).toBe(0);
    expect(scores.strategicValue).toBe(0);
    expect(scores.contextAwareness).toBe(1);
    expect(scores.novelty).toBe(1);
    expect(scores.overall).toBeCloseTo(0.4);
  });

  it('should derive novelty from the repetition score', () => {
    expect(scorer.score(input({ answer: 'Fine.', repetitionScore: 0.3 })).novelty).toBeCloseTo(0.7);
  });

  it('should measure specificity as specific tokens per hundred words', () => {
    const answer =
      'the market for documentaries is growing and buyers are looking for strong stories with clear hooks and broad appeal like Netflix';
    const scores = scorer.score(input({ answer, entities: ['Netflix'] }));

    // 21 words; Netflix counts once as an entity and once as a capitalised token
    expect(scores.specificity).toBeCloseTo(((2 / 21) * 100) / 15, 5);
  });

  it('should count imperative sentences towards actionability', () => {
    const answer = 'Contact Sarah Chen this week. The market is growing. Budgets are tight. Slots are limited.';

    expect(scorer.score(input({ answer })).actionability).toBeCloseTo(0.5);
  });

  it('should count connectives towards strategic value', () => {
    const answer = 'Budgets are rising because demand grew. Deals are slow. Buyers are cautious. Slates are full.';

    expect(scorer.score(input({ answer })).strategicValue).toBeCloseTo(0.5);
  });

  it('should score context awareness against a history capped at three turns', () => {
    const answer = 'As mentioned earlier, Platform B is strong.';

    expect(scorer.score(input({ answer, history: history(2) })).contextAwareness).toBe(1);
    expect(scorer.score(input({ answer, history: history(4) })).contextAwareness).toBeCloseTo(2 / 3);
    expect(scorer.score(input({ answer: 'Platform B is strong.', history: history(2) })).contextAwareness).toBe(0);
  });

  it('should apply configured weights to the overall score', () => {
    const noveltyOnly = new HeuristicQualityScorer(loadLexicon(), {
      specificity: 0,
      actionability: 0,
      strategicValue: 0,
      contextAwareness: 0,
      novelty: 1,
    });

    expect(noveltyOnly.score(input({ repetitionScore: 0.25 })).overall).toBeCloseTo(0.75);
  });

  it('should be deterministic', () => {
    const sample = input({
      answer: 'Reach out to Platform C because their slate is open.',
      entities: ['Platform C'],
      history: history(1),
      repetitionScore: 0.2,
    });

    expect(scorer.score(sample)).toEqual(scorer.score(sample));
  });
});
