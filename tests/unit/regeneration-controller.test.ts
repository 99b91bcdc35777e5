import { EntityCoverageLedger } from '../../src/coverage/entity-coverage-ledger';
import { GenerationFailureError } from '../../src/engine/errors';
import { Generator } from '../../src/engine/types';
import { EntityExtractor } from '../../src/extraction/entity-extractor';
import { loadLexicon, loadSlotVocabulary } from '../../src/knowledge/vocabulary';
import {
  RegenerationController,
  RegenerationDirective,
  RegenerationInput,
} from '../../src/repetition/regeneration-controller';
import { RepetitionDetector } from '../../src/repetition/repetition-detector';
import { entity } from '../helpers/fixtures';
import { keywordEmbedder, scriptedGenerator } from '../helpers/fakes';

const FIRST_ANSWER = 'Platform A and Platform B lead documentary buying.';
const FRESH_ANSWER = 'Platform C and Platform D are growing buyers.';

const controllerConfig = {
  maxRegenerationAttempts: 2,
  generationTimeoutMs: 200,
  synthesisTemperature: 0.7,
  repetitionLookback: 3,
};

describe('RegenerationController', () => {
  const vocabulary = loadSlotVocabulary();
  const extractor = new EntityExtractor(loadLexicon(), vocabulary);
  const embedder = keywordEmbedder(['platform a', 'platform b', 'platform c', 'platform d']);
  const detector = new RepetitionDetector(embedder, {
    similarityThreshold: 0.85,
    overlapThreshold: 0.7,
    repetitionLookback: 3,
    embeddingTimeoutMs: 200,
  });

  let ledger: EntityCoverageLedger;
  let buildPrompt: jest.Mock<string, [RegenerationDirective]>;

  async function input(overrides: Partial<RegenerationInput> = {}): Promise<RegenerationInput> {
    return {
      buildPrompt,
      extract: (answer) => extractor.extract(answer),
      priors: [
        { turnNumber: 1, answerEmbedding: await embedder.embed(FIRST_ANSWER), entityIds: ['platform-a', 'platform-b'] },
      ],
      relevantEntityIds: [],
      ledger,
      ...overrides,
    };
  }

  beforeEach(() => {
    ledger = new EntityCoverageLedger('conv-1', vocabulary);
    ledger.registerMention(entity('Platform A'), 1, []);
    ledger.registerMention(entity('Platform B'), 1, []);
    buildPrompt = jest.fn((directive: RegenerationDirective) => `prompt:${directive.kind}`);
  });

  it('should accept a non-repetitive first draft', async () => {
    const generator = scriptedGenerator({ synthesis: [FRESH_ANSWER] });
    const controller = new RegenerationController(generator, detector, controllerConfig);

    const outcome = await controller.run(await input());

    expect(outcome.answer).toBe(FRESH_ANSWER);
    expect(outcome.attempts).toBe(0);
    expect(outcome.regenerated).toBe(false);
    expect(outcome.phases).toEqual(['draft', 'repetition_checked', 'final']);
    expect(generator.calls('synthesis')[0].exclusionList).toBeUndefined();
  });

  it('should regenerate with the recent entities excluded', async () => {
    const generator = scriptedGenerator({ synthesis: [FIRST_ANSWER, FRESH_ANSWER] });
    const controller = new RegenerationController(generator, detector, controllerConfig);

    const outcome = await controller.run(await input());

    expect(outcome.answer).toBe(FRESH_ANSWER);
    expect(outcome.attempts).toBe(1);
    expect(outcome.regenerated).toBe(true);
    expect(outcome.exhausted).toBe(false);
    expect(outcome.assessment.overlapRatio).toBe(0);
    expect(outcome.extraction.entities.map((e) => e.id)).toEqual(['platform-c', 'platform-d']);
    expect(generator.calls('synthesis')[1].exclusionList).toEqual(['Platform A', 'Platform B']);
    expect(buildPrompt).toHaveBeenLastCalledWith({ kind: 'exclude', exclusionList: ['Platform A', 'Platform B'] });
  });

  it('should stop after the attempt cap and keep the last candidate', async () => {
    const generator = scriptedGenerator({ synthesis: [FIRST_ANSWER] });
    const controller = new RegenerationController(generator, detector, controllerConfig);

    const outcome = await controller.run(await input());

    expect(generator.calls('synthesis')).toHaveLength(3);
    expect(outcome.attempts).toBe(2);
    expect(outcome.regenerated).toBe(true);
    expect(outcome.exhausted).toBe(true);
    expect(outcome.answer).toBe(FIRST_ANSWER);
    expect(outcome.phases).toEqual([
      'draft',
      'repetition_checked',
      'regenerating',
      'repetition_checked',
      'regenerating',
      'repetition_checked',
      'final',
    ]);
  });

  it('should never regenerate when the cap is zero', async () => {
    const generator = scriptedGenerator({ synthesis: [FIRST_ANSWER] });
    const controller = new RegenerationController(generator, detector, { ...controllerConfig, maxRegenerationAttempts: 0 });

    const outcome = await controller.run(await input());

    expect(generator.calls('synthesis')).toHaveLength(1);
    expect(outcome.attempts).toBe(0);
    expect(outcome.regenerated).toBe(false);
    expect(outcome.exhausted).toBe(true);
  });

  describe('chooseDirective', () => {
    const controller = new RegenerationController(scriptedGenerator({}), detector, controllerConfig);

    it('should deepen when every relevant entity was covered recently', async () => {
      const directive = controller.chooseDirective(await input({ relevantEntityIds: ['platform-a'] }));

      expect(directive).toEqual({
        kind: 'deepen',
        focus: [
          {
            entityName: 'Platform A',
            slots: ['audience', 'content_focus', 'decision_makers', 'deal_terms', 'submission_process', 'recent_activity'],
          },
        ],
        exclusionList: ['Platform B'],
      });
    });

    it('should deepen on both subjects of a comparison without excluding either', async () => {
      const directive = controller.chooseDirective(await input({ relevantEntityIds: ['platform-a', 'platform-b'] }));

      expect(directive.kind).toBe('deepen');
      expect(directive.kind === 'deepen' && directive.focus.map((f) => f.entityName)).toEqual([
        'Platform A',
        'Platform B',
      ]);
      expect(directive.kind === 'deepen' && directive.exclusionList).toEqual([]);
    });

    it('should not exclude a recent entity the query is about', async () => {
      const directive = controller.chooseDirective(await input({ relevantEntityIds: ['platform-a', 'platform-c'] }));

      expect(directive).toEqual({ kind: 'exclude', exclusionList: ['Platform B'] });
    });

    it('should exclude recent entities when the query brings something new', async () => {
      const directive = controller.chooseDirective(await input({ relevantEntityIds: ['platform-c'] }));

      expect(directive).toEqual({ kind: 'exclude', exclusionList: ['Platform A', 'Platform B'] });
    });

    it('should fall back to entity ids for names the ledger does not know', async () => {
      const directive = controller.chooseDirective(
        await input({ ledger: new EntityCoverageLedger('conv-1', vocabulary) }),
      );

      expect(directive).toEqual({ kind: 'exclude', exclusionList: ['platform-a', 'platform-b'] });
    });
  });

  it('should raise GenerationFailureError after one retry', async () => {
    const generator: Generator & { generate: jest.Mock } = {
      generate: jest.fn().mockRejectedValue(new Error('upstream 500')),
    };
    const controller = new RegenerationController(generator, detector, controllerConfig);

    await expect(controller.run(await input())).rejects.toBeInstanceOf(GenerationFailureError);
    expect(generator.generate).toHaveBeenCalledTimes(2);
  });

  it('should treat an empty answer as a generation failure', async () => {
    const generator = scriptedGenerator({ synthesis: ['   '] });
    const controller = new RegenerationController(generator, detector, controllerConfig);

    await expect(controller.run(await input())).rejects.toThrow(/empty answer/);
  });
});
