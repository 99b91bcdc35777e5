import { Fact } from '../../src/config/types';
import {
  applyTurn,
  emptyState,
  extractTopics,
  longTermKey,
  nextDepth,
  pushShortTerm,
  summarizeAnswer,
  upgradeState,
} from '../../src/memory/memory-layers';
import { entity, makeTurn, shortTermEntry } from '../helpers/fixtures';

const options = { shortTermWindow: 5, shortTermAnswerChars: 500 };

const platformA = entity('Platform A');
const platformB = entity('Platform B');

const factA: Fact = { id: 'fa1', entityId: 'platform-a', text: 'Platform A buys documentaries.', slots: ['content_focus'] };

describe('memory layers', () => {
  describe('pushShortTerm', () => {
    it('should keep the most recent entries up to the window size', () => {
      let window = [shortTermEntry(1)];
      for (let n = 2; n <= 7; n++) window = pushShortTerm(window, shortTermEntry(n), 5);

      expect(window.map((e) => e.turnNumber)).toEqual([3, 4, 5, 6, 7]);
    });
  });

  describe('nextDepth', () => {
    it('should deepen, reset on a new topic and otherwise hold depth', () => {
      expect(nextDepth(2, 'deepen')).toBe(3);
      expect(nextDepth(3, 'new_topic')).toBe(1);
      expect(nextDepth(2, 'expand')).toBe(2);
      expect(nextDepth(2, 'compare')).toBe(2);
    });
  });

  describe('extractTopics', () => {
    it('should keep content words of four letters or more', () => {
      expect(extractTopics('What other streaming platforms operate in MENA?')).toEqual([
        'streaming',
        'platforms',
        'operate',
        'mena',
      ]);
    });
  });

  describe('summarizeAnswer', () => {
    it('should return short answers unchanged', () => {
      expect(summarizeAnswer('Short  answer.', 300)).toBe('Short answer.');
    });

    it('should keep whole sentences that fit', () => {
      expect(summarizeAnswer('First one. Second sentence here.', 12)).toBe('First one.');
    });
  });

  describe('applyTurn', () => {
    it('should replace working memory and record the turn in short-term memory', () => {
      const turn = makeTurn(1, {
        rawQuery: 'Who buys documentaries?',
        rewrittenQuery: 'Who buys documentaries?',
        answer: 'Platform A buys documentaries.',
        entities: [platformA],
      });
      const next = applyTurn(emptyState('conv-1', 0), turn, [factA], options, 5000);

      expect(next.working).toEqual({
        kind: 'working',
        version: 1,
        turnNumber: 1,
        query: 'Who buys documentaries?',
        rewrittenQuery: 'Who buys documentaries?',
        answerSummary: 'Platform A buys documentaries.',
        entities: ['Platform A'],
        strategy: 'breadth',
      });
      expect(next.shortTerm).toHaveLength(1);
      expect(next.shortTerm[0].entities).toEqual(['Platform A']);
      expect(next.coveredEntities).toEqual(['Platform A']);
      expect(next.coveredTopics).toEqual(['buys', 'documentaries']);
      expect(next.updatedAt).toBe(5000);
    });

    it('should truncate the short-term answer excerpt', () => {
      const turn = makeTurn(1, { answer: 'x'.repeat(50) });
      const next = applyTurn(emptyState('conv-1', 0), turn, [], { ...options, shortTermAnswerChars: 10 }, 0);

      expect(next.shortTerm[0].answerExcerpt).toBe('x'.repeat(10));
    });

    it('should union long-term facts idempotently', () => {
      const first = applyTurn(emptyState('conv-1', 0), makeTurn(1, { entities: [platformA] }), [factA], options, 0);
      const second = applyTurn(first, makeTurn(2, { entities: [platformA] }), [factA], options, 0);

      const key = longTermKey('platform-a', 'fa1');
      expect(Object.keys(second.longTerm)).toEqual([key]);
      expect(second.longTerm[key].firstTurn).toBe(1);
      expect(second.longTerm[key].entityName).toBe('Platform A');
    });

    it('should extend covered entities in first-seen order', () => {
      const first = applyTurn(emptyState('conv-1', 0), makeTurn(1, { entities: [platformA] }), [], options, 0);
      const second = applyTurn(first, makeTurn(2, { entities: [platformB, platformA] }), [], options, 0);

      expect(second.coveredEntities).toEqual(['Platform A', 'Platform B']);
    });

    it('should track current and maximum depth', () => {
      let state = emptyState('conv-1', 0);
      state = applyTurn(state, makeTurn(1, { queryType: 'initial' }), [], options, 0);
      state = applyTurn(state, makeTurn(2, { queryType: 'deepen' }), [], options, 0);
      state = applyTurn(state, makeTurn(3, { queryType: 'deepen' }), [], options, 0);
      state = applyTurn(state, makeTurn(4, { queryType: 'new_topic' }), [], options, 0);

      expect(state.depth).toBe(1);
      expect(state.maxDepth).toBe(3);
    });

    it('should leave the input state untouched', () => {
      const state = emptyState('conv-1', 0);
      const before = JSON.stringify(state);
      applyTurn(state, makeTurn(1, { entities: [platformA] }), [factA], options, 0);

      expect(JSON.stringify(state)).toBe(before);
    });
  });

  describe('upgradeState', () => {
    it('should accept a stored version 1 document', () => {
      const state = applyTurn(emptyState('conv-1', 0), makeTurn(1, { entities: [platformA] }), [factA], options, 0);
      const decoded = upgradeState(JSON.parse(JSON.stringify(state)));

      expect(decoded).toEqual(state);
    });

    it('should reject unknown schema versions', () => {
      expect(() => upgradeState({ schemaVersion: 99 })).toThrow('Unsupported conversation state schema version: 99');
    });

    it('should reject malformed documents', () => {
      expect(() => upgradeState({ schemaVersion: 1, conversationId: 'conv-1' })).toThrow(/Malformed conversation state/);
    });
  });
});
