import { EmbeddingFailureError, TurnCancelledError } from '../../src/engine/errors';
import { Embedder } from '../../src/engine/types';
import { PriorAnswer, RepetitionDetector } from '../../src/repetition/repetition-detector';

const config = {
  similarityThreshold: 0.85,
  overlapThreshold: 0.7,
  repetitionLookback: 3,
  embeddingTimeoutMs: 50,
};

function prior(turnNumber: number, answerEmbedding: number[], entityIds: string[] = []): PriorAnswer {
  return { turnNumber, answerEmbedding, entityIds };
}

function embedderReturning(vector: number[]): Embedder & { embed: jest.Mock } {
  return { model: 'test-embed-v1', embed: jest.fn().mockResolvedValue(vector) };
}

describe('RepetitionDetector', () => {
  describe('score', () => {
    const detector = new RepetitionDetector(embedderReturning([1, 0]), config);

    it('should score zero against an empty history', () => {
      const result = detector.score([1, 0], ['a'], []);

      expect(result.repetitionScore).toBe(0);
      expect(result.overlapRatio).toBe(0);
      expect(result.isRepetitive).toBe(false);
    });

    it('should flag a semantically identical answer', () => {
      const result = detector.score([1, 0], [], [prior(1, [2, 0])]);

      expect(result.repetitionScore).toBeCloseTo(1);
      expect(result.isRepetitive).toBe(true);
    });

    it('should take the maximum similarity over the recent answers', () => {
      const result = detector.score([1, 1], [], [prior(1, [1, 0]), prior(2, [0, 1])]);

      expect(result.repetitionScore).toBeCloseTo(Math.SQRT1_2);
      expect(result.isRepetitive).toBe(false);
    });

    it('should measure entity overlap against recent turns', () => {
      const partial = detector.score([0, 1], ['a', 'b', 'c'], [prior(1, [1, 0], ['a', 'b'])]);
      expect(partial.overlapRatio).toBeCloseTo(2 / 3);
      expect(partial.overlappingEntities).toEqual(['a', 'b']);
      expect(partial.isRepetitive).toBe(false);

      const full = detector.score([0, 1], ['a', 'b'], [prior(1, [1, 0], ['a', 'b'])]);
      expect(full.overlapRatio).toBe(1);
      expect(full.isRepetitive).toBe(true);
    });

    it('should only look back the configured number of turns', () => {
      const priors = [prior(1, [1, 0], ['a']), prior(2, [0, 1]), prior(3, [0, 1]), prior(4, [0, 1])];
      const result = detector.score([1, 0], ['a'], priors);

      expect(result.repetitionScore).toBe(0);
      expect(result.overlapRatio).toBe(0);
    });
  });

  describe('embed', () => {
    it('should retry a failed embedding once', async () => {
      const embedder = embedderReturning([1, 0]);
      embedder.embed.mockRejectedValueOnce(new Error('503'));
      const detector = new RepetitionDetector(embedder, config);

      await expect(detector.embed('text')).resolves.toEqual([1, 0]);
      expect(embedder.embed).toHaveBeenCalledTimes(2);
    });

    it('should raise EmbeddingFailureError after the retry fails', async () => {
      const embedder = embedderReturning([1, 0]);
      embedder.embed.mockRejectedValue(new Error('503'));
      const detector = new RepetitionDetector(embedder, config);

      await expect(detector.embed('text')).rejects.toBeInstanceOf(EmbeddingFailureError);
      expect(embedder.embed).toHaveBeenCalledTimes(2);
    });

    it('should treat a call that exceeds its budget as a failure', async () => {
      const embedder: Embedder = {
        model: 'slow',
        embed: (_text, signal) =>
          new Promise<number[]>((_, reject) => signal?.addEventListener('abort', () => reject(new Error('aborted')))),
      };
      const detector = new RepetitionDetector(embedder, config);

      await expect(detector.embed('text')).rejects.toBeInstanceOf(EmbeddingFailureError);
    });

    it('should propagate cancellation without retrying', async () => {
      const embedder = embedderReturning([1, 0]);
      const detector = new RepetitionDetector(embedder, config);
      const controller = new AbortController();
      controller.abort();

      await expect(detector.embed('text', controller.signal)).rejects.toBeInstanceOf(TurnCancelledError);
      expect(embedder.embed).not.toHaveBeenCalled();
    });
  });

  it('should embed and score the candidate in assess', async () => {
    const detector = new RepetitionDetector(embedderReturning([1, 0]), config);
    const result = await detector.assess('same words', ['a'], [prior(1, [1, 0], ['a'])]);

    expect(result.embedding).toEqual([1, 0]);
    expect(result.isRepetitive).toBe(true);
  });
});
