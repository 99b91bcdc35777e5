/**
 * Repetition Detector — does a candidate answer restate recent turns?
 *
 * Two signals: semantic similarity of the answer embedding against the last
 * few answers, and the share of the candidate's entities already named in
 * those turns. Either one above its threshold marks the candidate repetitive.
 */

import { EngineConfig } from '../config/engine-config';
import { EmbeddingFailureError, TurnCancelledError } from '../engine/errors';
import { retryOnce, withTimeout } from '../engine/timeout';
import { Embedder } from '../engine/types';
import { cosineSimilarity } from '../knowledge/similarity';
import { logger } from '../observability/logger';
import { externalCallDuration } from '../observability/metrics';

const log = logger.child({ component: 'repetition-detector' });

export interface PriorAnswer {
  turnNumber: number;
  answerEmbedding: number[];
  /** Entity ids named in that turn */
  entityIds: string[];
}

export interface RepetitionAssessment {
  repetitionScore: number;
  overlapRatio: number;
  isRepetitive: boolean;
  embedding: number[];
  /** Candidate entity ids also named in the recent turns */
  overlappingEntities: string[];
}

export type RepetitionConfig = Pick<
  EngineConfig,
  'similarityThreshold' | 'overlapThreshold' | 'repetitionLookback' | 'embeddingTimeoutMs'
>;

export class RepetitionDetector {
  constructor(
    private readonly embedder: Embedder,
    private readonly config: RepetitionConfig,
  ) {}

  /**
   * Embed `text`, retrying once. A second failure (or timeout) becomes
   * EmbeddingFailureError; cancellation propagates unchanged.
   */
  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const start = Date.now();
    try {
      const vector = await retryOnce(
        () => withTimeout('embedding', this.config.embeddingTimeoutMs, (s) => this.embedder.embed(text, s), signal),
        (err) => !(err instanceof TurnCancelledError),
        (err) => log.warn({ err }, 'Embedding failed, retrying once'),
      );
      externalCallDuration.observe({ dependency: 'embedding', status: 'ok' }, (Date.now() - start) / 1000);
      return vector;
    } catch (err) {
      externalCallDuration.observe({ dependency: 'embedding', status: 'error' }, (Date.now() - start) / 1000);
      if (err instanceof TurnCancelledError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new EmbeddingFailureError(`Embedding failed: ${message}`, err);
    }
  }

  /** Score a candidate against the most recent prior answers. */
  async assess(
    candidate: string,
    candidateEntityIds: string[],
    priors: PriorAnswer[],
    signal?: AbortSignal,
  ): Promise<RepetitionAssessment> {
    const embedding = await this.embed(candidate, signal);
    return this.score(embedding, candidateEntityIds, priors);
  }

  /** The scoring half of `assess`, for an already computed embedding. */
  score(embedding: number[], candidateEntityIds: string[], priors: PriorAnswer[]): RepetitionAssessment {
    const recent = [...priors]
      .sort((a, b) => a.turnNumber - b.turnNumber)
      .slice(-this.config.repetitionLookback);

    let repetitionScore = 0;
    for (const prior of recent) {
      repetitionScore = Math.max(repetitionScore, cosineSimilarity(embedding, prior.answerEmbedding));
    }
    repetitionScore = Math.min(1, Math.max(0, repetitionScore));

    const recentEntities = new Set(recent.flatMap((p) => p.entityIds));
    const current = [...new Set(candidateEntityIds)];
    const overlappingEntities = current.filter((id) => recentEntities.has(id));
    const overlapRatio = current.length === 0 ? 0 : overlappingEntities.length / current.length;

    return {
      repetitionScore,
      overlapRatio,
      isRepetitive:
        repetitionScore > this.config.similarityThreshold || overlapRatio > this.config.overlapThreshold,
      embedding,
      overlappingEntities,
    };
  }
}
