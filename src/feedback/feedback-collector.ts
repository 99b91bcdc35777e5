/**
 * Feedback Collector
 *
 * Append-only sink for explicit and implicit feedback on turns. Read by
 * stats and monitoring only; the turn pipeline never consults it.
 */

import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { Feedback } from '../config/types';
import { FeedbackInput, FeedbackSink, FeedbackStats } from '../engine/types';
import { parseRecord, validateFeedback } from '../memory/record-schemas';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'feedback-collector' });

/** Values above this count as positive */
const POSITIVE_THRESHOLD = 0.5;

export function summarizeFeedback(feedback: Feedback[]): FeedbackStats {
  if (feedback.length === 0) {
    return { totalFeedback: 0, positiveRate: 0, avgValue: 0 };
  }
  const positive = feedback.filter((f) => f.value > POSITIVE_THRESHOLD).length;
  const sum = feedback.reduce((acc, f) => acc + f.value, 0);
  return {
    totalFeedback: feedback.length,
    positiveRate: positive / feedback.length,
    avgValue: sum / feedback.length,
  };
}

function toRecord(input: FeedbackInput): Feedback {
  return {
    id: uuidv4(),
    conversationId: input.conversationId,
    turnNumber: input.turnNumber,
    feedbackType: input.feedbackType,
    value: input.value,
    ...(input.comment !== undefined ? { comment: input.comment } : {}),
    ...(input.implicitSignals !== undefined ? { implicitSignals: input.implicitSignals } : {}),
    createdAt: Date.now(),
  };
}

export class InMemoryFeedbackSink implements FeedbackSink {
  private readonly feedbackStore: Feedback[] = [];

  async record(input: FeedbackInput): Promise<Feedback> {
    const feedback = toRecord(input);
    this.feedbackStore.push(feedback);
    log.info(
      { conversationId: feedback.conversationId, turnNumber: feedback.turnNumber, type: feedback.feedbackType },
      'Feedback recorded',
    );
    return feedback;
  }

  async list(conversationId: string): Promise<Feedback[]> {
    return this.feedbackStore.filter((f) => f.conversationId === conversationId);
  }

  async stats(conversationId: string): Promise<FeedbackStats> {
    return summarizeFeedback(await this.list(conversationId));
  }
}

export class RedisFeedbackSink implements FeedbackSink {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = env.redis.keyPrefix,
  ) {}

  private key(conversationId: string): string {
    return `${this.prefix}feedback:${conversationId}`;
  }

  async record(input: FeedbackInput): Promise<Feedback> {
    const feedback = toRecord(input);
    await this.redis.rpush(this.key(feedback.conversationId), JSON.stringify(feedback));
    log.info(
      { conversationId: feedback.conversationId, turnNumber: feedback.turnNumber, type: feedback.feedbackType },
      'Feedback recorded',
    );
    return feedback;
  }

  async list(conversationId: string): Promise<Feedback[]> {
    const raws = await this.redis.lrange(this.key(conversationId), 0, -1);
    return raws.map((raw) => parseRecord(validateFeedback, raw, 'feedback'));
  }

  async stats(conversationId: string): Promise<FeedbackStats> {
    return summarizeFeedback(await this.list(conversationId));
  }
}

export function createFeedbackSink(redis?: Redis): FeedbackSink {
  return redis ? new RedisFeedbackSink(redis) : new InMemoryFeedbackSink();
}
