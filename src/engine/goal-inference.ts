import { TurnCancelledError } from './errors';
import { withTimeout } from './timeout';
import { Generator } from './types';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'goal-inference' });

const MAX_GOAL_CHARS = 200;

/**
 * One-sentence guess at what the user is trying to achieve, from the
 * queries so far. Returns null on any failure; never fails the turn.
 */
export async function inferGoal(
  generator: Generator,
  queries: string[],
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<string | null> {
  const prompt = [
    'Based on these questions from one conversation, state in one sentence what the user is trying to achieve.',
    'Respond with the sentence only.',
    '',
    ...queries.map((q, i) => `${i + 1}. ${q}`),
  ].join('\n');

  try {
    const raw = await withTimeout(
      'goal_inference',
      timeoutMs,
      (s) => generator.generate(prompt, { temperature: 0, maxTokens: 60, signal: s, purpose: 'goal' }),
      signal,
    );
    const goal = raw.trim().split(/\r?\n/)[0]?.trim() ?? '';
    return goal ? goal.slice(0, MAX_GOAL_CHARS) : null;
  } catch (err) {
    if (err instanceof TurnCancelledError) throw err;
    log.warn({ err }, 'Goal inference failed');
    return null;
  }
}
