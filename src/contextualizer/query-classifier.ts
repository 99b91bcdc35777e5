/**
 * Query classifiers — how does a query relate to the conversation so far?
 *
 * The rule-based classifier is the default: lexical cues first, then a
 * structural fallback on query length and overlap with recent turns. The
 * model-based classifier asks the Generator and falls back to the rules on
 * any unusable answer.
 */

import { QUERY_TYPES, QueryType } from '../config/types';
import { TurnCancelledError } from '../engine/errors';
import { withTimeout } from '../engine/timeout';
import { Generator } from '../engine/types';
import { containsPhrase } from '../extraction/text';
import { extractTopics } from '../memory/memory-layers';
import { ShortTermEntry } from '../memory/types';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'query-classifier' });

export interface ClassifyOptions {
  signal?: AbortSignal;
  /** Time left for classification; a model-based classifier gives up when it runs out */
  budgetMs?: number;
}

export interface QueryClassifier {
  readonly name: string;
  classify(query: string, history: ShortTermEntry[], options?: ClassifyOptions): Promise<QueryType>;
}

const NEW_TOPIC_CUES = [
  'different topic', 'new topic', 'switching gears', 'switch gears', 'on another note',
  'change of subject', 'changing the subject', 'unrelated question', 'something else entirely',
];
const COMPARE_CUES = [
  'compare', 'compared', 'comparison', 'versus', 'vs', 'difference between', 'differ',
  'which is better', 'better than', 'stack up', 'how does that contrast',
];
const CLARIFY_CUES = [
  'what do you mean', 'what does that mean', 'explain', 'define', 'clarify', 'meaning of', 'what is meant',
];
const DEEPEN_CUES = [
  'tell me more', 'more about', 'more detail', 'details', 'elaborate', 'go deeper', 'dig deeper',
  'specifically', 'what about his', 'what about her', 'what about their', 'expand on',
];
const EXPAND_CUES = [
  'what other', 'what else', 'any other', 'more options', 'alternatives', 'besides', 'apart from',
  'who else', 'other',
];
const ANAPHORA = [
  'this', 'that', 'these', 'those', 'it', 'its', 'they', 'them', 'their', 'he', 'she', 'his', 'her',
  'there', 'ones', 'same', 'above',
];

/** Queries with at least this many words and no link to history start a new topic */
const NEW_TOPIC_MIN_WORDS = 6;
/** Shorter unmatched follow-ups are read as drill-downs */
const SHORT_FOLLOW_UP_WORDS = 5;

function matchesAny(query: string, cues: readonly string[]): boolean {
  return cues.some((cue) => containsPhrase(query, cue));
}

export class RuleBasedQueryClassifier implements QueryClassifier {
  readonly name = 'rules';

  async classify(query: string, history: ShortTermEntry[]): Promise<QueryType> {
    return this.classifySync(query, history);
  }

  classifySync(query: string, history: ShortTermEntry[]): QueryType {
    if (history.length === 0) return 'initial';

    const text = query.trim();
    if (matchesAny(text, NEW_TOPIC_CUES)) return 'new_topic';
    if (matchesAny(text, COMPARE_CUES)) return 'compare';
    if (matchesAny(text, CLARIFY_CUES)) return 'clarify';
    if (matchesAny(text, DEEPEN_CUES)) return 'deepen';
    if (matchesAny(text, EXPAND_CUES)) return 'expand';

    const wordCount = text.split(/\s+/).filter(Boolean).length;
    if (wordCount >= NEW_TOPIC_MIN_WORDS && !matchesAny(text, ANAPHORA) && !this.overlapsHistory(text, history)) {
      return 'new_topic';
    }
    return wordCount < SHORT_FOLLOW_UP_WORDS ? 'deepen' : 'expand';
  }

  private overlapsHistory(query: string, history: ShortTermEntry[]): boolean {
    const recent = history.slice(-2);
    if (recent.some((entry) => entry.entities.some((name) => containsPhrase(query, name)))) {
      return true;
    }
    const previousTopics = new Set(recent.flatMap((entry) => extractTopics(entry.rewrittenQuery)));
    return extractTopics(query).some((topic) => previousTopics.has(topic));
  }
}

/**
 * Asks the Generator for a label. Anything other than a single known label,
 * a timeout, or an error yields the rule-based answer.
 */
export class ModelQueryClassifier implements QueryClassifier {
  readonly name = 'model';

  constructor(
    private readonly generator: Generator,
    private readonly fallback: RuleBasedQueryClassifier,
    private readonly budgetMs: number,
  ) {}

  async classify(query: string, history: ShortTermEntry[], options: ClassifyOptions = {}): Promise<QueryType> {
    if (history.length === 0) return 'initial';

    const budgetMs = Math.min(options.budgetMs ?? this.budgetMs, this.budgetMs);
    if (budgetMs <= 0) return this.fallback.classifySync(query, history);

    const recent = history
      .slice(-2)
      .map((entry) => `- Turn ${entry.turnNumber}: ${entry.rewrittenQuery}`)
      .join('\n');
    const prompt = [
      'Classify how the latest question relates to the conversation.',
      `Answer with exactly one label from: ${QUERY_TYPES.filter((t) => t !== 'initial').join(', ')}.`,
      '',
      'Recent questions:',
      recent,
      '',
      `Latest question: ${query}`,
      'Label:',
    ].join('\n');

    try {
      const raw = await withTimeout(
        'classify',
        budgetMs,
        (s) => this.generator.generate(prompt, { temperature: 0, maxTokens: 5, signal: s, purpose: 'classify' }),
        options.signal,
      );
      const label = raw.trim().toLowerCase().replace(/[^a-z_]/g, '');
      const known = QUERY_TYPES.find((t) => t === label && t !== 'initial');
      if (known) return known;
      log.debug({ raw }, 'Unrecognised classifier label, using rules');
    } catch (err) {
      if (err instanceof TurnCancelledError) throw err;
      log.warn({ err }, 'Model classification failed, using rules');
    }
    return this.fallback.classifySync(query, history);
  }
}
