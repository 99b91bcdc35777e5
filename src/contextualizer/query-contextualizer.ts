/**
 * Query Contextualizer — turns a raw follow-up into a standalone query.
 *
 * Classification picks the query type; for follow-up types the Generator
 * rewrites the query against the last turns. The rewrite is best effort:
 * any error, empty output or blown budget leaves the raw query in place.
 */

import { EngineConfig } from '../config/engine-config';
import { QueryType } from '../config/types';
import { ExternalTimeoutError, TurnCancelledError } from '../engine/errors';
import { ensureNotAborted, withTimeout } from '../engine/timeout';
import { Generator } from '../engine/types';
import { EntityExtractor } from '../extraction/entity-extractor';
import { containsPhrase } from '../extraction/text';
import { ShortTermEntry } from '../memory/types';
import { logger } from '../observability/logger';
import { rewriteFallbacks } from '../observability/metrics';
import { QueryClassifier } from './query-classifier';

const log = logger.child({ component: 'query-contextualizer' });

export type RewriteFallbackReason = 'timeout' | 'error' | 'empty';

export interface ContextualizedQuery {
  rawQuery: string;
  rewrittenQuery: string;
  queryType: QueryType;
  /** True when the Generator's rewrite was used */
  rewritten: boolean;
  fallbackReason?: RewriteFallbackReason;
  /** Entity names the query itself names */
  queryEntities: string[];
}

export type ContextualizerConfig = Pick<
  EngineConfig,
  'rewriteBudgetMs' | 'rewriteHistoryTurns' | 'rewriteAnswerChars' | 'rewriteTemperature'
>;

const TYPE_GUIDANCE: Record<QueryType, string> = {
  initial: '',
  new_topic: '',
  expand: 'The user wants options beyond those already discussed; name what was already covered so it can be excluded.',
  deepen: 'The user wants more depth on something already discussed; name it explicitly.',
  compare: 'The user wants a comparison; name both things being compared.',
  clarify: 'The user wants something from the previous answer explained; name it explicitly.',
};

/** Put `clause` before any terminal punctuation of `sentence`. */
function attachClause(sentence: string, clause: string): string {
  const match = sentence.match(/[?.!]+$/);
  const punctuation = match ? match[0] : '';
  const base = sentence.slice(0, sentence.length - punctuation.length).trimEnd();
  return `${base} ${clause}${punctuation}`;
}

/** First line of model output, without labels or wrapping quotes. */
export function cleanRewrite(output: string): string {
  const firstLine = output.trim().split(/\r?\n/)[0] ?? '';
  return firstLine
    .replace(/^(standalone (question|query)|rewritten (question|query))\s*:\s*/i, '')
    .trim()
    .replace(/^["'“”‘’`]+|["'“”‘’`]+$/g, '')
    .trim();
}

export class QueryContextualizer {
  constructor(
    private readonly generator: Generator,
    private readonly classifier: QueryClassifier,
    private readonly extractor: EntityExtractor,
    private readonly config: ContextualizerConfig,
  ) {}

  async contextualize(
    rawQuery: string,
    shortTerm: ShortTermEntry[],
    signal?: AbortSignal,
  ): Promise<ContextualizedQuery> {
    // One budget covers classification and rewrite together.
    const deadline = Date.now() + this.config.rewriteBudgetMs;
    const queryType = await this.classifier.classify(rawQuery, shortTerm, {
      signal,
      budgetMs: this.config.rewriteBudgetMs,
    });
    const queryEntities = this.extractor.extractEntities(rawQuery).map((e) => e.name);
    const base = { rawQuery, queryType, queryEntities };

    if (queryType === 'initial' || queryType === 'new_topic') {
      return { ...base, rewrittenQuery: rawQuery, rewritten: false };
    }

    const history = shortTerm.slice(-this.config.rewriteHistoryTurns);
    const prompt = this.buildRewritePrompt(rawQuery, queryType, history);

    const remainingMs = deadline - Date.now();
    if (remainingMs <= 0) {
      ensureNotAborted(signal, 'rewrite');
      return this.fallback(base, 'timeout');
    }

    let output: string;
    try {
      output = await withTimeout(
        'rewrite',
        remainingMs,
        (s) =>
          this.generator.generate(prompt, {
            temperature: this.config.rewriteTemperature,
            maxTokens: 120,
            signal: s,
            purpose: 'rewrite',
          }),
        signal,
      );
    } catch (err) {
      if (err instanceof TurnCancelledError) throw err;
      const reason: RewriteFallbackReason = err instanceof ExternalTimeoutError ? 'timeout' : 'error';
      return this.fallback(base, reason, err);
    }

    const cleaned = cleanRewrite(output);
    if (!cleaned) return this.fallback(base, 'empty');

    const guarded = this.applyGuards(cleaned, rawQuery, queryType, queryEntities, history);
    return { ...base, rewrittenQuery: guarded, rewritten: true };
  }

  buildRewritePrompt(rawQuery: string, queryType: QueryType, history: ShortTermEntry[]): string {
    const turns = history
      .map((entry) =>
        [
          `User: ${entry.rewrittenQuery}`,
          `Assistant: ${entry.answerExcerpt.slice(0, this.config.rewriteAnswerChars)}`,
        ].join('\n'),
      )
      .join('\n\n');

    return [
      'Rewrite the latest user question as a single standalone question that can be understood without the conversation.',
      'Resolve pronouns and references using the recent turns and keep every named entity.',
      TYPE_GUIDANCE[queryType],
      'Respond with exactly one sentence and no commentary.',
      '',
      'Recent turns:',
      turns,
      '',
      `Latest question: ${rawQuery}`,
    ]
      .filter((line, i, lines) => line !== '' || lines[i - 1] !== '')
      .join('\n');
  }

  /**
   * Deterministic repairs for what the rewrite must keep:
   * compare keeps both subjects, expand keeps what to look beyond. When the
   * query asks for a kind of entity, expand names only prior entities of that kind.
   */
  private applyGuards(
    rewrite: string,
    rawQuery: string,
    queryType: QueryType,
    queryEntities: string[],
    history: ShortTermEntry[],
  ): string {
    const last = history[history.length - 1];
    if (!last) return rewrite;

    if (queryType === 'compare') {
      const prior = last.entities.find((name) => !queryEntities.includes(name));
      const subjects = prior ? [...queryEntities, prior] : queryEntities;
      const missing = subjects.filter((name) => !containsPhrase(rewrite, name));
      if (missing.length > 0) return attachClause(rewrite, `(comparing ${subjects.join(' with ')})`);
    }

    if (queryType === 'expand' && last.entities.length > 0) {
      const askedTypes = this.extractor.typesNamedIn(rawQuery);
      const sameKind = last.entities.filter((name) => askedTypes.includes(this.extractor.typeOfName(name)));
      const prior = sameKind.length > 0 ? sameKind : last.entities;
      const mentionsPrior = prior.some((name) => containsPhrase(rewrite, name));
      if (!mentionsPrior) return attachClause(rewrite, `besides ${prior.slice(0, 3).join(', ')}`);
    }

    return rewrite;
  }

  private fallback(
    base: Pick<ContextualizedQuery, 'rawQuery' | 'queryType' | 'queryEntities'>,
    reason: RewriteFallbackReason,
    err?: unknown,
  ): ContextualizedQuery {
    rewriteFallbacks.inc({ reason });
    log.warn({ err, reason, queryType: base.queryType }, 'Query rewrite fell back to raw query');
    return { ...base, rewrittenQuery: base.rawQuery, rewritten: false, fallbackReason: reason };
  }
}
