/**
 * Pure transitions over the memory layers.
 *
 * Nothing here mutates its inputs: each function returns new records, which
 * is what lets the state manager stage a whole turn before persisting it.
 */

import Ajv from 'ajv';
import { EntityRef, Fact, QueryType, Turn } from '../config/types';
import {
  ConversationState,
  LongTermFact,
  MemorySnapshot,
  ShortTermEntry,
  WorkingMemory,
} from './types';

const TOPIC_STOPWORDS = new Set([
  'about', 'after', 'also', 'been', 'being', 'besides', 'best', 'between', 'both', 'could',
  'does', 'from', 'have', 'into', 'more', 'most', 'other', 'should', 'some', 'tell',
  'than', 'that', 'their', 'them', 'then', 'there', 'these', 'they', 'this', 'those',
  'what', 'when', 'where', 'which', 'while', 'whom', 'with', 'would', 'your',
]);

const MAX_TOPICS_PER_TURN = 5;
const WORKING_SUMMARY_CHARS = 300;

export function emptyState(conversationId: string, now: number): ConversationState {
  return {
    schemaVersion: 1,
    conversationId,
    working: null,
    shortTerm: [],
    longTerm: {},
    coveredEntities: [],
    coveredTopics: [],
    depth: 1,
    maxDepth: 1,
    updatedAt: now,
  };
}

const stringArray = { type: 'array', items: { type: 'string' } };

const stateSchema = {
  type: 'object',
  properties: {
    schemaVersion: { const: 1 },
    conversationId: { type: 'string' },
    working: {
      anyOf: [
        { type: 'null' },
        {
          type: 'object',
          properties: { kind: { const: 'working' }, version: { const: 1 } },
          required: ['kind', 'version', 'turnNumber', 'query', 'rewrittenQuery', 'answerSummary', 'entities', 'strategy'],
        },
      ],
    },
    shortTerm: {
      type: 'array',
      items: {
        type: 'object',
        properties: { kind: { const: 'short_term' }, version: { const: 1 }, entities: stringArray },
        required: ['kind', 'version', 'turnNumber', 'query', 'rewrittenQuery', 'queryType', 'answerExcerpt', 'entities', 'qualityScore'],
      },
    },
    longTerm: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: { kind: { const: 'long_term_fact' }, version: { const: 1 }, slots: stringArray },
        required: ['kind', 'version', 'key', 'entityId', 'entityName', 'factId', 'text', 'slots', 'firstTurn'],
      },
    },
    coveredEntities: stringArray,
    coveredTopics: stringArray,
    depth: { type: 'integer', minimum: 1 },
    maxDepth: { type: 'integer', minimum: 1 },
    updatedAt: { type: 'number' },
  },
  required: ['schemaVersion', 'conversationId', 'working', 'shortTerm', 'longTerm', 'coveredEntities', 'coveredTopics', 'depth', 'maxDepth', 'updatedAt'],
};

const ajv = new Ajv({ allErrors: true });
const validateStateV1 = ajv.compile<ConversationState>(stateSchema);

/**
 * Decode a stored state document. New schema versions add a case here that
 * upgrades the older shape; unknown versions are rejected.
 */
export function upgradeState(raw: unknown): ConversationState {
  const version = typeof raw === 'object' && raw !== null && 'schemaVersion' in raw
    ? raw.schemaVersion
    : undefined;

  switch (version) {
    case 1:
      if (!validateStateV1(raw)) {
        const errors = validateStateV1.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
        throw new Error(`Malformed conversation state: ${errors}`);
      }
      return raw;
    default:
      throw new Error(`Unsupported conversation state schema version: ${String(version)}`);
  }
}

export function toSnapshot(state: ConversationState): MemorySnapshot {
  return {
    conversationId: state.conversationId,
    working: state.working,
    shortTerm: [...state.shortTerm],
    longTerm: Object.values(state.longTerm),
    coveredEntities: [...state.coveredEntities],
    coveredTopics: [...state.coveredTopics],
    depth: state.depth,
  };
}

/** Append to the FIFO window, evicting the oldest entries beyond `size`. */
export function pushShortTerm(window: ShortTermEntry[], entry: ShortTermEntry, size: number): ShortTermEntry[] {
  const next = [...window, entry];
  return next.length > size ? next.slice(next.length - size) : next;
}

export function longTermKey(entityId: string, factId: string): string {
  return `${entityId}::${factId}`;
}

/** Idempotent union: a fact already present (same key) is left untouched. */
export function unionLongTerm(
  longTerm: Record<string, LongTermFact>,
  facts: Fact[],
  entities: EntityRef[],
  turnNumber: number,
): Record<string, LongTermFact> {
  const names = new Map(entities.map((e) => [e.id, e.name]));
  const next = { ...longTerm };

  for (const fact of facts) {
    const key = longTermKey(fact.entityId, fact.id);
    if (next[key]) continue;
    next[key] = {
      kind: 'long_term_fact',
      version: 1,
      key,
      entityId: fact.entityId,
      entityName: names.get(fact.entityId) ?? fact.entityId,
      factId: fact.id,
      text: fact.text,
      slots: [...fact.slots],
      firstTurn: turnNumber,
    };
  }

  return next;
}

/** +1 on deepen, back to 1 on a topic pivot, otherwise unchanged. */
export function nextDepth(depth: number, queryType: QueryType): number {
  if (queryType === 'deepen') return depth + 1;
  if (queryType === 'new_topic') return 1;
  return depth;
}

/** First sentences of an answer, cut at `maxChars` on a word boundary. */
export function summarizeAnswer(answer: string, maxChars: number): string {
  const text = answer.replace(/\s+/g, ' ').trim();
  if (text.length <= maxChars) return text;

  const sentences = text.match(/[^.!?]+[.!?]+/g) ?? [];
  let summary = '';
  for (const sentence of sentences) {
    if ((summary + sentence).length > maxChars) break;
    summary += sentence;
  }
  if (summary.trim()) return summary.trim();

  const cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  return `${lastSpace > 0 ? cut.slice(0, lastSpace) : cut}…`;
}

/** Content words of a query, used as coarse topic labels. */
export function extractTopics(query: string): string[] {
  const words = query.toLowerCase().match(/[a-z][a-z'-]{3,}/g) ?? [];
  const topics: string[] = [];
  for (const word of words) {
    if (TOPIC_STOPWORDS.has(word) || topics.includes(word)) continue;
    topics.push(word);
    if (topics.length >= MAX_TOPICS_PER_TURN) break;
  }
  return topics;
}

function unionOrdered(existing: string[], additions: string[]): string[] {
  const next = [...existing];
  for (const item of additions) {
    if (!next.includes(item)) next.push(item);
  }
  return next;
}

export interface ApplyTurnOptions {
  shortTermWindow: number;
  shortTermAnswerChars: number;
}

/**
 * The state after `turn`: working memory replaced, short-term pushed (with
 * eviction), long-term unioned, covered sets extended, depth updated.
 */
export function applyTurn(
  state: ConversationState,
  turn: Turn,
  facts: Fact[],
  options: ApplyTurnOptions,
  now: number,
): ConversationState {
  const entityNames = turn.entities.map((e) => e.name);

  const working: WorkingMemory = {
    kind: 'working',
    version: 1,
    turnNumber: turn.turnNumber,
    query: turn.rawQuery,
    rewrittenQuery: turn.rewrittenQuery,
    answerSummary: summarizeAnswer(turn.answer, WORKING_SUMMARY_CHARS),
    entities: entityNames,
    strategy: turn.responseStrategy,
  };

  const entry: ShortTermEntry = {
    kind: 'short_term',
    version: 1,
    turnNumber: turn.turnNumber,
    query: turn.rawQuery,
    rewrittenQuery: turn.rewrittenQuery,
    queryType: turn.queryType,
    answerExcerpt: turn.answer.slice(0, options.shortTermAnswerChars),
    entities: entityNames,
    qualityScore: turn.quality.overall,
  };

  const depth = nextDepth(state.depth, turn.queryType);

  return {
    schemaVersion: 1,
    conversationId: state.conversationId,
    working,
    shortTerm: pushShortTerm(state.shortTerm, entry, options.shortTermWindow),
    longTerm: unionLongTerm(state.longTerm, facts, turn.entities, turn.turnNumber),
    coveredEntities: unionOrdered(state.coveredEntities, entityNames),
    coveredTopics: unionOrdered(state.coveredTopics, extractTopics(turn.rewrittenQuery)),
    depth,
    maxDepth: Math.max(state.maxDepth, depth),
    updatedAt: now,
  };
}
