import Redis from 'ioredis';
import { Conversation, EntityCoverage, Turn } from '../config/types';
import { env } from '../config/env';
import { ConversationClosedError, ConversationNotFoundError, TurnConflictError } from '../engine/errors';
import { logger } from '../observability/logger';
import { upgradeState } from './memory-layers';
import {
  parseRecord,
  validateConversation,
  validateCoverage,
  validateTurn,
} from './record-schemas';
import {
  CommitResult,
  ConversationFilter,
  ConversationState,
  ConversationStore,
  TurnCommit,
  TurnRange,
} from './types';

function inRange(turnNumber: number, range?: TurnRange): boolean {
  if (range?.from !== undefined && turnNumber < range.from) return false;
  if (range?.to !== undefined && turnNumber > range.to) return false;
  return true;
}

function matchesFilter(conversation: Conversation, filter: ConversationFilter): boolean {
  if (filter.status && conversation.status !== filter.status) return false;
  if (filter.inactiveSince !== undefined && conversation.lastActiveAt >= filter.inactiveSince) return false;
  return true;
}

/**
 * Commit a turn bundle in one step. Turn log, state, coverage and the
 * conversation record change together or not at all. A conversation that is
 * no longer active takes no new turns.
 *
 * KEYS: conversation, turns, state, coverage
 * ARGV: turnNumber, turn, state, conversation, then coverage field/value pairs
 */
const COMMIT_SCRIPT = `
local conv = redis.call('GET', KEYS[1])
if not conv then return {'missing'} end
local existing = redis.call('HGET', KEYS[2], ARGV[1])
if existing then return {'duplicate', existing} end
local record = cjson.decode(conv)
if record['status'] ~= 'active' then return {'closed', record['status']} end
local total = record['totalTurns']
if tonumber(ARGV[1]) ~= total + 1 then return {'conflict', tostring(total)} end
redis.call('HSETNX', KEYS[2], ARGV[1], ARGV[2])
redis.call('SET', KEYS[3], ARGV[3])
redis.call('SET', KEYS[1], ARGV[4])
for i = 5, #ARGV, 2 do
  redis.call('HSET', KEYS[4], ARGV[i], ARGV[i + 1])
end
return {'committed'}
`;

/**
 * Redis-backed conversation store.
 *
 * Layout per conversation: a JSON conversation record, a hash of turns keyed
 * by turn number (the append-only log), a JSON state document, and a hash
 * of coverage records keyed by entity id.
 */
export class RedisConversationStore implements ConversationStore {
  private redis: Redis;
  private prefix: string;

  constructor(redis: Redis, prefix = env.redis.keyPrefix) {
    this.redis = redis;
    this.prefix = prefix;
  }

  private convKey(id: string): string {
    return `${this.prefix}conv:${id}`;
  }

  private turnsKey(id: string): string {
    return `${this.prefix}turns:${id}`;
  }

  private stateKey(id: string): string {
    return `${this.prefix}state:${id}`;
  }

  private coverageKey(id: string): string {
    return `${this.prefix}coverage:${id}`;
  }

  private get indexKey(): string {
    return `${this.prefix}conversations`;
  }

  async createConversation(conversation: Conversation): Promise<void> {
    const created = await this.redis.set(this.convKey(conversation.id), JSON.stringify(conversation), 'NX');
    if (created === null) {
      throw new Error(`Conversation ${conversation.id} already exists`);
    }
    await this.redis.sadd(this.indexKey, conversation.id);
  }

  async getConversation(conversationId: string): Promise<Conversation | null> {
    const raw = await this.redis.get(this.convKey(conversationId));
    return raw ? parseRecord(validateConversation, raw, 'conversation') : null;
  }

  async updateConversation(conversation: Conversation): Promise<void> {
    const updated = await this.redis.set(this.convKey(conversation.id), JSON.stringify(conversation), 'XX');
    if (updated === null) throw new ConversationNotFoundError(conversation.id);
  }

  async listConversations(filter: ConversationFilter): Promise<Conversation[]> {
    const ids = await this.redis.smembers(this.indexKey);
    if (ids.length === 0) return [];
    const raws = await this.redis.mget(ids.map((id) => this.convKey(id)));
    const conversations: Conversation[] = [];
    for (const raw of raws) {
      if (!raw) continue;
      const conversation = parseRecord(validateConversation, raw, 'conversation');
      if (matchesFilter(conversation, filter)) conversations.push(conversation);
    }
    return conversations;
  }

  async getState(conversationId: string): Promise<ConversationState | null> {
    const raw = await this.redis.get(this.stateKey(conversationId));
    if (!raw) return null;
    const data: unknown = JSON.parse(raw);
    return upgradeState(data);
  }

  async getTurn(conversationId: string, turnNumber: number): Promise<Turn | null> {
    const raw = await this.redis.hget(this.turnsKey(conversationId), String(turnNumber));
    return raw ? parseRecord(validateTurn, raw, 'turn') : null;
  }

  async getTurns(conversationId: string, range?: TurnRange): Promise<Turn[]> {
    const all = await this.redis.hgetall(this.turnsKey(conversationId));
    return Object.entries(all)
      .filter(([field]) => inRange(Number(field), range))
      .map(([, raw]) => parseRecord(validateTurn, raw, 'turn'))
      .sort((a, b) => a.turnNumber - b.turnNumber);
  }

  async getRecentTurns(conversationId: string, limit: number): Promise<Turn[]> {
    const conversation = await this.getConversation(conversationId);
    if (!conversation || conversation.totalTurns === 0 || limit <= 0) return [];
    const first = Math.max(1, conversation.totalTurns - limit + 1);
    const fields: string[] = [];
    for (let n = first; n <= conversation.totalTurns; n++) fields.push(String(n));
    const raws = await this.redis.hmget(this.turnsKey(conversationId), ...fields);
    return raws
      .filter((raw): raw is string => raw !== null)
      .map((raw) => parseRecord(validateTurn, raw, 'turn'));
  }

  async getEntityCoverage(conversationId: string): Promise<EntityCoverage[]> {
    const all = await this.redis.hgetall(this.coverageKey(conversationId));
    return Object.values(all).map((raw) => parseRecord(validateCoverage, raw, 'coverage'));
  }

  async commitTurn(bundle: TurnCommit): Promise<CommitResult> {
    const id = bundle.conversation.id;
    const coverageArgs = bundle.coverage.flatMap((c) => [c.entityId, JSON.stringify(c)]);

    const reply: unknown = await this.redis.eval(
      COMMIT_SCRIPT,
      4,
      this.convKey(id),
      this.turnsKey(id),
      this.stateKey(id),
      this.coverageKey(id),
      String(bundle.turn.turnNumber),
      JSON.stringify(bundle.turn),
      JSON.stringify(bundle.state),
      JSON.stringify(bundle.conversation),
      ...coverageArgs,
    );

    if (!Array.isArray(reply) || typeof reply[0] !== 'string') {
      throw new Error('Unexpected reply from commit script');
    }

    switch (reply[0]) {
      case 'committed':
        return { status: 'committed', turn: bundle.turn };
      case 'duplicate': {
        const stored = reply[1];
        if (typeof stored !== 'string') throw new Error('Duplicate turn reply without a record');
        return { status: 'duplicate', turn: parseRecord(validateTurn, stored, 'turn') };
      }
      case 'conflict':
        throw new TurnConflictError(id, Number(reply[1]) + 1, bundle.turn.turnNumber);
      case 'closed':
        throw new ConversationClosedError(id, String(reply[1]));
      case 'missing':
        throw new ConversationNotFoundError(id);
      default:
        throw new Error(`Unexpected commit status ${String(reply[0])}`);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (err) {
      logger.warn({ err }, 'Redis health check failed');
      return false;
    }
  }
}

/**
 * In-memory conversation store (dev/test fallback). Records are copied on
 * the way in and out, so callers never share mutable state with the store.
 */
export class InMemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, Conversation>();
  private turns = new Map<string, Map<number, Turn>>();
  private states = new Map<string, ConversationState>();
  private coverage = new Map<string, Map<string, EntityCoverage>>();

  async createConversation(conversation: Conversation): Promise<void> {
    if (this.conversations.has(conversation.id)) {
      throw new Error(`Conversation ${conversation.id} already exists`);
    }
    this.conversations.set(conversation.id, structuredClone(conversation));
  }

  async getConversation(conversationId: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(conversationId);
    return conversation ? structuredClone(conversation) : null;
  }

  async updateConversation(conversation: Conversation): Promise<void> {
    if (!this.conversations.has(conversation.id)) {
      throw new ConversationNotFoundError(conversation.id);
    }
    this.conversations.set(conversation.id, structuredClone(conversation));
  }

  async listConversations(filter: ConversationFilter): Promise<Conversation[]> {
    return [...this.conversations.values()]
      .filter((c) => matchesFilter(c, filter))
      .map((c) => structuredClone(c));
  }

  async getState(conversationId: string): Promise<ConversationState | null> {
    const state = this.states.get(conversationId);
    return state ? structuredClone(state) : null;
  }

  async getTurn(conversationId: string, turnNumber: number): Promise<Turn | null> {
    const turn = this.turns.get(conversationId)?.get(turnNumber);
    return turn ? structuredClone(turn) : null;
  }

  async getTurns(conversationId: string, range?: TurnRange): Promise<Turn[]> {
    const log = this.turns.get(conversationId);
    if (!log) return [];
    return [...log.values()]
      .filter((t) => inRange(t.turnNumber, range))
      .sort((a, b) => a.turnNumber - b.turnNumber)
      .map((t) => structuredClone(t));
  }

  async getRecentTurns(conversationId: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    const turns = await this.getTurns(conversationId);
    return turns.slice(-limit);
  }

  async getEntityCoverage(conversationId: string): Promise<EntityCoverage[]> {
    const records = this.coverage.get(conversationId);
    return records ? [...records.values()].map((r) => structuredClone(r)) : [];
  }

  async commitTurn(bundle: TurnCommit): Promise<CommitResult> {
    const id = bundle.conversation.id;
    const stored = this.conversations.get(id);
    if (!stored) throw new ConversationNotFoundError(id);

    const log = this.turns.get(id) ?? new Map<number, Turn>();
    const existing = log.get(bundle.turn.turnNumber);
    if (existing) return { status: 'duplicate', turn: structuredClone(existing) };
    if (stored.status !== 'active') throw new ConversationClosedError(id, stored.status);

    if (bundle.turn.turnNumber !== stored.totalTurns + 1) {
      throw new TurnConflictError(id, stored.totalTurns + 1, bundle.turn.turnNumber);
    }

    log.set(bundle.turn.turnNumber, structuredClone(bundle.turn));
    this.turns.set(id, log);
    this.states.set(id, structuredClone(bundle.state));
    const records = this.coverage.get(id) ?? new Map<string, EntityCoverage>();
    for (const record of bundle.coverage) records.set(record.entityId, structuredClone(record));
    this.coverage.set(id, records);
    this.conversations.set(id, structuredClone(bundle.conversation));

    return { status: 'committed', turn: structuredClone(bundle.turn) };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

/**
 * Create the appropriate store based on environment.
 */
export function createConversationStore(redis?: Redis): ConversationStore {
  if (redis) {
    return new RedisConversationStore(redis);
  }
  logger.warn('Using in-memory conversation store (no Redis)');
  return new InMemoryConversationStore();
}
