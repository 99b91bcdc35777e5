import {
  Conversation,
  ConversationStatus,
  EntityCoverage,
  QueryType,
  ResponseStrategy,
  Turn,
} from '../config/types';

// ─── Memory layers (versioned, tagged by `kind` + `version`) ──────

/** Summary of the immediately preceding turn */
export interface WorkingMemoryV1 {
  kind: 'working';
  version: 1;
  turnNumber: number;
  query: string;
  rewrittenQuery: string;
  answerSummary: string;
  entities: string[];
  strategy: ResponseStrategy;
}

export type WorkingMemory = WorkingMemoryV1;

/** One entry in the rolling short-term window */
export interface ShortTermEntryV1 {
  kind: 'short_term';
  version: 1;
  turnNumber: number;
  query: string;
  rewrittenQuery: string;
  queryType: QueryType;
  answerExcerpt: string;
  /** Entity names in order of appearance */
  entities: string[];
  qualityScore: number;
}

export type ShortTermEntry = ShortTermEntryV1;

/** A durable fact, keyed by entity + fact identity */
export interface LongTermFactV1 {
  kind: 'long_term_fact';
  version: 1;
  key: string;
  entityId: string;
  entityName: string;
  factId: string;
  text: string;
  slots: string[];
  firstTurn: number;
}

export type LongTermFact = LongTermFactV1;

export interface ConversationStateV1 {
  schemaVersion: 1;
  conversationId: string;
  working: WorkingMemory | null;
  shortTerm: ShortTermEntry[];
  longTerm: Record<string, LongTermFact>;
  coveredEntities: string[];
  coveredTopics: string[];
  depth: number;
  maxDepth: number;
  updatedAt: number;
}

export type ConversationState = ConversationStateV1;

/** The three memory layers as handed to prompting */
export interface MemorySnapshot {
  conversationId: string;
  working: WorkingMemory | null;
  shortTerm: ShortTermEntry[];
  longTerm: LongTermFact[];
  coveredEntities: string[];
  coveredTopics: string[];
  depth: number;
}

// ─── Persistence ──────────────────────────────────────────────────

/** Everything one committed turn writes, applied all-or-nothing */
export interface TurnCommit {
  conversation: Conversation;
  turn: Turn;
  state: ConversationState;
  /** Coverage records touched by this turn (full records, not deltas) */
  coverage: EntityCoverage[];
}

export type CommitResult =
  | { status: 'committed'; turn: Turn }
  /** A turn with this number already exists; the stored one is returned */
  | { status: 'duplicate'; turn: Turn };

export interface TurnRange {
  from?: number;
  to?: number;
}

export interface ConversationFilter {
  status?: ConversationStatus;
  /** Only conversations whose lastActiveAt is before this timestamp */
  inactiveSince?: number;
}

export interface ConversationStore {
  createConversation(conversation: Conversation): Promise<void>;
  getConversation(conversationId: string): Promise<Conversation | null>;
  /** Lifecycle updates only (end, abandon); per-turn counters go through commitTurn */
  updateConversation(conversation: Conversation): Promise<void>;
  listConversations(filter: ConversationFilter): Promise<Conversation[]>;

  getState(conversationId: string): Promise<ConversationState | null>;
  getTurn(conversationId: string, turnNumber: number): Promise<Turn | null>;
  /** Turns in ascending turnNumber order, optionally bounded (inclusive) */
  getTurns(conversationId: string, range?: TurnRange): Promise<Turn[]>;
  /** The last `limit` turns, ascending */
  getRecentTurns(conversationId: string, limit: number): Promise<Turn[]>;
  getEntityCoverage(conversationId: string): Promise<EntityCoverage[]>;

  /**
   * Apply a turn bundle atomically. The turn number must be exactly
   * `conversation.totalTurns + 1` as stored; an existing turn with the same
   * number yields `duplicate`.
   */
  commitTurn(bundle: TurnCommit): Promise<CommitResult>;

  healthCheck(): Promise<boolean>;
}
