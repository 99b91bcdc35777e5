/**
 * Conversation State Manager — owns the memory layers of every conversation.
 *
 * Reads go straight to the store. Writes happen once per turn: the next
 * state, the touched coverage records and the updated conversation record
 * are staged off to the side, then handed to the store as one bundle. If the
 * store rejects the bundle, nothing has changed.
 */

import { EngineConfig } from '../config/engine-config';
import { Conversation, Fact, Turn } from '../config/types';
import { EntityCoverageLedger } from '../coverage/entity-coverage-ledger';
import { ConversationNotFoundError, PersistenceFailureError, isEngineError } from '../engine/errors';
import { ensureNotAborted } from '../engine/timeout';
import { SlotVocabulary } from '../knowledge/vocabulary';
import { logger } from '../observability/logger';
import { applyTurn, emptyState, toSnapshot } from './memory-layers';
import { CommitResult, ConversationState, ConversationStore, MemorySnapshot, TurnCommit } from './types';

const log = logger.child({ component: 'state-manager' });

export type StateManagerConfig = Pick<EngineConfig, 'shortTermWindow' | 'shortTermAnswerChars'>;

export interface CommitOptions {
  /** Goal inferred during this turn, stored with the same commit */
  inferredGoal?: string;
  signal?: AbortSignal;
}

export class ConversationStateManager {
  constructor(
    private readonly store: ConversationStore,
    private readonly vocabulary: SlotVocabulary,
    private readonly config: StateManagerConfig,
    private readonly clock: () => number = Date.now,
  ) {}

  async getConversation(conversationId: string): Promise<Conversation> {
    const conversation = await this.store.getConversation(conversationId);
    if (!conversation) throw new ConversationNotFoundError(conversationId);
    return conversation;
  }

  async loadState(conversationId: string): Promise<ConversationState> {
    return (await this.store.getState(conversationId)) ?? emptyState(conversationId, this.clock());
  }

  /** Working, short-term and long-term memory plus covered sets and depth. */
  async snapshot(conversationId: string): Promise<MemorySnapshot> {
    return toSnapshot(await this.loadState(conversationId));
  }

  async loadLedger(conversationId: string): Promise<EntityCoverageLedger> {
    const records = await this.store.getEntityCoverage(conversationId);
    return new EntityCoverageLedger(conversationId, this.vocabulary, records);
  }

  /**
   * Build the bundle a turn would write, without touching the store.
   * Inputs are not modified.
   */
  stage(
    conversation: Conversation,
    state: ConversationState,
    ledger: EntityCoverageLedger,
    turn: Turn,
    facts: Fact[],
    inferredGoal?: string,
  ): TurnCommit {
    const now = this.clock();
    const staged = ledger.clone();
    for (const entity of turn.entities) {
      staged.registerMention(entity, turn.turnNumber, facts, now);
    }

    const previousTurns = conversation.totalTurns;
    const avgQualityScore =
      conversation.avgQualityScore === null || previousTurns === 0
        ? turn.quality.overall
        : (conversation.avgQualityScore * previousTurns + turn.quality.overall) / (previousTurns + 1);

    const next: Conversation = {
      ...conversation,
      totalTurns: turn.turnNumber,
      avgQualityScore,
      lastActiveAt: now,
      updatedAt: now,
      embeddingModel: conversation.embeddingModel ?? turn.embeddingModel,
      ...(inferredGoal ? { inferredGoal } : {}),
    };

    return {
      conversation: next,
      turn,
      state: applyTurn(state, turn, facts, this.config, now),
      coverage: staged.changed(),
    };
  }

  /**
   * Append `turn` and apply it to every memory layer, all or nothing.
   * A turn number that was already committed returns the stored turn.
   */
  async commitTurn(turn: Turn, facts: Fact[], options: CommitOptions = {}): Promise<CommitResult> {
    const conversationId = turn.conversationId;

    try {
      const [conversation, state, ledger] = await Promise.all([
        this.getConversation(conversationId),
        this.loadState(conversationId),
        this.loadLedger(conversationId),
      ]);

      const bundle = this.stage(conversation, state, ledger, turn, facts, options.inferredGoal);
      ensureNotAborted(options.signal, 'commit');

      const result = await this.store.commitTurn(bundle);
      log.debug({ conversationId, turnNumber: turn.turnNumber, status: result.status }, 'Turn commit');
      return result;
    } catch (err) {
      if (isEngineError(err)) throw err;
      log.error({ err, conversationId, turnNumber: turn.turnNumber }, 'Turn commit failed');
      const message = err instanceof Error ? err.message : String(err);
      throw new PersistenceFailureError(`Failed to commit turn ${turn.turnNumber}: ${message}`, err);
    }
  }
}
