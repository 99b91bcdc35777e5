/**
 * Conversation Engine — the per-query pipeline and conversation lifecycle.
 *
 *   load memory → contextualize → retrieve → synthesize (with repetition
 *   control) → score → stage memory + coverage → commit
 *
 * Turns of one conversation are serialized; nothing is written before the
 * final commit, so a failed or cancelled turn leaves no trace.
 */

import { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { EngineConfig } from '../config/engine-config';
import {
  Conversation,
  EntityCoverage,
  Feedback,
  QueryType,
  Turn,
} from '../config/types';
import { ModelQueryClassifier, QueryClassifier, RuleBasedQueryClassifier } from '../contextualizer/query-classifier';
import { QueryContextualizer, RewriteFallbackReason } from '../contextualizer/query-contextualizer';
import { EntityCoverageLedger } from '../coverage/entity-coverage-ledger';
import { EntityExtractor } from '../extraction/entity-extractor';
import { slugify } from '../extraction/text';
import { Lexicon, SlotVocabulary } from '../knowledge/vocabulary';
import { ConversationStateManager } from '../memory/conversation-state-manager';
import { toSnapshot } from '../memory/memory-layers';
import { ConversationStore, TurnRange } from '../memory/types';
import { childLogger, logger } from '../observability/logger';
import { conversationsAbandoned, externalCallDuration, turnsCommitted, turnsFailed } from '../observability/metrics';
import { TraceContext, createTraceContext, spanTimings, withSpan } from '../observability/trace';
import { HeuristicQualityScorer, QualityScoringStrategy } from '../quality/quality-scorer';
import { RegenerationController } from '../repetition/regeneration-controller';
import { RepetitionDetector } from '../repetition/repetition-detector';
import { ConversationLock } from './conversation-lock';
import {
  ConversationClosedError,
  EmbeddingModelMismatchError,
  TurnCancelledError,
  TurnConflictError,
  TurnNotFoundError,
  isEngineError,
} from './errors';
import { inferGoal } from './goal-inference';
import { buildSynthesisPrompt } from './prompt-builder';
import { EntityPlan, planEntities, planStrategy } from './response-strategy';
import { ensureNotAborted, withTimeout } from './timeout';
import { Embedder, FeedbackInput, FeedbackSink, FeedbackStats, Generator, RetrievedDocument, Retriever } from './types';

export interface ConversationEngineDeps {
  store: ConversationStore;
  feedback: FeedbackSink;
  retriever: Retriever;
  generator: Generator;
  embedder: Embedder;
  lexicon: Lexicon;
  vocabulary: SlotVocabulary;
  config: EngineConfig;
  /** Defaults to the rule-based classifier */
  classifier?: QueryClassifier;
  /** Defaults to the heuristic scorer with the configured weights */
  scorer?: QualityScoringStrategy;
  clock?: () => number;
}

export interface StartConversationInput {
  goal?: string;
  userId?: string;
  sessionId?: string;
}

export interface ProcessQueryOptions {
  /** Intended turn number; makes a retried request idempotent */
  turnNumber?: number;
  signal?: AbortSignal;
  requestId?: string;
}

export interface TurnResult {
  turn: Turn;
  /** The turn had already been committed by an earlier request */
  duplicate: boolean;
  rewriteFallback?: RewriteFallbackReason;
  /** Still repetitive after the last allowed regeneration */
  repetitionExhausted: boolean;
  plan?: EntityPlan;
}

export interface EntitySummary {
  entityId: string;
  name: string;
  type: string;
  mentionCount: number;
  depthScore: number;
}

export interface ConversationStats {
  conversationId: string;
  status: Conversation['status'];
  totalTurns: number;
  avgQualityScore: number | null;
  goal?: string;
  inferredGoal?: string;
  goalAchieved: boolean;
  durationMs: number;
  regeneratedTurns: number;
  avgRepetitionScore: number;
  currentDepth: number;
  maxDepth: number;
  queryTypes: Record<QueryType, number>;
  uniqueEntities: number;
  topEntities: EntitySummary[];
  feedback: FeedbackStats;
}

const TOP_ENTITIES = 5;

export class ConversationEngine {
  private readonly store: ConversationStore;
  private readonly feedbackSink: FeedbackSink;
  private readonly retriever: Retriever;
  private readonly generator: Generator;
  private readonly embedder: Embedder;
  private readonly vocabulary: SlotVocabulary;
  private readonly config: EngineConfig;
  private readonly clock: () => number;

  private readonly lock = new ConversationLock();
  private readonly stateManager: ConversationStateManager;
  private readonly extractor: EntityExtractor;
  private readonly contextualizer: QueryContextualizer;
  private readonly regeneration: RegenerationController;
  private readonly scorer: QualityScoringStrategy;
  private readonly log = logger.child({ component: 'conversation-engine' });

  constructor(deps: ConversationEngineDeps) {
    this.store = deps.store;
    this.feedbackSink = deps.feedback;
    this.retriever = deps.retriever;
    this.generator = deps.generator;
    this.embedder = deps.embedder;
    this.vocabulary = deps.vocabulary;
    this.config = deps.config;
    this.clock = deps.clock ?? Date.now;

    this.stateManager = new ConversationStateManager(deps.store, deps.vocabulary, deps.config, this.clock);
    this.extractor = new EntityExtractor(deps.lexicon, deps.vocabulary);
    this.contextualizer = new QueryContextualizer(
      deps.generator,
      deps.classifier ?? new RuleBasedQueryClassifier(),
      this.extractor,
      deps.config,
    );
    this.regeneration = new RegenerationController(
      deps.generator,
      new RepetitionDetector(deps.embedder, deps.config),
      deps.config,
    );
    this.scorer = deps.scorer ?? new HeuristicQualityScorer(deps.lexicon, deps.config.qualityWeights);
  }

  // ─── Lifecycle ────────────────────────────────────────────────

  async startConversation(input: StartConversationInput = {}): Promise<Conversation> {
    const now = this.clock();
    const conversation: Conversation = {
      id: uuidv4(),
      ...(input.userId ? { userId: input.userId } : {}),
      ...(input.sessionId ? { sessionId: input.sessionId } : {}),
      ...(input.goal ? { goal: input.goal } : {}),
      status: 'active',
      startedAt: now,
      lastActiveAt: now,
      totalTurns: 0,
      avgQualityScore: null,
      goalAchieved: false,
      createdAt: now,
      updatedAt: now,
    };
    await this.store.createConversation(conversation);
    this.log.info({ conversationId: conversation.id, hasGoal: Boolean(input.goal) }, 'Conversation started');
    return conversation;
  }

  async endConversation(conversationId: string, goalAchieved = false): Promise<Conversation> {
    return this.lock.run(conversationId, async () => {
      const conversation = await this.stateManager.getConversation(conversationId);
      if (conversation.status !== 'active') {
        throw new ConversationClosedError(conversationId, conversation.status);
      }
      const now = this.clock();
      const ended: Conversation = {
        ...conversation,
        status: 'completed',
        goalAchieved,
        endedAt: now,
        updatedAt: now,
      };
      await this.store.updateConversation(ended);
      this.log.info({ conversationId, goalAchieved, totalTurns: ended.totalTurns }, 'Conversation ended');
      return ended;
    });
  }

  /**
   * Mark active conversations idle since before `inactiveBefore` as
   * abandoned. Returns how many were marked.
   */
  async markAbandoned(inactiveBefore: number): Promise<number> {
    const candidates = await this.store.listConversations({ status: 'active', inactiveSince: inactiveBefore });
    let marked = 0;

    for (const candidate of candidates) {
      const changed = await this.lock.run(candidate.id, async () => {
        const current = await this.store.getConversation(candidate.id);
        if (!current || current.status !== 'active' || current.lastActiveAt >= inactiveBefore) return false;
        const now = this.clock();
        await this.store.updateConversation({ ...current, status: 'abandoned', endedAt: now, updatedAt: now });
        return true;
      });
      if (changed) {
        marked++;
        conversationsAbandoned.inc();
      }
    }

    if (marked > 0) this.log.info({ marked }, 'Conversations marked abandoned');
    return marked;
  }

  async getConversation(
    conversationId: string,
    range?: TurnRange,
  ): Promise<{ conversation: Conversation; turns: Turn[] }> {
    const conversation = await this.stateManager.getConversation(conversationId);
    const turns = await this.store.getTurns(conversationId, range);
    return { conversation, turns };
  }

  async addFeedback(input: FeedbackInput): Promise<Feedback> {
    const conversation = await this.stateManager.getConversation(input.conversationId);
    if (input.turnNumber !== null && (input.turnNumber < 1 || input.turnNumber > conversation.totalTurns)) {
      throw new TurnNotFoundError(input.conversationId, input.turnNumber);
    }
    return this.feedbackSink.record(input);
  }

  async getStats(conversationId: string): Promise<ConversationStats> {
    const conversation = await this.stateManager.getConversation(conversationId);
    const [turns, coverage, state, feedback] = await Promise.all([
      this.store.getTurns(conversationId),
      this.store.getEntityCoverage(conversationId),
      this.stateManager.loadState(conversationId),
      this.feedbackSink.stats(conversationId),
    ]);

    const ledger = new EntityCoverageLedger(conversationId, this.vocabulary, coverage);
    const queryTypes: Record<QueryType, number> = {
      initial: 0,
      expand: 0,
      deepen: 0,
      compare: 0,
      clarify: 0,
      new_topic: 0,
    };
    for (const turn of turns) queryTypes[turn.queryType]++;

    return {
      conversationId,
      status: conversation.status,
      totalTurns: conversation.totalTurns,
      avgQualityScore: conversation.avgQualityScore,
      ...(conversation.goal ? { goal: conversation.goal } : {}),
      ...(conversation.inferredGoal ? { inferredGoal: conversation.inferredGoal } : {}),
      goalAchieved: conversation.goalAchieved,
      durationMs: (conversation.endedAt ?? conversation.lastActiveAt) - conversation.startedAt,
      regeneratedTurns: turns.filter((t) => t.regenerated).length,
      avgRepetitionScore: turns.length > 0 ? turns.reduce((sum, t) => sum + t.repetitionScore, 0) / turns.length : 0,
      currentDepth: state.depth,
      maxDepth: state.maxDepth,
      queryTypes,
      uniqueEntities: coverage.length,
      topEntities: this.topEntities(coverage, ledger),
      feedback,
    };
  }

  // ─── Turn pipeline ────────────────────────────────────────────

  async processQuery(conversationId: string, query: string, options: ProcessQueryOptions = {}): Promise<TurnResult> {
    return this.lock.run(conversationId, async () => {
      try {
        return await this.runTurn(conversationId, query, options);
      } catch (err) {
        turnsFailed.inc({ code: isEngineError(err) ? err.code : 'INTERNAL' });
        throw err;
      }
    });
  }

  private async runTurn(conversationId: string, query: string, options: ProcessQueryOptions): Promise<TurnResult> {
    const { signal } = options;
    ensureNotAborted(signal, 'queue');

    const conversation = await this.stateManager.getConversation(conversationId);
    const expected = conversation.totalTurns + 1;

    if (options.turnNumber !== undefined && options.turnNumber < expected) {
      const stored = await this.store.getTurn(conversationId, options.turnNumber);
      if (stored) return { turn: stored, duplicate: true, repetitionExhausted: false };
    }
    if (conversation.status !== 'active') {
      throw new ConversationClosedError(conversationId, conversation.status);
    }
    if (options.turnNumber !== undefined && options.turnNumber !== expected) {
      throw new TurnConflictError(conversationId, expected, options.turnNumber);
    }
    if (conversation.embeddingModel && conversation.embeddingModel !== this.embedder.model) {
      throw new EmbeddingModelMismatchError(conversationId, conversation.embeddingModel, this.embedder.model);
    }

    const turnNumber = expected;
    const startedAt = this.clock();
    const trace = createTraceContext({ requestId: options.requestId, conversationId, turnNumber });
    const log = childLogger(trace.requestId, { conversationId, turnNumber });

    const [state, ledger, priorTurns] = await Promise.all([
      this.stateManager.loadState(conversationId),
      this.stateManager.loadLedger(conversationId),
      this.store.getRecentTurns(conversationId, this.config.repetitionLookback),
    ]);
    const snapshot = toSnapshot(state);

    const contextualized = await withSpan(trace, 'rewrite', () =>
      this.contextualizer.contextualize(query, snapshot.shortTerm, signal),
    );
    const { queryType, rewrittenQuery } = contextualized;
    const strategy = planStrategy(queryType, query);
    const plan = planEntities(queryType, rewrittenQuery, contextualized.queryEntities, snapshot);

    const documents = await withSpan(trace, 'retrieve', () => this.retrieve(rewrittenQuery, plan, signal, log));
    const goal = conversation.goal ?? conversation.inferredGoal;

    const outcome = await this.regeneration.run({
      buildPrompt: (directive) =>
        buildSynthesisPrompt({ query: rewrittenQuery, strategy, plan, snapshot, documents, goal }, directive),
      extract: (answer) => this.extractor.extract(answer),
      priors: priorTurns.map((t) => ({
        turnNumber: t.turnNumber,
        answerEmbedding: t.answerEmbedding,
        entityIds: t.entities.map((e) => e.id),
      })),
      relevantEntityIds: plan.include.map(slugify),
      ledger,
      signal,
      trace,
    });

    const { entities, facts } = outcome.extraction;
    const quality = this.scorer.score({
      answer: outcome.answer,
      entities: entities.map((e) => e.name),
      history: snapshot.shortTerm,
      repetitionScore: outcome.assessment.repetitionScore,
    });

    const inferredGoal = await this.maybeInferGoal(
      conversation,
      snapshot.shortTerm.map((e) => e.query),
      query,
      turnNumber,
      trace,
      signal,
    );

    const completedAt = this.clock();
    const turn: Turn = {
      conversationId,
      turnNumber,
      rawQuery: query,
      rewrittenQuery,
      queryType,
      responseStrategy: strategy,
      answer: outcome.answer,
      quality,
      repetitionScore: outcome.assessment.repetitionScore,
      overlapRatio: outcome.assessment.overlapRatio,
      regenerated: outcome.regenerated,
      regenerationAttempts: outcome.attempts,
      entities,
      newEntitiesCount: entities.filter((e) => !ledger.get(e.id)).length,
      documentsRetrieved: documents.length,
      answerEmbedding: outcome.assessment.embedding,
      embeddingModel: this.embedder.model,
      timing: {
        startedAt,
        completedAt,
        totalMs: completedAt - startedAt,
        phases: spanTimings(trace),
      },
      createdAt: completedAt,
    };

    ensureNotAborted(signal, 'commit');
    const result = await this.stateManager.commitTurn(turn, facts, {
      ...(inferredGoal ? { inferredGoal } : {}),
      signal,
    });

    if (result.status === 'duplicate') {
      log.warn('Turn number already committed by another request; returning stored turn');
      return { turn: result.turn, duplicate: true, repetitionExhausted: false };
    }

    turnsCommitted.inc({ query_type: queryType });
    log.info(
      {
        queryType,
        strategy,
        rewritten: contextualized.rewritten,
        regenerationAttempts: outcome.attempts,
        repetitionScore: outcome.assessment.repetitionScore,
        overlapRatio: outcome.assessment.overlapRatio,
        quality: quality.overall,
        entities: entities.length,
        documents: documents.length,
        totalMs: turn.timing.totalMs,
      },
      'Turn committed',
    );

    return {
      turn: result.turn,
      duplicate: false,
      ...(contextualized.fallbackReason ? { rewriteFallback: contextualized.fallbackReason } : {}),
      repetitionExhausted: outcome.exhausted,
      plan,
    };
  }

  /** Retrieval failures degrade to an answer without evidence. */
  private async retrieve(
    query: string,
    plan: EntityPlan,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<RetrievedDocument[]> {
    const start = Date.now();
    try {
      const documents = await withTimeout(
        'retrieval',
        this.config.retrievalTimeoutMs,
        (s) => this.retriever.retrieve(query, { signal: s, hints: plan }),
        signal,
      );
      externalCallDuration.observe({ dependency: 'retrieval', status: 'ok' }, (Date.now() - start) / 1000);
      return documents;
    } catch (err) {
      externalCallDuration.observe({ dependency: 'retrieval', status: 'error' }, (Date.now() - start) / 1000);
      if (err instanceof TurnCancelledError) throw err;
      log.warn({ err }, 'Retrieval failed, answering without documents');
      return [];
    }
  }

  private async maybeInferGoal(
    conversation: Conversation,
    previousQueries: string[],
    query: string,
    turnNumber: number,
    trace: TraceContext,
    signal?: AbortSignal,
  ): Promise<string | null> {
    if (conversation.goal || turnNumber > this.config.goalInferenceTurns) return null;
    return withSpan(trace, 'goal', () =>
      inferGoal(this.generator, [...previousQueries, query], this.config.generationTimeoutMs, signal),
    );
  }

  private topEntities(coverage: EntityCoverage[], ledger: EntityCoverageLedger): EntitySummary[] {
    return [...coverage]
      .sort((a, b) => b.mentionCount - a.mentionCount || a.firstMentionedTurn - b.firstMentionedTurn)
      .slice(0, TOP_ENTITIES)
      .map((c) => ({
        entityId: c.entityId,
        name: c.entityName,
        type: c.entityType,
        mentionCount: c.mentionCount,
        depthScore: ledger.depthScore(c.entityId),
      }));
  }
}

/** `model` asks the Generator and falls back to the rules; anything else uses the rules. */
export function createClassifier(kind: string, generator: Generator, budgetMs: number): QueryClassifier {
  const rules = new RuleBasedQueryClassifier();
  return kind === 'model' ? new ModelQueryClassifier(generator, rules, budgetMs) : rules;
}
