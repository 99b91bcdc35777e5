/** Conversation lifecycle status */
export type ConversationStatus = 'active' | 'completed' | 'abandoned';

/** How a query relates to the conversation so far */
export type QueryType = 'initial' | 'expand' | 'deepen' | 'compare' | 'clarify' | 'new_topic';

export const QUERY_TYPES: readonly QueryType[] = [
  'initial',
  'expand',
  'deepen',
  'compare',
  'clarify',
  'new_topic',
];

/** Shape of the answer the synthesis prompt asks for */
export type ResponseStrategy =
  | 'breadth'
  | 'depth'
  | 'compare'
  | 'strategic_advice'
  | 'actionable_steps';

/** Conversation record (one per conversation) */
export interface Conversation {
  id: string;
  userId?: string;
  sessionId?: string;
  /** Free-text goal supplied by the user at start */
  goal?: string;
  /** Goal inferred from the first turns when none was supplied */
  inferredGoal?: string;
  status: ConversationStatus;
  startedAt: number;
  lastActiveAt: number;
  endedAt?: number;
  totalTurns: number;
  /** Rolling mean of committed turns' overall quality; null before the first turn */
  avgQualityScore: number | null;
  goalAchieved: boolean;
  /** Embedding model pinned by the first committed turn */
  embeddingModel?: string;
  createdAt: number;
  updatedAt: number;
}

/** Quality sub-scores, each in [0, 1] */
export interface QualityScores {
  specificity: number;
  actionability: number;
  strategicValue: number;
  contextAwareness: number;
  novelty: number;
  overall: number;
}

export type QualityDimension = Exclude<keyof QualityScores, 'overall'>;

/** A named thing mentioned in an answer */
export interface EntityRef {
  /** Stable slug derived from the name */
  id: string;
  name: string;
  /** Key into the slot vocabulary */
  type: string;
}

/** A single statement about an entity, extracted from an answer */
export interface Fact {
  id: string;
  entityId: string;
  text: string;
  /** Attribute slots this fact covers */
  slots: string[];
}

export interface TurnTiming {
  startedAt: number;
  completedAt: number;
  totalMs: number;
  /** Milliseconds spent per phase (rewrite, retrieve, generate, embed, ...) */
  phases: Record<string, number>;
}

/** Immutable record of one committed exchange */
export interface Turn {
  conversationId: string;
  turnNumber: number;
  rawQuery: string;
  rewrittenQuery: string;
  queryType: QueryType;
  responseStrategy: ResponseStrategy;
  answer: string;
  quality: QualityScores;
  repetitionScore: number;
  overlapRatio: number;
  regenerated: boolean;
  regenerationAttempts: number;
  /** Entities in order of first appearance in the answer */
  entities: EntityRef[];
  newEntitiesCount: number;
  documentsRetrieved: number;
  answerEmbedding: number[];
  embeddingModel: string;
  timing: TurnTiming;
  createdAt: number;
}

/** Per-(conversation, entity) coverage record */
export interface EntityCoverage {
  conversationId: string;
  entityId: string;
  entityName: string;
  entityType: string;
  firstMentionedTurn: number;
  lastMentionedTurn: number;
  mentionCount: number;
  factsCovered: string[];
  attributesCovered: string[];
  updatedAt: number;
}

export type FeedbackType = 'thumbs_up' | 'thumbs_down' | 'rating' | 'comment' | 'implicit';

export const FEEDBACK_TYPES: readonly FeedbackType[] = [
  'thumbs_up',
  'thumbs_down',
  'rating',
  'comment',
  'implicit',
];

/** Append-only feedback signal; read by monitoring, never by the turn pipeline */
export interface Feedback {
  id: string;
  conversationId: string;
  /** null for conversation-level feedback */
  turnNumber: number | null;
  feedbackType: FeedbackType;
  value: number;
  comment?: string;
  implicitSignals?: Record<string, string | number | boolean>;
  createdAt: number;
}
