import { Conversation, EntityRef, QualityScores, Turn } from '../../src/config/types';
import { ShortTermEntry } from '../../src/memory/types';

export const QUALITY: QualityScores = {
  specificity: 0.5,
  actionability: 0.5,
  strategicValue: 0.5,
  contextAwareness: 0.5,
  novelty: 0.5,
  overall: 0.5,
};

export function entity(name: string, type = 'platform'): EntityRef {
  return { id: name.toLowerCase().replace(/[^a-z0-9]+/g, '-'), name, type };
}

export function makeTurn(turnNumber: number, overrides: Partial<Turn> = {}): Turn {
  return {
    conversationId: 'conv-1',
    turnNumber,
    rawQuery: `question ${turnNumber}`,
    rewrittenQuery: `question ${turnNumber}`,
    queryType: turnNumber === 1 ? 'initial' : 'expand',
    responseStrategy: 'breadth',
    answer: `Answer number ${turnNumber}.`,
    quality: QUALITY,
    repetitionScore: 0,
    overlapRatio: 0,
    regenerated: false,
    regenerationAttempts: 0,
    entities: [],
    newEntitiesCount: 0,
    documentsRetrieved: 0,
    answerEmbedding: [1, 0],
    embeddingModel: 'test-embed-v1',
    timing: { startedAt: 0, completedAt: 1, totalMs: 1, phases: {} },
    createdAt: 1,
    ...overrides,
  };
}

export function makeConversation(overrides: Partial<Conversation> = {}): Conversation {
  return {
    id: 'conv-1',
    status: 'active',
    startedAt: 1000,
    lastActiveAt: 1000,
    totalTurns: 0,
    avgQualityScore: null,
    goalAchieved: false,
    createdAt: 1000,
    updatedAt: 1000,
    ...overrides,
  };
}

export function shortTermEntry(turnNumber: number, overrides: Partial<ShortTermEntry> = {}): ShortTermEntry {
  return {
    kind: 'short_term',
    version: 1,
    turnNumber,
    query: `question ${turnNumber}`,
    rewrittenQuery: `question ${turnNumber}`,
    queryType: 'initial',
    answerExcerpt: `Answer number ${turnNumber}.`,
    entities: [],
    qualityScore: 0.5,
    ...overrides,
  };
}
