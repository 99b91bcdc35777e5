/**
 * Shape checks for records read back from persistence. Stored JSON is
 * validated before it is trusted as a typed record.
 */

import Ajv, { ValidateFunction } from 'ajv';
import { Conversation, EntityCoverage, Feedback, Turn } from '../config/types';

const ajv = new Ajv({ allErrors: true });

const stringArray = { type: 'array', items: { type: 'string' } };

const conversationSchema = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    status: { enum: ['active', 'completed', 'abandoned'] },
    totalTurns: { type: 'integer', minimum: 0 },
    avgQualityScore: { type: ['number', 'null'] },
    goalAchieved: { type: 'boolean' },
  },
  required: ['id', 'status', 'startedAt', 'lastActiveAt', 'totalTurns', 'avgQualityScore', 'goalAchieved', 'createdAt', 'updatedAt'],
};

const turnSchema = {
  type: 'object',
  properties: {
    conversationId: { type: 'string' },
    turnNumber: { type: 'integer', minimum: 1 },
    answer: { type: 'string' },
    repetitionScore: { type: 'number', minimum: 0, maximum: 1 },
    entities: { type: 'array', items: { type: 'object', required: ['id', 'name', 'type'] } },
    answerEmbedding: { type: 'array', items: { type: 'number' } },
  },
  required: [
    'conversationId', 'turnNumber', 'rawQuery', 'rewrittenQuery', 'queryType', 'responseStrategy', 'answer',
    'quality', 'repetitionScore', 'overlapRatio', 'regenerated', 'regenerationAttempts', 'entities',
    'newEntitiesCount', 'documentsRetrieved', 'answerEmbedding', 'embeddingModel', 'timing', 'createdAt',
  ],
};

const coverageSchema = {
  type: 'object',
  properties: {
    entityId: { type: 'string' },
    mentionCount: { type: 'integer', minimum: 1 },
    factsCovered: stringArray,
    attributesCovered: stringArray,
  },
  required: [
    'conversationId', 'entityId', 'entityName', 'entityType', 'firstMentionedTurn', 'lastMentionedTurn',
    'mentionCount', 'factsCovered', 'attributesCovered', 'updatedAt',
  ],
};

const feedbackSchema = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    turnNumber: { type: ['integer', 'null'] },
    value: { type: 'number' },
  },
  required: ['id', 'conversationId', 'turnNumber', 'feedbackType', 'value', 'createdAt'],
};

export const validateConversation = ajv.compile<Conversation>(conversationSchema);
export const validateTurn = ajv.compile<Turn>(turnSchema);
export const validateCoverage = ajv.compile<EntityCoverage>(coverageSchema);
export const validateFeedback = ajv.compile<Feedback>(feedbackSchema);

/** Parse stored JSON and check it against `validate`; throws on mismatch. */
export function parseRecord<T>(validate: ValidateFunction<T>, raw: string, label: string): T {
  const data: unknown = JSON.parse(raw);
  if (!validate(data)) {
    const errors = validate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Malformed ${label} record: ${errors}`);
  }
  return data;
}
