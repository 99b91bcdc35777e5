import Ajv from 'ajv';
import { env } from './env';
import { QualityDimension } from './types';

/**
 * Tunable engine thresholds. The defaults are heuristics carried over from
 * production use, not derived optima; every one of them can be overridden.
 */
export interface EngineConfig {
  /** Cosine similarity above which an answer counts as a restatement */
  similarityThreshold: number;
  /** Entity overlap ratio above which an answer counts as a restatement */
  overlapThreshold: number;
  maxRegenerationAttempts: number;
  /** Short-term memory window size */
  shortTermWindow: number;
  /** Prior turns compared by the repetition detector */
  repetitionLookback: number;
  /** Prior turns handed to the rewrite prompt */
  rewriteHistoryTurns: number;
  rewriteAnswerChars: number;
  rewriteBudgetMs: number;
  embeddingTimeoutMs: number;
  generationTimeoutMs: number;
  retrievalTimeoutMs: number;
  rewriteTemperature: number;
  synthesisTemperature: number;
  /** Goal inference runs on turns up to this number when no goal is set */
  goalInferenceTurns: number;
  /** Characters of the answer kept in short-term memory */
  shortTermAnswerChars: number;
  qualityWeights: Record<QualityDimension, number>;
}

export const DEFAULT_QUALITY_WEIGHTS: Record<QualityDimension, number> = {
  specificity: 0.2,
  actionability: 0.2,
  strategicValue: 0.2,
  contextAwareness: 0.2,
  novelty: 0.2,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  similarityThreshold: 0.85,
  overlapThreshold: 0.7,
  maxRegenerationAttempts: 2,
  shortTermWindow: 5,
  repetitionLookback: 3,
  rewriteHistoryTurns: 2,
  rewriteAnswerChars: 200,
  rewriteBudgetMs: 500,
  embeddingTimeoutMs: 10_000,
  generationTimeoutMs: 30_000,
  retrievalTimeoutMs: 8_000,
  rewriteTemperature: 0,
  synthesisTemperature: 0.7,
  goalInferenceTurns: 3,
  shortTermAnswerChars: 500,
  qualityWeights: DEFAULT_QUALITY_WEIGHTS,
};

const unit = { type: 'number', minimum: 0, maximum: 1 };
const positiveInt = { type: 'integer', minimum: 1 };
const nonNegativeInt = { type: 'integer', minimum: 0 };
const temperature = { type: 'number', minimum: 0, maximum: 2 };

const engineConfigSchema = {
  type: 'object',
  properties: {
    similarityThreshold: unit,
    overlapThreshold: unit,
    maxRegenerationAttempts: nonNegativeInt,
    shortTermWindow: positiveInt,
    repetitionLookback: positiveInt,
    rewriteHistoryTurns: positiveInt,
    rewriteAnswerChars: positiveInt,
    rewriteBudgetMs: positiveInt,
    embeddingTimeoutMs: positiveInt,
    generationTimeoutMs: positiveInt,
    retrievalTimeoutMs: positiveInt,
    rewriteTemperature: temperature,
    synthesisTemperature: temperature,
    goalInferenceTurns: nonNegativeInt,
    shortTermAnswerChars: positiveInt,
    qualityWeights: {
      type: 'object',
      properties: {
        specificity: { type: 'number', minimum: 0 },
        actionability: { type: 'number', minimum: 0 },
        strategicValue: { type: 'number', minimum: 0 },
        contextAwareness: { type: 'number', minimum: 0 },
        novelty: { type: 'number', minimum: 0 },
      },
      required: ['specificity', 'actionability', 'strategicValue', 'contextAwareness', 'novelty'],
      additionalProperties: false,
    },
  },
  required: Object.keys(DEFAULT_ENGINE_CONFIG),
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateEngineConfig = ajv.compile<EngineConfig>(engineConfigSchema);

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws on out-of-range values (e.g. a threshold above 1).
 */
export function resolveEngineConfig(overrides?: Partial<EngineConfig>): EngineConfig {
  const merged: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    qualityWeights: { ...DEFAULT_QUALITY_WEIGHTS, ...overrides?.qualityWeights },
  };

  if (!validateEngineConfig(merged)) {
    const errors = validateEngineConfig.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid engine config: ${errors}`);
  }

  const weightSum = Object.values(merged.qualityWeights).reduce((sum, w) => sum + w, 0);
  if (weightSum <= 0) {
    throw new Error('Invalid engine config: quality weights must not all be zero');
  }

  return merged;
}

/** Engine config from environment variables. */
export function loadEngineConfig(): EngineConfig {
  return resolveEngineConfig({
    similarityThreshold: env.engine.similarityThreshold,
    overlapThreshold: env.engine.overlapThreshold,
    maxRegenerationAttempts: env.engine.maxRegenerationAttempts,
    shortTermWindow: env.engine.shortTermWindow,
    repetitionLookback: env.engine.repetitionLookback,
    rewriteBudgetMs: env.engine.rewriteBudgetMs,
    rewriteAnswerChars: env.engine.rewriteAnswerChars,
    embeddingTimeoutMs: env.engine.embeddingTimeoutMs,
    generationTimeoutMs: env.engine.generationTimeoutMs,
    retrievalTimeoutMs: env.engine.retrievalTimeoutMs,
    rewriteTemperature: env.engine.rewriteTemperature,
    synthesisTemperature: env.engine.synthesisTemperature,
    goalInferenceTurns: env.engine.goalInferenceTurns,
  });
}
