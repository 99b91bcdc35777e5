import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),

  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 800),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 800),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 30000),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
    maxTokens: optionalInt('GEMINI_MAX_TOKENS', 800),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 30000),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'openai'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
    tertiaryProvider: optional('LLM_TERTIARY_PROVIDER', ''),
    /** Provider for query rewriting, classification and goal inference */
    rewriteProvider: optional('LLM_REWRITE_PROVIDER', ''),
  },

  embedding: {
    baseUrl: optional('EMBEDDING_BASE_URL', 'https://api.openai.com/v1'),
    apiKey: optional('EMBEDDING_API_KEY', optional('OPENAI_API_KEY', '')),
    model: optional('EMBEDDING_MODEL', 'text-embedding-3-small'),
  },

  retriever: {
    url: optional('RETRIEVER_URL', ''),
    apiKey: optional('RETRIEVER_API_KEY', ''),
    topK: optionalInt('RETRIEVER_TOP_K', 5),
  },

  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'dialog:'),
  },

  // ───── Engine thresholds (heuristic, tunable) ─────
  engine: {
    similarityThreshold: optionalFloat('REPETITION_SIMILARITY_THRESHOLD', 0.85),
    overlapThreshold: optionalFloat('REPETITION_OVERLAP_THRESHOLD', 0.7),
    maxRegenerationAttempts: optionalInt('MAX_REGENERATION_ATTEMPTS', 2),
    shortTermWindow: optionalInt('SHORT_TERM_WINDOW', 5),
    repetitionLookback: optionalInt('REPETITION_LOOKBACK_TURNS', 3),
    rewriteBudgetMs: optionalInt('REWRITE_BUDGET_MS', 500),
    rewriteAnswerChars: optionalInt('REWRITE_ANSWER_CHARS', 200),
    embeddingTimeoutMs: optionalInt('EMBEDDING_CALL_TIMEOUT_MS', 10000),
    generationTimeoutMs: optionalInt('GENERATION_CALL_TIMEOUT_MS', 30000),
    retrievalTimeoutMs: optionalInt('RETRIEVAL_CALL_TIMEOUT_MS', 8000),
    synthesisTemperature: optionalFloat('SYNTHESIS_TEMPERATURE', 0.7),
    rewriteTemperature: optionalFloat('REWRITE_TEMPERATURE', 0),
    goalInferenceTurns: optionalInt('GOAL_INFERENCE_TURNS', 3),
    /** 'rules' or 'model' */
    classifier: optional('QUERY_CLASSIFIER', 'rules'),
  },

  // ───── Conversation lifecycle ─────
  lifecycle: {
    abandonSweepEnabled: optionalBool('ABANDON_SWEEP_ENABLED', true),
    abandonAfterMinutes: optionalInt('ABANDON_AFTER_MINUTES', 30),
    sweepIntervalMinutes: optionalInt('ABANDON_SWEEP_INTERVAL_MINUTES', 5),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;
