import { Feedback, FeedbackType } from '../config/types';

// ─── Retriever ────────────────────────────────────────────────────
export interface RetrievedDocument {
  content: string;
  sourceMetadata: Record<string, unknown>;
  /** ISO timestamp of the source's last update, when known */
  freshnessTimestamp: string | null;
}

export interface RetrievalHints {
  /** Entities the answer should focus on (comparisons, drill-downs) */
  include: string[];
  /** Entities already covered that retrieval may de-prioritise */
  exclude: string[];
}

export interface RetrieveOptions {
  signal?: AbortSignal;
  hints?: RetrievalHints;
}

export interface Retriever {
  /** Ranked evidence for a standalone query */
  retrieve(query: string, options?: RetrieveOptions): Promise<RetrievedDocument[]>;
}

// ─── Generator ────────────────────────────────────────────────────
export type GenerationPurpose = 'rewrite' | 'classify' | 'goal' | 'synthesis';

export interface GenerateOptions {
  temperature: number;
  /** Entities the output must not mention */
  exclusionList?: string[];
  maxTokens?: number;
  signal?: AbortSignal;
  /** Tags the call for logs, metrics and test doubles */
  purpose?: GenerationPurpose;
}

export interface Generator {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

// ─── Embedder ─────────────────────────────────────────────────────
export interface Embedder {
  /** Model identifier; similarity is only comparable within one model */
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

// ─── Feedback ─────────────────────────────────────────────────────
export interface FeedbackInput {
  conversationId: string;
  turnNumber: number | null;
  feedbackType: FeedbackType;
  value: number;
  comment?: string;
  implicitSignals?: Record<string, string | number | boolean>;
}

export interface FeedbackStats {
  totalFeedback: number;
  /** Share of feedback with value > 0.5 */
  positiveRate: number;
  avgValue: number;
}

export interface FeedbackSink {
  record(input: FeedbackInput): Promise<Feedback>;
  list(conversationId: string): Promise<Feedback[]>;
  stats(conversationId: string): Promise<FeedbackStats>;
}
