import { GenerationPurpose } from '../engine/types';

// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'openai' | 'anthropic' | 'gemini';

export const LLM_PROVIDER_NAMES: readonly LLMProviderName[] = ['openai', 'anthropic', 'gemini'];

export function isProviderName(value: string): value is LLMProviderName {
  return LLM_PROVIDER_NAMES.some((name) => name === value);
}

// ─── Provider Configuration ───────────────────────────────────────
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  /** Standing instructions, sent the way each provider takes a system prompt */
  system?: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  content: string;
  /** Actual model identifier returned by the provider */
  model: string;
  /** Which provider served the request */
  provider: LLMProviderName;
  /** Token usage for cost tracking */
  usage: LLMTokenUsage;
  /** Wall-clock latency in milliseconds */
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /** Send a completion request and return the response. */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;

  /**
   * Lightweight connectivity check.
   * Returns true if the provider is reachable, false otherwise.
   */
  healthCheck(): Promise<boolean>;
}

// ─── Model Router Configuration ───────────────────────────────────
export interface ModelRouterConfig {
  primaryProvider: LLMProviderName;
  secondaryProvider?: LLMProviderName;
  tertiaryProvider?: LLMProviderName;
  /** Purpose → provider overrides, tried before the failover chain */
  purposeRouting?: Partial<Record<GenerationPurpose, LLMProviderName>>;
  /** Used when a call does not set maxTokens */
  defaultMaxTokens: number;
}
