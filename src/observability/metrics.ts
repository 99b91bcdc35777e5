import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

if (process.env.NODE_ENV !== 'test') {
  collectDefaultMetrics({ register: registry, prefix: 'dialog_' });
}

export const httpRequestDuration = new Histogram({
  name: 'dialog_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

export const turnsCommitted = new Counter({
  name: 'dialog_turns_committed_total',
  help: 'Turns committed, by query type',
  labelNames: ['query_type'] as const,
  registers: [registry],
});

export const turnsFailed = new Counter({
  name: 'dialog_turns_failed_total',
  help: 'Turns that ended in a reported failure, by error code',
  labelNames: ['code'] as const,
  registers: [registry],
});

export const regenerations = new Counter({
  name: 'dialog_regenerations_total',
  help: 'Regeneration attempts triggered by repetition',
  labelNames: ['directive'] as const,
  registers: [registry],
});

export const repetitionLoopsExhausted = new Counter({
  name: 'dialog_repetition_loops_exhausted_total',
  help: 'Turns finalised while still repetitive after the attempt cap',
  registers: [registry],
});

export const rewriteFallbacks = new Counter({
  name: 'dialog_rewrite_fallbacks_total',
  help: 'Query rewrites that fell back to the raw query',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const externalCallDuration = new Histogram({
  name: 'dialog_external_call_duration_seconds',
  help: 'Duration of calls to external collaborators',
  labelNames: ['dependency', 'status'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

export const llmRequestDuration = new Histogram({
  name: 'dialog_llm_request_duration_seconds',
  help: 'LLM completion latency by provider',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
  registers: [registry],
});

export const llmTokenUsage = new Counter({
  name: 'dialog_llm_tokens_total',
  help: 'LLM token usage',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [registry],
});

export const llmProviderFailovers = new Counter({
  name: 'dialog_llm_provider_failovers_total',
  help: 'Failovers between LLM providers',
  labelNames: ['from_provider', 'to_provider'] as const,
  registers: [registry],
});

export const conversationsAbandoned = new Counter({
  name: 'dialog_conversations_abandoned_total',
  help: 'Conversations marked abandoned by the inactivity sweep',
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
