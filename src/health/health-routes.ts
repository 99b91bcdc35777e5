import { FastifyInstance } from 'fastify';
import { env } from '../config/env';
import { ConversationStore } from '../memory/types';
import { logger } from '../observability/logger';
import { getMetrics, getContentType } from '../observability/metrics';

const log = logger.child({ component: 'health' });

/** Anything that can report per-provider generator health */
export interface GeneratorHealth {
  healthCheck(): Promise<Record<string, { status: string; latencyMs: number }>>;
  /** True while every provider's circuit breaker is open */
  isFullyOpen(): boolean;
}

export function registerHealthRoutes(
  app: FastifyInstance,
  store: ConversationStore,
  generator?: GeneratorHealth,
): void {
  /** Liveness: 200 while the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness: the store, every configured LLM provider and the circuit breakers */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    const start = Date.now();
    try {
      const ok = await store.healthCheck();
      checks.store = { status: ok ? 'ok' : 'error', latencyMs: Date.now() - start };
    } catch (err) {
      log.warn({ err }, 'Store health check failed');
      checks.store = { status: 'error', latencyMs: Date.now() - start };
    }

    if (generator) {
      checks.llm_circuit = { status: generator.isFullyOpen() ? 'open' : 'ok' };
      try {
        const providerChecks = await generator.healthCheck();
        for (const [providerName, check] of Object.entries(providerChecks)) {
          checks[`llm_${providerName}`] = check;
        }
      } catch (err) {
        log.warn({ err }, 'Generator health check failed');
        checks.llm = { status: 'error' };
      }
    } else {
      checks.llm = { status: 'skipped' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    const statusCode = allOk ? 200 : 503;

    return reply.status(statusCode).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
