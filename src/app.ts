import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { EngineConfig, loadEngineConfig } from './config/engine-config';
import { env } from './config/env';
import { AbandonmentSweeper } from './engine/abandonment-sweeper';
import { ConversationEngine, createClassifier } from './engine/conversation-engine';
import { Embedder, FeedbackSink, Generator, Retriever } from './engine/types';
import { createFeedbackSink } from './feedback/feedback-collector';
import { GeneratorHealth, registerHealthRoutes } from './health/health-routes';
import { OpenAIEmbeddingProvider } from './knowledge/embedding-service';
import { Lexicon, SlotVocabulary, loadLexicon, loadSlotVocabulary } from './knowledge/vocabulary';
import { ModelRouter } from './llm/model-router';
import { buildProviders, routerConfigFromEnv } from './llm/provider-factory';
import { createConversationStore } from './memory/conversation-memory';
import { ConversationStore } from './memory/types';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createRetriever } from './retrieval/http-retriever';
import { registerConversationRoutes } from './routes/conversation-routes';

/** Collaborators that replace the environment-built ones (tests, embedding). */
export interface AppOverrides {
  store?: ConversationStore;
  feedback?: FeedbackSink;
  retriever?: Retriever;
  generator?: Generator;
  embedder?: Embedder;
  lexicon?: Lexicon;
  vocabulary?: SlotVocabulary;
  config?: EngineConfig;
  /** Defaults to ABANDON_SWEEP_ENABLED */
  startSweeper?: boolean;
}

export interface AppContext {
  app: FastifyInstance;
  engine: ConversationEngine;
  redis?: Redis;
  sweeper?: AbandonmentSweeper;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.url) {
    logger.warn('REDIS_URL not set; using in-memory store');
    return undefined;
  }
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // requests are logged through observability/logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const redis = overrides.store ? undefined : await connectRedis();
  const store = overrides.store ?? createConversationStore(redis);
  const feedback = overrides.feedback ?? createFeedbackSink(redis);

  // ───── Multi-LLM provider stack ─────
  let generator: Generator;
  let generatorHealth: GeneratorHealth | undefined;
  if (overrides.generator) {
    generator = overrides.generator;
  } else {
    const routerConfig = routerConfigFromEnv();
    const router = new ModelRouter(routerConfig, buildProviders(env));
    generator = router;
    generatorHealth = router;
  }

  const config = overrides.config ?? loadEngineConfig();
  const engine = new ConversationEngine({
    store,
    feedback,
    retriever: overrides.retriever ?? createRetriever(),
    generator,
    embedder: overrides.embedder ?? new OpenAIEmbeddingProvider(),
    lexicon: overrides.lexicon ?? loadLexicon(),
    vocabulary: overrides.vocabulary ?? loadSlotVocabulary(),
    config,
    classifier: createClassifier(env.engine.classifier, generator, config.rewriteBudgetMs),
  });

  registerHealthRoutes(app, store, generatorHealth);
  registerConversationRoutes(app, engine);

  let sweeper: AbandonmentSweeper | undefined;
  if (overrides.startSweeper ?? env.lifecycle.abandonSweepEnabled) {
    sweeper = new AbandonmentSweeper(
      engine,
      env.lifecycle.abandonAfterMinutes * 60_000,
      env.lifecycle.sweepIntervalMinutes * 60_000,
    );
    sweeper.start();
  }

  logger.info({ redis: Boolean(redis), sweeper: Boolean(sweeper) }, 'Application initialized');
  return { app, engine, redis, sweeper };
}
