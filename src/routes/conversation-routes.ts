import { FastifyInstance, FastifyReply } from 'fastify';
import { FEEDBACK_TYPES, FeedbackType, Turn } from '../config/types';
import { ConversationEngine, TurnResult } from '../engine/conversation-engine';
import { EngineErrorCode, isEngineError } from '../engine/errors';
import { logger } from '../observability/logger';

interface IdParams {
  id: string;
}

/** POST /api/conversations */
interface StartBody {
  goal?: string;
  userId?: string;
  sessionId?: string;
}

/** POST /api/conversations/:id/query */
interface QueryBody {
  query: string;
  turnNumber?: number;
}

/** POST /api/conversations/:id/feedback */
interface FeedbackBody {
  turnNumber?: number | null;
  feedbackType: FeedbackType;
  value: number;
  comment?: string;
  implicitSignals?: Record<string, string | number | boolean>;
}

/** POST /api/conversations/:id/end */
interface EndBody {
  goalAchieved?: boolean;
}

interface RangeQuery {
  from?: number;
  to?: number;
}

const idParams = {
  type: 'object',
  properties: { id: { type: 'string', minLength: 1 } },
  required: ['id'],
} as const;

const startSchema = {
  type: 'object',
  properties: {
    goal: { type: 'string', maxLength: 500 },
    userId: { type: 'string', maxLength: 200 },
    sessionId: { type: 'string', maxLength: 200 },
  },
  additionalProperties: false,
} as const;

const querySchema = {
  type: 'object',
  properties: {
    query: { type: 'string', minLength: 1, maxLength: 4000 },
    turnNumber: { type: 'integer', minimum: 1 },
  },
  required: ['query'],
  additionalProperties: false,
} as const;

const feedbackSchema = {
  type: 'object',
  properties: {
    turnNumber: { type: ['integer', 'null'], minimum: 1 },
    feedbackType: { type: 'string', enum: [...FEEDBACK_TYPES] },
    value: { type: 'number', minimum: 0, maximum: 1 },
    comment: { type: 'string', maxLength: 2000 },
    implicitSignals: {
      type: 'object',
      additionalProperties: { type: ['string', 'number', 'boolean'] },
    },
  },
  required: ['feedbackType', 'value'],
  additionalProperties: false,
} as const;

const endSchema = {
  type: 'object',
  properties: { goalAchieved: { type: 'boolean' } },
  additionalProperties: false,
} as const;

const rangeSchema = {
  type: 'object',
  properties: {
    from: { type: 'integer', minimum: 1 },
    to: { type: 'integer', minimum: 1 },
  },
} as const;

const STATUS_BY_CODE: Record<EngineErrorCode, number> = {
  CONVERSATION_NOT_FOUND: 404,
  TURN_NOT_FOUND: 404,
  CONVERSATION_CLOSED: 409,
  TURN_CONFLICT: 409,
  EMBEDDING_MODEL_MISMATCH: 409,
  TURN_CANCELLED: 499,
  EMBEDDING_FAILURE: 502,
  GENERATION_FAILURE: 502,
  EXTERNAL_TIMEOUT: 504,
  PERSISTENCE_FAILURE: 503,
};

const log = logger.child({ component: 'conversation-routes' });

/** HTTP status for an error thrown by the engine. */
export function statusForError(err: unknown): number {
  return isEngineError(err) ? STATUS_BY_CODE[err.code] : 500;
}

function sendError(reply: FastifyReply, err: unknown): FastifyReply {
  const status = statusForError(err);
  if (isEngineError(err)) {
    if (status >= 500) log.error({ err }, 'Request failed');
    return reply.status(status).send({ error: err.message, code: err.code, retryable: err.retryable });
  }
  log.error({ err }, 'Unhandled error');
  return reply.status(500).send({ error: 'Internal error', code: 'INTERNAL', retryable: false });
}

/** Turn as returned over HTTP; the embedding stays server-side. */
export function turnView(turn: Turn): Omit<Turn, 'answerEmbedding'> {
  const { answerEmbedding: _embedding, ...rest } = turn;
  return rest;
}

function turnResultView(result: TurnResult) {
  return {
    turn: turnView(result.turn),
    duplicate: result.duplicate,
    repetitionExhausted: result.repetitionExhausted,
    ...(result.rewriteFallback ? { rewriteFallback: result.rewriteFallback } : {}),
    ...(result.plan ? { plan: result.plan } : {}),
  };
}

export function registerConversationRoutes(app: FastifyInstance, engine: ConversationEngine): void {
  // ─────────────────────────────────────────────
  // POST /api/conversations — Start a conversation
  // ─────────────────────────────────────────────
  app.post<{ Body: StartBody }>('/api/conversations', { schema: { body: startSchema } }, async (req, reply) => {
    try {
      const conversation = await engine.startConversation(req.body ?? {});
      return reply.status(201).send({ conversation });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ─────────────────────────────────────────────
  // POST /api/conversations/:id/query — Run one turn
  // ─────────────────────────────────────────────
  app.post<{ Params: IdParams; Body: QueryBody }>(
    '/api/conversations/:id/query',
    { schema: { params: idParams, body: querySchema } },
    async (req, reply) => {
      // A client that goes away cancels the turn; nothing is committed.
      const controller = new AbortController();
      const onClose = () => {
        if (!reply.raw.writableFinished) controller.abort(new Error('client disconnected'));
      };
      reply.raw.on('close', onClose);

      try {
        const result = await engine.processQuery(req.params.id, req.body.query, {
          turnNumber: req.body.turnNumber,
          signal: controller.signal,
          requestId: req.id,
        });
        return reply.status(200).send(turnResultView(result));
      } catch (err) {
        return sendError(reply, err);
      } finally {
        reply.raw.off('close', onClose);
      }
    },
  );

  // ─────────────────────────────────────────────
  // POST /api/conversations/:id/feedback
  // ─────────────────────────────────────────────
  app.post<{ Params: IdParams; Body: FeedbackBody }>(
    '/api/conversations/:id/feedback',
    { schema: { params: idParams, body: feedbackSchema } },
    async (req, reply) => {
      try {
        const feedback = await engine.addFeedback({
          conversationId: req.params.id,
          turnNumber: req.body.turnNumber ?? null,
          feedbackType: req.body.feedbackType,
          value: req.body.value,
          ...(req.body.comment !== undefined ? { comment: req.body.comment } : {}),
          ...(req.body.implicitSignals !== undefined ? { implicitSignals: req.body.implicitSignals } : {}),
        });
        return reply.status(201).send({ feedback });
      } catch (err) {
        return sendError(reply, err);
      }
    },
  );

  // ─────────────────────────────────────────────
  // GET /api/conversations/:id — Conversation + turns
  // ─────────────────────────────────────────────
  app.get<{ Params: IdParams; Querystring: RangeQuery }>(
    '/api/conversations/:id',
    { schema: { params: idParams, querystring: rangeSchema } },
    async (req, reply) => {
      try {
        const { conversation, turns } = await engine.getConversation(req.params.id, {
          from: req.query.from,
          to: req.query.to,
        });
        return reply.send({ conversation, turns: turns.map(turnView) });
      } catch (err) {
        return sendError(reply, err);
      }
    },
  );

  // ─────────────────────────────────────────────
  // GET /api/conversations/:id/stats
  // ─────────────────────────────────────────────
  app.get<{ Params: IdParams }>(
    '/api/conversations/:id/stats',
    { schema: { params: idParams } },
    async (req, reply) => {
      try {
        return reply.send({ stats: await engine.getStats(req.params.id) });
      } catch (err) {
        return sendError(reply, err);
      }
    },
  );

  // ─────────────────────────────────────────────
  // POST /api/conversations/:id/end
  // ─────────────────────────────────────────────
  app.post<{ Params: IdParams; Body: EndBody }>(
    '/api/conversations/:id/end',
    { schema: { params: idParams, body: endSchema } },
    async (req, reply) => {
      try {
        const conversation = await engine.endConversation(req.params.id, req.body?.goalAchieved ?? false);
        return reply.send({ conversation });
      } catch (err) {
        return sendError(reply, err);
      }
    },
  );
}
