/**
 * Error taxonomy for the turn pipeline.
 *
 * Fatal failures surface as `EngineError` subclasses carrying a stable `code`
 * and a `retryable` hint for the caller. Non-fatal outcomes (rewrite timeout,
 * repetition loop exhausted) are not errors: they are reported on the turn
 * result and in metrics.
 */

export type EngineErrorCode =
  | 'CONVERSATION_NOT_FOUND'
  | 'CONVERSATION_CLOSED'
  | 'TURN_CONFLICT'
  | 'TURN_NOT_FOUND'
  | 'TURN_CANCELLED'
  | 'EMBEDDING_FAILURE'
  | 'EMBEDDING_MODEL_MISMATCH'
  | 'GENERATION_FAILURE'
  | 'PERSISTENCE_FAILURE'
  | 'EXTERNAL_TIMEOUT';

export class EngineError extends Error {
  readonly name: string = 'EngineError';

  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly retryable: boolean,
    public readonly cause?: unknown,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ConversationNotFoundError extends EngineError {
  readonly name = 'ConversationNotFoundError';

  constructor(public readonly conversationId: string) {
    super(`Conversation ${conversationId} not found`, 'CONVERSATION_NOT_FOUND', false);
  }
}

export class ConversationClosedError extends EngineError {
  readonly name = 'ConversationClosedError';

  constructor(public readonly conversationId: string, public readonly status: string) {
    super(`Conversation ${conversationId} is ${status}`, 'CONVERSATION_CLOSED', false);
  }
}

/**
 * The intended turn number does not follow the committed sequence,
 * e.g. a client retried with a stale number or skipped ahead.
 */
export class TurnConflictError extends EngineError {
  readonly name = 'TurnConflictError';

  constructor(
    public readonly conversationId: string,
    public readonly expectedTurnNumber: number,
    public readonly requestedTurnNumber: number,
  ) {
    super(
      `Turn ${requestedTurnNumber} does not follow committed turns of ${conversationId} (next is ${expectedTurnNumber})`,
      'TURN_CONFLICT',
      false,
    );
  }
}

export class TurnNotFoundError extends EngineError {
  readonly name = 'TurnNotFoundError';

  constructor(public readonly conversationId: string, public readonly turnNumber: number) {
    super(`Turn ${turnNumber} of ${conversationId} not found`, 'TURN_NOT_FOUND', false);
  }
}

export class TurnCancelledError extends EngineError {
  readonly name = 'TurnCancelledError';

  constructor(public readonly phase: string, cause?: unknown) {
    super(`Turn cancelled during ${phase}`, 'TURN_CANCELLED', true, cause);
  }
}

/** A call to an external collaborator exceeded its time budget */
export class ExternalTimeoutError extends EngineError {
  readonly name = 'ExternalTimeoutError';

  constructor(
    public readonly dependency: string,
    public readonly elapsedMs: number,
  ) {
    super(`${dependency} call timed out after ${elapsedMs}ms`, 'EXTERNAL_TIMEOUT', true);
  }
}

export class EmbeddingFailureError extends EngineError {
  readonly name = 'EmbeddingFailureError';

  constructor(message: string, cause?: unknown) {
    super(message, 'EMBEDDING_FAILURE', true, cause);
  }
}

export class EmbeddingModelMismatchError extends EngineError {
  readonly name = 'EmbeddingModelMismatchError';

  constructor(
    public readonly conversationId: string,
    public readonly pinnedModel: string,
    public readonly activeModel: string,
  ) {
    super(
      `Conversation ${conversationId} was embedded with ${pinnedModel}; active embedder is ${activeModel}`,
      'EMBEDDING_MODEL_MISMATCH',
      false,
    );
  }
}

export class GenerationFailureError extends EngineError {
  readonly name = 'GenerationFailureError';

  constructor(message: string, cause?: unknown) {
    super(message, 'GENERATION_FAILURE', true, cause);
  }
}

/** The turn bundle could not be written; nothing was committed. */
export class PersistenceFailureError extends EngineError {
  readonly name = 'PersistenceFailureError';

  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_FAILURE', true, cause);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
