import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  conversationId?: string;
  turnNumber?: number;
  spans: SpanRecord[];
}

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: Record<string, string | number | boolean>;
  status: 'ok' | 'error';
}

export function createTraceContext(overrides?: Partial<TraceContext>): TraceContext {
  return {
    requestId: overrides?.requestId ?? uuidv4(),
    conversationId: overrides?.conversationId,
    turnNumber: overrides?.turnNumber,
    spans: [],
  };
}

export function startSpan(ctx: TraceContext, name: string, attrs?: Record<string, string | number | boolean>): SpanRecord {
  const span: SpanRecord = {
    name,
    startTime: Date.now(),
    attributes: attrs ?? {},
    status: 'ok',
  };
  ctx.spans.push(span);
  return span;
}

export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok'): void {
  span.endTime = Date.now();
  span.status = status;
}

/** Run `fn` inside a span, closing it with the outcome. */
export async function withSpan<T>(
  ctx: TraceContext,
  name: string,
  fn: (span: SpanRecord) => Promise<T>,
): Promise<T> {
  const span = startSpan(ctx, name);
  try {
    const result = await fn(span);
    endSpan(span, 'ok');
    return result;
  } catch (err) {
    endSpan(span, 'error');
    throw err;
  }
}

/** Span durations keyed by name, for the per-turn timing record. */
export function spanTimings(ctx: TraceContext): Record<string, number> {
  const timings: Record<string, number> = {};
  for (const span of ctx.spans) {
    if (span.endTime === undefined) continue;
    timings[span.name] = (timings[span.name] ?? 0) + (span.endTime - span.startTime);
  }
  return timings;
}
