import { v4 as uuidv4 } from 'uuid';

export type SpanKind = 'model_call' | 'tool_call';
export type SpanStatus = 'ok' | 'error';

export interface TurnSpan {
  kind: SpanKind;
  /** Model name or tool name */
  name: string;
  round: number;
  startTime: number;
  endTime?: number;
  status: SpanStatus;
  attributes: Record<string, string | number | boolean>;
}

/** Timing record of one chat() turn */
export interface TurnTrace {
  requestId: string;
  startTime: number;
  spans: TurnSpan[];
}

export interface SpanSummary {
  kind: SpanKind;
  name: string;
  round: number;
  durationMs: number;
  status: SpanStatus;
}

export function createTurnTrace(requestId: string = uuidv4()): TurnTrace {
  return { requestId, startTime: Date.now(), spans: [] };
}

/**
 * Run `fn` inside a span. A rejection marks the span as an error and is
 * rethrown; `statusOf` can mark a resolved value as an error too.
 */
export async function traced<T>(
  trace: TurnTrace,
  span: Pick<TurnSpan, 'kind' | 'name' | 'round'> & { attributes?: TurnSpan['attributes'] },
  fn: () => Promise<T>,
  statusOf?: (value: T) => SpanStatus,
): Promise<T> {
  const record: TurnSpan = {
    kind: span.kind,
    name: span.name,
    round: span.round,
    startTime: Date.now(),
    status: 'ok',
    attributes: span.attributes ?? {},
  };
  trace.spans.push(record);

  try {
    const value = await fn();
    record.status = statusOf ? statusOf(value) : 'ok';
    return value;
  } catch (err) {
    record.status = 'error';
    throw err;
  } finally {
    record.endTime = Date.now();
  }
}

/** Compact form for the end-of-turn log line */
export function summarizeTrace(trace: TurnTrace): { requestId: string; totalMs: number; spans: SpanSummary[] } {
  const now = Date.now();
  return {
    requestId: trace.requestId,
    totalMs: now - trace.startTime,
    spans: trace.spans.map((s) => ({
      kind: s.kind,
      name: s.name,
      round: s.round,
      durationMs: (s.endTime ?? now) - s.startTime,
      status: s.status,
    })),
  };
}
