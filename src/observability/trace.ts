import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  messageId?: string;
  runId?: string;
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
    messageId: overrides?.messageId,
    runId: overrides?.runId,
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

export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok', attrs?: Record<string, string | number | boolean>): void {
  span.endTime = Date.now();
  span.status = status;
  if (attrs) Object.assign(span.attributes, attrs);
}

/** Flatten spans into `{ name: durationMs }` for a single log line */
export function summarizeSpans(ctx: TraceContext): Record<string, number> {
  const summary: Record<string, number> = {};
  for (const span of ctx.spans) {
    summary[span.name] = (span.endTime ?? Date.now()) - span.startTime;
  }
  return summary;
}
