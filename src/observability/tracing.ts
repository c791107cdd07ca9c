/**
 * OpenTelemetry tracing (opt-in)
 *
 * Spans are created through the OpenTelemetry API only. Without OTEL_ENABLED
 * every helper runs its callback with a null span; with it, spans go to
 * whatever tracer provider the host process registered.
 */

import { trace, context, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Attributes, Span, Tracer } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'graph-change-ingestor';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer(): Tracer | null {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within an active span.
 * Errors are recorded on the span and re-thrown unchanged.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        span.setAttributes(attributes);
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * @param operation - 'authorize', 'callback' or 'refresh'
 */
export async function withOAuthSpan<T>(
  operation: string,
  userId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`OAuth ${operation}`, fn, {
    'oauth.operation': operation,
    'oauth.user_id': userId,
  });
}

export async function withTokenSpan<T>(
  operation: string,
  userId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Token ${operation}`, fn, {
    'token.operation': operation,
    'token.user_id': userId,
  });
}

export async function withWorkerSpan<T>(
  notificationId: number,
  changeType: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Worker process', fn, {
    'notification.id': notificationId,
    'notification.change_type': changeType,
  });
}

export function getCurrentSpan(): Span | undefined {
  if (!isOTelEnabled()) {
    return undefined;
  }
  return trace.getSpan(context.active());
}

export function addSpanEvent(name: string, attributes?: Attributes): void {
  getCurrentSpan()?.addEvent(name, attributes);
}

export function setSpanAttribute(key: string, value: string | number | boolean): void {
  getCurrentSpan()?.setAttribute(key, value);
}
