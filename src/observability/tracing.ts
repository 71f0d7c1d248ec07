/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Wraps sync phases, auth grants and HTTP calls in spans. The SDK and
 * exporter are left to the host process; without `OTEL_ENABLED` every
 * helper runs its function directly.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'reddit-account-transfer';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for a run
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
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
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const exception = error instanceof Error ? error : new Error(String(error));
      span.recordException(exception);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: exception.message,
      });
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

export async function withAuthSpan<T>(
  username: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Auth passwordGrant', fn, {
    'auth.grant_type': 'password',
    'auth.username': username,
  });
}

/**
 * Span for one phase of a run (fetch, subscriptions, saved, ...)
 */
export async function withPhaseSpan<T>(
  phase: string,
  runId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Sync ${phase}`, fn, {
    'sync.phase': phase,
    'sync.run_id': runId,
  });
}
