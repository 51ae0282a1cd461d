/**
 * OpenTelemetry Integration
 *
 * Spans around framework operations through @opentelemetry/api. Nothing is
 * exported until the application registers an SDK; until then every tracer
 * is a no-op.
 *
 * @module
 */

import {
  trace,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';

/**
 * OpenTelemetry configuration options
 */
export interface OTELConfig {
  /** Service name for traces (from OTEL_SERVICE_NAME env var) */
  serviceName: string;
}

/**
 * Get the current OTEL configuration from environment variables
 */
export function getOTELConfig(): OTELConfig {
  return {
    serviceName: process.env.OTEL_SERVICE_NAME ?? 'girder',
  };
}

let _tracer: Tracer | undefined;

/** Spans already marked failed, so withSpan does not overwrite the status */
const erroredSpans = new WeakSet<Span>();

/**
 * Get the OpenTelemetry tracer for the framework
 */
export function getOTELTracer(name = getOTELConfig().serviceName, version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

/**
 * Options for creating a new span
 */
export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * Run a function inside a new active span.
 * The span is ended when the function settles; a rejection is recorded on
 * the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {}
): Promise<T> {
  return getOTELTracer().startActiveSpan(
    name,
    {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    async (span) => {
      try {
        const result = await fn(span);
        if (!spanHasError(span)) {
          span.setStatus({ code: SpanStatusCode.OK });
        }
        return result;
      } catch (error) {
        recordSpanException(span, error instanceof Error ? error : new Error(String(error)));
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Record an exception on a span and mark it failed
 */
export function recordSpanException(span: Span, error: Error, message?: string): void {
  span.recordException(error);
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: message ?? error.message,
  });
  erroredSpans.add(span);
}

function spanHasError(span: Span): boolean {
  return erroredSpans.has(span);
}

export { SpanKind, SpanStatusCode, type Span, type Attributes };
