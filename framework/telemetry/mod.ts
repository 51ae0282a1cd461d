/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry tracing.
 */

export {
  Logger,
  getLogger,
  setLogger,
  isLogLevel,
  isLogFormat,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  getOTELConfig,
  getOTELTracer,
  withSpan,
  recordSpanException,
  SpanKind,
  SpanStatusCode,
  type OTELConfig,
  type CreateSpanOptions,
  type Span as OTELSpan,
  type Attributes as OTELAttributes,
} from './otel.ts';
