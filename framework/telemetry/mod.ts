/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry spans.
 */

export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type RequestLogContext,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELTracer,
  withSpan,
  getActiveSpan,
  setRouteAttribute,
  recordException,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
} from './otel.ts';
