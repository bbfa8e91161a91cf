/**
 * OpenTelemetry Integration
 *
 * Thin helpers over @opentelemetry/api. Spans are recorded only when
 * OTEL_ENABLED=true and an SDK has registered a tracer provider; otherwise
 * the API's no-op tracer is used and these calls cost next to nothing.
 *
 * @module
 */

import {
  context,
  trace,
  SpanKind,
  SpanStatusCode,
  type Attributes,
  type Span,
  type Tracer,
} from '@opentelemetry/api';

/**
 * Check if OpenTelemetry is enabled via the OTEL_ENABLED environment variable
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

let _tracer: Tracer | undefined;

/**
 * Get the framework's tracer
 */
export function getOTELTracer(name = 'trellis', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * Run a function inside a new active span, ending it when the function settles
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {}
): Promise<T> {
  if (!isOTELEnabled()) {
    const noopSpan = trace.getTracer('noop').startSpan('noop');
    try {
      return await fn(noopSpan);
    } finally {
      noopSpan.end();
    }
  }

  return getOTELTracer().startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    context.active(),
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        recordException(span, error);
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

/**
 * The span of the current context, if any
 */
export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/**
 * Annotate a server span with the matched route pattern
 */
export function setRouteAttribute(span: Span, routePattern: string, method: string): void {
  span.setAttribute('http.route', routePattern);
  span.updateName(`${method} ${routePattern}`);
}

/**
 * Record an exception on a span and mark it failed
 */
export function recordException(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  } else {
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
  }
}

export { SpanKind, SpanStatusCode, type Attributes, type Span, type Tracer };
