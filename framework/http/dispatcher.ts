/**
 * Dispatcher
 *
 * The transport-facing entry point, invoked once per connection:
 *
 * 1. Decode the connection into an immutable HttpRequest
 * 2. Run the middleware chain, which ends in route matching, the handler
 *    and content negotiation
 * 3. Convert any failure into a response through the error pipeline
 * 4. Send the response
 *
 * Whatever happens, the transport receives exactly one start message and
 * exactly one final body message.
 */

import { runWithRequest, setRequest, tryGetRequest } from '../context.ts';
import { ConfigurationError, HttpError } from '../errors.ts';
import { MiddlewarePipeline, compose } from '../middleware/pipeline.ts';
import { isValidHeartbeatInterval, type EventStream } from '../realtime/events.ts';
import { eventStreamHeaders, handleEventStream } from '../realtime/sse.ts';
import { convertParam } from '../router/params.ts';
import { paramTypes, type RouteMatch } from '../router/route.ts';
import type { Router } from '../router/router.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import {
  SpanKind,
  getActiveSpan,
  recordException,
  setRouteAttribute,
  withSpan,
} from '../telemetry/otel.ts';
import type { Renderer } from '../view/template.ts';
import { handleError, type ErrorHandlerMap, type ErrorPipelineOptions } from './error_handlers.ts';
import { negotiate } from './negotiation.ts';
import { HttpRequest } from './request.ts';
import {
  EventStreamResponse,
  HttpResponse,
  StreamingResponse,
  type AnyResponse,
} from './response.ts';
import { sendResponse, sendStreamingResponse } from './sender.ts';
import type { ConnectionHandler, Receive, Send } from './transport.ts';
import type { Middleware, Next, PathParams } from './types.ts';

export interface DispatcherOptions {
  router: Router;
  middleware?: MiddlewarePipeline | readonly Middleware[];
  errorHandlers?: ErrorHandlerMap;
  renderer?: Renderer | null;
  debug?: boolean;
  logger?: Logger;
  /** Heartbeat interval for event streams that did not choose one */
  sseHeartbeatInterval?: number | null;
  sseRetryMs?: number | null;
  sseCloseEvent?: string | null;
}

/**
 * Build the connection handler. The router is compiled and the middleware
 * chain composed here, once; both are read-only afterwards.
 */
export function createDispatcher(options: DispatcherOptions): ConnectionHandler {
  const { router, renderer = null, debug = false } = options;
  const logger = options.logger ?? getLogger();

  const heartbeat = options.sseHeartbeatInterval;
  if (heartbeat !== undefined && heartbeat !== null && !isValidHeartbeatInterval(heartbeat)) {
    throw new ConfigurationError(
      `Heartbeat interval must be a positive number of milliseconds, got ${heartbeat}.`
    );
  }

  if (!router.isCompiled) {
    router.compile();
  }

  const errorOptions: ErrorPipelineOptions = {
    handlers: options.errorHandlers ?? new Map(),
    renderer,
    debug,
    logger,
  };

  const terminal: Next = async (req) => {
    const match = router.match(req.method, req.path);

    const span = getActiveSpan();
    if (span) {
      setRouteAttribute(span, match.route.path, req.method);
    }

    const matched = req.withPathParams(match.params);
    setRequest(matched);

    const result = await match.route.handler(matched, convertParams(match));
    return await negotiate(result, { renderer });
  };

  const chain =
    options.middleware instanceof MiddlewarePipeline
      ? options.middleware.compose(terminal)
      : compose(options.middleware ?? [], terminal, logger);

  return async (scope, receive, send) => {
    const request = HttpRequest.fromConnection(scope, receive);
    const wire = trackSend(send);

    await runWithRequest(request, () =>
      withSpan(
        request.method,
        async (span) => {
          let response: AnyResponse;
          try {
            response = await chain(request);
          } catch (error) {
            if (!(error instanceof HttpError)) {
              recordException(span, error);
            }
            response = await handleError(error, tryGetRequest() ?? request, errorOptions);
          }

          span.setAttribute('http.response.status_code', response.status);

          try {
            await sendAny(response, request, wire.send, receive);
          } finally {
            await completeConnection(wire, logger);
          }
        },
        {
          kind: SpanKind.SERVER,
          attributes: {
            'http.request.method': request.method,
            'url.path': request.path,
          },
        }
      )
    );
  };

  async function sendAny(
    response: AnyResponse,
    req: HttpRequest,
    send: Send,
    receive: Receive
  ): Promise<void> {
    const headOnly = req.method === 'HEAD';

    if (response instanceof HttpResponse) {
      await sendResponse(response, send, { headOnly });
    } else if (response instanceof StreamingResponse) {
      await sendStreamingResponse(response, send, { headOnly, debug, logger });
    } else if (headOnly) {
      await send({ type: 'response.start', status: 200, headers: eventStreamHeaders(response.headers) });
      await send({ type: 'response.body', body: new Uint8Array(0), moreBody: false });
    } else {
      await handleEventStream(eventStreamFor(response), send, receive, {
        renderer,
        debug,
        logger,
        retryMs: options.sseRetryMs ?? null,
        closeEvent: options.sseCloseEvent ?? null,
        headers: response.headers,
      });
    }
  }

  function eventStreamFor(response: EventStreamResponse): EventStream {
    const stream = response.stream;
    const interval = options.sseHeartbeatInterval;
    if (stream.explicitHeartbeat || interval === undefined || interval === null) {
      return stream;
    }
    return stream.withHeartbeatInterval(interval);
  }
}

/**
 * Path parameters converted to their declared types; a value that fails
 * conversion is passed through as the raw string
 */
export function convertParams(match: RouteMatch): PathParams {
  const types = paramTypes(match.route);
  const params: PathParams = {};

  for (const [name, raw] of Object.entries(match.params)) {
    const type = types.get(name) ?? 'string';
    try {
      params[name] = convertParam(raw, type);
    } catch {
      params[name] = raw;
    }
  }

  return params;
}

interface TrackedSend {
  send: Send;
  started: boolean;
  finished: boolean;
}

function trackSend(raw: Send): TrackedSend {
  const tracked: TrackedSend = {
    started: false,
    finished: false,
    send: async (message) => {
      if (message.type === 'response.start') {
        tracked.started = true;
      } else if (!message.moreBody) {
        tracked.finished = true;
      }
      await raw(message);
    },
  };
  return tracked;
}

/**
 * Close a connection a failed send left open
 */
async function completeConnection(wire: TrackedSend, logger: Logger): Promise<void> {
  if (wire.finished) return;

  try {
    if (!wire.started) {
      await wire.send({
        type: 'response.start',
        status: 500,
        headers: [['content-type', 'text/plain; charset=utf-8']],
      });
    }
    await wire.send({ type: 'response.body', body: new Uint8Array(0), moreBody: false });
  } catch (error) {
    logger.error('Failed to close connection', error);
  }
}
