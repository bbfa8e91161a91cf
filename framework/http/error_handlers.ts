/**
 * Error Pipeline
 *
 * Turns failures raised during dispatch into responses. HttpError and its
 * subclasses are expected outcomes; anything else is a 500 that is always
 * logged with the request method and path.
 */

import { HttpError } from '../errors.ts';
import type { Logger } from '../telemetry/logger.ts';
import { escapeHtml } from '../view/html.ts';
import type { Renderer } from '../view/template.ts';
import { negotiate } from './negotiation.ts';
import type { HttpRequest } from './request.ts';
import { HttpResponse, type AnyResponse } from './response.ts';
import type { ErrorHandler, ErrorKey } from './types.ts';

export type ErrorHandlerMap = ReadonlyMap<ErrorKey, ErrorHandler>;

export interface ErrorPipelineOptions {
  handlers: ErrorHandlerMap;
  renderer?: Renderer | null;
  debug: boolean;
  logger: Logger;
}

/**
 * Convert any thrown value into a response
 */
export async function handleError(
  error: unknown,
  req: HttpRequest,
  options: ErrorPipelineOptions
): Promise<AnyResponse> {
  if (error instanceof HttpError) {
    return await handleHttpError(error, req, options);
  }
  return await handleInternalError(toError(error), req, options);
}

/**
 * Registered handler for the error's class, then its status; otherwise a
 * minimal response built from the error itself
 */
export async function handleHttpError(
  error: HttpError,
  req: HttpRequest,
  options: ErrorPipelineOptions
): Promise<AnyResponse> {
  options.logger.debug(`${error.status} ${req.method} ${req.path}`, { detail: error.detail });

  const handler = findClassHandler(options.handlers, error) ?? options.handlers.get(error.status);
  if (handler) {
    return await runHandler(handler, error, error.status, req, options);
  }

  let detail = error.detail || `Error ${error.status}`;
  if (options.debug && error.detail) {
    detail = `${error.status}: ${error.detail}`;
  }

  const response = req.isFragment
    ? new HttpResponse({ body: fragmentError(error.status, escapeHtml(detail)), status: error.status })
    : new HttpResponse({
        body: detail,
        status: error.status,
        contentType: 'text/plain; charset=utf-8',
      });

  return withFragmentHeaders(response.withHeaders(error.headers), req);
}

/**
 * Unexpected failure: logged, then a registered 500 handler or the
 * default 500 response
 */
export async function handleInternalError(
  error: Error,
  req: HttpRequest,
  options: ErrorPipelineOptions
): Promise<AnyResponse> {
  options.logger.error(`500 ${req.method} ${req.path}`, error, {
    method: req.method,
    path: req.path,
  });

  const handler = options.handlers.get(500) ?? findClassHandler(options.handlers, error);
  if (handler) {
    return await runHandler(handler, error, 500, req, options);
  }

  return defaultInternalResponse(error, req, options.debug);
}

/**
 * Run a registered handler. A handler answering 200 keeps the error's
 * status; a handler that throws falls back to the default 500.
 */
async function runHandler(
  handler: ErrorHandler,
  error: Error,
  status: number,
  req: HttpRequest,
  options: ErrorPipelineOptions
): Promise<AnyResponse> {
  try {
    const result = await handler(req, error);
    const response = await negotiate(result, { renderer: options.renderer });
    return response.status === 200 ? response.withStatus(status) : response;
  } catch (handlerError) {
    options.logger.error('Error handler failed', handlerError, {
      method: req.method,
      path: req.path,
      original: error.message,
    });
    return defaultInternalResponse(toError(handlerError), req, options.debug);
  }
}

function defaultInternalResponse(error: Error, req: HttpRequest, debug: boolean): HttpResponse {
  if (debug) {
    const body = `${error.name}: ${error.message}\n\n${error.stack ?? ''}`;
    if (req.isFragment) {
      return withFragmentHeaders(
        new HttpResponse({ body: fragmentError(500, escapeHtml(body)), status: 500 }),
        req
      );
    }
    return new HttpResponse({ body, status: 500, contentType: 'text/plain; charset=utf-8' });
  }

  if (req.isFragment) {
    return withFragmentHeaders(
      new HttpResponse({ body: fragmentError(500, 'Internal Server Error'), status: 500 }),
      req
    );
  }

  return new HttpResponse({
    body: 'Internal Server Error',
    status: 500,
    contentType: 'text/plain; charset=utf-8',
  });
}

function findClassHandler(handlers: ErrorHandlerMap, error: Error): ErrorHandler | undefined {
  for (const [key, handler] of handlers) {
    if (typeof key !== 'number' && error.constructor === key) {
      return handler;
    }
  }
  return undefined;
}

/**
 * Minimal snippet for partial-page requests
 */
export function fragmentError(status: number, detail: string): string {
  return `<div class="request-error" data-status="${status}">${detail}</div>`;
}

/**
 * Partial-page clients swap error content into a dedicated container
 */
function withFragmentHeaders(response: HttpResponse, req: HttpRequest): HttpResponse {
  if (!req.isFragment) return response;
  return response
    .withHeader('HX-Retarget', '#request-error')
    .withHeader('HX-Reswap', 'innerHTML')
    .withHeader('HX-Trigger', 'requestError');
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
