/**
 * Logging Middleware
 *
 * Request/response logging for monitoring and debugging.
 */

import { randomUUID } from 'node:crypto';
import type { HttpRequest } from '../http/request.ts';
import type { Middleware } from '../http/types.ts';
import { createRequestLogger, getLogger, type Logger } from '../telemetry/logger.ts';

export interface LoggingOptions {
  logger?: Logger;
  logRequest?: boolean;
  logResponse?: boolean;
  logHeaders?: boolean;
  excludePaths?: string[];
  /** Header carrying an upstream request id; generated when absent */
  requestIdHeader?: string;
}

const DEFAULT_OPTIONS = {
  logRequest: true,
  logResponse: true,
  logHeaders: false,
  excludePaths: ['/health', '/ready', '/favicon.ico'],
  requestIdHeader: 'x-request-id',
};

/**
 * Create logging middleware.
 *
 * The per-request logger is stored in `req.state` under `logger` so
 * handlers can log with the same request id.
 */
export function loggingMiddleware(options: LoggingOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return async function logging(req, next) {
    if (opts.excludePaths.some((path) => req.path.startsWith(path))) {
      return await next(req);
    }

    const base = opts.logger ?? getLogger();
    const requestId = req.header(opts.requestIdHeader) ?? randomUUID();
    const log = createRequestLogger(base, {
      requestId,
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    req.state.set('logger', log);

    const startTime = performance.now();

    if (opts.logRequest) {
      log.info(`→ ${req.method} ${req.path}`, requestContext(req, opts.logHeaders));
    }

    let status = 500;
    try {
      const response = await next(req);
      status = response.status;
      return response;
    } finally {
      if (opts.logResponse) {
        const duration = Math.round((performance.now() - startTime) * 100) / 100;
        const message = `← ${req.method} ${req.path} ${status} ${duration.toFixed(2)}ms`;
        const context = { status, duration };
        if (status >= 500) {
          log.warn(message, context);
        } else {
          log.info(message, context);
        }
      }
    }
  };
}

function requestContext(req: HttpRequest, withHeaders: boolean): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  if (req.query.raw) {
    context.query = req.query.raw;
  }
  if (withHeaders) {
    context.headers = Object.fromEntries(req.headers.entries());
  }
  return context;
}
