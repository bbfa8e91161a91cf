/**
 * Middleware Pipeline
 *
 * Composes middleware into a single chain (onion model). The first
 * middleware registered is the outermost: for [m1, m2] a request passes
 * m1, then m2, then the handler, and the response travels back through m2
 * and then m1.
 *
 * Each middleware can:
 * - Inspect or replace the request before calling next
 * - Short-circuit by returning without calling next
 * - Inspect or rewrite the response next returns
 */

import { ConfigurationError } from '../errors.ts';
import type { HttpRequest } from '../http/request.ts';
import type { AnyResponse } from '../http/response.ts';
import type { Middleware, Next } from '../http/types.ts';
import type { Logger } from '../telemetry/logger.ts';

/**
 * Compose middleware around a terminal handler.
 *
 * Pure: the result depends only on the arguments and can be reused for
 * every request.
 */
export function compose(
  middleware: readonly Middleware[],
  terminal: Next,
  logger?: Logger
): Next {
  const chain = [...middleware];

  const dispatch = (index: number, req: HttpRequest): Promise<AnyResponse> => {
    if (index >= chain.length) {
      return terminal(req);
    }

    const current = chain[index];
    const name = current.name || `middleware[${index}]`;
    let nextCalled = false;

    const next: Next = (nextReq) => {
      if (nextCalled) {
        return Promise.reject(new Error(`next() called multiple times in ${name}`));
      }
      nextCalled = true;
      return dispatch(index + 1, nextReq);
    };

    logger?.debug(`Entering ${name}`, { index });
    return current(req, next);
  };

  return (req) => dispatch(0, req);
}

/**
 * Ordered middleware collection, composed once at startup
 */
export class MiddlewarePipeline {
  private middleware: Middleware[] = [];
  private frozen = false;

  constructor(private readonly logger?: Logger) {}

  /**
   * Append middleware (runs inside everything added before it)
   */
  use(middleware: Middleware): this {
    this.assertMutable();
    this.middleware.push(middleware);
    return this;
  }

  /**
   * Insert middleware at a specific position
   */
  useAt(index: number, middleware: Middleware): this {
    this.assertMutable();
    this.middleware.splice(index, 0, middleware);
    return this;
  }

  /**
   * Remove middleware from the pipeline
   */
  remove(middleware: Middleware): this {
    this.assertMutable();
    const index = this.middleware.indexOf(middleware);
    if (index !== -1) {
      this.middleware.splice(index, 1);
    }
    return this;
  }

  /**
   * Get the number of middleware in the pipeline
   */
  get length(): number {
    return this.middleware.length;
  }

  /**
   * Compose the chain around a terminal handler and freeze the pipeline
   */
  compose(terminal: Next): Next {
    this.frozen = true;
    return compose(this.middleware, terminal, this.logger);
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new ConfigurationError('Cannot modify middleware after the pipeline has been composed.');
    }
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional(
  condition: (req: HttpRequest) => boolean,
  middleware: Middleware
): Middleware {
  return async (req, next) => {
    if (condition(req)) {
      return await middleware(req, next);
    }
    return await next(req);
  };
}

/**
 * Create a middleware that runs for specific paths
 */
export function forPath(pathPrefix: string, middleware: Middleware): Middleware {
  return conditional((req) => req.path.startsWith(pathPrefix), middleware);
}

/**
 * Create a middleware that runs for specific methods
 */
export function forMethods(methods: string[], middleware: Middleware): Middleware {
  const methodSet = new Set(methods.map((m) => m.toUpperCase()));
  return conditional((req) => methodSet.has(req.method), middleware);
}
