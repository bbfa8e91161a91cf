/**
 * CORS Middleware
 *
 * Handles Cross-Origin Resource Sharing (CORS) headers
 * and preflight OPTIONS requests.
 */

import { HttpResponse } from '../http/response.ts';
import type { Middleware } from '../http/types.ts';

export interface CorsOptions {
  origin?: string | string[] | ((origin: string) => boolean);
  methods?: string[];
  allowedHeaders?: string[];
  exposedHeaders?: string[];
  credentials?: boolean;
  maxAge?: number;
}

const DEFAULT_OPTIONS: Required<CorsOptions> = {
  origin: '*',
  methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  exposedHeaders: [],
  credentials: false,
  maxAge: 86400, // 24 hours
};

/**
 * Create CORS middleware
 */
export function corsMiddleware(options: CorsOptions = {}): Middleware {
  const opts: Required<CorsOptions> = { ...DEFAULT_OPTIONS, ...options };

  return async function cors(req, next) {
    const allowedOrigin = getOriginHeader(req.header('Origin'), opts.origin);

    const headers: [string, string][] = [];
    if (allowedOrigin) {
      headers.push(['Access-Control-Allow-Origin', allowedOrigin]);
      if (allowedOrigin !== '*') {
        headers.push(['Vary', 'Origin']);
      }
    }
    if (opts.credentials) {
      headers.push(['Access-Control-Allow-Credentials', 'true']);
    }
    if (opts.exposedHeaders.length > 0) {
      headers.push(['Access-Control-Expose-Headers', opts.exposedHeaders.join(', ')]);
    }

    // Preflight
    if (req.method === 'OPTIONS' && req.header('Access-Control-Request-Method')) {
      headers.push(['Access-Control-Allow-Methods', opts.methods.join(', ')]);
      headers.push(['Access-Control-Allow-Headers', opts.allowedHeaders.join(', ')]);
      if (opts.maxAge) {
        headers.push(['Access-Control-Max-Age', opts.maxAge.toString()]);
      }
      return new HttpResponse({ status: 204, headers });
    }

    const response = await next(req);
    return response.withHeaders(headers);
  };
}

/**
 * Determine the Access-Control-Allow-Origin header value
 */
function getOriginHeader(origin: string | null, allowed: CorsOptions['origin']): string | null {
  if (!origin) return null;

  if (allowed === '*') {
    return '*';
  }

  if (typeof allowed === 'string') {
    return origin === allowed ? allowed : null;
  }

  if (Array.isArray(allowed)) {
    return allowed.includes(origin) ? origin : null;
  }

  if (typeof allowed === 'function') {
    return allowed(origin) ? origin : null;
  }

  return null;
}

// Alias for convenience
export const cors = corsMiddleware;
