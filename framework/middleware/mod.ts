/**
 * Middleware Layer
 *
 * Cross-cutting concerns that wrap every request/response cycle.
 * Implements the onion model where each middleware wraps the next.
 */

export {
  MiddlewarePipeline,
  compose,
  conditional,
  forMethods,
  forPath,
} from './pipeline.ts';
export { corsMiddleware, cors, type CorsOptions } from './cors.ts';
export { loggingMiddleware, type LoggingOptions } from './logging.ts';
export {
  securityHeaders,
  buildCSP,
  type SecurityHeadersOptions,
  type ContentSecurityPolicyOptions,
  type StrictTransportSecurityOptions,
  type PermissionsPolicyOptions,
} from './security_headers.ts';
export { staticFiles, contentTypeFor, type StaticFilesOptions } from './static_files.ts';
