/**
 * Trellis
 *
 * The request-handling core of a small web framework: routing,
 * middleware, content negotiation, dispatch and server-sent events.
 *
 * @module trellis
 */

// Application
export { Application, type ApplicationOptions, type RouteOptions } from './app.ts';

// Errors
export {
  ConfigurationError,
  FrameworkError,
  HttpError,
  MethodNotAllowed,
  NegotiationError,
  NotFound,
  type HeaderPair,
} from './errors.ts';

// Request context
export { getRequest, runWithRequest, tryGetRequest } from './context.ts';

// Runtime
export { Lifecycle, type LifecycleHook } from './runtime/lifecycle.ts';

// HTTP
export {
  EventStreamResponse,
  HttpRequest,
  HttpResponse,
  Redirect,
  Server,
  StreamingResponse,
  createDispatcher,
  html as htmlResponse,
  json,
  negotiate,
  text,
  type AnyResponse,
  type ConnectionHandler,
  type ConnectionScope,
  type CookieOptions,
  type ErrorHandler,
  type ErrorKey,
  type Handler,
  type HttpMethod,
  type Middleware,
  type Negotiable,
  type Next,
  type PathParams,
  type Receive,
  type Send,
  type ServerOptions,
} from './http/mod.ts';

// Middleware
export {
  MiddlewarePipeline,
  compose,
  conditional,
  cors,
  forMethods,
  forPath,
  loggingMiddleware,
  securityHeaders,
  type CorsOptions,
  type LoggingOptions,
  type SecurityHeadersOptions,
} from './middleware/mod.ts';

// Router
export { Router, type ParamType, type Route, type RouteMatch } from './router/mod.ts';

// Realtime
export {
  EventStream,
  ServerEvent,
  type EventStreamOptions,
  type ServerEventInit,
} from './realtime/mod.ts';

// View
export {
  Fragment,
  SafeHtml,
  Stream,
  Template,
  escapeHtml,
  html,
  raw,
  type Renderer,
  type TemplateContext,
} from './view/mod.ts';

// Configuration
export { Config, loadConfig, type AppSettings, type ConfigOptions } from './config/mod.ts';

// Telemetry
export { Logger, getLogger, setLogger, type LogLevel } from './telemetry/mod.ts';
