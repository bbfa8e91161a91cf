/**
 * HTTP Layer
 *
 * Requests, responses, content negotiation and the dispatcher that ties
 * them to the transport.
 *
 * Responsibilities:
 * - Decode a connection into an immutable request
 * - Turn handler return values into responses
 * - Convert failures into responses
 * - Honour the transport's start/body contract
 */

export { Server, createReceive, createSend, scopeFromRequest, type ServerOptions } from './server.ts';
export { HttpRequest, type RequestInit } from './request.ts';
export { HeaderMap } from './headers.ts';
export { QueryParams } from './query.ts';
export {
  EventStreamResponse,
  HttpResponse,
  Redirect,
  StreamingResponse,
  html,
  isResponse,
  json,
  serializeCookie,
  text,
  type AnyResponse,
  type HeaderInput,
  type ResponseInit,
  type StreamingInit,
} from './response.ts';
export { isPlainObject, negotiate, type NegotiationOptions } from './negotiation.ts';
export { convertParams, createDispatcher, type DispatcherOptions } from './dispatcher.ts';
export {
  fragmentError,
  handleError,
  handleHttpError,
  handleInternalError,
  type ErrorHandlerMap,
  type ErrorPipelineOptions,
} from './error_handlers.ts';
export { sendResponse, sendStreamingResponse, type SendOptions } from './sender.ts';
export {
  encodeText,
  type Address,
  type ConnectionHandler,
  type ConnectionScope,
  type InboundMessage,
  type OutboundMessage,
  type RawHeaders,
  type Receive,
  type Send,
} from './transport.ts';
export type {
  CookieOptions,
  ErrorHandler,
  ErrorKey,
  Handler,
  HttpMethod,
  Middleware,
  Negotiable,
  Next,
  PathParams,
} from './types.ts';
