/**
 * HTTP Type Definitions
 */

import type { HttpRequest } from './request.ts';
import type { AnyResponse, Redirect } from './response.ts';
import type { EventStream } from '../realtime/events.ts';
import type { SafeHtml } from '../view/html.ts';
import type { Fragment, Stream, Template } from '../view/template.ts';

/**
 * HTTP methods with first-class registration helpers
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

/**
 * Path parameters after type conversion
 */
export type PathParams = Record<string, string | number>;

/**
 * Anything the content negotiator understands
 */
export type Negotiable =
  | AnyResponse
  | Redirect
  | Template
  | Fragment
  | Stream
  | EventStream
  | SafeHtml
  | string
  | Uint8Array
  | Record<string, unknown>
  | readonly unknown[]
  | readonly [body: Negotiable, status: number]
  | readonly [body: Negotiable, status: number, headers: Record<string, string>];

/**
 * Route handler
 */
export type Handler = (
  req: HttpRequest,
  params: PathParams
) => Negotiable | Promise<Negotiable>;

/**
 * Continuation passed to middleware
 */
export type Next = (req: HttpRequest) => Promise<AnyResponse>;

/**
 * Middleware: inspect or replace the request, short-circuit, or rewrite the
 * response returned by next
 */
export type Middleware = (req: HttpRequest, next: Next) => Promise<AnyResponse>;

/**
 * Error handler registered for a status code or error class
 */
export type ErrorHandler = (
  req: HttpRequest,
  error: Error
) => Negotiable | Promise<Negotiable>;

/**
 * Key for error handler registration
 */
export type ErrorKey = number | (abstract new (...args: never[]) => Error);

/**
 * Cookie options
 */
export interface CookieOptions {
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}
