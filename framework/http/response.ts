/**
 * HTTP Response Variants
 *
 * Three shapes leave the pipeline: a buffered HttpResponse, a chunked
 * StreamingResponse and an EventStreamResponse owned by the push engine.
 * Each transformation returns a new object; nothing is mutated in place.
 */

import type { HeaderPair } from '../errors.ts';
import type { EventStream } from '../realtime/events.ts';
import type { CookieOptions } from './types.ts';

export type HeaderInput = Record<string, string> | readonly HeaderPair[];

export interface ResponseInit {
  body?: string | Uint8Array;
  status?: number;
  contentType?: string;
  headers?: readonly HeaderPair[];
  cookies?: readonly string[];
}

const HTML = 'text/html; charset=utf-8';

function toPairs(headers: HeaderInput): HeaderPair[] {
  if (isPairList(headers)) return [...headers];
  return Object.entries(headers);
}

function isPairList(headers: HeaderInput): headers is readonly HeaderPair[] {
  return Array.isArray(headers);
}

/**
 * Pull Content-Type out of a header list; the last one given wins
 */
function splitContentType(
  headers: readonly HeaderPair[],
  fallback: string
): [contentType: string, rest: readonly HeaderPair[]] {
  let contentType = fallback;
  const rest: HeaderPair[] = [];
  for (const pair of headers) {
    if (pair[0].toLowerCase() === 'content-type') {
      contentType = pair[1];
    } else {
      rest.push(pair);
    }
  }
  return [contentType, rest];
}

function findHeader(headers: readonly HeaderPair[], name: string): string | null {
  const key = name.toLowerCase();
  return headers.find(([n]) => n.toLowerCase() === key)?.[1] ?? null;
}

/**
 * Buffered response: status, headers and a complete body
 */
export class HttpResponse {
  readonly body: string | Uint8Array;
  readonly status: number;
  readonly contentType: string;
  readonly headers: readonly HeaderPair[];
  readonly cookies: readonly string[];

  constructor(init: ResponseInit = {}) {
    this.body = init.body ?? '';
    this.status = init.status ?? 200;
    const [contentType, headers] = splitContentType(init.headers ?? [], init.contentType ?? HTML);
    this.contentType = contentType;
    this.headers = headers;
    this.cookies = init.cookies ?? [];
  }

  private copy(overrides: ResponseInit): HttpResponse {
    return new HttpResponse({
      body: this.body,
      status: this.status,
      contentType: this.contentType,
      headers: this.headers,
      cookies: this.cookies,
      ...overrides,
    });
  }

  withStatus(status: number): HttpResponse {
    return this.copy({ status });
  }

  withHeader(name: string, value: string): HttpResponse {
    return this.copy({ headers: [...this.headers, [name, value]] });
  }

  withHeaders(headers: HeaderInput): HttpResponse {
    return this.copy({ headers: [...this.headers, ...toPairs(headers)] });
  }

  withContentType(contentType: string): HttpResponse {
    return this.copy({ contentType });
  }

  /**
   * Add a Set-Cookie
   */
  withCookie(name: string, value: string, options: CookieOptions = {}): HttpResponse {
    return this.copy({ cookies: [...this.cookies, serializeCookie(name, value, options)] });
  }

  /**
   * Expire a cookie on the client
   */
  withoutCookie(name: string, options: CookieOptions = {}): HttpResponse {
    return this.withCookie(name, '', { ...options, maxAge: 0, expires: new Date(0) });
  }

  /**
   * First value of a header (case-insensitive); Content-Type included
   */
  header(name: string): string | null {
    if (name.toLowerCase() === 'content-type') return this.contentType;
    return findHeader(this.headers, name);
  }

  get bodyBytes(): Uint8Array {
    return typeof this.body === 'string' ? new TextEncoder().encode(this.body) : this.body;
  }

  get text(): string {
    return typeof this.body === 'string' ? this.body : new TextDecoder().decode(this.body);
  }
}

export interface StreamingInit {
  status?: number;
  contentType?: string;
  headers?: readonly HeaderPair[];
}

/**
 * Chunked response: headers go out first, then each chunk as it is produced
 */
export class StreamingResponse {
  readonly chunks: Iterable<string> | AsyncIterable<string>;
  readonly status: number;
  readonly contentType: string;
  readonly headers: readonly HeaderPair[];

  constructor(chunks: Iterable<string> | AsyncIterable<string>, init: StreamingInit = {}) {
    this.chunks = chunks;
    this.status = init.status ?? 200;
    const [contentType, headers] = splitContentType(init.headers ?? [], init.contentType ?? HTML);
    this.contentType = contentType;
    this.headers = headers;
  }

  private copy(overrides: StreamingInit): StreamingResponse {
    return new StreamingResponse(this.chunks, {
      status: this.status,
      contentType: this.contentType,
      headers: this.headers,
      ...overrides,
    });
  }

  withStatus(status: number): StreamingResponse {
    return this.copy({ status });
  }

  withHeader(name: string, value: string): StreamingResponse {
    return this.copy({ headers: [...this.headers, [name, value]] });
  }

  withHeaders(headers: HeaderInput): StreamingResponse {
    return this.copy({ headers: [...this.headers, ...toPairs(headers)] });
  }

  withContentType(contentType: string): StreamingResponse {
    return this.copy({ contentType });
  }

  header(name: string): string | null {
    if (name.toLowerCase() === 'content-type') return this.contentType;
    return findHeader(this.headers, name);
  }
}

/**
 * Server-sent events response.
 *
 * Status and content type are fixed by the push protocol, so those
 * transformations are no-ops. Extra headers (CORS, for instance) are kept
 * and sent after the protocol headers.
 */
export class EventStreamResponse {
  readonly status = 200;
  readonly contentType = 'text/event-stream';
  readonly headers: readonly HeaderPair[];

  constructor(
    readonly stream: EventStream,
    headers: readonly HeaderPair[] = []
  ) {
    this.headers = splitContentType(headers, this.contentType)[1];
  }

  withStatus(_status: number): EventStreamResponse {
    return this;
  }

  withHeader(name: string, value: string): EventStreamResponse {
    return new EventStreamResponse(this.stream, [...this.headers, [name, value]]);
  }

  withHeaders(headers: HeaderInput): EventStreamResponse {
    return new EventStreamResponse(this.stream, [...this.headers, ...toPairs(headers)]);
  }

  withContentType(_contentType: string): EventStreamResponse {
    return this;
  }

  header(name: string): string | null {
    if (name.toLowerCase() === 'content-type') return this.contentType;
    return findHeader(this.headers, name);
  }
}

export type AnyResponse = HttpResponse | StreamingResponse | EventStreamResponse;

/**
 * Redirect return value
 */
export class Redirect {
  constructor(
    readonly url: string,
    readonly status: 301 | 302 | 303 | 307 | 308 = 302,
    readonly headers: readonly HeaderPair[] = []
  ) {}
}

export function isResponse(value: unknown): value is AnyResponse {
  return (
    value instanceof HttpResponse ||
    value instanceof StreamingResponse ||
    value instanceof EventStreamResponse
  );
}

/**
 * JSON response
 */
export function json(data: unknown, status = 200): HttpResponse {
  return new HttpResponse({
    body: JSON.stringify(data),
    status,
    contentType: 'application/json; charset=utf-8',
  });
}

/**
 * HTML response
 */
export function html(content: string, status = 200): HttpResponse {
  return new HttpResponse({ body: content, status, contentType: HTML });
}

/**
 * Plain text response
 */
export function text(content: string, status = 200): HttpResponse {
  return new HttpResponse({ body: content, status, contentType: 'text/plain; charset=utf-8' });
}

/**
 * Serialize a Set-Cookie header value
 */
export function serializeCookie(name: string, value: string, options: CookieOptions = {}): string {
  const parts = [`${encodeURIComponent(name)}=${encodeURIComponent(value)}`];

  if (options.maxAge !== undefined) {
    parts.push(`Max-Age=${options.maxAge}`);
  }
  if (options.expires) {
    parts.push(`Expires=${options.expires.toUTCString()}`);
  }
  parts.push(`Path=${options.path ?? '/'}`);
  if (options.domain) {
    parts.push(`Domain=${options.domain}`);
  }
  if (options.secure) {
    parts.push('Secure');
  }
  if (options.httpOnly ?? true) {
    parts.push('HttpOnly');
  }
  parts.push(`SameSite=${options.sameSite ?? 'Lax'}`);

  return parts.join('; ');
}
