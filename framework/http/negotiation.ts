/**
 * Content Negotiation
 *
 * Maps a handler's return value to exactly one response variant.
 * Dispatch is by runtime type, in this order:
 *
 * 1. response objects         -> unchanged
 * 2. Redirect                 -> Location header, redirect status
 * 3. [body, status, headers?] -> negotiate body, override status/headers
 * 4. string / SafeHtml        -> 200 text/html
 * 5. Uint8Array / ArrayBuffer -> 200 application/octet-stream
 * 6. plain object / array     -> 200 application/json
 * 7. Template / Fragment      -> rendered, buffered; Stream -> chunked
 * 8. EventStream              -> push stream
 *
 * Anything else is a NegotiationError. Values are never stringified
 * implicitly.
 */

import { ConfigurationError, NegotiationError, describeType } from '../errors.ts';
import { EventStream } from '../realtime/events.ts';
import { SafeHtml } from '../view/html.ts';
import { Fragment, Stream, Template, type Renderer } from '../view/template.ts';
import {
  EventStreamResponse,
  HttpResponse,
  Redirect,
  StreamingResponse,
  isResponse,
  type AnyResponse,
} from './response.ts';

export interface NegotiationOptions {
  renderer?: Renderer | null;
}

type StatusTuple =
  | readonly [body: unknown, status: number]
  | readonly [body: unknown, status: number, headers: Record<string, string>];

/**
 * Convert a handler return value into a response
 */
export async function negotiate(
  value: unknown,
  options: NegotiationOptions = {}
): Promise<AnyResponse> {
  if (isResponse(value)) {
    return value;
  }

  if (value instanceof Redirect) {
    return new HttpResponse({ body: '', status: value.status })
      .withHeader('Location', value.url)
      .withHeaders(value.headers);
  }

  if (isStatusTuple(value)) {
    const [inner, status] = value;
    const response = (await negotiate(inner, options)).withStatus(status);
    return value.length === 3 ? response.withHeaders(value[2]) : response;
  }

  if (typeof value === 'string') {
    return new HttpResponse({ body: value, contentType: 'text/html; charset=utf-8' });
  }

  if (value instanceof SafeHtml) {
    return new HttpResponse({ body: value.content, contentType: 'text/html; charset=utf-8' });
  }

  if (value instanceof Uint8Array) {
    return new HttpResponse({ body: value, contentType: 'application/octet-stream' });
  }

  if (value instanceof ArrayBuffer) {
    return new HttpResponse({
      body: new Uint8Array(value),
      contentType: 'application/octet-stream',
    });
  }

  if (value instanceof Template) {
    const renderer = requireRenderer(options, 'Template');
    const body = await renderer.render(value.name, value.context);
    return new HttpResponse({ body, contentType: 'text/html; charset=utf-8' });
  }

  if (value instanceof Fragment) {
    const renderer = requireRenderer(options, 'Fragment');
    const body = await renderer.renderBlock(value.templateName, value.blockName, value.context);
    return new HttpResponse({ body, contentType: 'text/html; charset=utf-8' });
  }

  if (value instanceof Stream) {
    const renderer = requireRenderer(options, 'Stream');
    return new StreamingResponse(renderer.renderStream(value.name, value.context), {
      contentType: 'text/html; charset=utf-8',
    });
  }

  if (value instanceof EventStream) {
    return new EventStreamResponse(value);
  }

  if (Array.isArray(value) || isPlainObject(value)) {
    return new HttpResponse({
      body: JSON.stringify(value),
      contentType: 'application/json; charset=utf-8',
    });
  }

  throw new NegotiationError(describeType(value));
}

function requireRenderer(options: NegotiationOptions, kind: string): Renderer {
  if (!options.renderer) {
    throw new ConfigurationError(
      `${kind} return values require a renderer. Pass one to the application options.`
    );
  }
  return options.renderer;
}

/**
 * Objects created by literals, Object.create(null) or JSON.parse
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isStatusTuple(value: unknown): value is StatusTuple {
  if (!Array.isArray(value) || (value.length !== 2 && value.length !== 3)) return false;
  const status: unknown = value[1];
  if (typeof status !== 'number' || !Number.isInteger(status) || status < 100 || status > 599) {
    return false;
  }
  if (value.length === 2) return true;
  const headers: unknown = value[2];
  return isPlainObject(headers) && Object.values(headers).every((v) => typeof v === 'string');
}
