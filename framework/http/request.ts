/**
 * Immutable HTTP Request
 *
 * Metadata is fixed at construction. The body is pulled lazily from the
 * transport; once fully consumed, further reads yield nothing new.
 */

import { HeaderMap } from './headers.ts';
import { QueryParams } from './query.ts';
import type { Address, ConnectionScope, Receive } from './transport.ts';

interface BodyCursor {
  consumed: boolean;
  body?: Uint8Array;
}

export interface RequestInit {
  method: string;
  path: string;
  headers?: HeaderMap;
  query?: QueryParams;
  pathParams?: Record<string, string>;
  httpVersion?: string;
  client?: Address | null;
  server?: Address | null;
  receive?: Receive;
  state?: Map<string, unknown>;
}

const noBody: Receive = async () => ({ type: 'request.body', body: new Uint8Array(0), moreBody: false });

/**
 * Request for the framework
 */
export class HttpRequest {
  readonly method: string;
  readonly path: string;
  readonly headers: HeaderMap;
  readonly query: QueryParams;
  readonly pathParams: Readonly<Record<string, string>>;
  readonly httpVersion: string;
  readonly client: Address | null;
  readonly server: Address | null;
  readonly cookies: ReadonlyMap<string, string>;

  /**
   * Per-request storage for passing data between middleware and handlers.
   * Shared with copies derived by withPathParams().
   */
  readonly state: Map<string, unknown>;

  private readonly _receive: Receive;
  private readonly _cursor: BodyCursor;

  constructor(init: RequestInit, cursor: BodyCursor = { consumed: false }) {
    this.method = init.method.toUpperCase();
    this.path = init.path || '/';
    this.headers = init.headers ?? new HeaderMap();
    this.query = init.query ?? new QueryParams();
    this.pathParams = Object.freeze({ ...(init.pathParams ?? {}) });
    this.httpVersion = init.httpVersion ?? '1.1';
    this.client = init.client ?? null;
    this.server = init.server ?? null;
    this.state = init.state ?? new Map();
    this.cookies = parseCookies(this.headers.get('cookie') ?? '');
    this._receive = init.receive ?? noBody;
    this._cursor = cursor;
  }

  /**
   * Build a request from transport metadata
   */
  static fromConnection(scope: ConnectionScope, receive: Receive): HttpRequest {
    return new HttpRequest({
      method: scope.method,
      path: scope.path,
      headers: new HeaderMap(scope.headers),
      query: new QueryParams(scope.queryString),
      httpVersion: scope.httpVersion,
      client: scope.client,
      server: scope.server,
      receive,
    });
  }

  /**
   * Derive the matched copy of this request. Body cursor and state are shared.
   */
  withPathParams(pathParams: Record<string, string>): HttpRequest {
    return new HttpRequest(
      {
        method: this.method,
        path: this.path,
        headers: this.headers,
        query: this.query,
        pathParams,
        httpVersion: this.httpVersion,
        client: this.client,
        server: this.server,
        receive: this._receive,
        state: this.state,
      },
      this._cursor
    );
  }

  /**
   * Full URL path including the query string
   */
  get url(): string {
    return this.query.raw ? `${this.path}?${this.query.raw}` : this.path;
  }

  get contentType(): string | null {
    return this.headers.get('content-type');
  }

  get contentLength(): number | null {
    const value = this.headers.get('content-length');
    if (value === null || !/^\d+$/.test(value)) return null;
    return parseInt(value, 10);
  }

  /**
   * True for partial-page requests (HX-Request header)
   */
  get isFragment(): boolean {
    return this.headers.get('hx-request') === 'true';
  }

  /**
   * Client IP, honouring proxy headers
   */
  get ip(): string {
    return (
      this.headers.get('x-forwarded-for')?.split(',')[0]?.trim() ??
      this.headers.get('x-real-ip') ??
      this.client?.host ??
      'unknown'
    );
  }

  header(name: string): string | null {
    return this.headers.get(name);
  }

  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  /**
   * Pull the body in chunks. Yields nothing once the body has been consumed.
   */
  async *stream(): AsyncGenerator<Uint8Array, void, undefined> {
    if (this._cursor.consumed) return;
    while (true) {
      const message = await this._receive();
      if (message.type === 'disconnect') {
        this._cursor.consumed = true;
        return;
      }
      if (message.body.byteLength > 0) {
        yield message.body;
      }
      if (!message.moreBody) {
        this._cursor.consumed = true;
        return;
      }
    }
  }

  /**
   * Read the whole body. Cached after the first call.
   */
  async body(): Promise<Uint8Array> {
    if (this._cursor.body) return this._cursor.body;

    const chunks: Uint8Array[] = [];
    let length = 0;
    for await (const chunk of this.stream()) {
      chunks.push(chunk);
      length += chunk.byteLength;
    }

    const body = new Uint8Array(length);
    let offset = 0;
    for (const chunk of chunks) {
      body.set(chunk, offset);
      offset += chunk.byteLength;
    }
    this._cursor.body = body;
    return body;
  }

  async text(): Promise<string> {
    return new TextDecoder().decode(await this.body());
  }

  async json<T = unknown>(): Promise<T> {
    const parsed: T = JSON.parse(await this.text());
    return parsed;
  }
}

function parseCookies(header: string): ReadonlyMap<string, string> {
  const cookies = new Map<string, string>();

  for (const cookie of header.split(';')) {
    const [name, ...rest] = cookie.split('=');
    const key = name?.trim();
    if (key) {
      cookies.set(key, safeDecode(rest.join('=').trim()));
    }
  }

  return cookies;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
