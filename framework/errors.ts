/**
 * Error Hierarchy
 *
 * Shared by the router, negotiator, dispatcher and middleware so every
 * layer throws and catches the same types.
 */

export type HeaderPair = readonly [name: string, value: string];

/**
 * Base class for all framework errors
 */
export class FrameworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid setup: bad route syntax, registration after startup, a missing
 * collaborator. Thrown at startup and never converted into a response.
 */
export class ConfigurationError extends FrameworkError {}

/**
 * A handler returned a value the content negotiator cannot turn into a
 * response.
 */
export class NegotiationError extends FrameworkError {
  readonly valueType: string;

  constructor(valueType: string) {
    super(
      `Cannot convert ${valueType} to a response. ` +
        'Return a string, Uint8Array, plain object or array, Template, Stream, ' +
        'EventStream, Redirect, a response object, or a [body, status, headers?] tuple.'
    );
    this.valueType = valueType;
  }
}

/**
 * An error that maps directly to an HTTP status.
 *
 * Thrown by the router, middleware or handlers; the dispatcher offers it to
 * registered error handlers before falling back to a minimal response.
 */
export class HttpError extends FrameworkError {
  readonly status: number;
  readonly detail: string;
  readonly headers: readonly HeaderPair[];

  constructor(status: number, detail = '', headers: readonly HeaderPair[] = []) {
    super(detail ? `${status}: ${detail}` : String(status));
    this.status = status;
    this.detail = detail;
    this.headers = headers;
  }
}

/**
 * 404: no route matches the request path
 */
export class NotFound extends HttpError {
  constructor(detail = 'Not Found') {
    super(404, detail);
  }
}

/**
 * 405: the path matches but not for this method. Carries an Allow header.
 */
export class MethodNotAllowed extends HttpError {
  readonly allowed: readonly string[];

  constructor(allowed: Iterable<string>, detail = 'Method Not Allowed') {
    const sorted = [...new Set(allowed)].sort();
    super(405, detail, [['Allow', sorted.join(', ')]]);
    this.allowed = sorted;
  }
}

/**
 * Name the runtime type of an arbitrary value for error messages
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (
      proto !== null &&
      typeof proto === 'object' &&
      'constructor' in proto &&
      typeof proto.constructor === 'function' &&
      proto.constructor.name
    ) {
      return proto.constructor.name;
    }
    return 'object';
  }
  return typeof value;
}
