/**
 * Route Definitions
 *
 * Patterns are parsed into segments once, at registration. Routes are
 * frozen from then on.
 */

import { ConfigurationError } from '../errors.ts';
import type { Handler } from '../http/types.ts';
import { paramTypeNames, resolveParamType, type ParamType } from './params.ts';

export type PathSegment =
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'param'; readonly name: string; readonly type: ParamType };

export interface Route {
  readonly path: string;
  readonly segments: readonly PathSegment[];
  readonly handler: Handler;
  readonly methods: ReadonlySet<string>;
  readonly name?: string;
}

export interface RouteMatch {
  route: Route;
  /** Raw captured values, before type conversion */
  params: Record<string, string>;
}

const ANGLE_PARAM = /<(?:(\w+):)?(\w+)>/g;

/**
 * Split a request or pattern path into non-empty segments
 */
export function splitPath(path: string): string[] {
  return path.split('/').filter((part) => part.length > 0);
}

/**
 * Parse a route pattern into segments.
 *
 * ```
 * '/users'             -> [literal users]
 * '/users/{id:int}'    -> [literal users, param id:int]
 * '/files/{rest:path}' -> [literal files, param rest:path]
 * ```
 */
export function parsePath(pattern: string): PathSegment[] {
  if (pattern.includes('<') && pattern.includes('>')) {
    const suggestion = pattern.replace(ANGLE_PARAM, (_m, type: string | undefined, name: string) =>
      type ? `{${name}:${type}}` : `{${name}}`
    );
    throw new ConfigurationError(
      `Route '${pattern}' uses <param> syntax. Use {param} instead, e.g. '${suggestion}'.`
    );
  }

  const parts = splitPath(pattern);
  const segments: PathSegment[] = [];

  parts.forEach((part, index) => {
    if (!part.startsWith('{') && !part.endsWith('}')) {
      segments.push({ kind: 'literal', value: part });
      return;
    }

    if (!part.startsWith('{') || !part.endsWith('}')) {
      throw new ConfigurationError(
        `Route '${pattern}' has a malformed segment '${part}'. Expected {name} or {name:type}.`
      );
    }

    const inner = part.slice(1, -1);
    const colon = inner.indexOf(':');
    const name = colon === -1 ? inner : inner.slice(0, colon);
    const spelling = colon === -1 ? 'string' : inner.slice(colon + 1);

    if (!/^\w+$/.test(name)) {
      throw new ConfigurationError(
        `Route '${pattern}' has an invalid parameter name in '${part}'. Expected {name} or {name:type}.`
      );
    }

    const type = resolveParamType(spelling);
    if (!type) {
      throw new ConfigurationError(
        `Route '${pattern}' uses unknown parameter type '${spelling}'. ` +
          `Supported types: ${paramTypeNames().join(', ')}.`
      );
    }

    if (type === 'path' && index !== parts.length - 1) {
      throw new ConfigurationError(
        `Route '${pattern}': path parameter '{${name}:${spelling}}' must be the last segment.`
      );
    }

    segments.push({ kind: 'param', name, type });
  });

  const names = segments.flatMap((s) => (s.kind === 'param' ? [s.name] : []));
  const duplicate = names.find((name, i) => names.indexOf(name) !== i);
  if (duplicate) {
    throw new ConfigurationError(`Route '${pattern}' declares parameter '${duplicate}' twice.`);
  }

  return segments;
}

/**
 * Create a frozen route
 */
export function createRoute(
  path: string,
  handler: Handler,
  methods: Iterable<string> = ['GET'],
  name?: string
): Route {
  const methodSet = new Set([...methods].map((m) => m.toUpperCase()));
  if (methodSet.size === 0) {
    throw new ConfigurationError(`Route '${path}' must allow at least one method.`);
  }

  return Object.freeze({
    path,
    segments: Object.freeze(parsePath(path)),
    handler,
    methods: methodSet,
    name,
  });
}

/**
 * Declared types of a route's parameters, by name
 */
export function paramTypes(route: Route): Map<string, ParamType> {
  const types = new Map<string, ParamType>();
  for (const segment of route.segments) {
    if (segment.kind === 'param') {
      types.set(segment.name, segment.type);
    }
  }
  return types;
}
