/**
 * URL Router
 *
 * Trie-based router. Routes are registered during setup, then compile()
 * freezes the table for the life of the process.
 *
 * At each level a literal child is tried first, then parameter children
 * (int, float, then string), then a rest-of-path child. A parameter only
 * matches a segment its type accepts; otherwise matching backtracks to the
 * next alternative.
 */

import { ConfigurationError, MethodNotAllowed, NotFound } from '../errors.ts';
import type { Handler, HttpMethod } from '../http/types.ts';
import { accepts, type ParamType } from './params.ts';
import { createRoute, splitPath, type PathSegment, type Route, type RouteMatch } from './route.ts';

class TrieNode {
  readonly children = new Map<string, TrieNode>();
  readonly params: ParamEdge[] = [];
  readonly rest: RestEdge[] = [];
  readonly routes = new Map<string, Route>();
}

interface ParamEdge {
  name: string;
  type: ParamType;
  node: TrieNode;
}

interface RestEdge {
  name: string;
  node: TrieNode;
}

const PARAM_PRECEDENCE: Record<ParamType, number> = { int: 0, float: 1, string: 2, path: 3 };

/**
 * Router
 */
export class Router {
  private readonly root = new TrieNode();
  private readonly registered: Route[] = [];
  private readonly named = new Map<string, Route>();
  private compiled = false;

  /**
   * Register a pattern. Must happen before compile().
   */
  register(
    pattern: string,
    handler: Handler,
    methods: Iterable<HttpMethod | string> = ['GET'],
    name?: string
  ): Route {
    const route = createRoute(pattern, handler, methods, name);
    this.add(route);
    return route;
  }

  /**
   * Add a prepared route. Must happen before compile().
   */
  add(route: Route): this {
    if (this.compiled) {
      throw new ConfigurationError(
        `Cannot add routes after compilation (tried to add '${route.path}').`
      );
    }

    if (route.name !== undefined && this.named.has(route.name)) {
      throw new ConfigurationError(`Duplicate route name '${route.name}'.`);
    }

    const node = this.insert(route.segments);
    for (const method of route.methods) {
      const existing = node.routes.get(method);
      if (existing) {
        throw new ConfigurationError(
          `Route ${method} '${route.path}' conflicts with '${existing.path}'.`
        );
      }
    }
    for (const method of route.methods) {
      node.routes.set(method, route);
    }

    this.registered.push(route);
    if (route.name !== undefined) {
      this.named.set(route.name, route);
    }
    return this;
  }

  /**
   * Freeze the table. Further registration throws.
   */
  compile(): this {
    this.compiled = true;
    return this;
  }

  get isCompiled(): boolean {
    return this.compiled;
  }

  /**
   * All registered routes, in registration order
   */
  get routes(): readonly Route[] {
    return [...this.registered];
  }

  /**
   * Match a method and path.
   *
   * Throws NotFound when no pattern matches the path and MethodNotAllowed
   * when one does but not for this method.
   */
  match(method: string, path: string): RouteMatch {
    const upper = method.toUpperCase();
    const found = this.matchNode(this.root, splitPath(path), 0, {});

    if (!found) {
      throw new NotFound(`No route matches ${upper} '${path}'`);
    }

    const route = found.node.routes.get(upper) ??
      (upper === 'HEAD' ? found.node.routes.get('GET') : undefined);

    if (!route) {
      throw new MethodNotAllowed(found.node.routes.keys());
    }

    return { route, params: found.params };
  }

  /**
   * Build a path for a named route
   */
  url(name: string, params: Record<string, string | number> = {}): string {
    const route = this.named.get(name);
    if (!route) {
      throw new ConfigurationError(`No route named '${name}'.`);
    }

    const parts = route.segments.map((segment) => {
      if (segment.kind === 'literal') return segment.value;
      const value = params[segment.name];
      if (value === undefined) {
        throw new ConfigurationError(`Route '${name}' requires parameter '${segment.name}'.`);
      }
      const raw = String(value);
      return segment.type === 'path'
        ? raw.split('/').map(encodeURIComponent).join('/')
        : encodeURIComponent(raw);
    });

    return '/' + parts.join('/');
  }

  private insert(segments: readonly PathSegment[]): TrieNode {
    let node = this.root;

    for (const segment of segments) {
      if (segment.kind === 'literal') {
        let child = node.children.get(segment.value);
        if (!child) {
          child = new TrieNode();
          node.children.set(segment.value, child);
        }
        node = child;
        continue;
      }

      if (segment.type === 'path') {
        let edge = node.rest.find((e) => e.name === segment.name);
        if (!edge) {
          edge = { name: segment.name, node: new TrieNode() };
          node.rest.push(edge);
        }
        node = edge.node;
        continue;
      }

      let edge = node.params.find((e) => e.name === segment.name && e.type === segment.type);
      if (!edge) {
        edge = { name: segment.name, type: segment.type, node: new TrieNode() };
        node.params.push(edge);
        node.params.sort((a, b) => PARAM_PRECEDENCE[a.type] - PARAM_PRECEDENCE[b.type]);
      }
      node = edge.node;
    }

    return node;
  }

  private matchNode(
    node: TrieNode,
    parts: string[],
    index: number,
    params: Record<string, string>
  ): { node: TrieNode; params: Record<string, string> } | null {
    if (index === parts.length) {
      return node.routes.size > 0 ? { node, params } : null;
    }

    const part = safeDecode(parts[index]);

    const literal = node.children.get(part);
    if (literal) {
      const result = this.matchNode(literal, parts, index + 1, params);
      if (result) return result;
    }

    for (const edge of node.params) {
      if (!accepts(edge.type, part)) continue;
      const result = this.matchNode(edge.node, parts, index + 1, { ...params, [edge.name]: part });
      if (result) return result;
    }

    for (const edge of node.rest) {
      if (edge.node.routes.size === 0) continue;
      const remaining = parts.slice(index).map(safeDecode).join('/');
      return { node: edge.node, params: { ...params, [edge.name]: remaining } };
    }

    return null;
  }
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
