/**
 * Request Context
 *
 * The active request for the current dispatch, available anywhere below
 * it without passing the request around. Backed by AsyncLocalStorage, so
 * concurrent requests never see each other and nothing outlives the
 * dispatch that created it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { FrameworkError } from './errors.ts';
import type { HttpRequest } from './http/request.ts';

interface RequestScope {
  request: HttpRequest;
}

const storage = new AsyncLocalStorage<RequestScope>();

/**
 * Run fn with req as the active request
 */
export function runWithRequest<T>(req: HttpRequest, fn: () => Promise<T>): Promise<T> {
  return storage.run({ request: req }, fn);
}

/**
 * Replace the active request, e.g. with its matched copy
 */
export function setRequest(req: HttpRequest): void {
  const scope = storage.getStore();
  if (scope) {
    scope.request = req;
  }
}

/**
 * The active request; throws outside a dispatch
 */
export function getRequest(): HttpRequest {
  const scope = storage.getStore();
  if (!scope) {
    throw new FrameworkError('No active request. getRequest() only works during a dispatch.');
  }
  return scope.request;
}

export function tryGetRequest(): HttpRequest | null {
  return storage.getStore()?.request ?? null;
}
