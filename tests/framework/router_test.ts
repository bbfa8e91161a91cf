/**
 * Router Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ConfigurationError, MethodNotAllowed, NotFound } from '../../framework/errors.ts';
import { convertParams } from '../../framework/http/dispatcher.ts';
import { accepts, convertParam } from '../../framework/router/params.ts';
import { parsePath } from '../../framework/router/route.ts';
import { Router } from '../../framework/router/router.ts';

const ok = () => 'OK';

test('Router - basic route registration', () => {
  const router = new Router();
  router.register('/test', ok);

  const match = router.match('GET', '/test');
  assert.equal(match.route.path, '/test');
  assert.deepEqual(match.params, {});
});

test('Router - root path matches', () => {
  const router = new Router();
  router.register('/', ok);

  assert.equal(router.match('GET', '/').route.path, '/');
});

test('Router - route with params', () => {
  const router = new Router();
  router.register('/users/{id}', ok);

  const match = router.match('GET', '/users/123');
  assert.deepEqual(match.params, { id: '123' });
});

test('Router - multiple params', () => {
  const router = new Router();
  router.register('/users/{userId}/posts/{postId}', ok);

  const match = router.match('GET', '/users/123/posts/456');
  assert.deepEqual(match.params, { userId: '123', postId: '456' });
});

test('Router - trailing slash is ignored', () => {
  const router = new Router();
  router.register('/users', ok);

  assert.equal(router.match('GET', '/users/').route.path, '/users');
});

test('Router - literal segment wins over a parameter', () => {
  const router = new Router();
  router.register('/users/{id}', () => 'param');
  router.register('/users/me', () => 'literal');

  assert.equal(router.match('GET', '/users/me').route.path, '/users/me');
  assert.equal(router.match('GET', '/users/42').route.path, '/users/{id}');
});

test('Router - typed parameters are tried int, then float, then string', () => {
  const router = new Router();
  router.register('/items/{name}', ok);
  router.register('/items/{price:float}', ok);
  router.register('/items/{id:int}', ok);

  assert.equal(router.match('GET', '/items/7').route.path, '/items/{id:int}');
  assert.equal(router.match('GET', '/items/7.5').route.path, '/items/{price:float}');
  assert.equal(router.match('GET', '/items/seven').route.path, '/items/{name}');
});

test('Router - int parameter rejects non-digits', () => {
  const router = new Router();
  router.register('/users/{id:int}', ok);

  assert.throws(() => router.match('GET', '/users/abc'), NotFound);
  assert.throws(() => router.match('GET', '/users/-1'), NotFound);
});

test('Router - backtracks when a deeper segment fails', () => {
  const router = new Router();
  router.register('/a/{x:int}/edit', () => 'int');
  router.register('/a/{x}/view', () => 'string');

  const match = router.match('GET', '/a/5/view');
  assert.equal(match.route.path, '/a/{x}/view');
  assert.deepEqual(match.params, { x: '5' });
});

test('Router - path parameter captures the remainder', () => {
  const router = new Router();
  router.register('/files/{rest:path}', ok);

  const match = router.match('GET', '/files/docs/2024/report.pdf');
  assert.deepEqual(match.params, { rest: 'docs/2024/report.pdf' });
});

test('Router - path parameter needs at least one segment', () => {
  const router = new Router();
  router.register('/files/{rest:path}', ok);

  assert.throws(() => router.match('GET', '/files'), NotFound);
});

test('Router - segments are percent-decoded', () => {
  const router = new Router();
  router.register('/tags/{tag}', ok);

  assert.deepEqual(router.match('GET', '/tags/hello%20world').params, { tag: 'hello world' });
});

test('Router - no match throws NotFound', () => {
  const router = new Router();
  router.register('/test', ok);

  assert.throws(
    () => router.match('GET', '/nonexistent'),
    (error: unknown) =>
      error instanceof NotFound &&
      error.status === 404 &&
      error.detail === "No route matches GET '/nonexistent'"
  );
});

test('Router - wrong method throws MethodNotAllowed with Allow header', () => {
  const router = new Router();
  router.register('/test', ok, ['POST', 'GET']);

  assert.throws(
    () => router.match('DELETE', '/test'),
    (error: unknown) =>
      error instanceof MethodNotAllowed &&
      error.status === 405 &&
      error.headers[0][0] === 'Allow' &&
      error.headers[0][1] === 'GET, POST'
  );
});

test('Router - HEAD falls back to GET', () => {
  const router = new Router();
  router.register('/test', ok);

  assert.equal(router.match('HEAD', '/test').route.path, '/test');
});

test('Router - method matching is case-insensitive', () => {
  const router = new Router();
  router.register('/test', ok, ['post']);

  assert.equal(router.match('post', '/test').route.path, '/test');
});

test('Router - duplicate method on the same pattern is rejected', () => {
  const router = new Router();
  router.register('/users/{id}', ok);

  assert.throws(() => router.register('/users/{id}', ok), ConfigurationError);
});

test('Router - same pattern may register different methods', () => {
  const router = new Router();
  router.register('/users', () => 'list');
  router.register('/users', () => 'create', ['POST']);

  assert.equal(router.match('GET', '/users').route.methods.has('GET'), true);
  assert.equal(router.match('POST', '/users').route.methods.has('POST'), true);
});

test('Router - registration after compile is rejected', () => {
  const router = new Router();
  router.register('/a', ok);
  router.compile();

  assert.equal(router.isCompiled, true);
  assert.throws(() => router.register('/b', ok), ConfigurationError);
});

test('Router - routes lists registrations in order', () => {
  const router = new Router();
  router.register('/b', ok);
  router.register('/a', ok, ['POST']);

  assert.deepEqual(
    router.routes.map((route) => route.path),
    ['/b', '/a']
  );
});

test('Router - url builds paths for named routes', () => {
  const router = new Router();
  router.register('/users/{id:int}/posts/{slug}', ok, ['GET'], 'user_post');
  router.register('/files/{rest:path}', ok, ['GET'], 'file');

  assert.equal(router.url('user_post', { id: 42, slug: 'hello world' }), '/users/42/posts/hello%20world');
  assert.equal(router.url('file', { rest: 'a b/c' }), '/files/a%20b/c');
});

test('Router - url rejects unknown names and missing params', () => {
  const router = new Router();
  router.register('/users/{id}', ok, ['GET'], 'user');

  assert.throws(() => router.url('missing'), ConfigurationError);
  assert.throws(() => router.url('user'), ConfigurationError);
});

test('Router - duplicate route names are rejected', () => {
  const router = new Router();
  router.register('/a', ok, ['GET'], 'page');

  assert.throws(() => router.register('/b', ok, ['GET'], 'page'), ConfigurationError);
});

test('parsePath - parses literals and typed params', () => {
  assert.deepEqual(parsePath('/users/{id:int}/files/{rest:path}'), [
    { kind: 'literal', value: 'users' },
    { kind: 'param', name: 'id', type: 'int' },
    { kind: 'literal', value: 'files' },
    { kind: 'param', name: 'rest', type: 'path' },
  ]);
});

test('parsePath - accepts type aliases', () => {
  assert.deepEqual(parsePath('/{a:str}/{b:integer}'), [
    { kind: 'param', name: 'a', type: 'string' },
    { kind: 'param', name: 'b', type: 'int' },
  ]);
  assert.deepEqual(parsePath('/files/{p:rest-of-path}'), [
    { kind: 'literal', value: 'files' },
    { kind: 'param', name: 'p', type: 'path' },
  ]);
});

test('Router - rest-of-path spelling captures the remaining segments', () => {
  const router = new Router();
  router.register('/files/{p:rest-of-path}', () => 'file', ['GET']);
  router.compile();

  assert.deepEqual(router.match('GET', '/files/docs/a/b.txt').params, { p: 'docs/a/b.txt' });
});

test('parsePath - angle bracket syntax suggests the brace form', () => {
  assert.throws(
    () => parsePath('/users/<int:id>'),
    (error: unknown) =>
      error instanceof ConfigurationError && error.message.includes("'/users/{id:int}'")
  );
});

test('parsePath - rejects malformed segments', () => {
  assert.throws(() => parsePath('/users/{id'), ConfigurationError);
  assert.throws(() => parsePath('/users/{}'), ConfigurationError);
  assert.throws(() => parsePath('/users/{id:uuid}'), ConfigurationError);
  assert.throws(() => parsePath('/files/{rest:path}/edit'), ConfigurationError);
  assert.throws(() => parsePath('/{id}/{id}'), ConfigurationError);
});

test('Params - converters produce typed values', () => {
  assert.equal(convertParam('42', 'int'), 42);
  assert.equal(convertParam('2.5', 'float'), 2.5);
  assert.equal(convertParam('abc', 'string'), 'abc');
  assert.equal(accepts('float', '3'), true);
  assert.equal(accepts('string', 'a/b'), false);
});

test('Params - oversized integers throw RangeError', () => {
  assert.throws(() => convertParam('99999999999999999999', 'int'), RangeError);
});

test('convertParams - converts by declared type and keeps raw values on failure', () => {
  const router = new Router();
  router.register('/n/{id:int}/{name}', ok);

  assert.deepEqual(convertParams(router.match('GET', '/n/7/bob')), { id: 7, name: 'bob' });
  assert.deepEqual(convertParams(router.match('GET', '/n/99999999999999999999/bob')), {
    id: '99999999999999999999',
    name: 'bob',
  });
});
