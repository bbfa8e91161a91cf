/**
 * Content Negotiation Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ConfigurationError, NegotiationError } from '../../framework/errors.ts';
import { negotiate } from '../../framework/http/negotiation.ts';
import {
  EventStreamResponse,
  HttpResponse,
  Redirect,
  StreamingResponse,
  text,
} from '../../framework/http/response.ts';
import { EventStream } from '../../framework/realtime/events.ts';
import { html, raw } from '../../framework/view/html.ts';
import {
  Fragment,
  Stream,
  Template,
  type Renderer,
  type TemplateContext,
} from '../../framework/view/template.ts';

const renderer: Renderer = {
  render: (name: string, context: TemplateContext) => `<page ${name}>${String(context.title)}</page>`,
  renderStream: (name: string) => [`<${name}>`, 'body', `</${name}>`],
  renderBlock: async (name: string, block: string) => `<${name}#${block}>`,
};

async function* empty(): AsyncGenerator<string> {}

async function collect(chunks: Iterable<string> | AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of chunks) out.push(chunk);
  return out;
}

test('Negotiation - response objects pass through unchanged', async () => {
  const response = text('hi', 201);
  assert.equal(await negotiate(response), response);
});

test('Negotiation - string becomes HTML', async () => {
  const res = await negotiate('<h1>Hi</h1>');

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.status, 200);
  assert.equal(res.contentType, 'text/html; charset=utf-8');
  assert.equal(res.text, '<h1>Hi</h1>');
});

test('Negotiation - SafeHtml becomes HTML', async () => {
  const res = await negotiate(html`<p>${'<b>'}</p>`);

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.text, '<p>&lt;b&gt;</p>');
  assert.equal(res.contentType, 'text/html; charset=utf-8');
});

test('Negotiation - plain object and array become JSON', async () => {
  const obj = await negotiate({ id: 1, tags: ['a'] });
  assert.ok(obj instanceof HttpResponse);
  assert.equal(obj.contentType, 'application/json; charset=utf-8');
  assert.equal(obj.text, '{"id":1,"tags":["a"]}');

  const list = await negotiate([1, 2, 3]);
  assert.ok(list instanceof HttpResponse);
  assert.equal(list.text, '[1,2,3]');
});

test('Negotiation - bytes become octet-stream', async () => {
  const res = await negotiate(new Uint8Array([1, 2, 3]));

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.contentType, 'application/octet-stream');
  assert.deepEqual([...res.bodyBytes], [1, 2, 3]);

  const fromBuffer = await negotiate(new Uint8Array([4]).buffer);
  assert.ok(fromBuffer instanceof HttpResponse);
  assert.deepEqual([...fromBuffer.bodyBytes], [4]);
});

test('Negotiation - redirect sets Location and status', async () => {
  const res = await negotiate(new Redirect('/login', 303, [['X-Reason', 'auth']]));

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.status, 303);
  assert.equal(res.text, '');
  assert.equal(res.header('Location'), '/login');
  assert.equal(res.header('X-Reason'), 'auth');
});

test('Negotiation - redirect defaults to 302', async () => {
  assert.equal((await negotiate(new Redirect('/'))).status, 302);
});

test('Negotiation - status tuple overrides status', async () => {
  const res = await negotiate(['Created', 201]);

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.status, 201);
  assert.equal(res.text, 'Created');
});

test('Negotiation - status tuple with headers', async () => {
  const res = await negotiate([{ id: 1 }, 201, { 'X-Id': '1' }]);

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.status, 201);
  assert.equal(res.header('X-Id'), '1');
  assert.equal(res.contentType, 'application/json; charset=utf-8');
});

test('Negotiation - Content-Type in tuple headers replaces the default', async () => {
  const res = await negotiate(['x', 200, { 'Content-Type': 'text/plain' }]);

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.contentType, 'text/plain');
  assert.deepEqual(res.headers, []);
});

test('Negotiation - arrays that are not status tuples stay JSON', async () => {
  const outOfRange = await negotiate(['a', 42]);
  assert.ok(outOfRange instanceof HttpResponse);
  assert.equal(outOfRange.status, 200);
  assert.equal(outOfRange.text, '["a",42]');

  const badHeaders = await negotiate(['a', 201, { n: 1 }]);
  assert.ok(badHeaders instanceof HttpResponse);
  assert.equal(badHeaders.status, 200);
});

test('Negotiation - Template renders through the renderer', async () => {
  const res = await negotiate(new Template('home.html', { title: 'Home' }), { renderer });

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.text, '<page home.html>Home</page>');
});

test('Negotiation - Fragment renders one block', async () => {
  const res = await negotiate(new Fragment('list.html', 'items'), { renderer });

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.text, '<list.html#items>');
});

test('Negotiation - Stream becomes a chunked response', async () => {
  const res = await negotiate(new Stream('page.html'), { renderer });

  assert.ok(res instanceof StreamingResponse);
  assert.equal(res.contentType, 'text/html; charset=utf-8');
  assert.deepEqual(await collect(res.chunks), ['<page.html>', 'body', '</page.html>']);
});

test('Negotiation - renderable values need a renderer', async () => {
  await assert.rejects(negotiate(new Template('home.html')), ConfigurationError);
  await assert.rejects(negotiate(new Stream('home.html')), ConfigurationError);
});

test('Negotiation - EventStream becomes an event stream response', async () => {
  const stream = new EventStream(empty());
  const res = await negotiate(stream);

  assert.ok(res instanceof EventStreamResponse);
  assert.equal(res.stream, stream);
  assert.equal(res.contentType, 'text/event-stream');
});

test('Negotiation - unsupported values throw NegotiationError', async () => {
  await assert.rejects(negotiate(42), { name: 'NegotiationError', valueType: 'number' });
  await assert.rejects(negotiate(null), NegotiationError);
  await assert.rejects(negotiate(new Map()), { valueType: 'Map' });
  await assert.rejects(negotiate(undefined), { valueType: 'undefined' });
});

test('Negotiation - raw() markup is not escaped', async () => {
  const res = await negotiate(html`<div>${raw('<em>x</em>')}</div>`);

  assert.ok(res instanceof HttpResponse);
  assert.equal(res.text, '<div><em>x</em></div>');
});
