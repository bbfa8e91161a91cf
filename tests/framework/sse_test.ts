/**
 * Server-Sent Events Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTimeout as sleep } from 'node:timers/promises';
import { ConfigurationError } from '../../framework/errors.ts';
import { createDispatcher } from '../../framework/http/dispatcher.ts';
import type { InboundMessage, OutboundMessage, Receive, Send } from '../../framework/http/transport.ts';
import { EventStream, ServerEvent } from '../../framework/realtime/events.ts';
import { corsMiddleware } from '../../framework/middleware/cors.ts';
import {
  EVENT_STREAM_HEADERS,
  eventStreamHeaders,
  formatEvent,
  handleEventStream,
} from '../../framework/realtime/sse.ts';
import { Router } from '../../framework/router/router.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';
import { TestClient } from '../../framework/testing/client.ts';
import { parseEventFrames } from '../../framework/testing/sse.ts';
import { Fragment, type Renderer } from '../../framework/view/template.ts';

interface Connection {
  messages: OutboundMessage[];
  send: Send;
  receive: Receive;
  disconnect: () => void;
  raw: () => string;
}

function connection(): Connection {
  const messages: OutboundMessage[] = [];
  let disconnect: () => void = () => {};
  const gone = new Promise<InboundMessage>((resolve) => {
    disconnect = () => resolve({ type: 'disconnect' });
  });

  return {
    messages,
    send: async (message) => {
      messages.push(message);
    },
    receive: () => gone,
    disconnect: () => disconnect(),
    raw: () =>
      messages
        .map((m) => (m.type === 'response.body' ? new TextDecoder().decode(m.body) : ''))
        .join(''),
  };
}

function quietLogger(entries: LogEntry[] = []): Logger {
  return new Logger({ output: (entry) => entries.push(entry) });
}

async function* values(...items: unknown[]): AsyncGenerator<unknown> {
  for (const item of items) yield item;
}

const renderer: Renderer = {
  render: () => '',
  renderStream: () => [],
  renderBlock: (name, block, context) => `<li>${name}:${block}:${String(context.n)}</li>`,
};

test('ServerEvent - encodes fields and splits multi-line data', () => {
  const event = new ServerEvent({ data: 'line1\r\nline2\nline3', event: 'update', id: '7', retry: 500 });

  assert.equal(
    event.encode(),
    'event: update\nid: 7\nretry: 500\ndata: line1\ndata: line2\ndata: line3\n\n'
  );
  assert.equal(new ServerEvent({ data: '' }).encode(), 'data: \n\n');
});

test('ServerEvent - event and id must be single-line', () => {
  assert.throws(() => new ServerEvent({ data: 'ok', id: '1\ndata: injected' }), {
    name: 'TypeError',
    message: 'Server event id must not contain line breaks: "1\\ndata: injected"',
  });
  assert.throws(() => new ServerEvent({ data: 'ok', event: 'a\rb' }), TypeError);
  assert.equal(new ServerEvent({ data: 'a\nb', id: '2' }).encode(), 'id: 2\ndata: a\ndata: b\n\n');
});

test('EventStream - rejects invalid options', () => {
  for (const heartbeatInterval of [0, -1, Number.NaN, Number.POSITIVE_INFINITY]) {
    assert.throws(() => new EventStream(values(), { heartbeatInterval }), ConfigurationError);
  }
  assert.throws(() => new EventStream(values(), { eventType: 'tick\n' }), ConfigurationError);
  assert.equal(new EventStream(values(), { heartbeatInterval: 1 }).heartbeatInterval, 1);
});

test('formatEvent - strings, objects and server events', async () => {
  assert.equal(await formatEvent('hi'), 'data: hi\n\n');
  assert.equal(await formatEvent('hi', 'message'), 'event: message\ndata: hi\n\n');
  assert.equal(await formatEvent({ a: 1 }, 'tick'), 'event: tick\ndata: {"a":1}\n\n');
  assert.equal(await formatEvent([1, 2]), 'data: [1,2]\n\n');
  assert.equal(
    await formatEvent(new ServerEvent({ data: 'x', event: 'own' }), 'ignored'),
    'event: own\ndata: x\n\n'
  );
});

test('formatEvent - fragments render a block on their target event', async () => {
  assert.equal(
    await formatEvent(new Fragment('feed.html', 'item', { n: 1 }, 'feed'), undefined, renderer),
    'event: feed\ndata: <li>feed.html:item:1</li>\n\n'
  );
  assert.equal(
    await formatEvent(new Fragment('feed.html', 'item', { n: 2 }), undefined, renderer),
    'event: fragment\ndata: <li>feed.html:item:2</li>\n\n'
  );
});

test('formatEvent - rejects unsupported values', async () => {
  await assert.rejects(formatEvent(42), {
    name: 'TypeError',
    message:
      'Cannot send number as a server event. Yield a ServerEvent, string, plain object or Fragment.',
  });
  await assert.rejects(formatEvent(new Fragment('a.html', 'b')), ConfigurationError);
});

test('Event stream - sends headers, frames and a final body', async () => {
  const conn = connection();
  const stream = new EventStream(values('hello', { a: 1 }, new ServerEvent({ data: 'x', event: 'update', id: '7' })));

  await handleEventStream(stream, conn.send, conn.receive, { logger: quietLogger() });

  assert.deepEqual(conn.messages[0], {
    type: 'response.start',
    status: 200,
    headers: EVENT_STREAM_HEADERS,
  });
  assert.equal(conn.raw(), 'data: hello\n\ndata: {"a":1}\n\nevent: update\nid: 7\ndata: x\n\n');

  const last = conn.messages[conn.messages.length - 1];
  assert.ok(last.type === 'response.body');
  assert.equal(last.moreBody, false);
  assert.equal(last.body.byteLength, 0);
  assert.equal(conn.messages.filter((m) => m.type === 'response.body' && !m.moreBody).length, 1);
});

test('Event stream - event type applies to yielded strings', async () => {
  const conn = connection();
  await handleEventStream(new EventStream(values('a'), { eventType: 'message' }), conn.send, conn.receive, {
    logger: quietLogger(),
  });

  assert.equal(conn.raw(), 'event: message\ndata: a\n\n');
});

test('Event stream - retry announcement comes first', async () => {
  const conn = connection();
  await handleEventStream(new EventStream(values('a')), conn.send, conn.receive, {
    logger: quietLogger(),
    retryMs: 3000,
  });

  assert.equal(conn.raw(), 'event: sse:meta\nretry: 3000\ndata: sse-retry\n\ndata: a\n\n');
});

test('Event stream - close event follows a completed source', async () => {
  const conn = connection();
  await handleEventStream(new EventStream(values('a')), conn.send, conn.receive, {
    logger: quietLogger(),
    closeEvent: 'done',
  });

  assert.equal(conn.raw(), 'data: a\n\nevent: done\ndata: complete\n\n');
});

test('Event stream - heartbeats while the source is idle', async () => {
  async function* late(): AsyncGenerator<string> {
    await sleep(80);
    yield 'late';
  }

  const conn = connection();
  await handleEventStream(new EventStream(late(), { heartbeatInterval: 20 }), conn.send, conn.receive, {
    logger: quietLogger(),
  });

  const parsed = parseEventFrames(conn.raw());
  assert.ok(parsed.heartbeats >= 1);
  assert.deepEqual(
    parsed.events.map((e) => e.data),
    ['late']
  );
});

test('Event stream - disconnect stops the source and runs its cleanup', async () => {
  let cleanedUp = false;
  async function* forever(): AsyncGenerator<string> {
    try {
      for (let i = 0; ; i++) {
        await sleep(5);
        yield `tick ${i}`;
      }
    } finally {
      cleanedUp = true;
    }
  }

  const router = new Router();
  router.register('/ticks', () => new EventStream(forever()));
  const client = new TestClient({ handle: createDispatcher({ router, logger: quietLogger() }) });

  const result = await client.sse('/ticks', { maxEvents: 3 });

  assert.equal(result.status, 200);
  assert.equal(result.headers.get('content-type'), 'text/event-stream');
  assert.equal(result.headers.get('cache-control'), 'no-cache');
  assert.deepEqual(
    result.events.map((e) => e.data),
    ['tick 0', 'tick 1', 'tick 2']
  );
  assert.equal(cleanedUp, true);
});

test('Event stream - disconnect during an idle wait ends the stream', async () => {
  async function* silent(): AsyncGenerator<string> {
    await sleep(300);
    yield 'never';
  }

  const conn = connection();
  const done = handleEventStream(new EventStream(silent(), { heartbeatInterval: 20 }), conn.send, conn.receive, {
    logger: quietLogger(),
  });
  await sleep(50);
  conn.disconnect();
  await done;

  const parsed = parseEventFrames(conn.raw());
  assert.equal(parsed.events.length, 0);
  assert.ok(parsed.heartbeats >= 1);
  const last = conn.messages[conn.messages.length - 1];
  assert.ok(last.type === 'response.body');
  assert.equal(last.moreBody, false);
});

test('Event stream - source failure sends an error frame', async () => {
  async function* failing(): AsyncGenerator<string> {
    yield 'first';
    throw new Error('source broke');
  }

  const entries: LogEntry[] = [];
  const conn = connection();
  await handleEventStream(new EventStream(failing()), conn.send, conn.receive, {
    logger: quietLogger(entries),
  });

  assert.equal(conn.raw(), 'data: first\n\nevent: error\ndata: Internal server error\n\n');
  assert.equal(entries[0].message, 'Event stream source failed');
});

test('Event stream - unformattable values are skipped', async () => {
  const entries: LogEntry[] = [];
  const conn = connection();
  await handleEventStream(new EventStream(values(42, 'ok')), conn.send, conn.receive, {
    logger: quietLogger(entries),
  });

  assert.equal(conn.raw(), 'data: ok\n\n');
  assert.equal(entries[0].message, 'Failed to format server event');
});

test('Event stream - debug mode reports format failures in-band', async () => {
  const conn = connection();
  await handleEventStream(new EventStream(values(42)), conn.send, conn.receive, {
    logger: quietLogger(),
    debug: true,
  });

  assert.equal(
    conn.raw(),
    'event: error\ndata: TypeError: Cannot send number as a server event. ' +
      'Yield a ServerEvent, string, plain object or Fragment.\n\n'
  );
});

test('Event stream - debug block failure replaces the targeted fragment', async () => {
  const failingRenderer: Renderer = {
    ...renderer,
    renderBlock: () => {
      throw new Error('missing <block>');
    },
  };

  const conn = connection();
  await handleEventStream(
    new EventStream(values(new Fragment('feed.html', 'item', {}, 'feed'))),
    conn.send,
    conn.receive,
    { logger: quietLogger(), debug: true, renderer: failingRenderer }
  );

  assert.equal(
    conn.raw(),
    'event: feed\ndata: <div class="block-error" data-block="item">' +
      '<strong>Error</strong>: missing &lt;block&gt;</div>\n\n'
  );
});

test('Event stream - failed write is treated as a disconnect', async () => {
  const entries: LogEntry[] = [];
  let attempts = 0;
  const messages: OutboundMessage[] = [];
  const send: Send = async (message) => {
    if (message.type === 'response.body' && message.moreBody) {
      attempts++;
      throw new Error('socket closed');
    }
    messages.push(message);
  };
  const receive: Receive = () => new Promise<InboundMessage>(() => {});

  await handleEventStream(new EventStream(values('a', 'b', 'c')), send, receive, {
    logger: quietLogger(entries),
  });

  assert.equal(attempts, 1);
  assert.equal(messages.length, 2);
  assert.equal(entries[0].message, 'Event stream write failed, treating client as gone');
});

test('Event stream - HEAD sends only the headers', async () => {
  const router = new Router();
  router.register('/events', () => new EventStream(values('a')));
  const client = new TestClient({ handle: createDispatcher({ router, logger: quietLogger() }) });

  const res = await client.request('HEAD', '/events');
  assert.equal(res.status, 200);
  assert.equal(res.contentType, 'text/event-stream');
  assert.equal(res.text, '');
  assert.equal(res.messages.length, 2);
});

test('Event stream - application heartbeat interval applies unless the stream sets one', async () => {
  async function* slow(): AsyncGenerator<string> {
    await sleep(80);
    yield 'done';
  }

  const router = new Router();
  router.register('/default', () => new EventStream(slow()));
  router.register('/explicit', () => new EventStream(slow(), { heartbeatInterval: 10_000 }));
  const client = new TestClient({
    handle: createDispatcher({ router, logger: quietLogger(), sseHeartbeatInterval: 20 }),
  });

  const withDefault = await client.sse('/default', { maxEvents: 1 });
  assert.ok(withDefault.heartbeats >= 1);

  const withExplicit = await client.sse('/explicit', { maxEvents: 1 });
  assert.equal(withExplicit.heartbeats, 0);
  assert.deepEqual(
    withExplicit.events.map((e) => e.data),
    ['done']
  );
});

test('Event stream - dispatcher passes retry and close settings', async () => {
  const router = new Router();
  router.register('/events', () => new EventStream(values('a')));
  const client = new TestClient({
    handle: createDispatcher({ router, logger: quietLogger(), sseRetryMs: 1000, sseCloseEvent: 'end' }),
  });

  const result = await client.sse('/events');
  assert.deepEqual(
    result.events.map((e) => [e.event, e.data]),
    [
      ['sse:meta', 'sse-retry'],
      [undefined, 'a'],
      ['end', 'complete'],
    ]
  );
  assert.equal(result.events[0].retry, 1000);
});

test('Event stream - extra headers follow the protocol headers', async () => {
  const conn = connection();
  await handleEventStream(new EventStream(values()), conn.send, conn.receive, {
    logger: quietLogger(),
    headers: [
      ['Content-Type', 'text/plain'],
      ['Access-Control-Allow-Origin', '*'],
    ],
  });

  assert.deepEqual(conn.messages[0], {
    type: 'response.start',
    status: 200,
    headers: [...EVENT_STREAM_HEADERS, ['access-control-allow-origin', '*']],
  });
  assert.deepEqual(eventStreamHeaders(), EVENT_STREAM_HEADERS);
});

test('Event stream - CORS middleware reaches cross-origin streams', async () => {
  const router = new Router();
  router.register('/events', () => new EventStream(values('a')));
  const client = new TestClient({
    handle: createDispatcher({ router, middleware: [corsMiddleware()], logger: quietLogger() }),
  });
  const origin = { Origin: 'http://other.example' };

  const result = await client.sse('/events', { headers: origin });
  assert.equal(result.headers.get('access-control-allow-origin'), '*');
  assert.equal(result.headers.get('content-type'), 'text/event-stream');
  assert.deepEqual(
    result.events.map((e) => e.data),
    ['a']
  );

  const head = await client.request('HEAD', '/events', { headers: origin });
  assert.equal(head.header('access-control-allow-origin'), '*');
});

test('Event stream - invalid application heartbeat interval is rejected', () => {
  assert.throws(
    () => createDispatcher({ router: new Router(), logger: quietLogger(), sseHeartbeatInterval: 0 }),
    ConfigurationError
  );
});

test('Event stream - fragment with a multi-line target is skipped', async () => {
  const entries: LogEntry[] = [];
  const conn = connection();
  const stream = new EventStream(values(new Fragment('a.html', 'b', { n: 1 }, 'bad\ntarget'), 'after'));

  await handleEventStream(stream, conn.send, conn.receive, { logger: quietLogger(entries), renderer });

  assert.equal(conn.raw(), 'data: after\n\n');
  assert.equal(entries[0].message, 'Failed to format server event');
  assert.equal(entries[0].error?.name, 'TypeError');
});

test('parseEventFrames - events, comments and multi-line data', () => {
  const parsed = parseEventFrames(
    ': heartbeat\n\nevent: update\nid: 3\ndata: one\ndata: two\n\n: other comment\n\nretry: 10\n\n'
  );

  assert.equal(parsed.heartbeats, 1);
  assert.equal(parsed.events.length, 1);
  assert.equal(parsed.events[0].event, 'update');
  assert.equal(parsed.events[0].id, '3');
  assert.equal(parsed.events[0].data, 'one\ntwo');
});
