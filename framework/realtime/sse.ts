/**
 * Server-Sent Events Engine
 *
 * Owns a connection once a handler returns an EventStream:
 *
 * 1. Sends the text/event-stream headers.
 * 2. Runs two activities side by side:
 *    - the producer pulls from the source, frames each value and writes
 *      it, racing every pull against the heartbeat interval;
 *    - the disconnect monitor waits for the client to go away.
 * 3. Whichever finishes first wins. The other is stopped and awaited
 *    before the terminating body message goes out.
 *
 * Once a disconnect is observed no further frame is written.
 */

import { ConfigurationError, describeType, type HeaderPair } from '../errors.ts';
import { isPlainObject } from '../http/negotiation.ts';
import { encodeText, type Receive, type Send } from '../http/transport.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { escapeHtml } from '../view/html.ts';
import { Fragment, type Renderer } from '../view/template.ts';
import { HEARTBEAT_FRAME, ServerEvent, hasLineBreak, type EventStream } from './events.ts';

export interface EventStreamHandlerOptions {
  renderer?: Renderer | null;
  /** Include error detail in error frames */
  debug?: boolean;
  /** Reconnection delay announced to the client before the first event */
  retryMs?: number | null;
  /** Name of an event sent when the source completes */
  closeEvent?: string | null;
  /** Sent after the protocol headers */
  headers?: readonly HeaderPair[];
  logger?: Logger;
}

export const EVENT_STREAM_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ['content-type', 'text/event-stream'],
  ['cache-control', 'no-cache'],
  ['connection', 'keep-alive'],
  ['x-accel-buffering', 'no'],
];

/**
 * Protocol headers followed by extra response headers. Extras cannot
 * replace a protocol header.
 */
export function eventStreamHeaders(extra: readonly HeaderPair[] = []): HeaderPair[] {
  const fixed = new Set(EVENT_STREAM_HEADERS.map(([name]) => name));
  return [
    ...EVENT_STREAM_HEADERS,
    ...extra
      .map(([name, value]): HeaderPair => [name.toLowerCase(), value])
      .filter(([name]) => !fixed.has(name)),
  ];
}

/**
 * One-shot latch
 */
class Signal {
  readonly promise: Promise<void>;
  private resolve: () => void = () => {};
  private _fired = false;

  constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.resolve = resolve;
    });
  }

  get fired(): boolean {
    return this._fired;
  }

  fire(): void {
    if (this._fired) return;
    this._fired = true;
    this.resolve();
  }
}

type Pull =
  | { kind: 'event'; result: IteratorResult<unknown> }
  | { kind: 'idle' }
  | { kind: 'disconnect' };

/**
 * Stream an EventStream over a connection
 */
export async function handleEventStream(
  stream: EventStream,
  send: Send,
  receive: Receive,
  options: EventStreamHandlerOptions = {}
): Promise<void> {
  const logger = options.logger ?? getLogger();
  const disconnected = new Signal();
  const stopped = new Signal();

  const write = async (frame: string): Promise<void> => {
    if (disconnected.fired) return;
    try {
      await send({ type: 'response.body', body: encodeText(frame), moreBody: true });
    } catch (error) {
      logger.warn('Event stream write failed, treating client as gone', {
        error: error instanceof Error ? error.message : String(error),
      });
      disconnected.fire();
    }
  };

  await send({ type: 'response.start', status: 200, headers: eventStreamHeaders(options.headers) });

  try {
    if (options.retryMs !== undefined && options.retryMs !== null) {
      await write(
        new ServerEvent({ data: 'sse-retry', event: 'sse:meta', retry: options.retryMs }).encode()
      );
    }

    const producer = produceEvents(stream, write, disconnected, logger, options);
    const monitor = monitorDisconnect(receive, disconnected, stopped, logger);

    await Promise.race([producer, monitor]);
    stopped.fire();
    await Promise.all([producer, monitor]);

    if (options.closeEvent) {
      await write(new ServerEvent({ data: 'complete', event: options.closeEvent }).encode());
    }
  } finally {
    await send({ type: 'response.body', body: new Uint8Array(0), moreBody: false });
  }
}

async function monitorDisconnect(
  receive: Receive,
  disconnected: Signal,
  stopped: Signal,
  logger: Logger
): Promise<void> {
  const whenStopped = stopped.promise.then(() => null);

  while (!disconnected.fired && !stopped.fired) {
    try {
      const message = await Promise.race([receive(), whenStopped]);
      if (message === null) return;
      if (message.type === 'disconnect') {
        disconnected.fire();
        return;
      }
    } catch (error) {
      logger.warn('Receive failed while streaming events', {
        error: error instanceof Error ? error.message : String(error),
      });
      disconnected.fire();
    }
  }
}

async function produceEvents(
  stream: EventStream,
  write: (frame: string) => Promise<void>,
  disconnected: Signal,
  logger: Logger,
  options: EventStreamHandlerOptions
): Promise<void> {
  const iterator = stream.source[Symbol.asyncIterator]();
  let pending: Promise<IteratorResult<unknown>> | null = null;
  let exhausted = false;

  try {
    while (!disconnected.fired) {
      pending ??= iterator.next();
      const pull = await nextOrIdle(pending, stream.heartbeatInterval, disconnected);

      if (pull.kind === 'disconnect') break;
      if (pull.kind === 'idle') {
        await write(HEARTBEAT_FRAME);
        continue;
      }

      pending = null;
      if (pull.result.done) {
        exhausted = true;
        break;
      }

      const frame = await formatSafely(pull.result.value, stream, logger, options);
      if (frame) {
        await write(frame);
      }
    }
  } catch (error) {
    exhausted = true;
    logger.error('Event stream source failed', error);
    const detail =
      options.debug && error instanceof Error
        ? (error.stack ?? error.message)
        : 'Internal server error';
    await write(new ServerEvent({ data: detail, event: 'error' }).encode());
  }

  if (!exhausted) {
    await releaseSource(iterator, pending, logger);
  }
}

/**
 * Wait for the next value, the heartbeat interval or a disconnect
 */
async function nextOrIdle(
  pending: Promise<IteratorResult<unknown>>,
  interval: number,
  disconnected: Signal
): Promise<Pull> {
  let timer: NodeJS.Timeout | undefined;
  const idle = new Promise<Pull>((resolve) => {
    timer = setTimeout(() => resolve({ kind: 'idle' }), interval);
  });

  try {
    return await Promise.race([
      pending.then((result): Pull => ({ kind: 'event', result })),
      idle,
      disconnected.promise.then((): Pull => ({ kind: 'disconnect' })),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Finalize an abandoned source.
 *
 * Between pulls the generator is suspended at a yield, so return() runs
 * its finally blocks at once and is awaited. With a pull in flight the
 * generator cannot be interrupted; return() is queued behind that pull and
 * completes whenever it settles.
 */
async function releaseSource(
  iterator: AsyncIterator<unknown>,
  pending: Promise<IteratorResult<unknown>> | null,
  logger: Logger
): Promise<void> {
  if (!iterator.return) return;

  const closing = iterator.return();
  const onFailure = (error: unknown): void => {
    logger.warn('Event stream source failed while closing', {
      error: error instanceof Error ? error.message : String(error),
    });
  };

  if (pending === null) {
    try {
      await closing;
    } catch (error) {
      onFailure(error);
    }
  } else {
    closing.catch(onFailure);
  }
}

/**
 * Format one value; failures skip the event, or become an error frame in
 * debug mode
 */
async function formatSafely(
  value: unknown,
  stream: EventStream,
  logger: Logger,
  options: EventStreamHandlerOptions
): Promise<string | null> {
  try {
    return await formatEvent(value, stream.eventType, options.renderer);
  } catch (error) {
    logger.error('Failed to format server event', error);
    return options.debug ? formatErrorEvent(value, error) : null;
  }
}

/**
 * Convert a yielded value to wire format.
 *
 * - ServerEvent: encoded as is
 * - Fragment: rendered block, event named by its target (or "fragment")
 * - string: data with the stream's event type
 * - plain object or array: JSON data with the stream's event type
 */
export async function formatEvent(
  value: unknown,
  defaultEvent?: string,
  renderer?: Renderer | null
): Promise<string> {
  if (value instanceof ServerEvent) {
    return value.encode();
  }

  if (value instanceof Fragment) {
    if (!renderer) {
      throw new ConfigurationError('Fragment events require a renderer.');
    }
    const data = await renderer.renderBlock(value.templateName, value.blockName, value.context);
    return new ServerEvent({ data, event: value.target ?? 'fragment' }).encode();
  }

  if (typeof value === 'string') {
    return new ServerEvent({ data: value, event: defaultEvent }).encode();
  }

  if (isPlainObject(value) || Array.isArray(value)) {
    return new ServerEvent({ data: JSON.stringify(value), event: defaultEvent }).encode();
  }

  throw new TypeError(
    `Cannot send ${describeType(value)} as a server event. ` +
      'Yield a ServerEvent, string, plain object or Fragment.'
  );
}

function formatErrorEvent(value: unknown, error: unknown): string {
  const name = error instanceof Error ? error.name : 'Error';
  const message = error instanceof Error ? error.message : String(error);

  // A targeted fragment gets its error in place of the broken block
  if (value instanceof Fragment && value.target && !hasLineBreak(value.target)) {
    const markup =
      `<div class="block-error" data-block="${escapeHtml(value.blockName)}">` +
      `<strong>${escapeHtml(name)}</strong>: ${escapeHtml(message)}</div>`;
    return new ServerEvent({ data: markup, event: value.target }).encode();
  }

  return new ServerEvent({ data: `${name}: ${message}`, event: 'error' }).encode();
}
