/**
 * Response Sender
 *
 * Writes buffered and chunked responses to the transport. Every path ends
 * with exactly one body message carrying moreBody: false.
 */

import type { Logger } from '../telemetry/logger.ts';
import type { HttpResponse, StreamingResponse } from './response.ts';
import { encodeText, type Send } from './transport.ts';

export interface SendOptions {
  /** Send headers only (HEAD requests) */
  headOnly?: boolean;
  debug?: boolean;
  logger?: Logger;
}

const EMPTY = new Uint8Array(0);

type WireHeader = [string, string];

function lowerPairs(headers: readonly (readonly [string, string])[]): WireHeader[] {
  return headers.map(([name, value]) => [name.toLowerCase(), value]);
}

/**
 * Send a buffered response: start, then a single final body
 */
export async function sendResponse(
  response: HttpResponse,
  send: Send,
  options: SendOptions = {}
): Promise<void> {
  const body = response.bodyBytes;
  const headers: WireHeader[] = [
    ['content-type', response.contentType],
    ['content-length', String(body.byteLength)],
    ...lowerPairs(response.headers),
    ...response.cookies.map((cookie): WireHeader => ['set-cookie', cookie]),
  ];

  await send({ type: 'response.start', status: response.status, headers });
  await send({ type: 'response.body', body: options.headOnly ? EMPTY : body, moreBody: false });
}

/**
 * Send a chunked response. Headers are already on the wire when a chunk
 * fails, so the failure is reported in-band as an HTML comment.
 */
export async function sendStreamingResponse(
  response: StreamingResponse,
  send: Send,
  options: SendOptions = {}
): Promise<void> {
  const headers: WireHeader[] = [
    ['content-type', response.contentType],
    ...lowerPairs(response.headers),
  ];

  await send({ type: 'response.start', status: response.status, headers });

  const chunks = response.chunks;
  const iterator =
    Symbol.asyncIterator in chunks ? chunks[Symbol.asyncIterator]() : chunks[Symbol.iterator]();
  let exhausted = false;

  try {
    while (!options.headOnly) {
      let result: IteratorResult<string>;
      try {
        result = await iterator.next();
      } catch (error) {
        exhausted = true;
        options.logger?.error('Streaming response failed mid-stream', error);
        await send({
          type: 'response.body',
          body: encodeText(renderErrorComment(error, options.debug ?? false)),
          moreBody: true,
        });
        break;
      }

      if (result.done) {
        exhausted = true;
        break;
      }
      if (result.value) {
        await send({ type: 'response.body', body: encodeText(result.value), moreBody: true });
      }
    }
  } finally {
    // Unread chunks (HEAD, or a failed send): let the producer clean up
    if (!exhausted) {
      await closeChunks(iterator, options.logger);
    }
  }

  await send({ type: 'response.body', body: EMPTY, moreBody: false });
}

async function closeChunks(
  iterator: Iterator<string> | AsyncIterator<string>,
  logger: Logger | undefined
): Promise<void> {
  try {
    await iterator.return?.();
  } catch (error) {
    logger?.warn('Streaming response failed while closing', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

function renderErrorComment(error: unknown, debug: boolean): string {
  if (!debug) return '<!-- render error -->';
  const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
  // "--" may not appear inside an HTML comment
  return `<!-- render error\n${detail.replace(/--/g, '- -')}\n-->`;
}
