/**
 * HTTP Server
 *
 * Adapts node:http to the transport boundary: each request becomes a
 * ConnectionScope plus receive/send functions handed to the application's
 * connection handler.
 */

import { createServer, type IncomingMessage, type Server as NodeServer, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import {
  encodeText,
  type Address,
  type ConnectionHandler,
  type ConnectionScope,
  type InboundMessage,
  type Receive,
  type Send,
} from './transport.ts';

export interface ServerOptions {
  port?: number;
  host?: string;
  logger?: Logger;
  /** Time open connections get to finish after stop() before they are dropped */
  shutdownTimeout?: number;
  onListen?: (address: Address) => void;
}

/**
 * HTTP server for a connection handler
 */
export class Server {
  private server: NodeServer | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly handler: ConnectionHandler,
    private readonly options: ServerOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Bound address, once listening
   */
  get address(): Address | null {
    const info = this.server?.address();
    if (!info || typeof info === 'string') return null;
    return { host: info.address, port: info.port };
  }

  /**
   * Start accepting connections
   */
  async listen(): Promise<Address> {
    if (this.server) {
      throw new Error('Server is already listening');
    }

    const server = createServer((req, res) => {
      this.dispatch(req, res).catch((error: unknown) => {
        this.logger.error('Unhandled error while serving request', error, {
          method: req.method,
          url: req.url,
        });
        if (!res.headersSent) {
          res.statusCode = 500;
          res.end('Internal Server Error');
        } else {
          res.destroy();
        }
      });
    });
    this.server = server;

    const port = this.options.port ?? 8000;
    const host = this.options.host ?? '127.0.0.1';

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const info: AddressInfo | string | null = server.address();
    const address =
      info && typeof info !== 'string' ? { host: info.address, port: info.port } : { host, port };

    this.logger.info(`Listening on http://${address.host}:${address.port}`);
    this.options.onListen?.(address);
    return address;
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    server.closeIdleConnections();

    // Event streams never finish on their own
    const timer = setTimeout(() => server.closeAllConnections(), this.options.shutdownTimeout ?? 5000);
    timer.unref();

    try {
      await closed;
    } finally {
      clearTimeout(timer);
    }
  }

  private async dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    await this.handler(scopeFromRequest(req), createReceive(req, res), createSend(res));
  }
}

/**
 * Connection metadata from a Node request
 */
export function scopeFromRequest(req: IncomingMessage): ConnectionScope {
  const url = req.url ?? '/';
  const queryStart = url.indexOf('?');
  const path = queryStart === -1 ? url : url.slice(0, queryStart);
  const queryString = queryStart === -1 ? '' : url.slice(queryStart + 1);

  const headers: [string, string][] = [];
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    headers.push([req.rawHeaders[i].toLowerCase(), req.rawHeaders[i + 1]]);
  }

  const socket = req.socket;
  return {
    method: req.method ?? 'GET',
    path: path || '/',
    queryString,
    headers,
    httpVersion: req.httpVersion,
    client:
      socket.remoteAddress !== undefined
        ? { host: socket.remoteAddress, port: socket.remotePort ?? 0 }
        : null,
    server:
      socket.localAddress !== undefined
        ? { host: socket.localAddress, port: socket.localPort ?? 0 }
        : null,
  };
}

async function* bodyChunks(req: IncomingMessage): AsyncGenerator<Uint8Array, void, undefined> {
  for await (const chunk of req) {
    const value: unknown = chunk;
    if (value instanceof Uint8Array) {
      yield value;
    } else if (typeof value === 'string') {
      yield encodeText(value);
    }
  }
}

/**
 * Inbound messages: body chunks, an empty final chunk, then a disconnect
 * once the response is closed
 */
export function createReceive(req: IncomingMessage, res: ServerResponse): Receive {
  const chunks = bodyChunks(req);
  let bodyDone = false;

  const disconnect = new Promise<InboundMessage>((resolve) => {
    res.once('close', () => resolve({ type: 'disconnect' }));
  });

  return async () => {
    if (!bodyDone) {
      const next = await chunks.next();
      if (!next.done) {
        return { type: 'request.body', body: next.value, moreBody: true };
      }
      bodyDone = true;
      return { type: 'request.body', body: new Uint8Array(0), moreBody: false };
    }
    return await disconnect;
  };
}

/**
 * Outbound messages written to the Node response. Messages after the
 * client has gone are dropped.
 */
export function createSend(res: ServerResponse): Send {
  return async (message) => {
    if (res.destroyed || res.writableEnded) return;

    if (message.type === 'response.start') {
      res.statusCode = message.status;
      for (const [name, value] of message.headers) {
        res.appendHeader(name, value);
      }
      res.flushHeaders();
      return;
    }

    if (message.body.byteLength > 0) {
      await new Promise<void>((resolve, reject) => {
        res.write(message.body, (error) => (error ? reject(error) : resolve()));
      });
    }
    if (!message.moreBody) {
      await new Promise<void>((resolve) => {
        res.end(() => resolve());
      });
    }
  };
}
