/**
 * Transport Boundary
 *
 * The shapes a connection is reduced to before it reaches the framework:
 * a metadata bundle, an inbound message source and an outbound sink.
 * The Node adapter in server.ts produces these; the test client fakes them.
 */

export type RawHeaders = ReadonlyArray<readonly [name: string, value: string]>;

export interface Address {
  host: string;
  port: number;
}

/**
 * Connection metadata
 */
export interface ConnectionScope {
  method: string;
  path: string;
  queryString: string;
  headers: RawHeaders;
  httpVersion: string;
  client: Address | null;
  server: Address | null;
}

/**
 * Inbound messages: body chunks, then (eventually) a disconnect
 */
export type InboundMessage =
  | { type: 'request.body'; body: Uint8Array; moreBody: boolean }
  | { type: 'disconnect' };

/**
 * Outbound messages: one start, then body messages, the last with moreBody false
 */
export type OutboundMessage =
  | { type: 'response.start'; status: number; headers: RawHeaders }
  | { type: 'response.body'; body: Uint8Array; moreBody: boolean };

export type Receive = () => Promise<InboundMessage>;
export type Send = (message: OutboundMessage) => Promise<void>;

/**
 * The transport-facing entry point of an application
 */
export type ConnectionHandler = (
  scope: ConnectionScope,
  receive: Receive,
  send: Send
) => Promise<void>;

const encoder = new TextEncoder();

/**
 * Encode text as a body chunk
 */
export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}
