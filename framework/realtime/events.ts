/**
 * Server-Sent Event Types
 *
 * ServerEvent is one framed unit of the push protocol; EventStream is the
 * marker a handler returns to turn its response into a push stream.
 */

import { ConfigurationError } from '../errors.ts';

export interface ServerEventInit {
  data: string;
  event?: string;
  id?: string;
  retry?: number;
}

/**
 * A single outbound event
 */
export class ServerEvent {
  readonly data: string;
  readonly event?: string;
  readonly id?: string;
  readonly retry?: number;

  /**
   * @throws TypeError when `event` or `id` contains a line break; those
   * fields are single-line on the wire
   */
  constructor(init: ServerEventInit) {
    this.data = init.data;
    this.event = singleLine('event', init.event);
    this.id = singleLine('id', init.id);
    this.retry = init.retry;
  }

  /**
   * Serialize to the wire format, terminated by a blank line
   */
  encode(): string {
    const lines: string[] = [];
    if (this.event) {
      lines.push(`event: ${this.event}`);
    }
    if (this.id) {
      lines.push(`id: ${this.id}`);
    }
    if (this.retry !== undefined) {
      lines.push(`retry: ${this.retry}`);
    }
    for (const line of this.data.replace(/\r\n?/g, '\n').split('\n')) {
      lines.push(`data: ${line}`);
    }
    return lines.join('\n') + '\n\n';
  }
}

export function hasLineBreak(value: string): boolean {
  return /[\r\n]/.test(value);
}

function singleLine(field: string, value: string | undefined): string | undefined {
  if (value !== undefined && hasLineBreak(value)) {
    throw new TypeError(`Server event ${field} must not contain line breaks: ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Heartbeat comment sent while the producer is idle
 */
export const HEARTBEAT_FRAME = ': heartbeat\n\n';

export const DEFAULT_HEARTBEAT_INTERVAL = 15_000;

export interface EventStreamOptions {
  /** Event name applied to yielded strings and objects */
  eventType?: string;
  /** Idle time in milliseconds before a heartbeat comment is sent */
  heartbeatInterval?: number;
}

export function isValidHeartbeatInterval(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Push-stream return value.
 *
 * The source may yield ServerEvent, string, plain objects (sent as JSON)
 * or Fragment values.
 *
 * ```ts
 * app.get('/ticks', () => new EventStream(async function* () {
 *   for await (const tick of clock) yield { tick };
 * }()));
 * ```
 */
export class EventStream {
  readonly source: AsyncIterable<unknown>;
  readonly eventType?: string;
  readonly heartbeatInterval: number;
  /** False when the interval came from the default and may be overridden by config */
  readonly explicitHeartbeat: boolean;

  constructor(source: AsyncIterable<unknown>, options: EventStreamOptions = {}) {
    if (options.heartbeatInterval !== undefined && !isValidHeartbeatInterval(options.heartbeatInterval)) {
      throw new ConfigurationError(
        `Heartbeat interval must be a positive number of milliseconds, got ${options.heartbeatInterval}.`
      );
    }
    if (options.eventType !== undefined && hasLineBreak(options.eventType)) {
      throw new ConfigurationError(
        `Event type must not contain line breaks: ${JSON.stringify(options.eventType)}`
      );
    }
    this.source = source;
    this.eventType = options.eventType;
    this.heartbeatInterval = options.heartbeatInterval ?? DEFAULT_HEARTBEAT_INTERVAL;
    this.explicitHeartbeat = options.heartbeatInterval !== undefined;
  }

  /**
   * Copy with a different heartbeat interval
   */
  withHeartbeatInterval(heartbeatInterval: number): EventStream {
    return new EventStream(this.source, { eventType: this.eventType, heartbeatInterval });
  }
}
