/**
 * Server-Sent Events
 *
 * Handlers return an EventStream; the engine frames what it yields,
 * keeps the connection alive with heartbeats and stops on disconnect.
 */

export {
  DEFAULT_HEARTBEAT_INTERVAL,
  EventStream,
  HEARTBEAT_FRAME,
  ServerEvent,
  type EventStreamOptions,
  type ServerEventInit,
} from './events.ts';
export {
  EVENT_STREAM_HEADERS,
  eventStreamHeaders,
  formatEvent,
  handleEventStream,
  type EventStreamHandlerOptions,
} from './sse.ts';
