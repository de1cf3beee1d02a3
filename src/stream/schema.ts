/**
 * Stream Module - Schemas and Types
 */
import type { ByteSink } from "../encoder/index.js";
import type { Event } from "../event/index.js";

/**
 * What a connection must provide to carry an event stream:
 * a sink whose writes reach the client immediately, and notification
 * when the client goes away.
 */
export type SseTransport = Readonly<{
  sink: ByteSink;
  onDisconnect(listener: () => void): void;
}>;

/**
 * Optional one-shot event sent to each client right after it subscribes.
 */
export type InitialEventFn = () => Event | Promise<Event>;

/**
 * Per-connection behaviour.
 */
export type StreamOptions = Readonly<{
  allowCors: boolean;
  gzip: boolean;
  bufferSize: number;
  /** Idle time before a heartbeat comment is written. 0 disables. */
  heartbeatIntervalMs: number;
  initialEvent?: InitialEventFn;
}>;

/**
 * One client's request for a channel.
 */
export type StreamRequest = Readonly<{
  channel: string;
  lastEventId: string;
  /** Negotiated: enabled and accepted by the client. */
  gzip: boolean;
  requestId?: string;
}>;
