/**
 * Stream Module - Public API
 */
export type {
  InitialEventFn,
  SseTransport,
  StreamOptions,
  StreamRequest,
} from "./schema.js";
export { buildStreamHeaders, heartbeatComment } from "./transform.js";
export { serveSubscription } from "./service.js";
export { honoTransport, streamChannel, subscriptionHandler } from "./handler.js";
