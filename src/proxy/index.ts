/**
 * Proxy Module - Public API
 */
export type { ProxyOptions, UpstreamReply } from "./schema.js";
export { HOLD_CHANNEL_HEADER } from "./schema.js";
export type { ProxyError } from "./errors.js";
export { formatProxyError } from "./errors.js";
export {
  buildUpstreamUrl,
  holdResponseHeaders,
  passThroughHeaders,
  readHoldChannel,
} from "./transform.js";
export { forwardRequest, proxyHandler } from "./service.js";
