/**
 * Proxy Module - Schemas and Types
 */
import type { StreamOptions } from "../stream/index.js";

/**
 * Upstream response header naming the channel to hold the client on.
 */
export const HOLD_CHANNEL_HEADER = "Grip-Channel";

/**
 * Hop-by-hop headers. Never forwarded in either direction.
 */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

export type ProxyOptions = StreamOptions &
  Readonly<{
    /** Upstream origin, optionally with a base path and query. */
    target: string;
    /** Path prefix the handler is mounted under, stripped before forwarding. */
    mountPath?: string;
  }>;

/**
 * Outcome of an upstream round trip.
 */
export type UpstreamReply =
  | { readonly kind: "hold"; readonly channel: string; readonly response: Response }
  | { readonly kind: "pass"; readonly response: Response };
