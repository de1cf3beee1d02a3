/**
 * Stream Module - Hono adapter
 *
 * Realises the transport contract with `hono/streaming`: every write is
 * handed to the response stream straight away, and an aborted response
 * is the disconnect signal.
 */
import type { Context, Handler } from "hono";
import { stream } from "hono/streaming";
import type { Broker } from "../broker/index.js";
import { acceptsGzip } from "../encoder/index.js";
import { createLogger } from "../logger.js";
import type { SseTransport, StreamOptions } from "./schema.js";
import { serveSubscription } from "./service.js";
import { buildStreamHeaders } from "./transform.js";

const log = createLogger("stream");

type StreamingApi = Parameters<Parameters<typeof stream>[1]>[0];

/**
 * Transport over a Hono response stream. Writes after the client has
 * gone are reported as failures.
 */
export function honoTransport(api: StreamingApi): SseTransport {
  const ensureOpen = (): void => {
    if (api.aborted) {
      throw new Error("client disconnected");
    }
  };

  return {
    sink: {
      async write(chunk) {
        ensureOpen();
        await api.write(chunk);
        ensureOpen();
      },
      async writeString(text) {
        ensureOpen();
        await api.write(text);
        ensureOpen();
      },
    },
    onDisconnect(listener) {
      api.onAbort(listener);
    },
  };
}

/**
 * Switch the current request into an event stream for `channel`.
 */
export function streamChannel(
  c: Context,
  broker: Broker,
  channel: string,
  options: StreamOptions,
): Response {
  const requestId = c.get("requestId");
  const gzip = options.gzip && acceptsGzip(c.req.header("Accept-Encoding"));

  for (const [name, value] of Object.entries(
    buildStreamHeaders({ allowCors: options.allowCors, gzip }),
  )) {
    c.header(name, value);
  }
  c.status(200);

  return stream(
    c,
    async (api) => {
      await serveSubscription(
        broker,
        honoTransport(api),
        {
          channel,
          lastEventId: c.req.header("Last-Event-ID") ?? "",
          gzip,
          requestId,
        },
        options,
      );
    },
    async (error) => {
      log.error({ requestId, channel, error: error.message }, "Stream failed");
    },
  );
}

/**
 * Handler serving a fixed channel, or the channel derived from the request.
 */
export function subscriptionHandler(
  broker: Broker,
  channel: string | ((c: Context) => string),
  options: StreamOptions,
): Handler {
  return (c) =>
    streamChannel(c, broker, typeof channel === "string" ? channel : channel(c), options);
}
