/**
 * Proxy Module - Service Layer
 *
 * Forwards requests to an upstream application. When the upstream answers
 * with a hold instruction, its body is dropped and the client connection
 * becomes an event stream on the named channel.
 */
import type { Handler } from "hono";
import { type Result, err, ok } from "neverthrow";
import type { Broker } from "../broker/index.js";
import { createLogger } from "../logger.js";
import { streamChannel } from "../stream/index.js";
import { type ProxyError, formatProxyError, upstreamUnreachable } from "./errors.js";
import type { ProxyOptions, UpstreamReply } from "./schema.js";
import {
  buildUpstreamUrl,
  forwardedRequestHeaders,
  holdResponseHeaders,
  passThroughHeaders,
  readHoldChannel,
} from "./transform.js";

const log = createLogger("proxy");

/**
 * Send a request upstream and classify the reply.
 */
export async function forwardRequest(
  request: Request,
  options: Pick<ProxyOptions, "target" | "mountPath">,
): Promise<Result<UpstreamReply, ProxyError>> {
  const url = buildUpstreamUrl(options.target, options.mountPath ?? "", request.url);
  if (url.isErr()) {
    return err(url.error);
  }

  const hasBody = request.method !== "GET" && request.method !== "HEAD";

  try {
    const response = await fetch(url.value, {
      method: request.method,
      headers: forwardedRequestHeaders(request.headers),
      body: hasBody ? await request.arrayBuffer() : undefined,
      redirect: "manual",
    });

    const channel = readHoldChannel(response.headers);
    if (channel === null) {
      return ok({ kind: "pass", response });
    }
    return ok({ kind: "hold", channel, response });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(upstreamUnreachable(url.value, cause.message, cause));
  }
}

async function discardBody(response: Response, requestId: string | undefined): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.debug({ requestId, error: message }, "Discarding upstream body failed");
  }
}

/**
 * Hono handler proxying every request to `options.target`.
 */
export function proxyHandler(broker: Broker, options: ProxyOptions): Handler {
  return async (c) => {
    const requestId = c.get("requestId");
    const reply = await forwardRequest(c.req.raw, options);

    if (reply.isErr()) {
      const message = formatProxyError(reply.error);
      log.error({ requestId, path: c.req.path, error: message }, "Proxy request failed");
      return c.json({ error: message, requestId }, 502);
    }

    const upstream = reply.value;
    if (upstream.kind === "pass") {
      log.debug(
        { requestId, path: c.req.path, status: upstream.response.status },
        "Upstream response passed through",
      );
      return new Response(upstream.response.body, {
        status: upstream.response.status,
        statusText: upstream.response.statusText,
        headers: passThroughHeaders(upstream.response.headers),
      });
    }

    await discardBody(upstream.response, requestId);
    for (const [name, value] of holdResponseHeaders(upstream.response.headers)) {
      c.header(name, value, { append: true });
    }

    log.info({ requestId, path: c.req.path, channel: upstream.channel }, "Holding connection");
    return streamChannel(c, broker, upstream.channel, options);
  };
}
