/**
 * API routes for the channel relay.
 *
 * - /api/health - Health check with broker stats
 * - /api/channels/:channel/events - Event stream for one channel
 * - /api/publish - Publish an event to one or more channels
 * - /proxy/* - Hold-instruction proxy (only when a target is configured)
 */
import { Hono } from "hono";
import type { Broker } from "../broker/index.js";
import { config } from "../config.js";
import { createLogger } from "../logger.js";
import { proxyHandler } from "../proxy/index.js";
import type { MemoryRepository } from "../repository/index.js";
import { type StreamOptions, subscriptionHandler } from "../stream/index.js";
import { type PublishError, formatPublishError } from "./errors.js";
import { parsePublishRequest, publishEvent } from "./publish.js";

const log = createLogger("api");

export const VERSION = "1.0.0";

export const PROXY_MOUNT_PATH = "/proxy";

export type RouteDependencies = Readonly<{
  broker: Broker;
  streamOptions: StreamOptions;
  /** Records every published event; also the broker's default repository. */
  history?: MemoryRepository | null;
  /** Upstream for the proxy. Null leaves /proxy unmounted. */
  proxyTarget?: string | null;
}>;

function issuesOf(error: PublishError): Array<{ path: string; message: string }> {
  if (error.type !== "INVALID_REQUEST") {
    return [];
  }
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

export function createRoutes(deps: RouteDependencies): Hono {
  const { broker, streamOptions } = deps;
  const history = deps.history ?? null;
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: VERSION,
      appName: config.APP_NAME,
      broker: broker.stats(),
    });
  });

  // ===========================================================================
  // Event Streams
  // ===========================================================================

  routes.get(
    "/api/channels/:channel/events",
    subscriptionHandler(broker, (c) => c.req.param("channel") ?? "", streamOptions),
  );

  // ===========================================================================
  // Publishing
  // ===========================================================================

  routes.post("/api/publish", async (c) => {
    const requestId = c.get("requestId");

    const body: unknown = await c.req.json().catch(() => undefined);
    const parsed = parsePublishRequest(body);
    if (parsed.isErr()) {
      log.warn({ requestId, error: formatPublishError(parsed.error) }, "Rejected publish request");
      return c.json(
        {
          published: false,
          error: parsed.error.message,
          issues: issuesOf(parsed.error),
          requestId,
        },
        400,
      );
    }

    const result = await publishEvent(broker, history, parsed.value);
    if (result.isErr()) {
      log.error({ requestId, error: formatPublishError(result.error) }, "Publish failed");
      return c.json(
        { published: false, error: result.error.message, requestId },
        503,
      );
    }

    log.info(
      { requestId, channels: result.value.channels, id: result.value.event.id },
      "Event published",
    );
    return c.json(
      { published: true, channels: result.value.channels, requestId },
      202,
    );
  });

  // ===========================================================================
  // Proxy
  // ===========================================================================

  if (deps.proxyTarget) {
    const handler = proxyHandler(broker, {
      ...streamOptions,
      target: deps.proxyTarget,
      mountPath: PROXY_MOUNT_PATH,
    });
    routes.all(`${PROXY_MOUNT_PATH}/*`, handler);
    log.info({ target: deps.proxyTarget }, "Proxy mounted");
  }

  return routes;
}
