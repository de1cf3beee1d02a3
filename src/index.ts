/**
 * Channel Relay - Application Entry Point
 *
 * Sets up the Hono server on Node with:
 * - Event streams per channel
 * - Publishing endpoint backed by an in-memory history
 * - Optional hold-instruction proxy
 * - Request ID tracing
 * - Global error handling
 */
import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { Broker, formatBrokerError } from "./broker/index.js";
import {
  config,
  getBrokerOptions,
  getProxyTarget,
  getStreamOptions,
} from "./config.js";
import { createLogger, logOperationFailed } from "./logger.js";
import { MemoryRepository } from "./repository/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP
// =============================================================================

const streamOptions = getStreamOptions();
const proxyTarget = getProxyTarget();

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    ...getBrokerOptions(),
    ...streamOptions,
    proxyTarget,
    historyMaxEventsPerChannel: config.HISTORY_MAX_EVENTS_PER_CHANNEL,
  },
  "Configuration loaded",
);

const broker = new Broker(getBrokerOptions());
const history = new MemoryRepository({
  maxEventsPerChannel: config.HISTORY_MAX_EVENTS_PER_CHANNEL,
});

const registered = await broker.registerDefaultRepository(history);
if (registered.isErr()) {
  log.fatal({ error: formatBrokerError(registered.error) }, "Broker rejected the history");
  process.exit(1);
}

const app = createApp({ broker, history, streamOptions, proxyTarget });

// =============================================================================
// START SERVER
// =============================================================================

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0", // Bind to all interfaces for remote access
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = async (signal: string): Promise<void> => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Ends every open event stream
  const closed = await broker.shutdown();
  if (closed.isErr()) {
    log.warn({ error: formatBrokerError(closed.error) }, "Broker shutdown reported an error");
  }
  await broker.replaysSettled();

  server.close((error) => {
    if (error) {
      logOperationFailed(log, "server close", error);
      process.exit(1);
    }
    log.info("Shutdown complete");
    process.exit(0);
  });
};

const onSignal = (signal: string) => {
  shutdown(signal).catch((error: unknown) => {
    logOperationFailed(log, "shutdown", error);
    process.exit(1);
  });
};

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
