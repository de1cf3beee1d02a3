/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Covers:
 * - Server settings
 * - Broker and stream behaviour (CORS, replay, buffering, compression, heartbeats)
 * - Hold-instruction proxy target
 * - In-memory history retention
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional URL - empty string becomes undefined
 */
const optionalUrl = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined))
  .pipe(z.string().url().optional());

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8080).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("ChannelRelay").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Broker / Stream Configuration
  // ==========================================================================
  SSE_ALLOW_CORS: envBoolean(false).describe(
    "Add Access-Control-Allow-Origin: * to event streams",
  ),
  SSE_REPLAY_ALL: envBoolean(false).describe(
    "Replay history even when the client sends no Last-Event-ID",
  ),
  SSE_BUFFER_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(128)
    .describe("Events a client may fall behind before it is disconnected"),
  SSE_GZIP: envBoolean(false).describe(
    "Compress event streams when the client accepts gzip",
  ),
  SSE_HEARTBEAT_INTERVAL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(0)
    .describe("Idle interval before a heartbeat comment is sent (0 disables)"),

  // ==========================================================================
  // Proxy / History
  // ==========================================================================
  PROXY_TARGET_URL: optionalUrl.describe(
    "Upstream origin for the hold-instruction proxy (mounted at /proxy)",
  ),
  HISTORY_MAX_EVENTS_PER_CHANNEL: z.coerce
    .number()
    .int()
    .positive()
    .default(1000)
    .describe("Events retained per channel by the in-memory history"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Broker options derived from config.
 */
export function getBrokerOptions(): Readonly<{ replayAll: boolean }> {
  return { replayAll: config.SSE_REPLAY_ALL };
}

/**
 * Per-connection stream options derived from config.
 */
export function getStreamOptions(): Readonly<{
  allowCors: boolean;
  gzip: boolean;
  bufferSize: number;
  heartbeatIntervalMs: number;
}> {
  return {
    allowCors: config.SSE_ALLOW_CORS,
    gzip: config.SSE_GZIP,
    bufferSize: config.SSE_BUFFER_SIZE,
    heartbeatIntervalMs: config.SSE_HEARTBEAT_INTERVAL_MS,
  };
}

/**
 * Proxy target URL.
 * Returns null if the proxy is not configured.
 */
export function getProxyTarget(): string | null {
  return config.PROXY_TARGET_URL ?? null;
}
