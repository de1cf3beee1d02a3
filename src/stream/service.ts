/**
 * Stream Module - Service Layer
 *
 * Per-connection loop: registers a subscription with the broker, then
 * moves events from its queue through the encoder until the client
 * leaves, a write fails, or the queue closes.
 */
import type { Broker } from "../broker/index.js";
import { formatBrokerError } from "../broker/index.js";
import { Encoder, formatEncoderError } from "../encoder/index.js";
import { createLogger } from "../logger.js";
import { type Subscription, createSubscription } from "../subscription/index.js";
import type {
  InitialEventFn,
  SseTransport,
  StreamOptions,
  StreamRequest,
} from "./schema.js";
import { heartbeatComment } from "./transform.js";

const log = createLogger("stream");

/**
 * Serve one client until its stream ends.
 */
export async function serveSubscription(
  broker: Broker,
  transport: SseTransport,
  request: StreamRequest,
  options: StreamOptions,
): Promise<void> {
  const subscription = createSubscription(request.channel, {
    lastEventId: request.lastEventId,
    bufferSize: options.bufferSize,
  });
  const context = {
    requestId: request.requestId,
    subscriptionId: subscription.id,
    channel: request.channel,
  };

  // Registered first so a client that leaves during the handoff is still seen
  transport.onDisconnect(() => {
    if (subscription.close()) {
      log.info({ ...context }, "Client disconnected");
    }
    release(broker, subscription, context);
  });

  // Handoff: once this resolves, the broker delivers to the subscription
  const accepted = await broker.subscribe(subscription);
  if (accepted.isErr()) {
    log.warn({ ...context }, formatBrokerError(accepted.error));
    return;
  }
  log.info({ ...context, lastEventId: request.lastEventId, gzip: request.gzip }, "Client subscribed");

  const encoder = new Encoder(transport.sink, { gzip: request.gzip });

  if (options.initialEvent) {
    await sendInitialEvent(encoder, options.initialEvent, context);
  }

  const idleTimeout = options.heartbeatIntervalMs > 0 ? options.heartbeatIntervalMs : undefined;
  let delivered = 0;

  for (;;) {
    const next = await subscription.next(idleTimeout);
    if (next.type === "closed") {
      break;
    }

    const event = next.type === "item" ? next.value : heartbeatComment();
    const written = await encoder.encode(event);
    if (written.isErr()) {
      log.warn({ ...context, delivered }, formatEncoderError(written.error));
      subscription.close();
      release(broker, subscription, context);
      break;
    }
    if (next.type === "item") {
      delivered++;
    }
  }

  const closed = await encoder.close();
  if (closed.isErr()) {
    log.debug({ ...context }, formatEncoderError(closed.error));
  }
  log.debug({ ...context, delivered }, "Stream ended");
}

/**
 * Ask the broker to drop a subscription this connection no longer serves.
 */
function release(
  broker: Broker,
  subscription: Subscription,
  context: Record<string, unknown>,
): void {
  broker.unsubscribe(subscription).then((result) => {
    if (result.isErr()) {
      log.debug({ ...context }, formatBrokerError(result.error));
    }
  }, (error: unknown) => {
    log.error({ ...context, error: String(error) }, "Unsubscribe failed");
  });
}

/**
 * Produce and send the initial event. Failures are logged only; the
 * live loop starts regardless.
 */
async function sendInitialEvent(
  encoder: Encoder,
  initialEvent: InitialEventFn,
  context: Record<string, unknown>,
): Promise<void> {
  try {
    const event = await initialEvent();
    const written = await encoder.encode(event);
    if (written.isErr()) {
      log.warn({ ...context }, `Initial event not sent: ${formatEncoderError(written.error)}`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ ...context, error: message }, "Initial event producer failed");
  }
}
