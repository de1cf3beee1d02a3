/**
 * Publish flow behind POST /api/publish.
 *
 * Validates the body, hands the event to the broker and records it in
 * the history repository once accepted.
 */
import { type Result, err, ok } from "neverthrow";
import type { Broker } from "../broker/index.js";
import { formatBrokerError } from "../broker/index.js";
import {
  type Publication,
  type PublishRequest,
  PublishRequestSchema,
  publicationFromRequest,
} from "../event/index.js";
import type { MemoryRepository } from "../repository/index.js";
import { type PublishError, brokerUnavailable, invalidRequest } from "./errors.js";

export type PublishReceipt = Readonly<{
  channels: ReadonlyArray<string>;
  event: Publication;
}>;

/**
 * Validate an untrusted publish body.
 */
export function parsePublishRequest(body: unknown): Result<PublishRequest, PublishError> {
  const parsed = PublishRequestSchema.safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const message = first
      ? `${first.path.join(".") || "body"}: ${first.message}`
      : "invalid body";
    return err(invalidRequest(message, parsed.error.issues));
  }
  return ok(parsed.data);
}

/**
 * Publish a validated request, then record it. Events the broker
 * rejects are not recorded.
 */
export async function publishEvent(
  broker: Broker,
  history: MemoryRepository | null,
  request: PublishRequest,
): Promise<Result<PublishReceipt, PublishError>> {
  if (broker.isClosed) {
    return err(brokerUnavailable("broker is shut down"));
  }

  const channels = [...new Set(request.channels)];
  const event = publicationFromRequest(request);

  const published = await broker.publish(channels, event);
  if (published.isErr()) {
    return err(brokerUnavailable(formatBrokerError(published.error)));
  }

  if (history) {
    for (const channel of channels) {
      history.add(channel, event);
    }
  }

  return ok({ channels, event });
}
