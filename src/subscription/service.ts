/**
 * Subscription Module - Service Layer
 *
 * A connected client's membership in one channel: its replay cursor
 * and bounded delivery queue.
 */
import type { Event } from "../event/index.js";
import { BoundedQueue } from "./queue.js";
import {
  DEFAULT_BUFFER_SIZE,
  type OfferOutcome,
  type SubscriptionState,
  type TakeResult,
} from "./schema.js";

let nextSubscriptionId = 1;

export class Subscription {
  readonly id: number;
  readonly channel: string;
  readonly lastEventId: string;
  private readonly queue: BoundedQueue<Event>;
  private currentState: SubscriptionState = "created";

  constructor(channel: string, lastEventId = "", bufferSize = DEFAULT_BUFFER_SIZE) {
    this.id = nextSubscriptionId++;
    this.channel = channel;
    this.lastEventId = lastEventId;
    this.queue = new BoundedQueue<Event>(bufferSize);
  }

  get state(): SubscriptionState {
    return this.currentState;
  }

  get isClosed(): boolean {
    return this.currentState === "closed";
  }

  /** Number of events waiting for the consumer. */
  get pending(): number {
    return this.queue.size;
  }

  get capacity(): number {
    return this.queue.capacity;
  }

  /**
   * Mark as accepted by the broker. Has no effect once closed.
   */
  markRegistered(): void {
    if (this.currentState === "created") {
      this.currentState = "registered";
    }
  }

  offer(event: Event): OfferOutcome {
    return this.queue.offer(event);
  }

  next(timeoutMs?: number): Promise<TakeResult<Event>> {
    return this.queue.take(timeoutMs);
  }

  /**
   * Close the delivery queue. Returns true on the first call only.
   */
  close(): boolean {
    this.currentState = "closed";
    return this.queue.close();
  }
}

/**
 * Create a subscription for a connecting client.
 */
export function createSubscription(
  channel: string,
  options: Readonly<{ lastEventId?: string; bufferSize?: number }> = {},
): Subscription {
  return new Subscription(
    channel,
    options.lastEventId ?? "",
    options.bufferSize ?? DEFAULT_BUFFER_SIZE,
  );
}
