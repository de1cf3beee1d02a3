/**
 * Bounded FIFO shared between the broker, replay tasks and one consumer.
 *
 * Producers never wait: `offer` reports `full` or `closed` instead.
 * Once closed the queue yields nothing more, buffered items included.
 */
import type { OfferOutcome, TakeResult } from "./schema.js";

type Waiter<T> = (result: TakeResult<T>) => void;

export class BoundedQueue<T> {
  readonly capacity: number;
  private items: T[] = [];
  private waiter: Waiter<T> | null = null;
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue without blocking. A waiting consumer receives the item directly.
   */
  offer(item: T): OfferOutcome {
    if (this.closed) {
      return "closed";
    }
    if (this.waiter !== null) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter({ type: "item", value: item });
      return "accepted";
    }
    if (this.items.length >= this.capacity) {
      return "full";
    }
    this.items.push(item);
    return "accepted";
  }

  /**
   * Dequeue, waiting for an item, for close, or for `timeoutMs` to elapse.
   * Only one take may be pending at a time.
   */
  take(timeoutMs?: number): Promise<TakeResult<T>> {
    if (this.closed) {
      return Promise.resolve({ type: "closed" });
    }
    const head = this.items.splice(0, 1);
    if (head.length === 1) {
      return Promise.resolve({ type: "item", value: head[0] });
    }
    if (this.waiter !== null) {
      return Promise.reject(new Error("BoundedQueue supports a single consumer"));
    }

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const waiter: Waiter<T> = (result) => {
        if (timer !== null) {
          clearTimeout(timer);
        }
        resolve(result);
      };
      this.waiter = waiter;

      if (timeoutMs !== undefined && timeoutMs > 0) {
        timer = setTimeout(() => {
          if (this.waiter === waiter) {
            this.waiter = null;
          }
          resolve({ type: "timeout" });
        }, timeoutMs);
      }
    });
  }

  /**
   * Close the queue. Idempotent. Returns true on the first call only.
   */
  close(): boolean {
    if (this.closed) {
      return false;
    }
    this.closed = true;
    this.items = [];
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ type: "closed" });
    return true;
  }
}
