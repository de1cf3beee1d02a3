/**
 * Subscription Module - Schemas and Types
 */

/**
 * Outcome of a non-blocking enqueue.
 */
export type OfferOutcome = "accepted" | "full" | "closed";

/**
 * Outcome of a dequeue.
 */
export type TakeResult<T> =
  | { readonly type: "item"; readonly value: T }
  | { readonly type: "closed" }
  | { readonly type: "timeout" };

/**
 * Subscription lifecycle. Replay and live delivery interleave while
 * registered, so they are not separate states.
 */
export type SubscriptionState = "created" | "registered" | "closed";

/**
 * Queue capacity used when none is configured.
 */
export const DEFAULT_BUFFER_SIZE = 128;
