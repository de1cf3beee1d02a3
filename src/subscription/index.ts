/**
 * Subscription Module - Public API
 */
export type { OfferOutcome, SubscriptionState, TakeResult } from "./schema.js";
export { DEFAULT_BUFFER_SIZE } from "./schema.js";
export { BoundedQueue } from "./queue.js";
export { Subscription, createSubscription } from "./service.js";
