/**
 * Broker Module - Public API
 */
export type {
  BrokerCommand,
  BrokerOptions,
  BrokerStats,
} from "./schema.js";
export type { BrokerError } from "./errors.js";
export { formatBrokerError } from "./errors.js";
export { resolveRepository, shouldReplay } from "./transform.js";
export { Broker } from "./service.js";
