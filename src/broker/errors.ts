/**
 * Broker Module - Error Types
 */
import type { BrokerCommand } from "./schema.js";

/**
 * Errors a broker operation can resolve with. Operations never throw.
 */
export type BrokerError =
  | {
      readonly type: "BROKER_CLOSED";
      readonly command: BrokerCommand["type"];
    }
  | {
      readonly type: "COMMAND_FAILED";
      readonly command: BrokerCommand["type"];
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a BROKER_CLOSED error.
 */
export function brokerClosed(command: BrokerCommand["type"]): BrokerError {
  return { type: "BROKER_CLOSED", command };
}

/**
 * Create a COMMAND_FAILED error.
 */
export function commandFailed(
  command: BrokerCommand["type"],
  message: string,
  cause?: Error,
): BrokerError {
  if (cause) {
    return { type: "COMMAND_FAILED", command, message, cause };
  }
  return { type: "COMMAND_FAILED", command, message };
}

/**
 * Format a BrokerError for logging.
 */
export function formatBrokerError(error: BrokerError): string {
  switch (error.type) {
    case "BROKER_CLOSED":
      return `Broker is shut down (${error.command} rejected)`;
    case "COMMAND_FAILED":
      return `${error.command} failed: ${error.message}`;
  }
}
