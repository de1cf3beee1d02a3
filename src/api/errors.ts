/**
 * API - Error Types
 *
 * Failures of the publish endpoint, mapped to status codes by the routes.
 */
import type { z } from "zod";

export type PublishError =
  | {
      readonly type: "INVALID_REQUEST";
      readonly message: string;
      readonly issues: ReadonlyArray<z.ZodIssue>;
    }
  | { readonly type: "BROKER_UNAVAILABLE"; readonly message: string };

/**
 * Create an INVALID_REQUEST error.
 */
export function invalidRequest(
  message: string,
  issues: ReadonlyArray<z.ZodIssue> = [],
): PublishError {
  return { type: "INVALID_REQUEST", message, issues };
}

/**
 * Create a BROKER_UNAVAILABLE error.
 */
export function brokerUnavailable(message: string): PublishError {
  return { type: "BROKER_UNAVAILABLE", message };
}

/**
 * Format a PublishError for logging.
 */
export function formatPublishError(error: PublishError): string {
  switch (error.type) {
    case "INVALID_REQUEST":
      return `Invalid publish request: ${error.message}`;
    case "BROKER_UNAVAILABLE":
      return `Broker unavailable: ${error.message}`;
  }
}
