/**
 * Encoder Module - Error Types
 *
 * Typed error unions for encoding. Errors are values, not exceptions.
 */

/**
 * Errors that can occur while encoding an event.
 */
export type EncoderError =
  | {
      readonly type: "WRITE_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "COMPRESSION_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(message: string, cause?: Error): EncoderError {
  if (cause) {
    return { type: "WRITE_FAILED", message, cause };
  }
  return { type: "WRITE_FAILED", message };
}

/**
 * Create a COMPRESSION_FAILED error.
 */
export function compressionFailed(
  message: string,
  cause?: Error,
): EncoderError {
  if (cause) {
    return { type: "COMPRESSION_FAILED", message, cause };
  }
  return { type: "COMPRESSION_FAILED", message };
}

/**
 * Format an EncoderError for logging.
 */
export function formatEncoderError(error: EncoderError): string {
  switch (error.type) {
    case "WRITE_FAILED":
      return `Write failed: ${error.message}`;
    case "COMPRESSION_FAILED":
      return `Compression failed: ${error.message}`;
  }
}
