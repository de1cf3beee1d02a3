/**
 * Proxy Module - Error Types
 */

export type ProxyError =
  | { readonly type: "INVALID_TARGET"; readonly target: string; readonly message: string }
  | {
      readonly type: "UPSTREAM_UNREACHABLE";
      readonly url: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create an INVALID_TARGET error.
 */
export function invalidTarget(target: string, message: string): ProxyError {
  return { type: "INVALID_TARGET", target, message };
}

/**
 * Create an UPSTREAM_UNREACHABLE error.
 */
export function upstreamUnreachable(
  url: string,
  message: string,
  cause?: Error,
): ProxyError {
  if (cause) {
    return { type: "UPSTREAM_UNREACHABLE", url, message, cause };
  }
  return { type: "UPSTREAM_UNREACHABLE", url, message };
}

/**
 * Format a ProxyError for logging and client responses.
 */
export function formatProxyError(error: ProxyError): string {
  switch (error.type) {
    case "INVALID_TARGET":
      return `Invalid proxy target ${error.target}: ${error.message}`;
    case "UPSTREAM_UNREACHABLE":
      return `Upstream ${error.url} unreachable: ${error.message}`;
  }
}
