/**
 * Proxy Module - Pure Transformations
 *
 * URL rewriting and header filtering for the hold-instruction proxy.
 */
import { type Result, err, ok } from "neverthrow";
import { type ProxyError, invalidTarget } from "./errors.js";
import { HOLD_CHANNEL_HEADER, HOP_BY_HOP_HEADERS } from "./schema.js";

/**
 * Channel named by the upstream hold instruction, or null when there is none.
 */
export function readHoldChannel(headers: Headers): string | null {
  const channel = headers.get(HOLD_CHANNEL_HEADER)?.trim() ?? "";
  return channel === "" ? null : channel;
}

/**
 * Join two path segments with exactly one slash between them.
 */
export function joinPath(base: string, rest: string): string {
  const baseSlash = base.endsWith("/");
  const restSlash = rest.startsWith("/");
  if (baseSlash && restSlash) {
    return base + rest.slice(1);
  }
  if (!baseSlash && !restSlash) {
    return `${base}/${rest}`;
  }
  return base + rest;
}

/**
 * Remove the mount prefix from a request path. Paths outside the mount
 * are returned unchanged.
 */
export function stripMountPath(pathname: string, mountPath: string): string {
  if (mountPath === "" || mountPath === "/") {
    return pathname;
  }
  const mount = mountPath.endsWith("/") ? mountPath.slice(0, -1) : mountPath;
  if (pathname === mount) {
    return "";
  }
  return pathname.startsWith(`${mount}/`) ? pathname.slice(mount.length) : pathname;
}

/**
 * Upstream URL for an incoming request: the target's path joined with the
 * request path below the mount, target query first.
 */
export function buildUpstreamUrl(
  target: string,
  mountPath: string,
  requestUrl: string,
): Result<string, ProxyError> {
  let base: URL;
  try {
    base = new URL(target);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(invalidTarget(target, message));
  }

  const incoming = new URL(requestUrl);
  const upstream = new URL(base.href);
  upstream.pathname = joinPath(base.pathname, stripMountPath(incoming.pathname, mountPath));

  const targetQuery = base.search.slice(1);
  const requestQuery = incoming.search.slice(1);
  upstream.search =
    targetQuery === "" || requestQuery === ""
      ? targetQuery + requestQuery
      : `${targetQuery}&${requestQuery}`;

  return ok(upstream.toString());
}

function copyHeaders(source: Headers, drop: ReadonlySet<string>): Headers {
  const copy = new Headers();
  source.forEach((value, name) => {
    if (!drop.has(name.toLowerCase())) {
      copy.append(name, value);
    }
  });
  return copy;
}

const REQUEST_DROP = new Set([...HOP_BY_HOP_HEADERS, "host", "content-length"]);

// fetch hands back decoded bodies, so the upstream encoding and length no
// longer describe what is sent on.
const PASS_DROP = new Set([...HOP_BY_HOP_HEADERS, "content-encoding", "content-length"]);

const HOLD_DROP = new Set([...PASS_DROP, HOLD_CHANNEL_HEADER.toLowerCase()]);

/**
 * Headers sent upstream. The client's host is kept as X-Forwarded-Host.
 */
export function forwardedRequestHeaders(headers: Headers): Headers {
  const forwarded = copyHeaders(headers, REQUEST_DROP);
  const host = headers.get("host");
  if (host !== null && !forwarded.has("x-forwarded-host")) {
    forwarded.set("X-Forwarded-Host", host);
  }
  return forwarded;
}

/**
 * Headers of an upstream response relayed as-is.
 */
export function passThroughHeaders(headers: Headers): Headers {
  return copyHeaders(headers, PASS_DROP);
}

/**
 * Upstream headers kept on a held connection. The stream headers are
 * applied on top of these.
 */
export function holdResponseHeaders(headers: Headers): Array<[string, string]> {
  const kept: Array<[string, string]> = [];
  copyHeaders(headers, HOLD_DROP).forEach((value, name) => {
    kept.push([name, value]);
  });
  return kept;
}
