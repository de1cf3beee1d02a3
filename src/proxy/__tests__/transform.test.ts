/**
 * Proxy Module - Transform Tests
 */
import { describe, expect, test } from "vitest";
import {
  buildUpstreamUrl,
  forwardedRequestHeaders,
  holdResponseHeaders,
  joinPath,
  passThroughHeaders,
  readHoldChannel,
  stripMountPath,
} from "../transform.js";

describe("readHoldChannel", () => {
  test("returns the channel named by the upstream", () => {
    expect(readHoldChannel(new Headers({ "Grip-Channel": "news" }))).toBe("news");
  });

  test("returns null when the header is missing or blank", () => {
    expect(readHoldChannel(new Headers())).toBeNull();
    expect(readHoldChannel(new Headers({ "Grip-Channel": "  " }))).toBeNull();
  });
});

describe("joinPath", () => {
  test("leaves exactly one slash between segments", () => {
    expect(joinPath("/base", "/a")).toBe("/base/a");
    expect(joinPath("/base/", "/a")).toBe("/base/a");
    expect(joinPath("/base", "a")).toBe("/base/a");
    expect(joinPath("/", "")).toBe("/");
  });
});

describe("stripMountPath", () => {
  test("removes the mount prefix", () => {
    expect(stripMountPath("/proxy/a/b", "/proxy")).toBe("/a/b");
    expect(stripMountPath("/proxy", "/proxy")).toBe("");
  });

  test("keeps paths outside the mount", () => {
    expect(stripMountPath("/proxyish", "/proxy")).toBe("/proxyish");
    expect(stripMountPath("/a", "")).toBe("/a");
  });
});

describe("buildUpstreamUrl", () => {
  test("maps the path below the mount onto the target", () => {
    const url = buildUpstreamUrl("http://upstream.test", "/proxy", "http://localhost/proxy/a/b?x=1");
    expect(url._unsafeUnwrap()).toBe("http://upstream.test/a/b?x=1");
  });

  test("joins the target base path", () => {
    const url = buildUpstreamUrl("http://upstream.test/base/", "/proxy", "http://localhost/proxy/a");
    expect(url._unsafeUnwrap()).toBe("http://upstream.test/base/a");
  });

  test("puts the target query before the request query", () => {
    const url = buildUpstreamUrl(
      "http://upstream.test/base?k=v",
      "/proxy",
      "http://localhost/proxy/a?x=1",
    );
    expect(url._unsafeUnwrap()).toBe("http://upstream.test/base/a?k=v&x=1");
  });

  test("rejects a target that is not a URL", () => {
    const url = buildUpstreamUrl("not a url", "/proxy", "http://localhost/proxy/a");
    expect(url._unsafeUnwrapErr().type).toBe("INVALID_TARGET");
  });
});

describe("header filtering", () => {
  test("drops hop-by-hop headers and host from forwarded requests", () => {
    const headers = forwardedRequestHeaders(
      new Headers({
        Host: "relay.test",
        Connection: "keep-alive",
        "Keep-Alive": "timeout=5",
        "X-Client": "a",
      }),
    );

    expect(headers.get("x-client")).toBe("a");
    expect(headers.get("x-forwarded-host")).toBe("relay.test");
    expect(headers.has("host")).toBe(false);
    expect(headers.has("connection")).toBe(false);
    expect(headers.has("keep-alive")).toBe(false);
  });

  test("drops encoding and length from passed-through responses", () => {
    const headers = passThroughHeaders(
      new Headers({
        "Content-Encoding": "gzip",
        "Content-Length": "12",
        "Content-Type": "text/plain",
      }),
    );

    expect(headers.get("content-type")).toBe("text/plain");
    expect(headers.has("content-encoding")).toBe(false);
    expect(headers.has("content-length")).toBe(false);
  });

  test("keeps other upstream headers on held connections", () => {
    const kept = holdResponseHeaders(
      new Headers({
        "Grip-Channel": "news",
        "Content-Length": "7",
        "Content-Encoding": "gzip",
        "X-Upstream": "yes",
      }),
    );

    expect(kept).toEqual([["x-upstream", "yes"]]);
  });
});
