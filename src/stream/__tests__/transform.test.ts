/**
 * Stream header tests.
 */
import { describe, expect, it } from "vitest";
import { buildStreamHeaders, heartbeatComment } from "../transform.js";

describe("buildStreamHeaders", () => {
  it("sets the event-stream headers", () => {
    expect(buildStreamHeaders({ allowCors: false, gzip: false })).toEqual({
      "Content-Type": "text/event-stream; charset=utf-8",
      "Cache-Control": "no-cache, no-store, must-revalidate",
      Connection: "keep-alive",
    });
  });

  it("adds CORS and gzip headers when enabled", () => {
    const headers = buildStreamHeaders({ allowCors: true, gzip: true });

    expect(headers["Access-Control-Allow-Origin"]).toBe("*");
    expect(headers["Content-Encoding"]).toBe("gzip");
  });
});

describe("heartbeatComment", () => {
  it("is a comment frame", () => {
    expect(heartbeatComment()).toEqual({ kind: "comment", value: "heartbeat" });
  });
});
