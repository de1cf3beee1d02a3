/**
 * API Routes Integration Tests
 *
 * Uses Hono's app.request() against a real broker and history.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../config.js", () => ({
  config: {
    APP_NAME: "TestRelay",
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
}));

// Mock logger to prevent pino initialization issues
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Now import the modules (after mocks are set up)
import type { Hono } from "hono";
import { Broker } from "../../broker/index.js";
import { MemoryRepository } from "../../repository/index.js";
import type { StreamOptions } from "../../stream/index.js";
import { createApp } from "../app.js";

const STREAM_OPTIONS: StreamOptions = {
  allowCors: false,
  gzip: false,
  bufferSize: 8,
  heartbeatIntervalMs: 0,
};

function publishRequest(body: unknown, requestId = "req-publish"): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json", "x-request-id": requestId },
    body: JSON.stringify(body),
  };
}

describe("API Routes", () => {
  let broker: Broker;
  let history: MemoryRepository;
  let app: Hono;

  beforeEach(async () => {
    broker = new Broker();
    history = new MemoryRepository();
    await broker.registerDefaultRepository(history);
    app = createApp({ broker, history, streamOptions: STREAM_OPTIONS });
  });

  afterEach(async () => {
    await broker.shutdown();
    vi.unstubAllGlobals();
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  describe("GET /api/health", () => {
    test("returns 200 with broker stats", async () => {
      const res = await app.request("/api/health", { headers: { "x-request-id": "req-1" } });

      expect(res.status).toBe(200);
      expect(res.headers.get("x-request-id")).toBe("req-1");
      expect(await res.json()).toMatchObject({
        status: "ok",
        requestId: "req-1",
        version: "1.0.0",
        appName: "TestRelay",
        broker: {
          channels: 0,
          subscribers: 0,
          repositories: 0,
          hasDefaultRepository: true,
          activeReplays: 0,
          closed: false,
        },
      });
    });

    test("generates a request id when none is sent", async () => {
      const res = await app.request("/api/health");

      expect(res.headers.get("x-request-id")).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });
  });

  // ===========================================================================
  // Publishing
  // ===========================================================================

  describe("POST /api/publish", () => {
    test("accepts a valid event and records it", async () => {
      const res = await app.request(
        "/api/publish",
        publishRequest({ channels: ["news", "news", "sport"], id: "1", data: "hello" }),
      );

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({
        published: true,
        channels: ["news", "sport"],
        requestId: "req-publish",
      });
      expect(history.size("news")).toBe(1);
      expect(history.size("sport")).toBe(1);
    });

    test("delivers the event to stream subscribers", async () => {
      const stream = await app.request("/api/channels/news/events");
      await vi.waitFor(() => expect(broker.subscriberCount("news")).toBe(1));

      await app.request(
        "/api/publish",
        publishRequest({ channels: ["news"], id: "1", event: "update", data: "a\nb" }),
      );

      const reader = stream.body?.getReader();
      const chunk = await reader?.read();
      expect(new TextDecoder().decode(chunk?.value)).toBe(
        "id: 1\nevent: update\ndata: a\ndata: b\n\n",
      );
      await reader?.cancel();
    });

    test("rejects a request without channels", async () => {
      const res = await app.request("/api/publish", publishRequest({ channels: [], data: "x" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        published: false,
        error: "channels: At least one channel is required",
        issues: [{ path: "channels", message: "At least one channel is required" }],
        requestId: "req-publish",
      });
      expect(history.size("news")).toBe(0);
    });

    test("rejects a body that is not JSON", async () => {
      const res = await app.request("/api/publish", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "not json",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        published: false,
        error: "body: Required",
      });
    });

    test("answers 503 once the broker is shut down", async () => {
      await broker.shutdown();

      const res = await app.request(
        "/api/publish",
        publishRequest({ channels: ["news"], data: "late" }),
      );

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        published: false,
        error: "broker is shut down",
        requestId: "req-publish",
      });
      expect(history.size("news")).toBe(0);
    });
  });

  // ===========================================================================
  // Event Streams
  // ===========================================================================

  describe("GET /api/channels/:channel/events", () => {
    test("replays history after Last-Event-ID", async () => {
      await app.request("/api/publish", publishRequest({ channels: ["news"], id: "1", data: "one" }));
      await app.request("/api/publish", publishRequest({ channels: ["news"], id: "2", data: "two" }));

      const res = await app.request("/api/channels/news/events", {
        headers: { "Last-Event-ID": "1" },
      });

      expect(res.headers.get("Content-Type")).toBe("text/event-stream; charset=utf-8");
      expect(res.headers.get("x-request-id")).not.toBeNull();
      const reader = res.body?.getReader();
      const chunk = await reader?.read();
      expect(new TextDecoder().decode(chunk?.value)).toBe("id: 2\ndata: two\n\n");
      await reader?.cancel();
    });
  });

  // ===========================================================================
  // Proxy
  // ===========================================================================

  describe("/proxy/*", () => {
    test("is not mounted without a target", async () => {
      const res = await app.request("/proxy/items");

      expect(res.status).toBe(404);
    });

    test("forwards to the configured target", async () => {
      const fetchMock = vi.fn(
        async (_input: string, _init?: RequestInit): Promise<Response> => new Response("upstream"),
      );
      vi.stubGlobal("fetch", fetchMock);
      const proxied = createApp({
        broker,
        history,
        streamOptions: STREAM_OPTIONS,
        proxyTarget: "http://upstream.test",
      });

      const res = await proxied.request("/proxy/items", { headers: { "x-request-id": "req-9" } });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe("upstream");
      expect(res.headers.get("x-request-id")).toBe("req-9");
      expect(fetchMock.mock.calls[0]?.[0]).toBe("http://upstream.test/items");
    });
  });

  // ===========================================================================
  // Error Boundary
  // ===========================================================================

  describe("error handler", () => {
    test("turns unhandled errors into a 500 with the request id", async () => {
      app.get("/boom", () => {
        throw new Error("boom");
      });

      const res = await app.request("/boom", { headers: { "x-request-id": "req-2" } });

      expect(res.status).toBe(500);
      expect(res.headers.get("x-request-id")).toBe("req-2");
      expect(await res.json()).toEqual({ error: "boom", requestId: "req-2" });
    });
  });
});
