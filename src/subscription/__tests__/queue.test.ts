/**
 * BoundedQueue Tests
 */
import { afterEach, describe, expect, test, vi } from "vitest";
import { BoundedQueue } from "../queue.js";

describe("BoundedQueue", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("rejects a non-positive capacity", () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(RangeError);
  });

  test("delivers items in FIFO order", async () => {
    const queue = new BoundedQueue<string>(3);
    queue.offer("a");
    queue.offer("b");

    expect(await queue.take()).toEqual({ type: "item", value: "a" });
    expect(await queue.take()).toEqual({ type: "item", value: "b" });
  });

  test("reports full instead of blocking", () => {
    const queue = new BoundedQueue<number>(1);

    expect(queue.offer(1)).toBe("accepted");
    expect(queue.offer(2)).toBe("full");
    expect(queue.size).toBe(1);
  });

  test("hands an item straight to a waiting consumer", async () => {
    const queue = new BoundedQueue<number>(1);
    const pending = queue.take();

    expect(queue.offer(7)).toBe("accepted");
    expect(queue.size).toBe(0);
    expect(await pending).toEqual({ type: "item", value: 7 });
  });

  test("close wakes a waiting consumer", async () => {
    const queue = new BoundedQueue<number>(1);
    const pending = queue.take();

    expect(queue.close()).toBe(true);

    expect(await pending).toEqual({ type: "closed" });
  });

  test("close discards buffered items and rejects later offers", async () => {
    const queue = new BoundedQueue<number>(2);
    queue.offer(1);
    queue.close();

    expect(await queue.take()).toEqual({ type: "closed" });
    expect(queue.offer(2)).toBe("closed");
    expect(queue.close()).toBe(false);
  });

  test("times out when nothing arrives", async () => {
    vi.useFakeTimers();
    const queue = new BoundedQueue<number>(1);
    const pending = queue.take(1000);

    vi.advanceTimersByTime(1000);

    expect(await pending).toEqual({ type: "timeout" });
    // The timed-out waiter no longer receives items
    expect(queue.offer(3)).toBe("accepted");
    expect(queue.size).toBe(1);
  });

  test("allows a single pending consumer only", async () => {
    const queue = new BoundedQueue<number>(1);
    const first = queue.take();

    await expect(queue.take()).rejects.toThrow("single consumer");

    queue.close();
    expect(await first).toEqual({ type: "closed" });
  });
});
