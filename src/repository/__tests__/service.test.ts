/**
 * MemoryRepository Tests
 */
import { describe, expect, test } from "vitest";
import { type Event, comment, eventId, publication } from "../../event/index.js";
import { MemoryRepository } from "../service.js";

const seeded = (): MemoryRepository => {
  const repo = new MemoryRepository();
  for (const id of ["1", "2", "3"]) {
    repo.add("news", publication({ id, data: `item ${id}` }));
  }
  repo.add("sport", publication({ id: "s1", data: "goal" }));
  return repo;
};

const ids = (events: Iterable<Event>): string[] => [...events].map(eventId);

describe("MemoryRepository", () => {
  test("replays everything for an empty cursor", () => {
    expect(ids(seeded().replay("news", ""))).toEqual(["1", "2", "3"]);
  });

  test("replays the events after the cursor", () => {
    expect(ids(seeded().replay("news", "1"))).toEqual(["2", "3"]);
  });

  test("replays nothing when the cursor is the latest event", () => {
    expect(ids(seeded().replay("news", "3"))).toEqual([]);
  });

  test("replays everything for an unknown cursor", () => {
    expect(ids(seeded().replay("news", "gone"))).toEqual(["1", "2", "3"]);
  });

  test("keeps channels apart", () => {
    expect(ids(seeded().replay("sport", ""))).toEqual(["s1"]);
    expect(ids(seeded().replay("weather", ""))).toEqual([]);
  });

  test("drops the oldest events beyond the retention limit", () => {
    const repo = new MemoryRepository({ maxEventsPerChannel: 2 });
    repo.add("news", publication({ id: "1", data: "" }));
    repo.add("news", publication({ id: "2", data: "" }));
    repo.add("news", publication({ id: "3", data: "" }));

    expect(repo.size("news")).toBe(2);
    expect(ids(repo.replay("news", ""))).toEqual(["2", "3"]);
  });

  test("replay is unaffected by events added while iterating", () => {
    const repo = seeded();
    const iterator = repo.replay("news", "2");
    repo.add("news", publication({ id: "4", data: "" }));

    expect(ids(iterator)).toEqual(["3"]);
  });

  test("stores comments without treating them as cursors", () => {
    const repo = new MemoryRepository();
    repo.add("news", comment("marker"));
    repo.add("news", publication({ id: "1", data: "" }));

    expect([...repo.replay("news", "1")]).toEqual([]);
    expect([...repo.replay("news", "")]).toHaveLength(2);
  });
});
