/**
 * Repository Module - In-memory history
 *
 * Keeps recent events per channel so reconnecting clients can catch up.
 */
import { type Event, eventId } from "../event/index.js";
import type { MemoryRepositoryOptions, Repository } from "./schema.js";

export class MemoryRepository implements Repository {
  private readonly events = new Map<string, Event[]>();
  private readonly maxEventsPerChannel: number;

  constructor(options: MemoryRepositoryOptions = {}) {
    this.maxEventsPerChannel = options.maxEventsPerChannel ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Record an event on a channel.
   */
  add(channel: string, event: Event): void {
    const history = this.events.get(channel) ?? [];
    history.push(event);
    if (history.length > this.maxEventsPerChannel) {
      history.splice(0, history.length - this.maxEventsPerChannel);
    }
    this.events.set(channel, history);
  }

  /**
   * Number of events held for a channel.
   */
  size(channel: string): number {
    return this.events.get(channel)?.length ?? 0;
  }

  /**
   * Events after the one whose id matches the cursor. An empty or unknown
   * cursor (e.g. one that has aged out) replays everything retained.
   */
  replay(channel: string, lastEventId: string): Iterable<Event> {
    const history = this.events.get(channel) ?? [];
    const start = lastEventId === "" ? 0 : indexAfter(history, lastEventId);
    // Snapshot now so the sequence is fixed at the time of the request
    return history.slice(start);
  }
}

const indexAfter = (history: ReadonlyArray<Event>, lastEventId: string): number => {
  for (let i = history.length - 1; i >= 0; i--) {
    if (eventId(history[i]) === lastEventId) {
      return i + 1;
    }
  }
  return 0;
};
