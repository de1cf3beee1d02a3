/**
 * Repository Module - Schemas and Types
 */
import type { Event } from "../event/index.js";

/**
 * Source of historical events for reconnecting clients.
 *
 * `replay` returns a finite, ordered, one-shot sequence of the events
 * that follow `lastEventId` on `channel`. An empty cursor asks for
 * everything available. A failing repository simply stops producing.
 */
export interface Repository {
  replay(
    channel: string,
    lastEventId: string,
  ): Iterable<Event> | AsyncIterable<Event>;
}

/**
 * Options for the in-memory repository.
 */
export type MemoryRepositoryOptions = Readonly<{
  /** Oldest events are dropped beyond this many per channel. */
  maxEventsPerChannel?: number;
}>;
