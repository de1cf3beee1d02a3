/**
 * Event constructors and accessors - pure functions.
 */
import type { Comment, Event, Publication, PublishRequest } from "./schema.js";

/**
 * Create a publication. Missing fields default to the empty string.
 */
export const publication = (
  fields: Readonly<{ id?: string; event?: string; data: string }>,
): Publication => ({
  kind: "publication",
  id: fields.id ?? "",
  event: fields.event ?? "",
  data: fields.data,
});

/**
 * Create a comment frame.
 */
export const comment = (value: string): Comment => ({
  kind: "comment",
  value,
});

/**
 * Id of an event. Comments carry none.
 */
export const eventId = (event: Event): string =>
  event.kind === "publication" ? event.id : "";

/**
 * Build the publication carried by a validated publish request.
 */
export const publicationFromRequest = (request: PublishRequest): Publication =>
  publication({ id: request.id, event: request.event, data: request.data });
