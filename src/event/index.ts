/**
 * Event module public API.
 */
export type { Comment, Event, Publication, PublishRequest } from "./schema.js";
export { PublishRequestSchema } from "./schema.js";
export {
  comment,
  eventId,
  publication,
  publicationFromRequest,
} from "./transform.js";
