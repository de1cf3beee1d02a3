/**
 * Event Module - Schemas and Types
 *
 * An event is either a publication (a full SSE record) or a comment
 * (a single meta line, used for heartbeats). The `kind` tag drives encoding.
 */
import { z } from "zod";

// =============================================================================
// Event Types
// =============================================================================

/**
 * A data event. Empty `id` / `event` are omitted on the wire;
 * `data` is always written, even when empty.
 */
export type Publication = Readonly<{
  kind: "publication";
  id: string;
  event: string;
  data: string;
}>;

/**
 * A comment frame, written as `:<value>`.
 */
export type Comment = Readonly<{
  kind: "comment";
  value: string;
}>;

/**
 * Union of all event variants.
 */
export type Event = Publication | Comment;

// =============================================================================
// Publish Request
// =============================================================================

/**
 * Body of a publish request. Validated at the HTTP boundary.
 */
export const PublishRequestSchema = z.object({
  channels: z
    .array(z.string().min(1, "Channel name must not be empty"))
    .min(1, "At least one channel is required")
    .describe("Channels to publish to"),
  id: z.string().default("").describe("Event id (omitted when empty)"),
  event: z.string().default("").describe("Event name (omitted when empty)"),
  data: z.string().describe("Event payload, may span several lines"),
});

export type PublishRequest = z.infer<typeof PublishRequestSchema>;
