/**
 * Encoder transformations - pure functions producing the SSE wire format.
 */
import type { Comment, Event, Publication } from "../event/index.js";

/**
 * Split a payload into `data:` segments.
 * A trailing newline yields a trailing empty segment, and an empty
 * payload yields exactly one empty segment.
 */
export const splitDataLines = (data: string): string[] => data.split("\n");

/**
 * Serialize a publication as a complete record terminated by a blank line.
 */
export const formatPublication = (ev: Publication): string => {
  let out = "";
  if (ev.id !== "") {
    out += `id: ${ev.id}\n`;
  }
  if (ev.event !== "") {
    out += `event: ${ev.event}\n`;
  }
  for (const line of splitDataLines(ev.data)) {
    out += `data: ${line}\n`;
  }
  return `${out}\n`;
};

/**
 * Serialize a comment as a single meta line. No blank line follows,
 * so clients never see it as a record boundary.
 */
export const formatComment = (ev: Comment): string => `:${ev.value}\n`;

/**
 * Serialize any event.
 */
export const formatEvent = (ev: Event): string => {
  switch (ev.kind) {
    case "publication":
      return formatPublication(ev);
    case "comment":
      return formatComment(ev);
  }
};

/**
 * Whether an Accept-Encoding header value admits gzip.
 */
export const acceptsGzip = (acceptEncoding: string | undefined): boolean =>
  acceptEncoding !== undefined && acceptEncoding.includes("gzip");
