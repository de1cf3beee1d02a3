/**
 * Stream transformations - headers and heartbeat frames.
 */
import { type Comment, comment } from "../event/index.js";

/**
 * Response headers for an event stream.
 */
export const buildStreamHeaders = (
  options: Readonly<{ allowCors: boolean; gzip: boolean }>,
): Record<string, string> => {
  const headers: Record<string, string> = {
    "Content-Type": "text/event-stream; charset=utf-8",
    "Cache-Control": "no-cache, no-store, must-revalidate",
    Connection: "keep-alive",
  };
  if (options.allowCors) {
    headers["Access-Control-Allow-Origin"] = "*";
  }
  if (options.gzip) {
    headers["Content-Encoding"] = "gzip";
  }
  return headers;
};

/**
 * Comment written when a connection has been idle for the heartbeat interval.
 */
export const heartbeatComment = (): Comment => comment("heartbeat");
