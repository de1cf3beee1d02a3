/**
 * Encoder Module - Public API
 */
export type { ByteSink, EncoderOptions } from "./schema.js";
export type { EncoderError } from "./errors.js";
export { formatEncoderError } from "./errors.js";
export {
  acceptsGzip,
  formatComment,
  formatEvent,
  formatPublication,
  splitDataLines,
} from "./transform.js";
export { Encoder } from "./service.js";
