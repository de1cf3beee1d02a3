/**
 * Encoder Module - Schemas and Types
 */

/**
 * Destination for encoded bytes.
 *
 * `write` is the generic byte path. Transports that can take text directly
 * may expose `writeString`; output is identical whichever path is used.
 * A rejected (or throwing) write means the peer is gone.
 */
export type ByteSink = {
  write(chunk: Uint8Array): Promise<void> | void;
  writeString?(text: string): Promise<void> | void;
};

/**
 * Encoder options.
 */
export type EncoderOptions = Readonly<{
  /** Compress through a gzip stream, flushed after every event. */
  gzip?: boolean;
}>;
