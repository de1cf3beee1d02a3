/**
 * Encoder Module - Service Layer
 *
 * Writes encoded events to a byte sink, optionally through a gzip stream
 * that is flushed after every event so each one reaches the client
 * immediately.
 */
import { once } from "node:events";
import { type Gzip, constants, createGzip } from "node:zlib";
import { type Result, err, ok } from "neverthrow";
import type { Event } from "../event/index.js";
import {
  type EncoderError,
  compressionFailed,
  writeFailed,
} from "./errors.js";
import type { ByteSink, EncoderOptions } from "./schema.js";
import { formatEvent } from "./transform.js";

const textEncoder = new TextEncoder();

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Encodes events onto one sink. A single writer is expected: callers
 * await each `encode` before issuing the next.
 */
export class Encoder {
  private readonly sink: ByteSink;
  private readonly gzip: Gzip | null;
  private compressed: Buffer[] = [];
  private compressorError: Error | null = null;

  constructor(sink: ByteSink, options: EncoderOptions = {}) {
    this.sink = sink;
    this.gzip = options.gzip ? this.createCompressor() : null;
  }

  /**
   * Encode one event. Failures are returned, never retried.
   */
  async encode(event: Event): Promise<Result<void, EncoderError>> {
    const text = formatEvent(event);

    if (this.gzip === null) {
      return this.writeText(text);
    }

    const compressed = await this.compress(this.gzip, text);
    if (compressed.isErr()) {
      return err(compressed.error);
    }
    return this.writeBytes(compressed.value);
  }

  /**
   * End the compressor, if any, writing the gzip trailer.
   */
  async close(): Promise<Result<void, EncoderError>> {
    const gzip = this.gzip;
    if (gzip === null || gzip.writableEnded || this.compressorError !== null) {
      return ok(undefined);
    }
    // The trailer is emitted on the readable side; wait for it to finish
    try {
      const ended = once(gzip, "end");
      gzip.end();
      await ended;
    } catch (error) {
      const cause = toError(error);
      return err(compressionFailed(cause.message, cause));
    }
    const trailer = this.drainCompressed();
    if (trailer.byteLength === 0) {
      return ok(undefined);
    }
    return this.writeBytes(trailer);
  }

  private createCompressor(): Gzip {
    const gzip = createGzip();
    gzip.on("data", (chunk: Buffer) => {
      this.compressed.push(chunk);
    });
    gzip.on("error", (error: Error) => {
      this.compressorError = error;
    });
    return gzip;
  }

  private compress(
    gzip: Gzip,
    text: string,
  ): Promise<Result<Uint8Array, EncoderError>> {
    if (this.compressorError !== null || gzip.writableEnded) {
      return Promise.resolve(
        err(
          compressionFailed(
            "compressor is no longer writable",
            this.compressorError ?? undefined,
          ),
        ),
      );
    }

    return new Promise((resolve) => {
      gzip.write(text);
      gzip.flush(constants.Z_SYNC_FLUSH, () => {
        if (this.compressorError !== null) {
          resolve(
            err(compressionFailed("gzip stream failed", this.compressorError)),
          );
          return;
        }
        resolve(ok(this.drainCompressed()));
      });
    });
  }

  private drainCompressed(): Buffer {
    const out = Buffer.concat(this.compressed);
    this.compressed = [];
    return out;
  }

  private async writeText(text: string): Promise<Result<void, EncoderError>> {
    try {
      if (this.sink.writeString) {
        await this.sink.writeString(text);
      } else {
        await this.sink.write(textEncoder.encode(text));
      }
      return ok(undefined);
    } catch (error) {
      const cause = toError(error);
      return err(writeFailed(cause.message, cause));
    }
  }

  private async writeBytes(
    bytes: Uint8Array,
  ): Promise<Result<void, EncoderError>> {
    try {
      await this.sink.write(bytes);
      return ok(undefined);
    } catch (error) {
      const cause = toError(error);
      return err(writeFailed(cause.message, cause));
    }
  }
}
