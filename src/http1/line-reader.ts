/**
 * Buffered line reader over a Node.js Readable.
 *
 * Pulls one chunk at a time (pausing the source in between) and hands
 * out "\n"-terminated lines. Whatever was read past the last line is
 * returned by release(), so the caller can continue exactly where
 * line parsing stopped.
 */
import { Buffer } from "node:buffer";
import type { Readable } from "node:stream";
import { MalformedResponseError, toTransportError } from "../errors.js";

const LF = 0x0a;
const EMPTY = Buffer.alloc(0);

/** Limit on bytes read through readLine() to prevent memory exhaustion */
export const MAX_HEAD_BYTES = 81920;

export interface ReleasedSource {
  /** Bytes already pulled from the source but not returned as lines */
  leftover: Buffer;
  /** Whether the source has already ended */
  ended: boolean;
}

export class LineReader {
  private buffered: Buffer = EMPTY;
  private ended = false;
  private lineBytes = 0;

  constructor(
    private readonly source: Readable,
    private readonly maxBytes: number = MAX_HEAD_BYTES,
  ) {}

  /**
   * Read through the next "\n" (inclusive). At end of stream the
   * remaining bytes are returned unterminated, then "" on every call.
   */
  async readLine(): Promise<string> {
    for (;;) {
      const newline = this.buffered.indexOf(LF);
      if (newline !== -1) {
        return this.take(newline + 1);
      }
      if (this.ended) {
        return this.take(this.buffered.length);
      }
      if (this.lineBytes + this.buffered.length > this.maxBytes) {
        throw new MalformedResponseError(`Response headers too large (>${this.maxBytes} bytes)`);
      }

      const chunk = await this.nextChunk();
      if (chunk === null) {
        this.ended = true;
      } else {
        this.buffered = this.buffered.length > 0 ? Buffer.concat([this.buffered, chunk]) : chunk;
      }
    }
  }

  /** Stop line reading; nothing more is pulled from the source */
  release(): ReleasedSource {
    const released = { leftover: this.buffered, ended: this.ended };
    this.buffered = EMPTY;
    return released;
  }

  private take(length: number): string {
    const line = this.buffered.subarray(0, length);
    this.buffered = this.buffered.subarray(length);
    this.lineBytes += length;
    if (this.lineBytes > this.maxBytes) {
      throw new MalformedResponseError(`Response headers too large (>${this.maxBytes} bytes)`);
    }
    return line.toString("latin1");
  }

  private nextChunk(): Promise<Buffer | null> {
    const source = this.source;
    if (source.errored) {
      return Promise.reject(toTransportError(source.errored, "Failed to read response"));
    }
    if (source.readableEnded || source.destroyed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        source.removeListener("data", onData);
        source.removeListener("end", onEnd);
        source.removeListener("close", onEnd);
        source.removeListener("error", onError);
      };
      const onData = (chunk: Buffer | string) => {
        cleanup();
        source.pause();
        resolve(typeof chunk === "string" ? Buffer.from(chunk, "latin1") : chunk);
      };
      const onEnd = () => {
        cleanup();
        resolve(null);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(toTransportError(err, "Failed to read response"));
      };

      source.on("data", onData);
      source.once("end", onEnd);
      source.once("close", onEnd);
      source.once("error", onError);
      source.resume();
    });
  }
}
