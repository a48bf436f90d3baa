/**
 * Response body as a Node.js Readable over the connection's socket.
 *
 * The stream owns the socket from the moment the head is parsed: it
 * first emits the bytes the line reader had already pulled, then
 * forwards socket data until Content-Length bytes were delivered or the
 * server closes. The socket is destroyed when the body ends or is
 * destroyed.
 */
import { Buffer } from "node:buffer";
import { Readable, type Duplex } from "node:stream";
import { toTransportError } from "../errors.js";
import type { ReleasedSource } from "./line-reader.js";

export class BodyStream extends Readable {
  /** Bytes still expected, or null when the body runs until close */
  private remaining: number | null;
  private attached = false;
  private finished = false;

  constructor(
    private readonly socket: Duplex,
    released: ReleasedSource,
    contentLength: number | null,
  ) {
    super();
    this.remaining = contentLength;

    if (released.leftover.length > 0) this.accept(released.leftover);
    if (this.remaining === 0 || released.ended) this.finish();
  }

  /** Pull more from the socket; reattaches lazily on the first read */
  _read(): void {
    if (this.finished) return;
    if (!this.attached) {
      // Socket failed or closed before the first read: no event will follow
      if (this.socket.destroyed || this.socket.readableEnded) {
        const { errored } = this.socket;
        if (errored) this.destroy(toTransportError(errored, "Failed to read response body"));
        else this.finish();
        return;
      }
      this.attached = true;
      this.socket.on("data", this.onData);
      this.socket.once("end", this.onEnd);
      this.socket.once("close", this.onEnd);
      this.socket.on("error", this.onError);
    }
    this.socket.resume();
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.finished = true;
    this.detach();
    this.socket.destroy();
    callback(error);
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const buf = typeof chunk === "string" ? Buffer.from(chunk, "latin1") : chunk;
    if (!this.accept(buf)) this.socket.pause();
  };

  private readonly onEnd = (): void => {
    this.finish();
  };

  private readonly onError = (err: Error): void => {
    this.destroy(toTransportError(err, "Failed to read response body"));
  };

  /** Push a chunk, trimmed to what is left of Content-Length. Returns push()'s backpressure signal. */
  private accept(chunk: Buffer): boolean {
    if (this.finished) return false;

    let data = chunk;
    if (this.remaining !== null) {
      if (data.length > this.remaining) data = data.subarray(0, this.remaining);
      this.remaining -= data.length;
    }

    const wantMore = data.length > 0 ? this.push(data) : true;
    if (this.remaining === 0) {
      this.finish();
      return false;
    }
    return wantMore;
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.detach();
    this.push(null);
    this.socket.destroy();
  }

  private detach(): void {
    if (!this.attached) return;
    this.attached = false;
    this.socket.removeListener("data", this.onData);
    this.socket.removeListener("end", this.onEnd);
    this.socket.removeListener("close", this.onEnd);
    this.socket.removeListener("error", this.onError);
  }
}
