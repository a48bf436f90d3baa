/**
 * Caller-facing response: parsed head plus a lazily read body stream.
 */
import { Buffer } from "node:buffer";
import type { Readable } from "node:stream";
import type { Status } from "../http/status.js";
import type { HeaderMap } from "../utils/headers.js";

export interface HttpResponse {
  status: Status;
  reasonPhrase: string;
  headers: HeaderMap;
  /** Body bytes, positioned at the first byte after the header block */
  body: Readable;

  /** Read body as UTF-8 text */
  text(): Promise<string>;
  /** Read body as JSON */
  json(): Promise<unknown>;
  /** Read body as ArrayBuffer */
  arrayBuffer(): Promise<ArrayBuffer>;
  /** Release the connection without reading the body */
  destroy(): void;
}

export function wrapResponse(
  status: Status,
  reasonPhrase: string,
  headers: HeaderMap,
  body: Readable,
): HttpResponse {
  let bodyConsumed = false;
  let failure: Error | undefined;

  // A body that fails before it is read keeps the error for the first read
  body.on("error", (err: Error) => {
    if (!failure) failure = err;
  });

  const consumeBody = async (): Promise<Buffer> => {
    if (bodyConsumed) throw new TypeError("Body already consumed");
    bodyConsumed = true;
    if (failure) throw failure;

    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
  };

  return {
    status,
    reasonPhrase,
    headers,
    body,
    async text(): Promise<string> {
      const bytes = await consumeBody();
      return bytes.toString("utf-8");
    },
    async json(): Promise<unknown> {
      const text = await this.text();
      return JSON.parse(text);
    },
    async arrayBuffer(): Promise<ArrayBuffer> {
      const bytes = await consumeBody();
      const copy = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(copy).set(bytes);
      return copy;
    },
    destroy(): void {
      body.destroy();
    },
  };
}
