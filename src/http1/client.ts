/**
 * HTTP/1.1 exchange over a raw TCP/TLS socket.
 * Writes the serialized request, then parses the response head and
 * hands the rest of the socket over to the body stream.
 */
import { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";
import { toTransportError } from "../errors.js";
import { getHeader } from "../utils/headers.js";
import { BodyStream } from "./body.js";
import { LineReader } from "./line-reader.js";
import { readResponseHead, type ResponseHead } from "./parser.js";

export interface Http1Request {
  /** Request-line verb, used to tell whether the response can carry a body */
  method: string;
  /** Complete request bytes: request line, headers, blank line, body */
  payload: Uint8Array;
}

export interface Http1Response extends ResponseHead {
  /** Raw (still encoded) body bytes */
  body: BodyStream;
  /** True for responses that never carry a body (HEAD, 1xx, 204, 304) */
  bodyless: boolean;
}

/**
 * Send an HTTP/1.1 request over a connected socket and return the response.
 * The returned body owns the socket from here on.
 */
export async function http1Request(socket: Duplex, request: Http1Request): Promise<Http1Response> {
  await writeToSocket(socket, Buffer.from(request.payload));
  return readResponse(socket, request.method);
}

function writeToSocket(socket: Duplex, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (err?: Error | null) => {
      if (err) reject(toTransportError(err, "Failed to write request"));
      else resolve();
    });
  });
}

/**
 * Parse the response head. Interim 100 Continue responses are skipped.
 * Nothing past the blank line is consumed: those bytes become the first
 * bytes of the body.
 */
export async function readResponse(socket: Duplex, method: string): Promise<Http1Response> {
  const reader = new LineReader(socket);

  let head = await readResponseHead(reader);
  while (head.status.code === 100) {
    head = await readResponseHead(reader);
  }

  const bodyless = hasNoBody(method, head.status.code);
  const contentLength = bodyless ? 0 : parseContentLength(getHeader(head.headers, "Content-Length"));

  console.debug(
    `[http1] ${method} -> ${head.status.code} ${head.reasonPhrase} (content-length=${contentLength ?? "none"})`,
  );

  return {
    ...head,
    body: new BodyStream(socket, reader.release(), contentLength),
    bodyless,
  };
}

function hasNoBody(method: string, code: number): boolean {
  return method === "HEAD" || (code >= 100 && code < 200) || code === 204 || code === 304;
}

/** Invalid or absent Content-Length means "read until close" */
function parseContentLength(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}
