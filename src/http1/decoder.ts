/**
 * Content decoding for response bodies.
 *
 * The decoder is picked once, from the response headers, before any
 * body byte is read. gzip and deflate bodies run through node:zlib;
 * everything else passes through untouched.
 */
import { PassThrough, type Readable, type Transform } from "node:stream";
import zlib from "node:zlib";
import { DecompressionError } from "../errors.js";
import { findHeaderKey, removeHeader, type HeaderMap } from "../utils/headers.js";

export type ContentCoding = "identity" | "gzip" | "deflate";

export interface Decoder {
  encoding: ContentCoding;
  /** Decoded body; the source itself for identity */
  stream: Readable;
}

export function identityDecoder(source: Readable): Decoder {
  return { encoding: "identity", stream: source };
}

/**
 * Choose a decoder from Content-Encoding, falling back to
 * Transfer-Encoding. On gzip/deflate the encoding header and
 * Content-Length are removed from `headers` (in place), since the
 * length no longer describes what the caller reads.
 */
export function detectDecoder(headers: HeaderMap, source: Readable): Decoder {
  const key = findHeaderKey(headers, "Content-Encoding") ?? findHeaderKey(headers, "Transfer-Encoding");
  const encoding = key === undefined ? "" : headers[key].trim();

  if (key === undefined || (encoding !== "gzip" && encoding !== "deflate")) {
    return identityDecoder(source);
  }

  delete headers[key];
  removeHeader(headers, "Content-Length");

  const decompressor = encoding === "gzip" ? zlib.createGunzip() : zlib.createInflate();
  return { encoding, stream: decompress(source, decompressor, encoding) };
}

/**
 * Pipe `source` through `decompressor`. zlib failures reach the reader
 * as DecompressionError; errors of the source itself are forwarded as-is.
 */
function decompress(source: Readable, decompressor: Transform, encoding: ContentCoding): Readable {
  const output = new PassThrough();

  decompressor.on("error", err => {
    output.destroy(new DecompressionError(encoding, err));
  });
  source.on("error", err => {
    output.destroy(err);
  });
  output.on("close", () => {
    source.destroy();
    decompressor.destroy();
  });

  source.pipe(decompressor).pipe(output);
  return output;
}
