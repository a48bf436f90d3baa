/**
 * Error types surfaced by wirereq.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text. Nothing here is retried internally.
 */

export type WireRequestErrorCode =
  | "ERR_CONFIGURATION"
  | "ERR_TRANSPORT"
  | "ERR_MALFORMED_RESPONSE"
  | "ERR_DECOMPRESSION"
  | "ERR_TOO_MANY_REDIRECTS";

export class WireRequestError extends Error {
  readonly code: WireRequestErrorCode;

  constructor(code: WireRequestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised before any network activity, e.g. https without TLS support. */
export class ConfigurationError extends WireRequestError {
  constructor(message: string) {
    super("ERR_CONFIGURATION", message);
  }
}

/** DNS, connect, TLS handshake, socket I/O or deadline failures. */
export class TransportError extends WireRequestError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super("ERR_TRANSPORT", message, { cause: options?.cause });
    this.timedOut = options?.timedOut ?? false;
  }
}

export class MalformedResponseError extends WireRequestError {
  constructor(message: string) {
    super("ERR_MALFORMED_RESPONSE", message);
  }
}

/** Emitted by a response body stream when compressed data is invalid. */
export class DecompressionError extends WireRequestError {
  readonly encoding: string;

  constructor(encoding: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("ERR_DECOMPRESSION", `Failed to decode ${encoding} body: ${detail}`, { cause });
    this.encoding = encoding;
  }
}

export class TooManyRedirectsError extends WireRequestError {
  readonly maxRedirects: number;

  constructor(maxRedirects: number) {
    super("ERR_TOO_MANY_REDIRECTS", `Maximum redirects (${maxRedirects}) exceeded`);
    this.maxRedirects = maxRedirects;
  }
}

/** Wrap a raw socket/TLS error; errors already raised by this package pass through */
export function toTransportError(err: unknown, context: string): WireRequestError {
  if (err instanceof WireRequestError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new TransportError(`${context}: ${detail}`, { cause: err });
}
