/**
 * Connection dispatch: one Request in, one terminal HttpResponse out.
 *
 * Each hop opens its own connection (plain TCP or TLS), writes the
 * serialized request, parses the reply and, on a 3xx with a Location,
 * retargets the request and goes again. There is no pooling and no
 * retry: any transport or parse error aborts the whole chain.
 */
import type { Duplex } from "node:stream";
import { DEFAULT_MAX_REDIRECTS, resolveTimeout, type Env } from "./config.js";
import { ConfigurationError, TooManyRedirectsError } from "./errors.js";
import { methodToString } from "./http/method.js";
import { isRedirect } from "./http/status.js";
import { http1Request, type Http1Response } from "./http1/client.js";
import { detectDecoder, identityDecoder } from "./http1/decoder.js";
import type { Request } from "./http1/request.js";
import { wrapResponse, type HttpResponse } from "./http1/response.js";
import { resolveConnectors, type Connectors } from "./socket/tls.js";
import { getHeader } from "./utils/headers.js";
import { splitAuthority } from "./utils/url.js";

export interface SendOptions {
  /** Maximum number of redirects to follow (default: 10) */
  maxRedirects?: number;
  /** Auto-decompress gzip/deflate response body. Default: true */
  decompress?: boolean;
  /** Transport overrides; `tls: null` disables https */
  connectors?: Partial<Connectors>;
  /** Environment consulted for the default timeout (default: process.env) */
  env?: Env;
}

export async function dispatch(request: Request, options: SendOptions = {}): Promise<HttpResponse> {
  const connectors = resolveConnectors(options.connectors);
  const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;

  let current = request;
  let redirectCount = 0;

  for (;;) {
    const response = await sendOnce(current, connectors, options);

    // Not a redirect: 2xx, 4xx and 5xx alike go back to the caller
    if (!isRedirect(response.status)) {
      return response;
    }

    const location = getHeader(response.headers, "Location");
    if (location === undefined) {
      return response;
    }

    // The redirect's own body is never read
    response.destroy();

    redirectCount++;
    if (redirectCount > maxRedirects) {
      throw new TooManyRedirectsError(maxRedirects);
    }

    console.debug(`[redirect] ${response.status.code} ${current.host}${current.resource} -> ${location}`);
    current = current.redirectTo(location);
  }
}

async function sendOnce(
  request: Request,
  connectors: Connectors,
  options: SendOptions,
): Promise<HttpResponse> {
  const connector = request.https ? connectors.tls : connectors.plain;
  if (!connector) {
    throw new ConfigurationError(
      `Cannot send to https://${request.host}${request.resource}: TLS support is not available`,
    );
  }

  const timeout = resolveTimeout(request.timeout, options.env);
  const payload = request.serialize();
  const { hostname, port } = splitAuthority(request.host, request.https);

  const socket = await connector.connect({
    hostname,
    port,
    timeoutMs: timeout === undefined ? undefined : timeout * 1000,
  });
  watchSocket(socket, request.host);

  let raw: Http1Response;
  try {
    raw = await http1Request(socket, { method: methodToString(request.method), payload });
  } catch (err) {
    socket.destroy();
    throw err;
  }

  // Nothing to decode on a response that carries no body
  const decoder =
    options.decompress === false || raw.bodyless
      ? identityDecoder(raw.body)
      : detectDecoder(raw.headers, raw.body);

  return wrapResponse(raw.status, raw.reasonPhrase, raw.headers, decoder.stream);
}

/**
 * Socket errors reach the caller through the pending write, the head
 * parser or the body stream; this listener keeps a late error (after the
 * body was abandoned) from becoming an uncaught exception.
 */
function watchSocket(socket: Duplex, host: string): void {
  socket.on("error", (err: Error) => {
    console.debug(`[socket] error(${host}) ${err.message}`);
  });
  socket.once("close", () => {
    console.debug(`[socket] closed(${host})`);
  });
}
