/**
 * HTTP request value and its wire serialization.
 *
 * A Request is built by chaining: every with*() call returns a new value
 * and leaves the previous one untouched. send() consumes the value;
 * sending the same Request twice is an error.
 */
import { Buffer } from "node:buffer";
import { ConfigurationError } from "../errors.js";
import { methodToString, type Method } from "../http/method.js";
import { removeHeader, serializeHttp1Headers, type HeaderMap } from "../utils/headers.js";
import { hasScheme, parseUrl, type ParsedUrl } from "../utils/url.js";
import type { HttpResponse } from "./response.js";
import { dispatch, type SendOptions } from "../connection.js";

interface RequestState extends ParsedUrl {
  method: Method;
  headers: Readonly<HeaderMap>;
  body?: string;
  /** Seconds */
  timeout?: number;
}

export class Request {
  private sent = false;

  private constructor(private readonly state: Readonly<RequestState>) {}

  /** Parse `url` and start a request with no headers, body or timeout */
  static create(method: Method, url: string): Request {
    return new Request({ method, ...parseUrl(url), headers: {} });
  }

  get method(): Method {
    return this.state.method;
  }

  /** Authority with explicit port, e.g. "example.com:443" */
  get host(): string {
    return this.state.host;
  }

  get resource(): string {
    return this.state.resource;
  }

  get https(): boolean {
    return this.state.https;
  }

  get headers(): Readonly<HeaderMap> {
    return this.state.headers;
  }

  get body(): string | undefined {
    return this.state.body;
  }

  get timeout(): number | undefined {
    return this.state.timeout;
  }

  /** Insert or overwrite a header; the key is kept exactly as given */
  withHeader(key: string, value: string): Request {
    return this.with({ headers: { ...this.state.headers, [key]: value } });
  }

  withHeaders(headers: Readonly<HeaderMap>): Request {
    return this.with({ headers: { ...this.state.headers, ...headers } });
  }

  /** Set the body; Content-Length always follows its UTF-8 byte length */
  withBody(content: string): Request {
    const headers = { ...this.state.headers };
    removeHeader(headers, "Content-Length");
    headers["Content-Length"] = String(Buffer.byteLength(content, "utf-8"));
    return this.with({ body: content, headers });
  }

  /** Per-request timeout in whole seconds, overriding the environment default */
  withTimeout(seconds: number): Request {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new ConfigurationError(`Timeout must be a non-negative integer, got ${seconds}`);
    }
    return this.with({ timeout: seconds });
  }

  /**
   * Retarget for a redirect. A location with its own scheme replaces
   * host, resource and scheme; anything else is a path on the current
   * host. The body and its Content-Length are dropped.
   */
  redirectTo(location: string): Request {
    const target: ParsedUrl = hasScheme(location)
      ? parseUrl(location)
      : {
          host: this.state.host,
          resource: location.startsWith("/") ? location : `/${location}`,
          https: this.state.https,
        };

    const headers = { ...this.state.headers };
    removeHeader(headers, "Content-Length");
    return new Request({ ...this.state, ...target, headers, body: undefined });
  }

  /**
   * Wire format:
   * `<METHOD> <resource> HTTP/1.1\r\nHost: <host>\r\n<k>: <v>\r\n...\r\n[body]`
   */
  serialize(): Buffer {
    const { method, resource, host, headers, body } = this.state;
    const head = `${methodToString(method)} ${resource} HTTP/1.1\r\nHost: ${host}\r\n`;
    return Buffer.from(`${head}${serializeHttp1Headers(headers)}\r\n${body ?? ""}`, "utf-8");
  }

  /** Send the request and resolve with the response head; consumes this value */
  async send(options?: SendOptions): Promise<HttpResponse> {
    if (this.sent) {
      throw new ConfigurationError("Request has already been sent");
    }
    this.sent = true;
    return dispatch(this, options);
  }

  private with(changes: Partial<RequestState>): Request {
    return new Request({ ...this.state, ...changes });
  }
}
