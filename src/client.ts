/**
 * Top-level request API.
 *
 * Shorthand constructors return a Request to finish with .withHeader(),
 * .withBody(), .withTimeout() and .send(); request() does it in one call.
 */
import { customMethod, isStandardMethod, type Method } from "./http/method.js";
import { Request } from "./http1/request.js";
import type { HttpResponse } from "./http1/response.js";
import type { SendOptions } from "./connection.js";
import type { HeaderMap } from "./utils/headers.js";

export interface RequestOptions extends SendOptions {
  /** Standard verb or any custom verb text (default: "GET") */
  method?: Method | string;
  headers?: HeaderMap;
  body?: string;
  /** Timeout in whole seconds */
  timeout?: number;
}

export function createRequest(method: Method, url: string): Request {
  return Request.create(method, url);
}

export const get = (url: string): Request => Request.create("GET", url);
export const head = (url: string): Request => Request.create("HEAD", url);
export const post = (url: string): Request => Request.create("POST", url);
export const put = (url: string): Request => Request.create("PUT", url);
/** DELETE (`delete` is a reserved word) */
export const del = (url: string): Request => Request.create("DELETE", url);
export const connect = (url: string): Request => Request.create("CONNECT", url);
export const options = (url: string): Request => Request.create("OPTIONS", url);
export const trace = (url: string): Request => Request.create("TRACE", url);
export const patch = (url: string): Request => Request.create("PATCH", url);

/**
 * Build and send a request in one call.
 * A method string outside the standard set is sent as a custom verb.
 */
export async function request(url: string, init: RequestOptions = {}): Promise<HttpResponse> {
  const { method, headers, body, timeout, ...sendOptions } = init;

  let req = Request.create(toMethod(method), url);
  if (headers) req = req.withHeaders(headers);
  if (body !== undefined) req = req.withBody(body);
  if (timeout !== undefined) req = req.withTimeout(timeout);

  return req.send(sendOptions);
}

function toMethod(method: Method | string | undefined): Method {
  if (method === undefined) return "GET";
  if (typeof method !== "string") return method;
  return isStandardMethod(method) ? method : customMethod(method);
}
