/**
 * Header utilities for HTTP/1.1.
 *
 * Header maps keep keys exactly as written by the caller or the server.
 * Lookups of the few headers the client itself acts on (Content-Length,
 * Content-Encoding, Location, ...) ignore case, since field names are
 * case-insensitive on the wire.
 */

export type HeaderMap = Record<string, string>;

/**
 * Serialize headers into HTTP/1.1 format: "Key: Value\r\n"
 * Keys and values are written verbatim; supplying valid text is up to the caller.
 */
export function serializeHttp1Headers(headers: HeaderMap): string {
  let result = "";
  for (const [key, value] of Object.entries(headers)) {
    result += `${key}: ${value}\r\n`;
  }
  return result;
}

/** Find the key under which `name` is stored, ignoring case */
export function findHeaderKey(headers: HeaderMap, name: string): string | undefined {
  if (Object.hasOwn(headers, name)) return name;
  const lower = name.toLowerCase();
  return Object.keys(headers).find(key => key.toLowerCase() === lower);
}

export function getHeader(headers: HeaderMap, name: string): string | undefined {
  const key = findHeaderKey(headers, name);
  return key === undefined ? undefined : headers[key];
}

/** Remove every spelling of `name` from the map (in place) */
export function removeHeader(headers: HeaderMap, name: string): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) delete headers[key];
  }
}
