/**
 * HTTP/1.1 response head parser.
 * Turns the status line and header block into structured values.
 */
import { MalformedResponseError } from "../errors.js";
import { statusFromCode, type Status } from "../http/status.js";
import type { HeaderMap } from "../utils/headers.js";
import type { LineReader } from "./line-reader.js";

export const MISSING_STATUS_LINE_REASON = "Server did not provide a status line";

export interface ResponseHead {
  status: Status;
  /** Single word following the code, e.g. "OK" or "Not" for "Not Found" */
  reasonPhrase: string;
  headers: HeaderMap;
}

/**
 * Parse "HTTP/1.1 200 OK". A missing line, or a code that is not a
 * number up to 999, yields a synthetic 503 instead of failing.
 */
export function parseStatusLine(line: string): { status: Status; reasonPhrase: string } {
  const parts = line.replace(/\r?\n$/, "").split(" ");
  const code = parts[1];

  if (code !== undefined && /^\d+$/.test(code)) {
    const value = parseInt(code, 10);
    if (value <= 999) {
      return { status: statusFromCode(value), reasonPhrase: parts[2] ?? "" };
    }
  }
  return { status: statusFromCode(503), reasonPhrase: MISSING_STATUS_LINE_REASON };
}

/** Split "Key: value" at the first colon; the value is trimmed */
export function parseHeaderLine(line: string): [string, string] {
  const trimmed = line.trim();
  const colonIdx = trimmed.indexOf(":");
  if (colonIdx === -1) {
    throw new MalformedResponseError(`Malformed header line: ${JSON.stringify(trimmed)}`);
  }
  return [trimmed.substring(0, colonIdx), trimmed.substring(colonIdx + 1).trim()];
}

/**
 * Read the status line and header block. Stops at the first line that
 * is blank after trimming, or at end of stream. Nothing past the blank
 * line is consumed from `reader`'s point of view.
 */
export async function readResponseHead(reader: LineReader): Promise<ResponseHead> {
  const { status, reasonPhrase } = parseStatusLine(await reader.readLine());

  const headers: HeaderMap = {};
  for (;;) {
    const line = await reader.readLine();
    if (line.trim() === "") break;
    const [key, value] = parseHeaderLine(line);
    // Duplicate keys: last one wins
    headers[key] = value;
  }

  return { status, reasonPhrase, headers };
}
