/**
 * Response status codes and their classes.
 */

export type StatusBand = "informational" | "success" | "redirect" | "client-error" | "server-error";

export interface Status {
  code: number;
  band: StatusBand;
}

/**
 * Classify a code by numeric range. Anything outside 100-499,
 * including codes above 599, falls into "server-error".
 */
export function classifyStatus(code: number): StatusBand {
  if (code >= 100 && code < 200) return "informational";
  if (code >= 200 && code < 300) return "success";
  if (code >= 300 && code < 400) return "redirect";
  if (code >= 400 && code < 500) return "client-error";
  return "server-error";
}

export function statusFromCode(code: number): Status {
  return { code, band: classifyStatus(code) };
}

export function isSuccess(status: Status): boolean {
  return status.band === "success";
}

export function isRedirect(status: Status): boolean {
  return status.band === "redirect";
}

/** A status renders as its bare numeric code, e.g. "404" */
export function formatStatus(status: Status): string {
  return String(status.code);
}
