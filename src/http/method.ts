/**
 * HTTP request methods: the standard verbs plus a free-form escape hatch.
 */

export type StandardMethod =
  | "GET"
  | "HEAD"
  | "POST"
  | "PUT"
  | "DELETE"
  | "CONNECT"
  | "OPTIONS"
  | "TRACE"
  | "PATCH";

/**
 * A caller-supplied verb written into the request line as-is.
 * It is not checked against the token grammar: a malformed verb
 * produces a malformed request.
 */
export interface CustomMethod {
  kind: "custom";
  verb: string;
}

export type Method = StandardMethod | CustomMethod;

export const STANDARD_METHODS: readonly StandardMethod[] = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
];

export function customMethod(verb: string): CustomMethod {
  return { kind: "custom", verb };
}

/** Render a method to its request-line text */
export function methodToString(method: Method): string {
  return typeof method === "string" ? method : method.verb;
}

export function isStandardMethod(method: string): method is StandardMethod {
  return STANDARD_METHODS.some(standard => standard === method);
}
