/**
 * Environment-sourced defaults.
 */

/** Default timeout in whole seconds, used when a request sets none */
export const TIMEOUT_ENV_VAR = "WIREREQ_TIMEOUT";

export const DEFAULT_MAX_REDIRECTS = 10;

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Read the default timeout from the environment.
 * Anything other than a non-negative integer counts as unset.
 */
export function timeoutFromEnv(env: Env = process.env): number | undefined {
  const raw = env[TIMEOUT_ENV_VAR]?.trim();
  if (!raw || !/^\d+$/.test(raw)) return undefined;
  return parseInt(raw, 10);
}

/**
 * Effective timeout in seconds: the request's own value, else the
 * environment default, else none.
 */
export function resolveTimeout(requestTimeout: number | undefined, env?: Env): number | undefined {
  return requestTimeout ?? timeoutFromEnv(env);
}
