import { describe, it, expect } from "vitest";
import { TIMEOUT_ENV_VAR, resolveTimeout, timeoutFromEnv } from "../../src/config.js";

describe("timeoutFromEnv", () => {
  it("should read whole seconds", () => {
    expect(timeoutFromEnv({ [TIMEOUT_ENV_VAR]: "5" })).toBe(5);
    expect(timeoutFromEnv({ [TIMEOUT_ENV_VAR]: " 12 " })).toBe(12);
  });

  it("should ignore missing or malformed values", () => {
    expect(timeoutFromEnv({})).toBeUndefined();
    expect(timeoutFromEnv({ [TIMEOUT_ENV_VAR]: "" })).toBeUndefined();
    expect(timeoutFromEnv({ [TIMEOUT_ENV_VAR]: "1.5" })).toBeUndefined();
    expect(timeoutFromEnv({ [TIMEOUT_ENV_VAR]: "-3" })).toBeUndefined();
    expect(timeoutFromEnv({ [TIMEOUT_ENV_VAR]: "soon" })).toBeUndefined();
  });
});

describe("resolveTimeout", () => {
  it("should prefer the request's own timeout", () => {
    expect(resolveTimeout(2, { [TIMEOUT_ENV_VAR]: "9" })).toBe(2);
  });

  it("should fall back to the environment, then to none", () => {
    expect(resolveTimeout(undefined, { [TIMEOUT_ENV_VAR]: "9" })).toBe(9);
    expect(resolveTimeout(undefined, {})).toBeUndefined();
  });
});
