import { describe, it, expect } from "vitest";
import {
  STANDARD_METHODS,
  customMethod,
  isStandardMethod,
  methodToString,
} from "../../../src/http/method.js";

describe("methodToString", () => {
  it("should render every standard verb as itself", () => {
    for (const method of STANDARD_METHODS) {
      expect(methodToString(method)).toBe(method);
    }
  });

  it("should embed custom verbs verbatim, without validation", () => {
    expect(methodToString(customMethod("PURGE"))).toBe("PURGE");
    expect(methodToString(customMethod("not a token"))).toBe("not a token");
  });
});

describe("isStandardMethod", () => {
  it("should recognize the nine standard verbs only", () => {
    expect(STANDARD_METHODS).toHaveLength(9);
    expect(isStandardMethod("PATCH")).toBe(true);
    expect(isStandardMethod("get")).toBe(false);
    expect(isStandardMethod("PURGE")).toBe(false);
  });
});
