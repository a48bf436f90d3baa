import { describe, it, expect, vi } from "vitest";
import { Buffer } from "node:buffer";
import { Request } from "../../../src/http1/request.js";
import { customMethod } from "../../../src/http/method.js";
import { ConfigurationError, TransportError } from "../../../src/errors.js";
import type { SocketConnector } from "../../../src/socket/connector.js";

describe("Request.create", () => {
  it("should parse the URL and start empty", () => {
    const req = Request.create("GET", "https://example.com:8443/x/y?z=1");
    expect(req.method).toBe("GET");
    expect(req.host).toBe("example.com:8443");
    expect(req.resource).toBe("/x/y?z=1");
    expect(req.https).toBe(true);
    expect(req.headers).toEqual({});
    expect(req.body).toBeUndefined();
    expect(req.timeout).toBeUndefined();
  });
});

describe("Request builder", () => {
  it("should return new values and leave the original untouched", () => {
    const base = Request.create("POST", "http://example.com/c");
    const withHeader = base.withHeader("Ping", "Qwerty");
    const withBody = withHeader.withBody("E");

    expect(base.headers).toEqual({});
    expect(withHeader.headers).toEqual({ Ping: "Qwerty" });
    expect(withHeader.body).toBeUndefined();
    expect(withBody.headers).toEqual({ Ping: "Qwerty", "Content-Length": "1" });
    expect(withBody.body).toBe("E");
  });

  it("should keep header keys exactly as given and overwrite same-key values", () => {
    const req = Request.create("GET", "http://example.com/")
      .withHeader("X-Token", "a")
      .withHeader("x-token", "b")
      .withHeader("X-Token", "c");
    expect(req.headers).toEqual({ "X-Token": "c", "x-token": "b" });
  });

  it("should merge header maps", () => {
    const req = Request.create("GET", "http://example.com/")
      .withHeader("Accept", "text/plain")
      .withHeaders({ Accept: "application/json", "User-Agent": "test-agent" });
    expect(req.headers).toEqual({ Accept: "application/json", "User-Agent": "test-agent" });
  });

  it("should set Content-Length to the UTF-8 byte length of the body", () => {
    const req = Request.create("POST", "http://example.com/").withBody("héllo");
    expect(req.headers["Content-Length"]).toBe("6");
  });

  it("should replace a caller-supplied content-length of any spelling", () => {
    const req = Request.create("POST", "http://example.com/")
      .withHeader("content-length", "999")
      .withBody("abc");
    expect(req.headers).toEqual({ "Content-Length": "3" });
  });

  it("should store whole-second timeouts and reject others", () => {
    expect(Request.create("GET", "http://example.com/").withTimeout(3).timeout).toBe(3);
    expect(() => Request.create("GET", "http://example.com/").withTimeout(1.5)).toThrow(
      ConfigurationError,
    );
    expect(() => Request.create("GET", "http://example.com/").withTimeout(-1)).toThrow(
      "Timeout must be a non-negative integer, got -1",
    );
  });
});

describe("Request.serialize", () => {
  it("should produce the request line, Host header, headers and blank line", () => {
    const wire = Request.create("GET", "http://example.com/header_pong")
      .withHeader("Ping", "Qwerty")
      .serialize()
      .toString("utf-8");
    expect(wire).toBe("GET /header_pong HTTP/1.1\r\nHost: example.com:80\r\nPing: Qwerty\r\n\r\n");
  });

  it("should append the body after the blank line", () => {
    const wire = Request.create("PUT", "http://example.com/d").withBody("R").serialize();
    expect(wire.toString("utf-8")).toBe(
      "PUT /d HTTP/1.1\r\nHost: example.com:80\r\nContent-Length: 1\r\n\r\nR",
    );
  });

  it("should end with exactly Content-Length body bytes", () => {
    const body = "ünïcødé body";
    const wire = Request.create("POST", "http://example.com/").withBody(body).serialize();
    const separator = wire.indexOf("\r\n\r\n");
    const length = Number(Request.create("POST", "http://example.com/").withBody(body).headers["Content-Length"]);

    expect(wire.length - (separator + 4)).toBe(length);
    expect(length).toBe(Buffer.byteLength(body, "utf-8"));
  });

  it("should write custom verbs verbatim", () => {
    const wire = Request.create(customMethod("PURGE"), "http://example.com/cache").serialize();
    expect(wire.toString("utf-8")).toBe("PURGE /cache HTTP/1.1\r\nHost: example.com:80\r\n\r\n");
  });
});

describe("Request.redirectTo", () => {
  const original = Request.create("POST", "http://example.com:8080/old")
    .withHeader("Accept", "text/plain")
    .withBody("payload")
    .withTimeout(4);

  it("should resolve a path against the current host and scheme, dropping the body", () => {
    const next = original.redirectTo("/new?x=1");
    expect(next.host).toBe("example.com:8080");
    expect(next.resource).toBe("/new?x=1");
    expect(next.https).toBe(false);
    expect(next.body).toBeUndefined();
    expect(next.headers).toEqual({ Accept: "text/plain" });
    expect(next.method).toBe("POST");
    expect(next.timeout).toBe(4);
  });

  it("should add a leading slash to a bare relative location", () => {
    expect(original.redirectTo("next").resource).toBe("/next");
  });

  it("should replace host, resource and scheme for an absolute location", () => {
    const next = original.redirectTo("https://other.example/landing");
    expect(next.host).toBe("other.example:443");
    expect(next.resource).toBe("/landing");
    expect(next.https).toBe(true);
  });
});

describe("Request.send", () => {
  it("should refuse to send the same request twice", async () => {
    const plain: SocketConnector = {
      connect: vi.fn(() => Promise.reject(new TransportError("connection refused"))),
    };
    const req = Request.create("GET", "http://example.com/");

    await expect(req.send({ connectors: { plain } })).rejects.toThrow(TransportError);
    await expect(req.send({ connectors: { plain } })).rejects.toThrow("Request has already been sent");
    expect(plain.connect).toHaveBeenCalledTimes(1);
  });

  it("should fail https before any network activity when TLS is unavailable", async () => {
    const plain: SocketConnector = { connect: vi.fn() };
    const req = Request.create("GET", "https://example.com/");

    await expect(req.send({ connectors: { plain, tls: null } })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(plain.connect).not.toHaveBeenCalled();
  });
});
