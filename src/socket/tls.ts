/**
 * TLS/TCP connector factories.
 * TLS runs over a fresh TCP connection and verifies the peer against
 * Node's bundled root certificates unless trusted roots are supplied.
 */
import net from "node:net";
import tls from "node:tls";
import type { Duplex } from "node:stream";
import { TransportError } from "../errors.js";
import {
  applyDeadline,
  plainConnector,
  waitUntilReady,
  type ConnectTarget,
  type SocketConnector,
} from "./connector.js";

export interface TlsConnectorOptions {
  /** Trusted root certificates (PEM). Defaults to Node's bundled store. */
  ca?: string | Buffer | Array<string | Buffer>;
}

/** Create a TLS connector verifying against the given (or default) roots */
export function createTlsConnector(options: TlsConnectorOptions = {}): SocketConnector {
  return {
    connect(target: ConnectTarget): Promise<Duplex> {
      if (!target.hostname) {
        return Promise.reject(new TransportError("Cannot connect: URL has no host"));
      }
      console.debug(`[socket] connect(${target.hostname}:${target.port} tls=true)`);
      const socket = tls.connect({
        host: target.hostname,
        port: target.port,
        // SNI must be a DNS name, never an IP literal
        servername: net.isIP(target.hostname) ? undefined : target.hostname,
        ca: options.ca,
        rejectUnauthorized: true,
      });
      applyDeadline(socket, target);
      return waitUntilReady(socket, "secureConnect", target);
    },
  };
}

export const tlsConnector: SocketConnector = createTlsConnector();

/** Whether this Node build can speak TLS at all */
export function hasTlsSupport(): boolean {
  return typeof process.versions.openssl === "string";
}

export interface Connectors {
  plain: SocketConnector;
  /** null: encrypted transport disabled; https requests fail with ConfigurationError */
  tls: SocketConnector | null;
}

/** Fill in the defaults for any connector the caller left out */
export function resolveConnectors(overrides: Partial<Connectors> = {}): Connectors {
  return {
    plain: overrides.plain ?? plainConnector,
    tls: overrides.tls !== undefined ? overrides.tls : hasTlsSupport() ? tlsConnector : null,
  };
}
