/**
 * Transport capability: open a duplex byte stream to host:port.
 * The dispatcher only sees SocketConnector; plain TCP lives here,
 * TLS in ./tls.ts.
 */
import net from "node:net";
import type { Duplex } from "node:stream";
import { TransportError, toTransportError } from "../errors.js";

export interface ConnectTarget {
  hostname: string;
  port: number;
  /** Idle deadline covering connect, writes and reads. Absent or 0: none. */
  timeoutMs?: number;
}

export interface SocketConnector {
  connect(target: ConnectTarget): Promise<Duplex>;
}

/** Plain TCP via node:net */
export const plainConnector: SocketConnector = {
  connect(target: ConnectTarget): Promise<Duplex> {
    if (!target.hostname) {
      return Promise.reject(new TransportError("Cannot connect: URL has no host"));
    }
    console.debug(`[socket] connect(${target.hostname}:${target.port} tls=false)`);
    const socket = net.connect({ host: target.hostname, port: target.port });
    applyDeadline(socket, target);
    return waitUntilReady(socket, "connect", target);
  },
};

/**
 * Apply the idle deadline to a raw socket. On expiry the socket is
 * destroyed with a TransportError, which fails whichever read, write
 * or connect is pending.
 */
export function applyDeadline(socket: net.Socket, target: ConnectTarget): void {
  const { timeoutMs } = target;
  if (timeoutMs === undefined || timeoutMs <= 0) return;

  socket.setTimeout(timeoutMs);
  socket.on("timeout", () => {
    socket.destroy(
      new TransportError(`Socket timed out after ${timeoutMs}ms (${target.hostname}:${target.port})`, {
        timedOut: true,
      }),
    );
  });
}

/** Resolve once `readyEvent` fires, reject (and destroy) on the first error */
export function waitUntilReady<T extends net.Socket>(
  socket: T,
  readyEvent: "connect" | "secureConnect",
  target: ConnectTarget,
): Promise<T> {
  return new Promise((resolve, reject) => {
    const onReady = () => {
      socket.removeListener("error", onError);
      resolve(socket);
    };
    const onError = (err: Error) => {
      socket.removeListener(readyEvent, onReady);
      socket.destroy();
      reject(toTransportError(err, `Failed to connect to ${target.hostname}:${target.port}`));
    };
    socket.once(readyEvent, onReady);
    socket.once("error", onError);
  });
}
