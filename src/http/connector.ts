import { lookup as dnsLookup } from "node:dns/promises";
import net, { type Socket } from "node:net";
import { performance } from "node:perf_hooks";
import tls, { type TLSSocket } from "node:tls";
import type { buildConnector } from "undici";

import { withinDeadline } from "./deadline";

export interface ConnectionTimings {
  /** Monotonic timestamps (performance.now()) of each phase boundary. */
  startedAt: number;
  resolvedAt: number;
  connectedAt: number;
  securedAt: number;
  remoteAddress?: string;
  remotePort?: number;
}

export interface ResolvedAddress {
  address: string;
  family: number;
}

export type HostLookup = (hostname: string) => Promise<ResolvedAddress>;

export interface TimedConnectorOptions {
  /** Defaults to dns.lookup. */
  lookup?: HostLookup;
  connectTimeoutMs?: number;
  /** Abandons the connection attempt once aborted. */
  signal?: AbortSignal;
  rejectUnauthorized?: boolean;
  onConnected: (timings: ConnectionTimings) => void;
}

export class ConnectTimeoutError extends Error {
  constructor(host: string, timeoutMs: number) {
    super(`Connecting to ${host} timed out after ${timeoutMs}ms`);
    this.name = "ConnectTimeoutError";
  }
}

const defaultLookup: HostLookup = async (hostname) => {
  const result = await dnsLookup(hostname);
  return { address: result.address, family: result.family };
};

function stripIpv6Brackets(hostname: string): string {
  return hostname.startsWith("[") && hostname.endsWith("]") ? hostname.slice(1, -1) : hostname;
}

function resolvePort(options: buildConnector.Options): number {
  const parsed = Number.parseInt(options.port, 10);
  if (Number.isInteger(parsed) && parsed > 0) {
    return parsed;
  }

  return options.protocol === "https:" ? 443 : 80;
}

function withTimeout<T extends Socket>(
  socket: T,
  readyEvent: "connect" | "secureConnect",
  host: string,
  timeoutMs: number | undefined,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer =
      typeof timeoutMs === "number" && timeoutMs > 0
        ? setTimeout(() => {
            const error = new ConnectTimeoutError(host, timeoutMs);
            socket.destroy(error);
          }, timeoutMs)
        : null;

    const settle = () => {
      if (timer) {
        clearTimeout(timer);
      }
      socket.off("error", onError);
      socket.off(readyEvent, onReady);
    };

    const onError = (error: Error) => {
      settle();
      socket.destroy();
      reject(error);
    };

    const onReady = () => {
      settle();
      resolve(socket);
    };

    socket.once("error", onError);
    socket.once(readyEvent, onReady);
  });
}

async function resolveAddress(
  lookup: HostLookup,
  hostname: string,
  signal: AbortSignal | undefined,
): Promise<string> {
  const pending = lookup(hostname);
  const resolved = await (signal ? withinDeadline(pending, signal) : pending);
  return resolved.address;
}

async function establish(
  connectOptions: buildConnector.Options,
  options: TimedConnectorOptions,
): Promise<Socket | TLSSocket> {
  const lookup = options.lookup ?? defaultLookup;
  const hostname = stripIpv6Brackets(connectOptions.hostname);
  const port = resolvePort(connectOptions);

  const startedAt = performance.now();
  const literal = net.isIP(hostname) !== 0;
  const address = literal ? hostname : await resolveAddress(lookup, hostname, options.signal);
  const resolvedAt = literal ? startedAt : performance.now();
  options.signal?.throwIfAborted();

  const socket = await withTimeout(
    net.connect({ host: address, port }),
    "connect",
    hostname,
    options.connectTimeoutMs,
  );
  const connectedAt = performance.now();

  if (options.signal?.aborted) {
    socket.destroy();
    options.signal.throwIfAborted();
  }

  let connected: Socket | TLSSocket = socket;
  let securedAt = connectedAt;

  if (connectOptions.protocol === "https:") {
    const servername = connectOptions.servername ?? hostname;
    connected = await withTimeout(
      tls.connect({
        socket,
        servername: net.isIP(servername) === 0 ? servername : undefined,
        ALPNProtocols: ["http/1.1"],
        rejectUnauthorized: options.rejectUnauthorized ?? true,
      }),
      "secureConnect",
      hostname,
      options.connectTimeoutMs,
    );
    securedAt = performance.now();
  }

  options.onConnected({
    startedAt,
    resolvedAt,
    connectedAt,
    securedAt,
    remoteAddress: socket.remoteAddress,
    remotePort: socket.remotePort,
  });

  return connected;
}

/**
 * undici connector that performs name resolution, the TCP handshake and the
 * TLS handshake as separate steps and reports when each one finished.
 */
export function createTimedConnector(options: TimedConnectorOptions): buildConnector.connector {
  return (connectOptions, callback) => {
    void establish(connectOptions, options).then(
      (socket) => {
        callback(null, socket);
      },
      (error: unknown) => {
        callback(error instanceof Error ? error : new Error(String(error)), null);
      },
    );
  };
}
