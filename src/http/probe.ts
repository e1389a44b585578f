import { performance } from "node:perf_hooks";
import { Client } from "undici";

import type { ProbeOperation, TimingSample } from "../domain";
import { ProbeFailureError, toError } from "../errors";
import { createTimedConnector, type ConnectionTimings, type HostLookup } from "./connector";
import { withinDeadline } from "./deadline";
import { httpRequest, RequestTimeoutError } from "./request";

export interface HttpProbeOptions {
  /** Bounds the connection, the response headers and the body read. */
  timeoutMs: number;
  location?: string;
  headers?: Record<string, string>;
  lookup?: HostLookup;
  /** Accept self-signed certificates (tests only). */
  insecure?: boolean;
  userAgent?: string;
}

const DEFAULT_USER_AGENT = "perfprobe";

/**
 * Reduces a URL to scheme, host and path. A missing scheme defaults to https.
 */
export function effectiveTarget(uri: string): string {
  const trimmed = uri.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  const url = new URL(withScheme);

  return `${url.protocol}//${url.host}${url.pathname}`;
}

interface CapturedConnection {
  timings?: ConnectionTimings;
}

/**
 * Builds a probe that issues one GET per call over a fresh connection and
 * measures each phase of it.
 */
export function createHttpProbe(options: HttpProbeOptions): ProbeOperation {
  const headers = {
    "user-agent": options.userAgent ?? DEFAULT_USER_AGENT,
    ...options.headers,
  };

  return async (target: string): Promise<TimingSample> => {
    let url: URL;
    try {
      url = new URL(target);
    } catch (error) {
      throw new ProbeFailureError("Invalid target URL", { target }, { cause: error });
    }

    // One deadline covers lookup, connect, headers, body and close.
    const deadline = new AbortController();
    const timer = setTimeout(() => {
      deadline.abort(new RequestTimeoutError(options.timeoutMs));
    }, options.timeoutMs);

    const captured: CapturedConnection = {};
    const client = new Client(url.origin, {
      connect: createTimedConnector({
        lookup: options.lookup,
        connectTimeoutMs: options.timeoutMs,
        signal: deadline.signal,
        rejectUnauthorized: !options.insecure,
        onConnected: (timings) => {
          captured.timings = timings;
        },
      }),
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
      pipelining: 1,
    });

    const startedAt = new Date();
    const start = performance.now();
    let closed = false;

    try {
      const response = await withinDeadline(
        httpRequest({ url, method: "GET", headers, dispatcher: client, signal: deadline.signal }),
        deadline.signal,
      );
      const headersAt = performance.now();

      const body = await withinDeadline(response.body.arrayBuffer(), deadline.signal);
      await withinDeadline(client.close(), deadline.signal);
      closed = true;
      const closedAt = performance.now();

      const connection = captured.timings;
      if (!connection) {
        throw new Error("Connection was not established through the timed connector");
      }

      const dnsMs = connection.resolvedAt - connection.startedAt;
      const tcpMs = connection.connectedAt - connection.resolvedAt;
      const tlsMs = connection.securedAt - connection.connectedAt;
      const replyMs = Math.max(0, headersAt - connection.securedAt);
      const closeMs = closedAt - headersAt;
      const phaseSum = dnsMs + tcpMs + tlsMs + replyMs + closeMs;

      return {
        target,
        dnsMs,
        tcpMs,
        tlsMs,
        replyMs,
        closeMs,
        totalMs: Math.max(closedAt - start, phaseSum),
        statusCode: response.statusCode,
        sizeBytes: body.byteLength,
        remoteAddress: connection.remoteAddress,
        location: options.location,
        startedAt,
      };
    } catch (error) {
      const cause = deadline.signal.aborted ? toError(deadline.signal.reason) : toError(error);
      throw new ProbeFailureError(`${cause.name}: ${cause.message}`, { target }, { cause });
    } finally {
      clearTimeout(timer);
      if (!closed) {
        await client.destroy();
      }
    }
  };
}
