import { request, type Dispatcher } from "undici";

export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

type UndiciRequestOptions = {
  dispatcher?: Dispatcher;
} & Omit<Dispatcher.RequestOptions, "origin" | "path" | "method" | "signal"> &
  Partial<Pick<Dispatcher.RequestOptions, "method">>;

export interface HttpRequestOptions extends UndiciRequestOptions {
  url: string | URL;
  timeoutMs?: number;
  signal?: AbortSignal;
}

function ensureUrlInstance(value: string | URL): URL {
  if (value instanceof URL) {
    return value;
  }

  return new URL(value);
}

function isFinitePositive(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function forwardAbortSignal(source: AbortSignal, controller: AbortController): () => void {
  if (source.aborted) {
    controller.abort(source.reason);
    return () => {};
  }

  const listener = () => {
    controller.abort(source.reason);
  };

  source.addEventListener("abort", listener, { once: true });

  return () => {
    source.removeEventListener("abort", listener);
  };
}

/**
 * Issues a request through undici, rejecting with {@link RequestTimeoutError}
 * when the timeout elapses before the response headers arrive.
 */
export async function httpRequest(options: HttpRequestOptions): Promise<Dispatcher.ResponseData> {
  const { url, timeoutMs, signal, dispatcher, ...rest } = options;

  const targetUrl = ensureUrlInstance(url);

  if (targetUrl.protocol !== "http:" && targetUrl.protocol !== "https:") {
    throw new Error(`Unsupported protocol for request: ${targetUrl.protocol}`);
  }

  const controller = isFinitePositive(timeoutMs) ? new AbortController() : null;
  const cleanups: Array<() => void> = [];

  if (controller && isFinitePositive(timeoutMs)) {
    const timer = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort(new RequestTimeoutError(timeoutMs));
      }
    }, timeoutMs);
    cleanups.push(() => {
      clearTimeout(timer);
    });

    if (signal) {
      cleanups.push(forwardAbortSignal(signal, controller));
    }
  }

  try {
    return await request(targetUrl, {
      ...rest,
      ...(dispatcher ? { dispatcher } : {}),
      signal: controller ? controller.signal : signal,
    });
  } catch (error) {
    if (controller?.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      if (reason instanceof Error) {
        throw reason;
      }
    }

    throw error;
  } finally {
    for (const cleanup of cleanups.splice(0, cleanups.length)) {
      cleanup();
    }
  }
}
