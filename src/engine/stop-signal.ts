import { MAX_DURATION_MS } from "../duration";

export type WaitOutcome = "elapsed" | "stopped";

export interface StopSignalOptions {
  /**
   * Optional overrides for scheduling functions (mainly for tests).
   */
  setTimeoutFn?: (callback: () => void, delay: number) => ReturnType<typeof setTimeout>;
  clearTimeoutFn?: (handle: ReturnType<typeof setTimeout>) => void;
}

/**
 * One-shot broadcast shared by every probe loop. Starts open, closes once and
 * never reopens.
 */
export class StopSignal {
  private readonly controller = new AbortController();
  private readonly setTimeoutFn: (
    callback: () => void,
    delay: number,
  ) => ReturnType<typeof setTimeout>;
  private readonly clearTimeoutFn: (handle: ReturnType<typeof setTimeout>) => void;

  private closeReason: string | undefined;

  constructor(options: StopSignalOptions = {}) {
    this.setTimeoutFn = options.setTimeoutFn ?? ((cb, delay) => setTimeout(cb, delay));
    this.clearTimeoutFn = options.clearTimeoutFn ?? ((handle) => clearTimeout(handle));
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | undefined {
    return this.closeReason;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Closes the signal. Returns true only for the call that performed the
   * transition; later calls change nothing.
   */
  close(reason = "stop requested"): boolean {
    if (this.closed) {
      return false;
    }

    this.closeReason = reason;
    this.controller.abort(reason);
    return true;
  }

  /**
   * Waits for the delay to elapse or the signal to close, whichever comes first.
   * Delays beyond a single timer's range are waited out in chunks.
   */
  wait(delayMs: number): Promise<WaitOutcome> {
    if (this.closed) {
      return Promise.resolve("stopped");
    }

    if (!Number.isFinite(delayMs) || delayMs <= 0) {
      return Promise.resolve("elapsed");
    }

    const signal = this.controller.signal;

    return new Promise<WaitOutcome>((resolve) => {
      let remaining = delayMs;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => {
        if (timer !== undefined) {
          this.clearTimeoutFn(timer);
        }
        resolve("stopped");
      };

      const arm = () => {
        const chunk = Math.min(remaining, MAX_DURATION_MS);
        remaining -= chunk;
        timer = this.setTimeoutFn(() => {
          if (remaining > 0) {
            arm();
            return;
          }
          signal.removeEventListener("abort", onAbort);
          resolve("elapsed");
        }, chunk);
      };

      signal.addEventListener("abort", onAbort, { once: true });
      arm();
    });
  }
}
