import pLimit, { type LimitFunction } from "p-limit";

import type { NotificationSink, TimingSample } from "../domain";
import { toError } from "../errors";
import type { Logger } from "../logger";

export type AlertDecision = "dispatched" | "suppressed" | "unconfigured";

export interface AlertManagerOptions {
  thresholdMs: number;
  /** Minimum time between two dispatched alerts, shared by all targets. */
  intervalMs: number;
  notifier?: NotificationSink;
  recipients?: readonly string[];
  logger: Logger;
}

function formatMilliseconds(value: number): string {
  return Number.isInteger(value) ? `${value}ms` : `${value.toFixed(3)}ms`;
}

export function formatAlertMessage(
  sample: TimingSample,
  target: string,
  thresholdMs: number,
): string {
  return `RespTime ${formatMilliseconds(sample.totalMs)} on ${target} exceeds ${formatMilliseconds(thresholdMs)}`;
}

/**
 * Process-wide alert rate limiter. A single instance is shared by every probe
 * loop; the debounce window is global, not per target.
 */
export class AlertManager {
  readonly thresholdMs: number;

  private readonly intervalMs: number;
  private readonly notifier?: NotificationSink;
  private readonly recipients: readonly string[];
  private readonly logger: Logger;
  private readonly lock: LimitFunction = pLimit(1);

  private lastAlertAt: number | null = null;

  constructor(options: AlertManagerOptions) {
    if (!Number.isFinite(options.thresholdMs) || options.thresholdMs < 0) {
      throw new TypeError("thresholdMs must be a finite non-negative number");
    }

    if (!Number.isFinite(options.intervalMs) || options.intervalMs < 0) {
      throw new TypeError("intervalMs must be a finite non-negative number");
    }

    this.thresholdMs = options.thresholdMs;
    this.intervalMs = options.intervalMs;
    this.notifier = options.notifier;
    this.recipients = options.recipients ?? [];
    this.logger = options.logger;
  }

  exceedsThreshold(sample: TimingSample): boolean {
    return sample.totalMs > this.thresholdMs;
  }

  /** Timestamp of the last dispatched alert, or null before the first one. */
  get lastAlertTime(): Date | null {
    return this.lastAlertAt === null ? null : new Date(this.lastAlertAt);
  }

  /**
   * Decides whether the breach warrants a notification and dispatches it.
   * The check-and-update of the last alert time runs under a lock so that two
   * loops cannot both pass the debounce check.
   */
  considerAlert(sample: TimingSample, target: string): Promise<AlertDecision> {
    return this.lock(() => this.evaluate(sample, target));
  }

  private async evaluate(sample: TimingSample, target: string): Promise<AlertDecision> {
    const message = formatAlertMessage(sample, target, this.thresholdMs);
    this.logger.debug({ target }, message);

    const sampleTime = sample.startedAt.getTime();

    if (this.lastAlertAt !== null && sampleTime - this.lastAlertAt < this.intervalMs) {
      this.logger.trace({ target }, "too soon to send another alert");
      return "suppressed";
    }

    this.lastAlertAt = sampleTime;

    if (!this.notifier?.configured || this.recipients.length === 0) {
      this.logger.warn({ target }, `nowhere to send notification for ${target}`);
      return "unconfigured";
    }

    for (const recipient of this.recipients) {
      try {
        await this.notifier.send(message, recipient);
      } catch (error) {
        this.logger.warn(
          { target, err: toError(error) },
          "notification could not be delivered",
        );
      }
    }

    return "dispatched";
  }
}
