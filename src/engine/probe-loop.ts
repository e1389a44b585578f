import type { MetricsSink, ProbeOperation, TimingSample, WebhookSink } from "../domain";
import { toError, type SinkName } from "../errors";
import type { Logger } from "../logger";
import type { Reporter } from "../output";
import type { AlertManager } from "./alert-manager";
import type { StopSignal } from "./stop-signal";
import { RunningSummary, type SummaryReport } from "./summary";

/** Bound used when no attempt limit is configured. */
export const UNBOUNDED_ATTEMPTS = 2 ** 31 - 1;

export type LoopExitReason = "attempts-reached" | "stopped" | "failure-ceiling" | "error";

export interface TargetRunResult {
  target: string;
  successes: number;
  failures: number;
  exitReason: LoopExitReason;
  /** Present when at least one sample succeeded. */
  summary?: SummaryReport;
  /** Set when the loop ended on an unexpected error. */
  error?: Error;
}

export interface TargetProbeLoopOptions {
  target: string;
  probe: ProbeOperation;
  /** Successful samples after which the loop ends. 0 means unbounded. */
  maxAttempts: number;
  /** Failed attempts (in total, not consecutive) after which the loop ends. */
  failureCeiling: number;
  delayMs: number;
  stopSignal: StopSignal;
  reporter: Reporter;
  logger: Logger;
  location: string;
  metrics?: MetricsSink;
  webhook?: WebhookSink;
  alertManager?: AlertManager;
  now?: () => Date;
}

async function deliver(
  sink: SinkName,
  target: string,
  logger: Logger,
  publish: () => Promise<void>,
): Promise<void> {
  try {
    await publish();
  } catch (error) {
    logger.warn({ sink, target, err: toError(error) }, `${sink} delivery failed`);
  }
}

/**
 * Probes one target until its attempt limit, its failure ceiling or the
 * shared stop signal ends it. Attempts are strictly sequential: the next probe
 * starts only after the previous sample has been reported, published and
 * considered for alerting.
 */
export async function runTargetProbeLoop(options: TargetProbeLoopOptions): Promise<TargetRunResult> {
  const { target, probe, stopSignal, reporter, logger, metrics, webhook, alertManager } = options;
  const now = options.now ?? (() => new Date());
  const limit = options.maxAttempts > 0 ? options.maxAttempts : UNBOUNDED_ATTEMPTS;
  const log = logger.child({ target });

  let successes = 0;
  let failures = 0;
  let exitReason: LoopExitReason = "attempts-reached";
  let failure: Error | undefined;
  let summary: RunningSummary | null = null;
  let report: SummaryReport | undefined;

  log.trace("probe loop started");

  try {
    for (;;) {
      const attempt = successes + failures + 1;
      let sample: TimingSample | null = null;

      try {
        sample = await probe(target);
      } catch (error) {
        failures += 1;
        log.debug({ attempt, err: toError(error) }, "probe attempt failed");

        if (failures >= options.failureCeiling) {
          log.warn(`fetch failure ${failures} of ${options.failureCeiling} on ${target}`);
          if (successes === 0) {
            reporter.noSamples(target);
          }
          exitReason = "failure-ceiling";
          break;
        }
      }

      if (sample) {
        const current = sample;
        successes += 1;

        if (summary === null) {
          summary = RunningSummary.fromSample(current);
        } else {
          summary.add(current);
        }

        reporter.sample(current, successes);

        if (metrics) {
          log.trace(`publishing ${current.totalMs} msec to metrics`);
          await deliver("metrics", target, log, () =>
            metrics.publish(options.location, target, current.statusCode, current.totalMs),
          );
        }

        if (webhook) {
          log.trace(`publishing ${current.remoteAddress ?? "sample"} to webhook`);
          await deliver("webhook", target, log, () => webhook.publish(current));
        }

        if (alertManager?.exceedsThreshold(current)) {
          await alertManager.considerAlert(current, target);
        }
      }

      if (successes >= limit) {
        exitReason = "attempts-reached";
        break;
      }

      const outcome = await stopSignal.wait(options.delayMs);
      if (outcome === "stopped") {
        exitReason = "stopped";
        break;
      }
    }
  } catch (error) {
    failure = toError(error);
    exitReason = "error";
    log.error({ err: failure }, "probe loop aborted");
  } finally {
    if (summary !== null && !summary.isFinalized) {
      report = summary.finalize(now());
      try {
        reporter.summary(report);
      } catch (error) {
        const reportFailure = toError(error);
        log.error({ err: reportFailure }, "summary could not be reported");
        if (!failure) {
          failure = reportFailure;
          exitReason = "error";
        }
      }
    }
  }

  log.trace({ exitReason, successes, failures }, "probe loop finished");

  return {
    target,
    successes,
    failures,
    exitReason,
    ...(report ? { summary: report } : {}),
    ...(failure ? { error: failure } : {}),
  };
}
