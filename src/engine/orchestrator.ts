import type { MetricsSink, ProbeOperation, WebhookSink } from "../domain";
import { UsageError } from "../errors";
import type { Logger } from "../logger";
import type { Reporter } from "../output";
import type { AlertManager } from "./alert-manager";
import { runTargetProbeLoop, type TargetRunResult } from "./probe-loop";
import type { StopSignal } from "./stop-signal";

export interface MonitorOptions {
  targets: readonly string[];
  probe: ProbeOperation;
  maxAttempts: number;
  failureCeiling: number;
  delayMs: number;
  location: string;
  stopSignal: StopSignal;
  reporter: Reporter;
  logger: Logger;
  metrics?: MetricsSink;
  webhook?: WebhookSink;
  alertManager?: AlertManager;
  now?: () => Date;
}

export interface MonitorOutcome {
  results: TargetRunResult[];
  /** True when the run ended because the stop signal closed. */
  stopped: boolean;
}

/**
 * Starts one probe loop per target, all sharing the same stop signal, and
 * resolves once every loop has exited. Each loop prints its own summary; the
 * results returned here are for the exit status only.
 */
export async function runMonitor(options: MonitorOptions): Promise<MonitorOutcome> {
  if (options.targets.length === 0) {
    throw new UsageError("no destinations to test");
  }

  const { logger } = options;

  logger.debug({ targets: options.targets, location: options.location }, "starting probe loops");

  const loops = options.targets.map((target) =>
    runTargetProbeLoop({
      target,
      probe: options.probe,
      maxAttempts: options.maxAttempts,
      failureCeiling: options.failureCeiling,
      delayMs: options.delayMs,
      stopSignal: options.stopSignal,
      reporter: options.reporter,
      logger,
      location: options.location,
      metrics: options.metrics,
      webhook: options.webhook,
      alertManager: options.alertManager,
      now: options.now,
    }),
  );

  logger.trace("waiting for probe loops to exit");
  const results = await Promise.all(loops);
  logger.trace("all probe loops exited");

  return { results, stopped: options.stopSignal.closed };
}
