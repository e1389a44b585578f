#!/usr/bin/env node
import process from "node:process";

import packageJson from "../package.json";
import { parseCliFlags, redactResolvedSettings, renderCliHelp } from "./cli";
import { loadPerfprobeConfig, resolveSettings, type RawPerfprobeFile } from "./config";
import { AlertManager, runMonitor, ShutdownCoordinator, StopSignal } from "./engine";
import { formatMillisecondsToDuration } from "./duration";
import { PerfprobeError } from "./errors";
import {
  EXIT_CODE_CONFIG_ERROR,
  EXIT_CODE_INTERNAL_ERROR,
  EXIT_CODE_OK,
  exitCodeFromTargetOutcomes,
} from "./exit-codes";
import { createHttpProbe } from "./http";
import { createLogger, type Logger } from "./logger";
import { createReporter } from "./output";
import { redactUrlCredentials } from "./redaction";
import { createWebhookSink, PrometheusTextfileSink, TwilioNotifier } from "./sinks";

interface CliOutcome {
  code: number;
}

function printVersion(): CliOutcome {
  const version = typeof packageJson.version === "string" ? packageJson.version : "0.0.0";
  process.stdout.write(`perfprobe ${version}\n`);
  return { code: EXIT_CODE_OK };
}

function printHelp(): CliOutcome {
  process.stdout.write(renderCliHelp());
  return { code: EXIT_CODE_OK };
}

async function run(argv: readonly string[]): Promise<CliOutcome> {
  const cli = parseCliFlags(argv);

  if (cli.version) {
    return printVersion();
  }

  if (cli.help) {
    return printHelp();
  }

  const log: Logger = createLogger({ quiet: cli.quiet, verbose: cli.verbose });

  let file: RawPerfprobeFile | undefined;
  if (cli.configPath) {
    log.debug({ path: cli.configPath }, "loading configuration file");
    file = await loadPerfprobeConfig(cli.configPath);
  }

  const settings = resolveSettings({
    cli,
    file,
    notice: (message) => {
      log.info(message);
    },
  });
  const { monitor } = settings;

  if (monitor.targets.length === 0) {
    process.stderr.write(renderCliHelp());
    log.error("no destinations to test");
    return { code: EXIT_CODE_CONFIG_ERROR };
  }

  log.debug({ settings: redactResolvedSettings(settings) }, "resolved settings");

  const probe = createHttpProbe({ timeoutMs: monitor.timeoutMs, location: monitor.location });
  const metrics = settings.metricsPath
    ? new PrometheusTextfileSink({ path: settings.metricsPath, logger: log })
    : undefined;
  const webhook = createWebhookSink(settings.webhookUrl, log);

  for (const target of monitor.targets) {
    log.debug({ location: monitor.location }, `testing ${target}`);
  }
  if (metrics && settings.metricsPath) {
    log.debug(`publishing response times to ${settings.metricsPath}`);
  }
  if (webhook && settings.webhookUrl) {
    log.debug(`publishing samples to webhook ${redactUrlCredentials(settings.webhookUrl)}`);
  }

  let alertManager: AlertManager | undefined;
  if (monitor.alertThresholdMs !== undefined) {
    const notifier = new TwilioNotifier({ ...settings.twilio, logger: log });
    alertManager = new AlertManager({
      thresholdMs: monitor.alertThresholdMs,
      intervalMs: monitor.alertIntervalMs,
      notifier,
      recipients: settings.receivers,
      logger: log,
    });
    log.debug(
      { thresholdMs: monitor.alertThresholdMs, recipients: settings.receivers.length },
      `alerting above ${monitor.alertThresholdMs}ms, at most once every ${formatMillisecondsToDuration(monitor.alertIntervalMs)}`,
    );
  }

  const reporter = createReporter(monitor.outputFormat);
  const stopSignal = new StopSignal();
  const shutdown = new ShutdownCoordinator({ stopSignal });

  reporter.header();
  shutdown.start();

  try {
    const outcome = await runMonitor({
      targets: monitor.targets,
      probe,
      maxAttempts: monitor.maxAttempts,
      failureCeiling: monitor.failureCeiling,
      delayMs: monitor.delayMs,
      location: monitor.location,
      stopSignal,
      reporter,
      logger: log,
      metrics,
      webhook,
      alertManager,
    });

    log.debug({ stopped: outcome.stopped }, "monitor finished");
    return { code: exitCodeFromTargetOutcomes(outcome.results) };
  } finally {
    shutdown.dispose();
  }
}

async function main(): Promise<CliOutcome> {
  const argv = process.argv.slice(2);

  try {
    return await run(argv);
  } catch (error) {
    if (error instanceof PerfprobeError) {
      process.stderr.write(`${error.message}\n`);
      return { code: error.exitCode };
    }

    if (error instanceof Error) {
      process.stderr.write(`${error.message}\n`);
      return { code: EXIT_CODE_INTERNAL_ERROR };
    }

    process.stderr.write(`Unexpected error: ${String(error)}\n`);
    return { code: EXIT_CODE_INTERNAL_ERROR };
  }
}

const outcome = await main();
process.exitCode = outcome.code;
