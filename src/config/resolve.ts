import { hostname } from "node:os";

import type { CliParameters, MonitorParameters, OutputFormat } from "../domain";
import { DurationParseError, parseDurationToMilliseconds } from "../duration";
import { UsageError } from "../errors";
import { effectiveTarget } from "../http";
import type { TwilioCredentials } from "../sinks";
import type { RawPerfprobeFile } from "./types";

export const DEFAULT_SETTINGS = {
  delayMs: parseDurationToMilliseconds("10s"),
  failureCeiling: 10,
  maxAttempts: 0,
  alertIntervalMs: parseDurationToMilliseconds("300s"),
  timeoutMs: parseDurationToMilliseconds("15s"),
  outputFormat: "text",
} as const satisfies Partial<MonitorParameters> & { outputFormat: OutputFormat };

export interface ResolvedSettings {
  monitor: MonitorParameters;
  metricsPath?: string;
  webhookUrl?: string;
  twilio: TwilioCredentials;
  receivers: string[];
}

export interface ResolveSettingsOptions {
  cli: CliParameters;
  file?: RawPerfprobeFile;
  env?: NodeJS.ProcessEnv;
  /** Receives informational notices about overridden values. */
  notice?: (message: string) => void;
  defaultLocation?: () => string;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function splitList(value: string | undefined): string[] {
  return (value ?? "").split(/\s+/).filter((item) => item.length > 0);
}

function optionalDuration(value: string | undefined, field: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  try {
    return parseDurationToMilliseconds(value);
  } catch (error) {
    if (error instanceof DurationParseError) {
      throw new UsageError(`${field}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

function collectTargets(raw: readonly string[]): string[] {
  const seen = new Set<string>();

  for (const candidate of raw) {
    let target: string;
    try {
      target = effectiveTarget(candidate);
    } catch (error) {
      throw new UsageError(`Invalid target URL: ${candidate}`, { cause: error });
    }
    seen.add(target);
  }

  return Array.from(seen);
}

function resolveAlertThreshold(
  cli: CliParameters,
  file: RawPerfprobeFile | undefined,
  env: NodeJS.ProcessEnv,
  notice: (message: string) => void,
): number | undefined {
  let threshold = cli.alertThresholdMs ?? 0;
  const fromEnv = env.RESPONSE_THRESHOLD;

  if (fromEnv !== undefined) {
    if (threshold > 0) {
      notice(`alert threshold from command line overrides environment: ${fromEnv}`);
    } else {
      const parsed = Number(fromEnv.trim());
      if (Number.isSafeInteger(parsed) && parsed >= 0) {
        threshold = parsed;
      } else {
        notice(`parsing environment var RESPONSE_THRESHOLD: invalid value "${fromEnv}"`);
      }
    }
  }

  if (threshold === 0) {
    threshold = optionalDuration(file?.alert_threshold, "alert_threshold") ?? 0;
  }

  return threshold > 0 ? threshold : undefined;
}

function resolveWebhookUrl(
  cli: CliParameters,
  file: RawPerfprobeFile | undefined,
  env: NodeJS.ProcessEnv,
  notice: (message: string) => void,
): string | undefined {
  const fromEnv = nonEmpty(env.HTTP_JSON_WEBHOOK) ?? nonEmpty(file?.webhook?.url);
  const fromCli = nonEmpty(cli.webhookUrl);

  if (fromCli) {
    if (fromEnv) {
      notice("overwriting webhook from environment via command line");
    }
    return fromCli;
  }

  return fromEnv;
}

/**
 * Merges built-in defaults, the configuration file, the environment and the
 * command line, in increasing order of precedence.
 */
export function resolveSettings(options: ResolveSettingsOptions): ResolvedSettings {
  const { cli, file } = options;
  const env = options.env ?? process.env;
  const notice = options.notice ?? (() => {});
  const defaultLocation = options.defaultLocation ?? hostname;

  const targets = collectTargets([
    ...cli.targets,
    ...splitList(env.PERFPROBE_URL),
    ...(file?.targets ?? []),
  ]);

  const twilioFile = file?.notify?.twilio;
  const receiversFromEnv = splitList(env.TWILIO_SMS_RECEIVERS);

  const monitor: MonitorParameters = {
    targets,
    delayMs: cli.delayMs ?? optionalDuration(file?.delay, "delay") ?? DEFAULT_SETTINGS.delayMs,
    maxAttempts: cli.maxAttempts ?? file?.max_attempts ?? DEFAULT_SETTINGS.maxAttempts,
    failureCeiling:
      cli.failureCeiling ?? file?.failure_ceiling ?? DEFAULT_SETTINGS.failureCeiling,
    alertThresholdMs: resolveAlertThreshold(cli, file, env, notice),
    alertIntervalMs:
      cli.alertIntervalMs ??
      optionalDuration(file?.alert_interval, "alert_interval") ??
      DEFAULT_SETTINGS.alertIntervalMs,
    timeoutMs:
      cli.timeoutMs ?? optionalDuration(file?.timeout, "timeout") ?? DEFAULT_SETTINGS.timeoutMs,
    outputFormat: cli.outputFormat ?? file?.output ?? DEFAULT_SETTINGS.outputFormat,
    location: nonEmpty(env.PERFPROBE_LOCATION) ?? nonEmpty(file?.location) ?? defaultLocation(),
  };

  return {
    monitor,
    metricsPath: nonEmpty(cli.metricsPath) ?? nonEmpty(file?.metrics?.textfile),
    webhookUrl: resolveWebhookUrl(cli, file, env, notice),
    twilio: {
      accountSid: nonEmpty(env.TWILIO_ACCOUNT_SID) ?? nonEmpty(twilioFile?.account_sid),
      authToken: nonEmpty(env.TWILIO_AUTH_TOKEN) ?? nonEmpty(twilioFile?.auth_token),
      sender: nonEmpty(env.TWILIO_SMS_SENDER) ?? nonEmpty(twilioFile?.sender),
    },
    receivers: receiversFromEnv.length > 0 ? receiversFromEnv : [...(twilioFile?.receivers ?? [])],
  };
}
