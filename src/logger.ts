import pino, { type DestinationStream, type Level, type Logger } from "pino";

export type { Logger } from "pino";

export interface Verbosity {
  quiet?: boolean;
  /** Number of -v steps requested; -V counts as two. */
  verbose?: number;
}

export function levelFromVerbosity(verbosity: Verbosity): Level {
  if (verbosity.quiet) {
    return "warn";
  }

  const verbose = verbosity.verbose ?? 0;

  if (verbose >= 2) {
    return "trace";
  }

  return verbose === 1 ? "debug" : "info";
}

export interface CreateLoggerOptions extends Verbosity {
  /** Defaults to stderr; stdout carries the measurements. */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const destination = options.destination ?? pino.destination(2);

  return pino(
    {
      name: "perfprobe",
      level: levelFromVerbosity(options),
      base: {},
    },
    destination,
  );
}
