import type { CliParameters } from "../domain";
import { DurationParseError, parseDurationToMilliseconds } from "../duration";
import { CliFlagError } from "./errors";

const HELP_FLAGS = new Set(["-h", "--help"]);

function expectValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];

  if (value === undefined) {
    throw new CliFlagError(`Flag ${flag} requires a value`);
  }

  return value;
}

function parseNonNegativeInteger(value: string, flag: string): number {
  const numeric = Number(value);

  if (!Number.isSafeInteger(numeric) || numeric < 0) {
    throw new CliFlagError(`Flag ${flag} must be a non-negative integer`);
  }

  return numeric;
}

function parsePositiveInteger(value: string, flag: string): number {
  const numeric = parseNonNegativeInteger(value, flag);

  if (numeric === 0) {
    throw new CliFlagError(`Flag ${flag} must be greater than 0`);
  }

  return numeric;
}

function parseDuration(value: string, flag: string, allowBareSeconds: boolean): number {
  try {
    return parseDurationToMilliseconds(value, { allowBareSeconds });
  } catch (error) {
    if (error instanceof DurationParseError) {
      throw new CliFlagError(`Flag ${flag}: ${error.message}`);
    }

    throw error;
  }
}

/**
 * Parses the command line. Options are applied in order; anything that does
 * not start with a dash (or follows `--`) is a target URL.
 */
export function parseCliFlags(argv: readonly string[]): CliParameters {
  const result: CliParameters = { targets: [], verbose: 0 };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === "--") {
      result.targets.push(...argv.slice(index + 1));
      break;
    }

    if (!token.startsWith("-") || token === "-") {
      result.targets.push(token);
      continue;
    }

    if (HELP_FLAGS.has(token)) {
      result.help = true;
      continue;
    }

    switch (token) {
      case "--version": {
        result.version = true;
        break;
      }

      case "--config": {
        result.configPath = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "-d": {
        result.delayMs = parseDuration(expectValue(argv, index, token), token, true);
        index += 1;
        break;
      }

      case "-t": {
        const timeoutMs = parseDuration(expectValue(argv, index, token), token, true);
        if (timeoutMs === 0) {
          throw new CliFlagError(`Flag ${token} must be greater than 0`);
        }
        result.timeoutMs = timeoutMs;
        index += 1;
        break;
      }

      case "-f": {
        result.failureCeiling = parsePositiveInteger(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "-n": {
        result.maxAttempts = parseNonNegativeInteger(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "-j": {
        result.outputFormat = "json";
        break;
      }

      case "-A": {
        result.alertThresholdMs = parseNonNegativeInteger(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "-M": {
        result.alertIntervalMs = parseDuration(expectValue(argv, index, token), token, true);
        index += 1;
        break;
      }

      case "-m": {
        result.metricsPath = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "-W": {
        result.webhookUrl = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "-q": {
        result.quiet = true;
        break;
      }

      case "-v": {
        result.verbose += 1;
        break;
      }

      case "-V": {
        result.verbose += 2;
        break;
      }

      default: {
        throw new CliFlagError(`Unknown flag: ${token}`);
      }
    }
  }

  return result;
}
