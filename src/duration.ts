export const DURATION_PATTERN = "^(?:\\d+)(?:ms|s|m|h)$";

const DURATION_REGEX = /^(\d+)(ms|s|m|h)$/;
const BARE_SECONDS_REGEX = /^\d+$/;

const UNIT_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

/** Longest delay a single timer can hold. */
export const MAX_DURATION_MS = 2 ** 31 - 1;

export class DurationParseError extends Error {
  constructor(value: unknown, reason = "Invalid duration string") {
    const display = typeof value === "string" ? value : String(value);
    super(`${reason}: "${display}"`);
    this.name = "DurationParseError";
  }
}

export interface ParseDurationOptions {
  /** Accept a unit-less integer as a number of seconds. */
  allowBareSeconds?: boolean;
}

export function parseDurationToMilliseconds(
  value: string,
  options: ParseDurationOptions = {},
): number {
  const trimmed = value.trim();

  if (options.allowBareSeconds && BARE_SECONDS_REGEX.test(trimmed)) {
    return parseDurationToMilliseconds(`${trimmed}s`);
  }

  const match = DURATION_REGEX.exec(trimmed);

  if (!match) {
    throw new DurationParseError(value);
  }

  const [, numeric, unit] = match;
  const amount = Number.parseInt(numeric, 10);
  const multiplier = UNIT_MULTIPLIERS[unit];

  if (!Number.isSafeInteger(amount) || multiplier === undefined) {
    throw new DurationParseError(value);
  }

  const milliseconds = amount * multiplier;
  if (milliseconds > MAX_DURATION_MS) {
    throw new DurationParseError(value, `Duration exceeds ${MAX_DURATION_MS}ms`);
  }

  return milliseconds;
}

export function formatMillisecondsToDuration(value: number): string {
  if (!Number.isFinite(value) || value < 0) {
    throw new TypeError("Duration must be a non-negative finite number of milliseconds");
  }

  for (const unit of ["h", "m", "s"] as const) {
    const multiplier = UNIT_MULTIPLIERS[unit];
    if (value >= multiplier && value % multiplier === 0) {
      return `${value / multiplier}${unit}`;
    }
  }

  return `${value}ms`;
}

/**
 * Elapsed wall time in whole seconds as `7s`, `3m05s` or `1h02m09s`.
 */
export function formatElapsed(elapsedMs: number): string {
  let seconds = Math.max(0, Math.floor(elapsedMs / 1_000));

  const hours = Math.floor(seconds / 3_600);
  seconds -= hours * 3_600;
  const minutes = Math.floor(seconds / 60);
  seconds -= minutes * 60;

  const pad = (part: number) => String(part).padStart(2, "0");

  if (hours > 0) {
    return `${hours}h${pad(minutes)}m${pad(seconds)}s`;
  }

  if (minutes > 0) {
    return `${minutes}m${pad(seconds)}s`;
  }

  return `${seconds}s`;
}
