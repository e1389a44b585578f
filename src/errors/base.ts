import { EXIT_CODE_CONFIG_ERROR, EXIT_CODE_INTERNAL_ERROR, type ExitCode } from "../exit-codes";

export interface ErrorContext {
  target?: string;
  attempt?: number;
  url?: string;
  sink?: string;
}

export interface PerfprobeErrorOptions {
  exitCode: ExitCode;
  context?: ErrorContext;
  cause?: unknown;
  name?: string;
}

function isFiniteInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function formatErrorMessageWithContext(message: string, context?: ErrorContext): string {
  if (!context) {
    return message;
  }

  const details: string[] = [];

  if (isNonEmptyString(context.target)) {
    details.push(`target=${context.target}`);
  }

  if (isFiniteInteger(context.attempt)) {
    details.push(`attempt=${context.attempt}`);
  }

  if (isNonEmptyString(context.url)) {
    details.push(`url=${context.url}`);
  }

  if (isNonEmptyString(context.sink)) {
    details.push(`sink=${context.sink}`);
  }

  if (details.length === 0) {
    return message;
  }

  return `${message} (${details.join(", ")})`;
}

export class PerfprobeError extends Error {
  readonly exitCode: ExitCode;
  readonly context?: ErrorContext;

  constructor(message: string, options: PerfprobeErrorOptions) {
    super(formatErrorMessageWithContext(message, options.context), { cause: options.cause });

    this.exitCode = options.exitCode;
    this.context = options.context;
    this.name = options.name ?? new.target.name;
  }
}

export interface UsageErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export class UsageError extends PerfprobeError {
  constructor(message: string, options: UsageErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_CONFIG_ERROR,
      context: options.context,
      cause: options.cause,
      name: "UsageError",
    });
  }
}

export class InternalError extends PerfprobeError {
  constructor(message: string, options: UsageErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_INTERNAL_ERROR,
      context: options.context,
      cause: options.cause,
      name: "InternalError",
    });
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
