import { EXIT_CODE_INTERNAL_ERROR, EXIT_CODE_NO_SAMPLES } from "../exit-codes";
import { PerfprobeError } from "./base";

export interface ProbeFailureContext {
  target: string;
  attempt?: number;
}

/** One probe attempt that produced no sample. */
export class ProbeFailureError extends PerfprobeError {
  readonly target: string;
  readonly attempt?: number;

  constructor(message: string, context: ProbeFailureContext, options: { cause?: unknown } = {}) {
    super(message, {
      exitCode: EXIT_CODE_NO_SAMPLES,
      context: { target: context.target, attempt: context.attempt },
      cause: options.cause,
      name: "ProbeFailureError",
    });

    this.target = context.target;
    this.attempt = context.attempt;
  }
}

export type SinkName = "metrics" | "webhook" | "twilio";

/** Raised inside a sink when a delivery did not go through; sinks log it, they never rethrow. */
export class SinkDeliveryError extends PerfprobeError {
  readonly sink: SinkName;
  readonly statusCode?: number;

  constructor(
    message: string,
    context: { sink: SinkName; url?: string; statusCode?: number },
    options: { cause?: unknown } = {},
  ) {
    super(message, {
      exitCode: EXIT_CODE_INTERNAL_ERROR,
      context: { sink: context.sink, url: context.url },
      cause: options.cause,
      name: "SinkDeliveryError",
    });

    this.sink = context.sink;
    this.statusCode = context.statusCode;
  }
}
