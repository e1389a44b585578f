export type { ErrorContext, PerfprobeErrorOptions, UsageErrorOptions } from "./base";
export {
  InternalError,
  PerfprobeError,
  UsageError,
  formatErrorMessageWithContext,
  toError,
} from "./base";
export type { ProbeFailureContext, SinkName } from "./probe";
export { ProbeFailureError, SinkDeliveryError } from "./probe";
