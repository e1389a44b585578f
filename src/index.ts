export * from "./config";
export * from "./domain";
export * from "./duration";
export * from "./engine";
export * from "./errors";
export * from "./exit-codes";
export * from "./http";
export * from "./output";
export * from "./sinks";
export { createLogger, levelFromVerbosity } from "./logger";
export type { CreateLoggerOptions, Logger, Verbosity } from "./logger";
