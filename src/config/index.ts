export { ConfigError, ConfigValidationError, MissingEnvironmentVariableError } from "./errors";
export type { LoadConfigOptions } from "./loader";
export { loadPerfprobeConfig, parsePerfprobeConfig } from "./loader";
export { resolvePlaceholders } from "./placeholders";
export type { ResolveSettingsOptions, ResolvedSettings } from "./resolve";
export { DEFAULT_SETTINGS, resolveSettings } from "./resolve";
export { perfprobeConfigSchema } from "./schema";
export type { DurationString, RawPerfprobeFile, RawTwilioConfig } from "./types";
export { validatePerfprobeConfig } from "./validator";
