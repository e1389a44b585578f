import { UsageError } from "../errors";

/** Any problem reading or interpreting the YAML configuration. Exits with the usage code. */
export class ConfigError extends UsageError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class ConfigValidationError extends ConfigError {
  /** One `config.<path>: <message>` entry per schema violation. */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(issues.length > 0 ? issues.join("\n") : "config: is invalid");
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export class MissingEnvironmentVariableError extends ConfigError {
  readonly variableName: string;

  constructor(variableName: string, location: string) {
    super(`Environment variable ${variableName} referenced in ${location} is not defined`);
    this.name = "MissingEnvironmentVariableError";
    this.variableName = variableName;
  }
}
