import Ajv, { type ErrorObject } from "ajv";
import ajvErrors from "ajv-errors";
import addFormats from "ajv-formats";
import addKeywords from "ajv-keywords";

import { ConfigValidationError } from "./errors";
import { perfprobeConfigSchema } from "./schema";
import type { RawPerfprobeFile } from "./types";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  messages: true,
  coerceTypes: true,
});

addFormats(ajv);
addKeywords(ajv, ["transform"]);
ajvErrors(ajv, { singleError: false });

const validateFn = ajv.compile<RawPerfprobeFile>(perfprobeConfigSchema);

function toPointer(instancePath: string): string {
  if (!instancePath) {
    return "config";
  }

  const segments = instancePath
    .split("/")
    .filter(Boolean)
    .map((segment) => segment.replaceAll("~1", "/").replaceAll("~0", "~"));

  return segments
    .map((segment) => (Number.isNaN(Number(segment)) ? `.${segment}` : `[${segment}]`))
    .join("")
    .replace(/^\./, "config.");
}

function describeIssues(errors: readonly ErrorObject[]): string[] {
  return errors.map((error) => `${toPointer(error.instancePath)}: ${error.message ?? "is invalid"}`);
}

export function validatePerfprobeConfig(payload: unknown): asserts payload is RawPerfprobeFile {
  if (!validateFn(payload)) {
    const { errors } = validateFn;
    throw new ConfigValidationError(describeIssues(errors ?? []));
  }
}
