import { MissingEnvironmentVariableError } from "./errors";

/** `${NAME}` or `${NAME:-fallback}`. */
const PLACEHOLDER_PATTERN = /\$\{([A-Z0-9_]+)(?::-([^}]*))?\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }

  const prototype = Object.getPrototypeOf(value) as object | null;
  return prototype === Object.prototype || prototype === null;
}

function substitute(value: string, env: NodeJS.ProcessEnv, context: string): string {
  return value.replace(
    PLACEHOLDER_PATTERN,
    (_match, variableName: string, fallback: string | undefined) => {
      const replacement = env[variableName];

      if (typeof replacement === "string" && replacement.length > 0) {
        return replacement;
      }

      if (typeof fallback === "string") {
        return fallback;
      }

      if (typeof replacement === "undefined") {
        throw new MissingEnvironmentVariableError(variableName, context);
      }

      return replacement;
    },
  );
}

/**
 * Replaces environment placeholders in every string of a parsed YAML document.
 * `context` names the location reported when a variable is missing.
 */
export function resolvePlaceholders(
  value: unknown,
  env: NodeJS.ProcessEnv,
  context: string,
): unknown {
  if (typeof value === "string") {
    return substitute(value, env, context);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => resolvePlaceholders(item, env, `${context}[${index}]`));
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, nested]) => [
        key,
        resolvePlaceholders(nested, env, `${context}.${key}`),
      ]),
    );
  }

  return value;
}
