import { promises as fs } from "node:fs";
import { parse } from "yaml";

import { ConfigError } from "./errors";
import { resolvePlaceholders } from "./placeholders";
import type { RawPerfprobeFile } from "./types";
import { validatePerfprobeConfig } from "./validator";

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
}

export function parsePerfprobeConfig(
  content: string,
  options: LoadConfigOptions = {},
): RawPerfprobeFile {
  let parsed: unknown;

  try {
    parsed = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown parse error";
    throw new ConfigError(`Unable to parse configuration: ${message}`, { cause: error });
  }

  // An empty document is an empty configuration.
  const document = parsed ?? {};
  const env = options.env ?? process.env;
  const withEnv = resolvePlaceholders(document, env, "config");

  validatePerfprobeConfig(withEnv);

  return withEnv;
}

export async function loadPerfprobeConfig(
  path: string,
  options: LoadConfigOptions = {},
): Promise<RawPerfprobeFile> {
  let raw: string;

  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown read error";
    throw new ConfigError(`Unable to read configuration at ${path}: ${message}`, {
      cause: error,
    });
  }

  return parsePerfprobeConfig(raw, options);
}
