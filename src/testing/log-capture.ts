import pino, { type Level } from "pino";

import type { Logger } from "../logger";

export interface CapturedLogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export interface LogCapture {
  logger: Logger;
  lines: CapturedLogLine[];
  /** Messages logged at the given pino level name. */
  messages(level: Level): string[];
}

function isLogLine(value: unknown): value is CapturedLogLine {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

/**
 * Logger whose JSON lines are parsed into memory instead of written out.
 */
export function createLogCapture(level: Level = "trace"): LogCapture {
  const lines: CapturedLogLine[] = [];
  const destination = {
    write(chunk: string): void {
      for (const raw of chunk.split("\n")) {
        if (raw.length === 0) {
          continue;
        }
        const parsed: unknown = JSON.parse(raw);
        if (isLogLine(parsed)) {
          lines.push(parsed);
        }
      }
    },
  };

  const logger = pino({ level, base: null }, destination);

  return {
    logger,
    lines,
    messages(name) {
      const numeric = pino.levels.values[name];
      return lines.filter((line) => line.level === numeric).map((line) => line.msg);
    },
  };
}
