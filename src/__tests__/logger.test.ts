import { describe, expect, it } from "vitest";

import { createLogger, levelFromVerbosity } from "../logger";

describe("levelFromVerbosity", () => {
  it("maps quiet, default, -v and -V to pino levels", () => {
    expect(levelFromVerbosity({ quiet: true, verbose: 2 })).toBe("warn");
    expect(levelFromVerbosity({})).toBe("info");
    expect(levelFromVerbosity({ verbose: 1 })).toBe("debug");
    expect(levelFromVerbosity({ verbose: 2 })).toBe("trace");
    expect(levelFromVerbosity({ verbose: 3 })).toBe("trace");
  });
});

describe("createLogger", () => {
  it("writes JSON lines without pid and hostname", () => {
    const chunks: string[] = [];
    const logger = createLogger({
      verbose: 1,
      destination: {
        write(chunk: string) {
          chunks.push(chunk);
        },
      },
    });

    logger.debug({ target: "https://example.com/" }, "probe attempt failed");
    logger.trace("hidden");

    expect(chunks).toHaveLength(1);
    const line: unknown = JSON.parse(chunks[0]);
    expect(line).toMatchObject({
      level: 20,
      name: "perfprobe",
      target: "https://example.com/",
      msg: "probe attempt failed",
    });
    expect(line).not.toHaveProperty("pid");
    expect(line).not.toHaveProperty("hostname");
  });
});
