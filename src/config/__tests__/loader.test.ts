import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  ConfigError,
  ConfigValidationError,
  loadPerfprobeConfig,
  MissingEnvironmentVariableError,
  parsePerfprobeConfig,
} from "../../config";

describe("parsePerfprobeConfig", () => {
  it("parses a full configuration and resolves environment placeholders", () => {
    const config = parsePerfprobeConfig(
      `
targets:
  - https://api.example.com/health
  - www.example.com
delay: 5s
timeout: 2s
max_attempts: 20
failure_ceiling: 4
alert_threshold: 250ms
alert_interval: 10m
output: json
location: " eu-west "
metrics:
  textfile: /var/lib/node_exporter/perfprobe.prom
webhook:
  url: https://hooks.example.com/in
notify:
  twilio:
    account_sid: AC0000
    auth_token: "\${TWILIO_TOKEN}"
    sender: "+15550000000"
    receivers: ["+15550000001"]
`,
      { env: { TWILIO_TOKEN: "test-secret" } },
    );

    expect(config.targets).toEqual(["https://api.example.com/health", "www.example.com"]);
    expect(config.delay).toBe("5s");
    expect(config.max_attempts).toBe(20);
    expect(config.output).toBe("json");
    expect(config.location).toBe("eu-west");
    expect(config.notify?.twilio?.auth_token).toBe("test-secret");
    expect(config.notify?.twilio?.receivers).toEqual(["+15550000001"]);
  });

  it("uses the placeholder fallback when the variable is unset", () => {
    const config = parsePerfprobeConfig('location: "${PROBE_SITE:-lab}"\n', { env: {} });

    expect(config.location).toBe("lab");
  });

  it("treats an empty document as an empty configuration", () => {
    expect(parsePerfprobeConfig("", { env: {} })).toEqual({});
  });

  it("throws when a referenced variable is missing", () => {
    expect(() =>
      parsePerfprobeConfig('webhook:\n  url: "${HOOK_URL}"\n', { env: {} }),
    ).toThrowError(MissingEnvironmentVariableError);
  });

  it("reports malformed durations with a readable message", () => {
    expect(() => parsePerfprobeConfig("delay: soon\n", { env: {} })).toThrowError(
      "config.delay: delay must be expressed as a duration like 500ms, 10s, 5m or 1h",
    );
  });

  it("rejects unknown keys and invalid output formats", () => {
    expect(() => parsePerfprobeConfig("interval: 5s\n", { env: {} })).toThrowError(
      ConfigValidationError,
    );
    expect(() => parsePerfprobeConfig("output: xml\n", { env: {} })).toThrowError(
      "config.output: output must be one of: text, json",
    );
  });

  it("collects every schema violation", () => {
    try {
      parsePerfprobeConfig("output: xml\nmax_attempts: -2\n", { env: {} });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toHaveProperty("issues", [
        "config.max_attempts: max_attempts cannot be negative",
        "config.output: output must be one of: text, json",
      ]);
    }
  });

  it("rejects a failure ceiling of zero", () => {
    expect(() => parsePerfprobeConfig("failure_ceiling: 0\n", { env: {} })).toThrowError(
      "config.failure_ceiling: failure_ceiling must be at least 1",
    );
  });

  it("wraps YAML syntax errors", () => {
    expect(() => parsePerfprobeConfig("targets: [unclosed\n", { env: {} })).toThrowError(
      ConfigError,
    );
  });
});

describe("loadPerfprobeConfig", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "perfprobe-config-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("reads the file from disk", async () => {
    const file = path.join(directory, "perfprobe.yaml");
    await writeFile(file, "targets: [https://example.com/]\n", "utf8");

    await expect(loadPerfprobeConfig(file, { env: {} })).resolves.toEqual({
      targets: ["https://example.com/"],
    });
  });

  it("reports unreadable files as configuration errors", async () => {
    await expect(
      loadPerfprobeConfig(path.join(directory, "missing.yaml"), { env: {} }),
    ).rejects.toThrowError(/^Unable to read configuration at /);
  });
});
