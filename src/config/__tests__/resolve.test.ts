import { describe, expect, it } from "vitest";

import { DEFAULT_SETTINGS, resolveSettings } from "../resolve";
import type { CliParameters } from "../../domain";
import { UsageError } from "../../errors";

function cli(overrides: Partial<CliParameters> = {}): CliParameters {
  return { targets: [], verbose: 0, ...overrides };
}

const defaultLocation = () => "probe-host";

describe("resolveSettings", () => {
  it("applies defaults when nothing is configured", () => {
    const { monitor, metricsPath, webhookUrl, receivers } = resolveSettings({
      cli: cli({ targets: ["https://example.com/"] }),
      env: {},
      defaultLocation,
    });

    expect(monitor).toEqual({
      targets: ["https://example.com/"],
      delayMs: DEFAULT_SETTINGS.delayMs,
      maxAttempts: 0,
      failureCeiling: 10,
      alertThresholdMs: undefined,
      alertIntervalMs: 300_000,
      timeoutMs: 15_000,
      outputFormat: "text",
      location: "probe-host",
    });
    expect(metricsPath).toBeUndefined();
    expect(webhookUrl).toBeUndefined();
    expect(receivers).toEqual([]);
  });

  it("merges targets from the command line, the environment and the file", () => {
    const { monitor } = resolveSettings({
      cli: cli({ targets: ["example.com/a?x=1"] }),
      env: { PERFPROBE_URL: "https://example.com/a  http://other.example.com" },
      file: { targets: ["https://third.example.com/status"] },
      defaultLocation,
    });

    expect(monitor.targets).toEqual([
      "https://example.com/a",
      "http://other.example.com/",
      "https://third.example.com/status",
    ]);
  });

  it("rejects targets that are not URLs", () => {
    expect(() =>
      resolveSettings({ cli: cli({ targets: ["http://"] }), env: {}, defaultLocation }),
    ).toThrowError(UsageError);
  });

  it("rejects file durations longer than a timer can hold", () => {
    expect(() =>
      resolveSettings({
        cli: cli({ targets: ["https://example.com/"] }),
        env: {},
        file: { delay: "600h" },
        defaultLocation,
      }),
    ).toThrowError(new UsageError('delay: Duration exceeds 2147483647ms: "600h"'));
  });

  it("lets the command line win over the file", () => {
    const { monitor } = resolveSettings({
      cli: cli({ targets: ["https://example.com/"], delayMs: 1_000, outputFormat: "json" }),
      env: {},
      file: { delay: "30s", output: "text", failure_ceiling: 2, timeout: "3s" },
      defaultLocation,
    });

    expect(monitor.delayMs).toBe(1_000);
    expect(monitor.outputFormat).toBe("json");
    expect(monitor.failureCeiling).toBe(2);
    expect(monitor.timeoutMs).toBe(3_000);
  });

  it("takes the alert threshold from the environment when no flag is given", () => {
    const notices: string[] = [];
    const { monitor } = resolveSettings({
      cli: cli({ targets: ["https://example.com/"] }),
      env: { RESPONSE_THRESHOLD: "250" },
      notice: (message) => notices.push(message),
      defaultLocation,
    });

    expect(monitor.alertThresholdMs).toBe(250);
    expect(notices).toEqual([]);
  });

  it("keeps the command line threshold and says so", () => {
    const notices: string[] = [];
    const { monitor } = resolveSettings({
      cli: cli({ targets: ["https://example.com/"], alertThresholdMs: 100 }),
      env: { RESPONSE_THRESHOLD: "250" },
      notice: (message) => notices.push(message),
      defaultLocation,
    });

    expect(monitor.alertThresholdMs).toBe(100);
    expect(notices).toEqual(["alert threshold from command line overrides environment: 250"]);
  });

  it("ignores an unparsable threshold in the environment", () => {
    const notices: string[] = [];
    const { monitor } = resolveSettings({
      cli: cli({ targets: ["https://example.com/"] }),
      env: { RESPONSE_THRESHOLD: "fast" },
      notice: (message) => notices.push(message),
      defaultLocation,
    });

    expect(monitor.alertThresholdMs).toBeUndefined();
    expect(notices).toEqual(['parsing environment var RESPONSE_THRESHOLD: invalid value "fast"']);
  });

  it("falls back to the file threshold and treats zero as disabled", () => {
    expect(
      resolveSettings({
        cli: cli({ targets: ["https://example.com/"] }),
        env: {},
        file: { alert_threshold: "2s" },
        defaultLocation,
      }).monitor.alertThresholdMs,
    ).toBe(2_000);

    expect(
      resolveSettings({
        cli: cli({ targets: ["https://example.com/"], alertThresholdMs: 0 }),
        env: {},
        defaultLocation,
      }).monitor.alertThresholdMs,
    ).toBeUndefined();
  });

  it("overrides the environment webhook from the command line", () => {
    const notices: string[] = [];
    const settings = resolveSettings({
      cli: cli({ targets: ["https://example.com/"], webhookUrl: "https://cli.example.com/hook" }),
      env: { HTTP_JSON_WEBHOOK: "https://env.example.com/hook" },
      notice: (message) => notices.push(message),
      defaultLocation,
    });

    expect(settings.webhookUrl).toBe("https://cli.example.com/hook");
    expect(notices).toEqual(["overwriting webhook from environment via command line"]);
  });

  it("reads Twilio credentials and receivers from the environment before the file", () => {
    const settings = resolveSettings({
      cli: cli({ targets: ["https://example.com/"] }),
      env: {
        TWILIO_ACCOUNT_SID: "AC-env",
        TWILIO_AUTH_TOKEN: "test-secret",
        TWILIO_SMS_RECEIVERS: "+15550000001 +15550000002",
      },
      file: {
        notify: {
          twilio: { account_sid: "AC-file", sender: "+15550000000", receivers: ["+15559999999"] },
        },
      },
      defaultLocation,
    });

    expect(settings.twilio).toEqual({
      accountSid: "AC-env",
      authToken: "test-secret",
      sender: "+15550000000",
    });
    expect(settings.receivers).toEqual(["+15550000001", "+15550000002"]);
  });

  it("prefers the location from the environment", () => {
    const { monitor } = resolveSettings({
      cli: cli({ targets: ["https://example.com/"] }),
      env: { PERFPROBE_LOCATION: "eu-west" },
      file: { location: "lab" },
      defaultLocation,
    });

    expect(monitor.location).toBe("eu-west");
  });
});
