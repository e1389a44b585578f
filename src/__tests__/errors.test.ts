import { describe, expect, it } from "vitest";

import {
  EXIT_CODE_CONFIG_ERROR,
  EXIT_CODE_INTERNAL_ERROR,
  EXIT_CODE_NO_SAMPLES,
  EXIT_CODE_OK,
  exitCodeFromTargetOutcomes,
  formatErrorMessageWithContext,
  InternalError,
  ProbeFailureError,
  SinkDeliveryError,
  toError,
  UsageError,
} from "../index";

describe("error hierarchy", () => {
  it("formats error messages with provided context", () => {
    const message = formatErrorMessageWithContext("Request failed", {
      target: "https://api.example.com/health",
      attempt: 2,
      sink: "webhook",
    });

    expect(message).toBe(
      "Request failed (target=https://api.example.com/health, attempt=2, sink=webhook)",
    );
  });

  it("leaves messages without context untouched", () => {
    expect(formatErrorMessageWithContext("Request failed", {})).toBe("Request failed");
  });

  it("captures exit codes for usage errors", () => {
    const error = new UsageError("Invalid flag");

    expect(error.exitCode).toBe(EXIT_CODE_CONFIG_ERROR);
    expect(error.name).toBe("UsageError");
    expect(error).toBeInstanceOf(Error);
  });

  it("keeps the cause of internal errors", () => {
    const cause = new Error("boom");
    const error = new InternalError("summary finalized twice", { cause });

    expect(error.exitCode).toBe(EXIT_CODE_INTERNAL_ERROR);
    expect(error.cause).toBe(cause);
  });

  it("adds the target to probe failures", () => {
    const error = new ProbeFailureError("ECONNREFUSED", {
      target: "https://example.com/",
      attempt: 3,
    });

    expect(error.exitCode).toBe(EXIT_CODE_NO_SAMPLES);
    expect(error.target).toBe("https://example.com/");
    expect(error.message).toBe("ECONNREFUSED (target=https://example.com/, attempt=3)");
  });

  it("records the sink and status code of delivery errors", () => {
    const error = new SinkDeliveryError("Webhook responded with HTTP 500", {
      sink: "webhook",
      url: "https://hooks.example.com/in",
      statusCode: 500,
    });

    expect(error.sink).toBe("webhook");
    expect(error.statusCode).toBe(500);
    expect(error.message).toBe(
      "Webhook responded with HTTP 500 (url=https://hooks.example.com/in, sink=webhook)",
    );
  });

  it("wraps non-error values", () => {
    expect(toError("plain").message).toBe("plain");
  });
});

describe("exitCodeFromTargetOutcomes", () => {
  it("is clean when every target has samples", () => {
    expect(exitCodeFromTargetOutcomes([{ successes: 3 }, { successes: 1 }])).toBe(EXIT_CODE_OK);
  });

  it("reports targets that never produced a sample", () => {
    expect(exitCodeFromTargetOutcomes([{ successes: 3 }, { successes: 0 }])).toBe(
      EXIT_CODE_NO_SAMPLES,
    );
  });
});
