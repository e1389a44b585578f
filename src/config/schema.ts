import type { Schema } from "ajv";

import { DURATION_PATTERN } from "../duration";

function durationProperty(label: string) {
  return {
    type: "string",
    pattern: DURATION_PATTERN,
    errorMessage: {
      pattern: `${label} must be expressed as a duration like 500ms, 10s, 5m or 1h`,
    },
  } as const;
}

export const perfprobeConfigSchema = {
  $id: "https://perfprobe.dev/schemas/perfprobe-config.json",
  type: "object",
  additionalProperties: false,
  properties: {
    targets: {
      type: "array",
      uniqueItems: true,
      items: {
        type: "string",
        transform: ["trim"],
        minLength: 1,
        errorMessage: {
          minLength: "Targets must not be empty",
        },
      },
      errorMessage: {
        uniqueItems: "Targets must be unique",
      },
    },
    delay: durationProperty("delay"),
    timeout: durationProperty("timeout"),
    alert_threshold: durationProperty("alert_threshold"),
    alert_interval: durationProperty("alert_interval"),
    max_attempts: {
      type: "integer",
      minimum: 0,
      errorMessage: {
        type: "max_attempts must be an integer",
        minimum: "max_attempts cannot be negative",
      },
    },
    failure_ceiling: {
      type: "integer",
      minimum: 1,
      errorMessage: {
        type: "failure_ceiling must be an integer",
        minimum: "failure_ceiling must be at least 1",
      },
    },
    output: {
      type: "string",
      enum: ["text", "json"],
      errorMessage: {
        enum: "output must be one of: text, json",
      },
    },
    location: {
      type: "string",
      transform: ["trim"],
      minLength: 1,
    },
    metrics: {
      type: "object",
      additionalProperties: false,
      properties: {
        textfile: {
          type: "string",
          minLength: 1,
          errorMessage: {
            minLength: "metrics.textfile must not be empty",
          },
        },
      },
    },
    webhook: {
      type: "object",
      additionalProperties: false,
      properties: {
        url: {
          type: "string",
          format: "uri",
          errorMessage: {
            format: "webhook.url must be a valid URI",
          },
        },
      },
    },
    notify: {
      type: "object",
      additionalProperties: false,
      properties: {
        twilio: {
          type: "object",
          additionalProperties: false,
          properties: {
            account_sid: { type: "string", transform: ["trim"] },
            auth_token: { type: "string", transform: ["trim"] },
            sender: { type: "string", transform: ["trim"] },
            receivers: {
              type: "array",
              uniqueItems: true,
              items: {
                type: "string",
                transform: ["trim"],
                minLength: 1,
                errorMessage: {
                  minLength: "Receivers must not be empty",
                },
              },
              errorMessage: {
                uniqueItems: "Receivers must be unique",
              },
            },
          },
        },
      },
    },
  },
} as const satisfies Schema & { errorMessage?: unknown };
