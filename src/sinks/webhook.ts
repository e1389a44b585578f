import type { Dispatcher } from "undici";

import type { TimingSample, WebhookSink } from "../domain";
import { SinkDeliveryError, toError } from "../errors";
import { httpRequest } from "../http";
import type { Logger } from "../logger";
import { buildSampleRecord } from "../output";
import { redactUrlCredentials } from "../redaction";

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 10_000;

export interface JsonWebhookSinkOptions {
  url: string;
  logger: Logger;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

/**
 * POSTs every sample as JSON. Failed deliveries are logged and dropped; the
 * next sample is attempted as usual.
 */
export class JsonWebhookSink implements WebhookSink {
  private readonly url: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(options: JsonWebhookSinkOptions) {
    this.url = options.url;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
  }

  async publish(sample: TimingSample): Promise<void> {
    try {
      await this.deliver(sample);
    } catch (error) {
      const failure =
        error instanceof SinkDeliveryError
          ? error
          : new SinkDeliveryError(
              toError(error).message,
              { sink: "webhook", url: redactUrlCredentials(this.url) },
              { cause: error },
            );
      this.logger.warn({ err: failure, target: sample.target }, "webhook delivery failed");
    }
  }

  private async deliver(sample: TimingSample): Promise<void> {
    const response = await httpRequest({
      url: this.url,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(buildSampleRecord(sample)),
      timeoutMs: this.timeoutMs,
      dispatcher: this.dispatcher,
    });

    // Drained so the connection can be reused.
    await response.body.dump();

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new SinkDeliveryError(
        `Webhook responded with HTTP ${response.statusCode}`,
        { sink: "webhook", url: redactUrlCredentials(this.url), statusCode: response.statusCode },
      );
    }
  }
}

const REQUIRED_WEBHOOK_PREFIX = "https://";

/**
 * Returns a sink for the URL, or undefined (after logging why) when the URL
 * is not an https endpoint.
 */
export function createWebhookSink(
  url: string | undefined,
  logger: Logger,
  options: Omit<JsonWebhookSinkOptions, "url" | "logger"> = {},
): JsonWebhookSink | undefined {
  if (!url) {
    return undefined;
  }

  if (!url.startsWith(REQUIRED_WEBHOOK_PREFIX)) {
    logger.error(
      { url: redactUrlCredentials(url) },
      `webhook URL must start with ${REQUIRED_WEBHOOK_PREFIX}; webhook disabled`,
    );
    return undefined;
  }

  return new JsonWebhookSink({ ...options, url, logger });
}
