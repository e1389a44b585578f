import type { Dispatcher } from "undici";

import type { NotificationSink } from "../domain";
import { SinkDeliveryError, toError } from "../errors";
import { httpRequest } from "../http";
import type { Logger } from "../logger";

export const TWILIO_API_BASE_URL = "https://api.twilio.com";

export interface TwilioCredentials {
  accountSid?: string;
  authToken?: string;
  /** Sender number registered with the account. */
  sender?: string;
}

export interface TwilioNotifierOptions extends TwilioCredentials {
  logger: Logger;
  baseUrl?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

function isObjectLike(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Sends alert text as an SMS through the Twilio Messages API.
 */
export class TwilioNotifier implements NotificationSink {
  readonly configured: boolean;

  private readonly accountSid: string;
  private readonly authToken: string;
  private readonly sender: string;
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(options: TwilioNotifierOptions) {
    this.accountSid = options.accountSid?.trim() ?? "";
    this.authToken = options.authToken?.trim() ?? "";
    this.sender = options.sender?.trim() ?? "";
    this.logger = options.logger;
    this.baseUrl = options.baseUrl ?? TWILIO_API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.dispatcher = options.dispatcher;
    this.configured =
      this.accountSid.length > 0 && this.authToken.length > 0 && this.sender.length > 0;
  }

  async send(message: string, recipient: string): Promise<void> {
    if (!this.configured) {
      this.logger.warn({ recipient }, "Twilio credentials or sender missing; SMS not sent");
      return;
    }

    try {
      const sid = await this.deliver(message, recipient);
      this.logger.debug({ recipient, sid }, "SMS alert queued");
    } catch (error) {
      const failure =
        error instanceof SinkDeliveryError
          ? error
          : new SinkDeliveryError(toError(error).message, { sink: "twilio" }, { cause: error });
      this.logger.warn({ err: failure, recipient }, "SMS alert could not be sent");
    }
  }

  private async deliver(message: string, recipient: string): Promise<string | undefined> {
    const url = new URL(
      `/2010-04-01/Accounts/${encodeURIComponent(this.accountSid)}/Messages.json`,
      this.baseUrl,
    );
    const form = new URLSearchParams({ To: recipient, From: this.sender, Body: message });
    const credentials = Buffer.from(`${this.accountSid}:${this.authToken}`).toString("base64");

    this.logger.trace({ recipient }, "sending Twilio message");

    const response = await httpRequest({
      url,
      method: "POST",
      headers: {
        accept: "application/json",
        authorization: `Basic ${credentials}`,
        "content-type": "application/x-www-form-urlencoded",
      },
      body: form.toString(),
      timeoutMs: this.timeoutMs,
      dispatcher: this.dispatcher,
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      await response.body.dump();
      throw new SinkDeliveryError(`Twilio responded with HTTP ${response.statusCode}`, {
        sink: "twilio",
        statusCode: response.statusCode,
      });
    }

    const payload: unknown = await response.body.json();
    return isObjectLike(payload) && typeof payload.sid === "string" ? payload.sid : undefined;
  }
}
