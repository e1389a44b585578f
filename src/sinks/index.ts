export type {
  MetricsSnapshot,
  PrometheusTextfileSinkOptions,
  ResponseTimeGauge,
  SampleCounter,
} from "./prometheus-textfile";
export { PrometheusTextfileSink, serializeMetricsTextfile } from "./prometheus-textfile";
export type { TwilioCredentials, TwilioNotifierOptions } from "./twilio";
export { TWILIO_API_BASE_URL, TwilioNotifier } from "./twilio";
export type { JsonWebhookSinkOptions } from "./webhook";
export { DEFAULT_WEBHOOK_TIMEOUT_MS, JsonWebhookSink, createWebhookSink } from "./webhook";
