export type OutputFormat = "text" | "json";

/** Status code recorded when the transport produced no HTTP response line. */
export const NO_RESPONSE_STATUS = -1 as const;

export interface PhaseTimings {
  /** Name resolution of the target host. Zero for IP literals. */
  dnsMs: number;
  /** TCP three-way handshake. */
  tcpMs: number;
  /** TLS handshake. Zero for plain HTTP. */
  tlsMs: number;
  /** Request written until response headers arrived ("time to first byte"). */
  replyMs: number;
  /** Response headers until the body was fully read and the connection released. */
  closeMs: number;
}

export interface TimingSample extends PhaseTimings {
  /** Effective target identifier: scheme, host and path. */
  target: string;
  /** Wall time spent on the attempt, never lower than the sum of the phases. */
  totalMs: number;
  /** HTTP status code, or {@link NO_RESPONSE_STATUS}. */
  statusCode: number;
  /** Body size in bytes. */
  sizeBytes: number;
  /** Peer address the connection was made to. */
  remoteAddress?: string;
  /** Where the probe ran from. */
  location?: string;
  startedAt: Date;
}

/**
 * Performs one request against the target. Resolves with a fully populated
 * sample or rejects; a partial sample is never produced.
 */
export type ProbeOperation = (target: string) => Promise<TimingSample>;

export interface MetricsSink {
  publish(location: string, target: string, statusCode: number, responseTimeMs: number): Promise<void>;
}

export interface WebhookSink {
  publish(sample: TimingSample): Promise<void>;
}

export interface NotificationSink {
  /** True when credentials for the channel are present. */
  readonly configured: boolean;
  send(message: string, recipient: string): Promise<void>;
}

export interface MonitorParameters {
  /** Endpoints to probe, one loop each. */
  targets: string[];
  /** Delay between attempts on one target. */
  delayMs: number;
  /** Stop a target after this many successful samples. 0 runs until stopped. */
  maxAttempts: number;
  /** Stop a target once this many attempts have failed in total. */
  failureCeiling: number;
  /** Response time above which an alert is considered. Undefined disables alerting. */
  alertThresholdMs?: number;
  /** Minimum time between two dispatched alerts, across all targets. */
  alertIntervalMs: number;
  /** Per-request timeout handed to the probe. */
  timeoutMs: number;
  outputFormat: OutputFormat;
  location: string;
}

export interface CliParameters {
  /** Positional URLs. */
  targets: string[];
  /** Path to an optional YAML configuration file. */
  configPath?: string;
  delayMs?: number;
  failureCeiling?: number;
  maxAttempts?: number;
  outputFormat?: OutputFormat;
  /** 0 disables alerting. */
  alertThresholdMs?: number;
  alertIntervalMs?: number;
  /** Prometheus textfile to publish response times to. */
  metricsPath?: string;
  webhookUrl?: string;
  timeoutMs?: number;
  quiet?: boolean;
  /** Accumulated verbosity: -v adds one, -V adds two. */
  verbose: number;
  help?: boolean;
  version?: boolean;
}
