import { promises as fs } from "node:fs";
import path from "node:path";
import pLimit, { type LimitFunction } from "p-limit";

import type { MetricsSink } from "../domain";
import { SinkDeliveryError, toError } from "../errors";
import type { Logger } from "../logger";
import { formatStatusCode } from "../output";

export interface ResponseTimeGauge {
  location: string;
  target: string;
  code: string;
  responseTimeMs: number;
}

export interface SampleCounter {
  location: string;
  target: string;
  count: number;
}

export interface MetricsSnapshot {
  gauges: readonly ResponseTimeGauge[];
  counters: readonly SampleCounter[];
  publishedAt: Date;
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(labels: Record<string, string>): string {
  const rendered = Object.entries(labels)
    .map(([key, value]) => `${key}="${escapeLabelValue(value)}"`)
    .join(",");

  return `{${rendered}}`;
}

export function serializeMetricsTextfile(snapshot: MetricsSnapshot): string {
  const timestampMs = snapshot.publishedAt.getTime();
  if (!Number.isFinite(timestampMs)) {
    throw new TypeError("Invalid Date value provided for serialization");
  }

  const lines: string[] = [
    "# HELP perfprobe_response_time_ms last observed response time",
    "# TYPE perfprobe_response_time_ms gauge",
  ];

  for (const gauge of snapshot.gauges) {
    const labels = formatLabels({
      location: gauge.location,
      target: gauge.target,
      code: gauge.code,
    });
    lines.push(`perfprobe_response_time_ms${labels} ${gauge.responseTimeMs}`);
  }

  lines.push(
    "",
    "# HELP perfprobe_samples_total successful samples recorded",
    "# TYPE perfprobe_samples_total counter",
  );

  for (const counter of snapshot.counters) {
    const labels = formatLabels({ location: counter.location, target: counter.target });
    lines.push(`perfprobe_samples_total${labels} ${counter.count}`);
  }

  lines.push(
    "",
    "# HELP perfprobe_publish_timestamp_ms unix epoch ms",
    "# TYPE perfprobe_publish_timestamp_ms gauge",
    `perfprobe_publish_timestamp_ms ${timestampMs}`,
  );

  return `${lines.join("\n")}\n`;
}

export interface PrometheusTextfileSinkOptions {
  /** File the node exporter textfile collector reads. */
  path: string;
  logger: Logger;
  now?: () => Date;
}

/**
 * Keeps the latest response time per location, target and status code and
 * rewrites the textfile after every publish. Writes are serialized and go
 * through a temporary file so the collector never reads a partial file.
 */
export class PrometheusTextfileSink implements MetricsSink {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly gauges = new Map<string, ResponseTimeGauge>();
  private readonly counters = new Map<string, SampleCounter>();
  private readonly writeLock: LimitFunction = pLimit(1);

  constructor(options: PrometheusTextfileSinkOptions) {
    this.filePath = options.path;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  snapshot(): MetricsSnapshot {
    return {
      gauges: Array.from(this.gauges.values()),
      counters: Array.from(this.counters.values()),
      publishedAt: this.now(),
    };
  }

  async publish(
    location: string,
    target: string,
    statusCode: number,
    responseTimeMs: number,
  ): Promise<void> {
    const code = formatStatusCode(statusCode);
    this.gauges.set(`${location}\u0000${target}\u0000${code}`, {
      location,
      target,
      code,
      responseTimeMs,
    });

    const counterKey = `${location}\u0000${target}`;
    const counter = this.counters.get(counterKey);
    this.counters.set(counterKey, {
      location,
      target,
      count: (counter?.count ?? 0) + 1,
    });

    try {
      await this.writeLock(() => this.write());
    } catch (error) {
      const failure = new SinkDeliveryError(
        `Unable to write metrics textfile at ${this.filePath}`,
        { sink: "metrics" },
        { cause: error },
      );
      this.logger.warn({ err: failure, cause: toError(error).message }, failure.message);
    }
  }

  private async write(): Promise<void> {
    const content = serializeMetricsTextfile(this.snapshot());
    const directory = path.dirname(this.filePath);
    const temporary = path.join(directory, `.${path.basename(this.filePath)}.${process.pid}.tmp`);

    await fs.writeFile(temporary, content, "utf8");
    await fs.rename(temporary, this.filePath);
  }
}
