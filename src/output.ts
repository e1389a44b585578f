import { NO_RESPONSE_STATUS, type OutputFormat, type TimingSample } from "./domain";
import { formatElapsed } from "./duration";
import type { SummaryReport } from "./engine/summary";

export const TEXT_HEADER =
  "Sample\tDNS(ms)\tTCP(ms)\tTLS(ms)\tReply(ms)\tClose(ms)\tRespTime(ms)\tSize\tCode\tRemote\tURL";

export interface TimingsRecord {
  dns: number;
  tcp: number;
  tls: number;
  reply: number;
  close: number;
  total: number;
}

export interface SampleRecord {
  target: string;
  location?: string;
  started_at: string;
  status_code: number;
  size_bytes: number;
  remote_address?: string;
  timings_ms: TimingsRecord;
}

export interface SummaryRecord {
  type: "summary";
  target: string;
  location?: string;
  count: number;
  elapsed: string;
  elapsed_ms: number;
  first_sample_at: string;
  averages_ms: TimingsRecord;
  average_size_bytes: number;
  status_codes: Record<string, number>;
  remote_addresses: string[];
}

export interface NoSamplesRecord {
  type: "no_samples";
  target: string;
}

/**
 * Receives the measurements a probe loop produces. Distinct from the logger:
 * this is the program's output.
 */
export interface Reporter {
  header(): void;
  sample(sample: TimingSample, index: number): void;
  summary(report: SummaryReport): void;
  noSamples(target: string): void;
}

function toIsoString(date: Date): string {
  if (!Number.isFinite(date.getTime())) {
    throw new TypeError("Invalid Date value provided for serialization");
  }

  return date.toISOString();
}

function formatMs(value: number): string {
  return value.toFixed(3);
}

export function formatStatusCode(statusCode: number): string {
  return statusCode === NO_RESPONSE_STATUS ? "0" : String(statusCode).padStart(3, "0");
}

export function buildSampleRecord(sample: TimingSample): SampleRecord {
  const record: SampleRecord = {
    target: sample.target,
    started_at: toIsoString(sample.startedAt),
    status_code: sample.statusCode,
    size_bytes: sample.sizeBytes,
    timings_ms: {
      dns: sample.dnsMs,
      tcp: sample.tcpMs,
      tls: sample.tlsMs,
      reply: sample.replyMs,
      close: sample.closeMs,
      total: sample.totalMs,
    },
  };

  if (sample.location) {
    record.location = sample.location;
  }

  if (sample.remoteAddress) {
    record.remote_address = sample.remoteAddress;
  }

  return record;
}

export function buildSummaryRecord(report: SummaryReport): SummaryRecord {
  const { averages } = report;
  const record: SummaryRecord = {
    type: "summary",
    target: report.target,
    count: report.count,
    elapsed: formatElapsed(report.elapsedMs),
    elapsed_ms: report.elapsedMs,
    first_sample_at: toIsoString(report.firstSampleAt),
    averages_ms: {
      dns: averages.dnsMs,
      tcp: averages.tcpMs,
      tls: averages.tlsMs,
      reply: averages.replyMs,
      close: averages.closeMs,
      total: averages.totalMs,
    },
    average_size_bytes: averages.sizeBytes,
    status_codes: report.statusCodes,
    remote_addresses: report.remoteAddresses,
  };

  if (report.location) {
    record.location = report.location;
  }

  return record;
}

export function formatSampleLine(sample: TimingSample, index: number): string {
  return [
    String(index),
    formatMs(sample.dnsMs),
    formatMs(sample.tcpMs),
    formatMs(sample.tlsMs),
    formatMs(sample.replyMs),
    formatMs(sample.closeMs),
    formatMs(sample.totalMs),
    String(sample.sizeBytes),
    formatStatusCode(sample.statusCode),
    sample.remoteAddress ?? "-",
    sample.target,
  ].join("\t");
}

export function formatSummaryBlock(report: SummaryReport): string {
  const elapsed = formatElapsed(report.elapsedMs);
  const { averages } = report;
  const codes = Object.entries(report.statusCodes)
    .map(([code, seen]) => `${formatStatusCode(Number(code))}:${seen}`)
    .join(",");

  const line = [
    `${report.count} ${elapsed.padEnd(6, " ")}`,
    formatMs(averages.dnsMs),
    formatMs(averages.tcpMs),
    formatMs(averages.tlsMs),
    formatMs(averages.replyMs),
    formatMs(averages.closeMs),
    formatMs(averages.totalMs),
    String(Math.round(averages.sizeBytes)),
    codes,
    report.remoteAddresses.join(",") || "-",
    report.target,
  ].join("\t");

  return `\nRecorded ${report.count} samples in ${elapsed}, average values:\n${TEXT_HEADER}\n${line}\n\n`;
}

export function formatNoSamplesLine(target: string): string {
  return `No valid samples received from ${target}, no summary provided`;
}

export function createReporter(
  format: OutputFormat,
  write: (chunk: string) => void = (chunk) => {
    process.stdout.write(chunk);
  },
): Reporter {
  const writeJson = (value: unknown) => {
    write(`${JSON.stringify(value, null, 2)}\n`);
  };

  if (format === "json") {
    return {
      header: () => {},
      sample: (sample) => {
        writeJson(buildSampleRecord(sample));
      },
      summary: (report) => {
        writeJson(buildSummaryRecord(report));
      },
      noSamples: (target) => {
        writeJson({ type: "no_samples", target } satisfies NoSamplesRecord);
      },
    };
  }

  return {
    header: () => {
      write(`${TEXT_HEADER}\n`);
    },
    sample: (sample, index) => {
      write(`${formatSampleLine(sample, index)}\n`);
    },
    summary: (report) => {
      write(formatSummaryBlock(report));
    },
    noSamples: (target) => {
      write(`${formatNoSamplesLine(target)}\n`);
    },
  };
}
