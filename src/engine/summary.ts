import type { PhaseTimings, TimingSample } from "../domain";
import { InternalError } from "../errors";

export interface SampleTotals extends PhaseTimings {
  totalMs: number;
  sizeBytes: number;
}

export interface SummaryReport {
  target: string;
  location?: string;
  /** Number of successful samples aggregated. */
  count: number;
  /** Start of the first sample. */
  firstSampleAt: Date;
  /** Wall time from the first sample's start until finalization. */
  elapsedMs: number;
  /** Per-field sum divided by {@link SummaryReport.count}. */
  averages: SampleTotals;
  /** Number of samples seen per status code. */
  statusCodes: Record<string, number>;
  /** Distinct peer addresses in the order they were first seen. */
  remoteAddresses: string[];
}

const TOTAL_FIELDS = [
  "dnsMs",
  "tcpMs",
  "tlsMs",
  "replyMs",
  "closeMs",
  "totalMs",
  "sizeBytes",
] as const satisfies readonly (keyof SampleTotals)[];

function totalsOf(sample: TimingSample): SampleTotals {
  return {
    dnsMs: sample.dnsMs,
    tcpMs: sample.tcpMs,
    tlsMs: sample.tlsMs,
    replyMs: sample.replyMs,
    closeMs: sample.closeMs,
    totalMs: sample.totalMs,
    sizeBytes: sample.sizeBytes,
  };
}

/**
 * Running per-target aggregation, owned by a single probe loop. Created from
 * the first successful sample and finalized exactly once.
 */
export class RunningSummary {
  private readonly target: string;
  private readonly location?: string;
  private readonly firstSampleAt: Date;
  private readonly sums: SampleTotals;
  private readonly statusCodes = new Map<number, number>();
  private readonly remoteAddresses = new Set<string>();

  private count = 0;
  private finalized = false;

  private constructor(first: TimingSample) {
    this.target = first.target;
    this.location = first.location;
    this.firstSampleAt = first.startedAt;
    this.sums = totalsOf(first);
    this.track(first);
  }

  static fromSample(sample: TimingSample): RunningSummary {
    return new RunningSummary(sample);
  }

  get sampleCount(): number {
    return this.count;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  add(sample: TimingSample): void {
    if (this.finalized) {
      throw new InternalError("Cannot add a sample to a finalized summary", {
        context: { target: this.target },
      });
    }

    for (const field of TOTAL_FIELDS) {
      this.sums[field] += sample[field];
    }

    this.track(sample);
  }

  finalize(now: Date = new Date()): SummaryReport {
    if (this.finalized) {
      throw new InternalError("Summary has already been finalized", {
        context: { target: this.target },
      });
    }

    this.finalized = true;

    const averages = { ...this.sums };
    for (const field of TOTAL_FIELDS) {
      averages[field] = this.sums[field] / this.count;
    }

    return {
      target: this.target,
      location: this.location,
      count: this.count,
      firstSampleAt: this.firstSampleAt,
      elapsedMs: Math.max(0, now.getTime() - this.firstSampleAt.getTime()),
      averages,
      statusCodes: Object.fromEntries(
        Array.from(this.statusCodes, ([code, seen]) => [String(code), seen]),
      ),
      remoteAddresses: Array.from(this.remoteAddresses),
    };
  }

  private track(sample: TimingSample): void {
    this.count += 1;
    this.statusCodes.set(sample.statusCode, (this.statusCodes.get(sample.statusCode) ?? 0) + 1);

    if (sample.remoteAddress) {
      this.remoteAddresses.add(sample.remoteAddress);
    }
  }
}
