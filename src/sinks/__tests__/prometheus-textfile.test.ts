import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createLogCapture } from "../../testing/log-capture";
import { PrometheusTextfileSink, serializeMetricsTextfile } from "../prometheus-textfile";

const PUBLISHED_AT = new Date("2024-05-01T10:00:00.000Z");

describe("serializeMetricsTextfile", () => {
  it("renders gauges, counters and the publish timestamp", () => {
    const text = serializeMetricsTextfile({
      gauges: [{ location: "lab", target: "https://example.com/", code: "200", responseTimeMs: 42.5 }],
      counters: [{ location: "lab", target: "https://example.com/", count: 3 }],
      publishedAt: PUBLISHED_AT,
    });

    expect(text).toBe(
      [
        "# HELP perfprobe_response_time_ms last observed response time",
        "# TYPE perfprobe_response_time_ms gauge",
        'perfprobe_response_time_ms{location="lab",target="https://example.com/",code="200"} 42.5',
        "",
        "# HELP perfprobe_samples_total successful samples recorded",
        "# TYPE perfprobe_samples_total counter",
        'perfprobe_samples_total{location="lab",target="https://example.com/"} 3',
        "",
        "# HELP perfprobe_publish_timestamp_ms unix epoch ms",
        "# TYPE perfprobe_publish_timestamp_ms gauge",
        `perfprobe_publish_timestamp_ms ${PUBLISHED_AT.getTime()}`,
        "",
      ].join("\n"),
    );
  });

  it("escapes label values", () => {
    const text = serializeMetricsTextfile({
      gauges: [{ location: 'a"b\\c\nd', target: "t", code: "0", responseTimeMs: 1 }],
      counters: [],
      publishedAt: PUBLISHED_AT,
    });

    expect(text).toContain('perfprobe_response_time_ms{location="a\\"b\\\\c\\nd",target="t",code="0"} 1');
  });

  it("refuses invalid dates", () => {
    expect(() =>
      serializeMetricsTextfile({ gauges: [], counters: [], publishedAt: new Date(Number.NaN) }),
    ).toThrowError(TypeError);
  });
});

describe("PrometheusTextfileSink", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "perfprobe-metrics-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("keeps the latest value per location, target and status code", async () => {
    const file = path.join(directory, "perfprobe.prom");
    const sink = new PrometheusTextfileSink({
      path: file,
      logger: createLogCapture().logger,
      now: () => PUBLISHED_AT,
    });

    await sink.publish("lab", "https://example.com/", 200, 10);
    await sink.publish("lab", "https://example.com/", 200, 12);
    await sink.publish("lab", "https://example.com/", -1, 30);

    const content = await readFile(file, "utf8");
    expect(content).toContain(
      'perfprobe_response_time_ms{location="lab",target="https://example.com/",code="200"} 12\n',
    );
    expect(content).toContain(
      'perfprobe_response_time_ms{location="lab",target="https://example.com/",code="0"} 30\n',
    );
    expect(content).toContain('perfprobe_samples_total{location="lab",target="https://example.com/"} 3\n');
    expect(sink.snapshot().gauges).toHaveLength(2);
    expect(await readdir(directory)).toEqual(["perfprobe.prom"]);
  });

  it("serializes concurrent publishes", async () => {
    const file = path.join(directory, "perfprobe.prom");
    const sink = new PrometheusTextfileSink({ path: file, logger: createLogCapture().logger });

    await Promise.all(
      ["a", "b", "c", "d"].map((name, index) =>
        sink.publish("lab", `https://${name}.example.com/`, 200, index),
      ),
    );

    const content = await readFile(file, "utf8");
    expect(content.match(/^perfprobe_response_time_ms\{/gm)).toHaveLength(4);
  });

  it("logs write failures instead of throwing", async () => {
    const capture = createLogCapture();
    const sink = new PrometheusTextfileSink({
      path: path.join(directory, "missing", "perfprobe.prom"),
      logger: capture.logger,
    });

    await expect(sink.publish("lab", "https://example.com/", 200, 1)).resolves.toBeUndefined();
    expect(capture.messages("warn")).toEqual([
      `Unable to write metrics textfile at ${path.join(directory, "missing", "perfprobe.prom")} (sink=metrics)`,
    ]);
  });
});
