import { describe, expect, it } from "vitest";
import { SAMPLE_STREAM_LABELS, SampleLogData } from "./sample-data";
import type { LokiQueryResponse } from "./types";

const HOUR = 3600;
// 2024-03-01T10:00:00Z
const H10 = 1709287200;

function values(res: LokiQueryResponse) {
  return res.data?.result[0].values ?? [];
}

function seconds(ns: string): number {
  return Number(BigInt(ns) / 1_000_000_000n);
}

describe("SampleLogData", () => {
  it("is deterministic for a seed", () => {
    const a = new SampleLogData(42).generateLogs(H10, H10 + 2 * HOUR, 500);
    const b = new SampleLogData(42).generateLogs(H10, H10 + 2 * HOUR, 500);
    const c = new SampleLogData(43).generateLogs(H10, H10 + 2 * HOUR, 500);
    expect(a).toEqual(b);
    expect(values(a)).not.toEqual(values(c));
  });

  it("emits one labelled stream, newest first, inside the window", () => {
    const res = new SampleLogData(1).generateLogs(H10 + 600, H10 + 1800, 500);
    const entries = values(res);

    expect(res.status).toBe("success");
    expect(res.data?.result).toHaveLength(1);
    expect(res.data?.result[0].stream).toEqual(SAMPLE_STREAM_LABELS);
    expect(entries.length).toBeGreaterThan(0);
    const secs = entries.map(([ts]) => seconds(ts));
    expect(secs.every((s) => s >= H10 + 600 && s <= H10 + 1800)).toBe(true);
    expect([...secs].sort((x, y) => y - x)).toEqual(secs);
  });

  it("keeps a finished hour identical whichever window asks for it", () => {
    const gen = new SampleLogData(42);
    const inHour = (res: LokiQueryResponse) =>
      values(res).filter(([ts]) => seconds(ts) >= H10 && seconds(ts) < H10 + HOUR);

    const narrow = inHour(gen.generateLogs(H10, H10 + HOUR - 1, 10_000));
    const wide = inHour(gen.generateLogs(H10 - 5 * HOUR, H10 + 3 * HOUR, 10_000));

    expect(narrow.length).toBeGreaterThan(0);
    expect(wide).toEqual(narrow);
  });

  it("truncates to the limit keeping the newest lines", () => {
    const gen = new SampleLogData(5);
    const full = values(gen.generateLogs(H10, H10 + HOUR, 10_000));
    const limited = values(gen.generateLogs(H10, H10 + HOUR, 10));
    expect(limited).toEqual(full.slice(0, 10));
  });

  it("omits error lines when asked to", () => {
    const entries = values(new SampleLogData(9).generateLogs(H10, H10 + 4 * HOUR, 10_000, false));
    expect(entries.some(([, line]) => line.startsWith("ERROR"))).toBe(false);
  });

  it("adds failed logins, memory spikes and database timeouts to anomalous runs", () => {
    const burstHour = H10 + 2 * HOUR;
    const entries = values(new SampleLogData(3).generateAnomalousLogs(H10, burstHour + HOUR - 1, 10_000));
    const lines = entries.map(([, line]) => line);

    expect(lines.filter((l) => l.includes("Failed login attempt"))).toHaveLength(5);
    expect(lines.filter((l) => l.startsWith("WARNING: Memory usage spike detected"))).toHaveLength(3);
    expect(lines.filter((l) => l.startsWith("ERROR: Database query timeout"))).toHaveLength(4);
    const burst = entries.filter(([, line]) => line.startsWith("WARNING") || line.includes("timeout after"));
    expect(burst.every(([ts]) => seconds(ts) > burstHour && seconds(ts) < burstHour + HOUR)).toBe(true);
  });

  it("keeps the anomaly burst in place as the window end moves within the hour", () => {
    const gen = new SampleLogData(3);
    const cutoff = H10 + 2 * HOUR + 1200;
    const upTo = (res: LokiQueryResponse) => values(res).filter(([ts]) => seconds(ts) <= cutoff);

    const early = upTo(gen.generateAnomalousLogs(H10, cutoff, 10_000));
    const later = upTo(gen.generateAnomalousLogs(H10, cutoff + 1200, 10_000));

    expect(later).toEqual(early);
  });

  it("lists labels and label values", () => {
    const gen = new SampleLogData(1);
    expect(gen.labels().data).toEqual(["app", "env", "level", "host", "namespace", "service"]);
    expect(gen.labelValues("env").data).toContain("staging");
    expect(gen.labelValues("unknown").data).toEqual(["value1", "value2", "value3"]);
  });
});
