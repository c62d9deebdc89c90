import { describe, it, expect } from "vitest";
import { formatDuration, calculateStats, summarizeSamples } from "../src/utils.js";
import type { TimingSample } from "../src/types.js";

describe("formatDuration", () => {
  it("formats sub-10ms durations with decimals", () => {
    expect(formatDuration(5)).toBe("5.00ms");
    expect(formatDuration(0.123)).toBe("0.12ms");
  });

  it("formats milliseconds", () => {
    expect(formatDuration(500)).toBe("500ms");
  });

  it("formats seconds", () => {
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(45000)).toBe("45.00s");
  });

  it("formats minutes", () => {
    expect(formatDuration(90000)).toBe("1m 30s");
    expect(formatDuration(300000)).toBe("5m 0s");
  });

  it("formats hours", () => {
    expect(formatDuration(3661000)).toBe("1h 1m 1s");
  });
});

describe("calculateStats", () => {
  it("calculates stats for empty array", () => {
    const stats = calculateStats([]);
    expect(stats.count).toBe(0);
    expect(stats.min).toBe(0);
    expect(stats.max).toBe(0);
    expect(stats.avg).toBe(0);
  });

  it("calculates stats for single value", () => {
    const stats = calculateStats([100]);
    expect(stats.min).toBe(100);
    expect(stats.max).toBe(100);
    expect(stats.avg).toBe(100);
  });

  it("calculates stats for multiple values", () => {
    const stats = calculateStats([50, 10, 40, 20, 30]);
    expect(stats.count).toBe(5);
    expect(stats.min).toBe(10);
    expect(stats.max).toBe(50);
    expect(stats.avg).toBe(30);
    expect(stats.median).toBe(30);
    expect(stats.p95).toBe(50);
  });
});

function sample(
  iterationIndex: number,
  status: TimingSample["status"],
  elapsedMs: number | null,
  device: { utilizationPct: number | null; memoryMb: number | null } = {
    utilizationPct: null,
    memoryMb: null,
  }
): TimingSample {
  return { iterationIndex, status, elapsedMs, ...device, timestamp: "2026-01-01T00:00:00.000Z" };
}

describe("summarizeSamples", () => {
  it("counts statuses and times only completed queries", () => {
    const summary = summarizeSamples([
      sample(0, "ok", 10, { utilizationPct: 80, memoryMb: 1000 }),
      sample(1, "fallback", 30, { utilizationPct: 40, memoryMb: 2000 }),
      sample(2, "error", null),
      sample(3, "timeout", null),
      sample(4, "skipped", null),
    ]);

    expect(summary.counts).toEqual({ ok: 1, fallback: 1, error: 1, timeout: 1, skipped: 1 });
    expect(summary.timing.count).toBe(2);
    expect(summary.timing.avg).toBe(20);
    expect(summary.avgUtilizationPct).toBe(60);
    expect(summary.avgMemoryMb).toBe(1500);
  });

  it("reports no device averages without counters", () => {
    const summary = summarizeSamples([sample(0, "ok", 5)]);
    expect(summary.avgUtilizationPct).toBeNull();
    expect(summary.avgMemoryMb).toBeNull();
  });
});
