import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import {
  buildSessionReport,
  generateMarkdown,
  generateReport,
  rankSessions,
  type BenchmarkReport,
} from "../src/report.js";
import type { BackendName, SessionResult, TimingSample } from "../src/types.js";

const dataset = { size: "100k", nodesPath: "/d/nodes_100k.csv", edgesPath: "/d/edges_100k.csv" };

function sample(iterationIndex: number, elapsedMs: number | null, status: TimingSample["status"]) {
  return {
    iterationIndex,
    elapsedMs,
    status,
    utilizationPct: null,
    memoryMb: null,
    timestamp: "2026-01-01T00:00:00.000Z",
  };
}

const cpu: SessionResult = {
  target: { backend: "duckdb", dataset, queryName: "1_hop" },
  failed: false,
  setup: { setupMs: 1500 },
  states: ["OPENING", "RUNNING", "CLOSING", "CLOSED"],
  samples: [sample(0, 8, "ok"), sample(1, 12, "ok")],
};

const gpu: SessionResult = {
  target: { backend: "sirius", dataset, queryName: "1_hop" },
  failed: true,
  failureReason: "sirius: setup failed: Error: no CUDA device",
  states: ["OPENING", "FAILED", "CLOSING", "CLOSED"],
  samples: [sample(0, null, "skipped"), sample(1, null, "skipped")],
};

const report: BenchmarkReport = {
  timestamp: "2026-01-01T00:00:00.000Z",
  command: "graph-bench -s 100k -q 1_hop -n 2",
  environment: {
    label: "lab-gpu-1",
    totalMemoryGB: 64,
    freeMemoryGB: 32,
    cpuCores: 16,
    cpuModel: "Test CPU",
    platform: "linux",
    osRelease: "6.0",
    nodeVersion: "v20.0.0",
  },
  iterations: 2,
  resultFile: "results/persistent-session-2026-01-01T00-00-00.csv",
  sessions: [buildSessionReport(cpu), buildSessionReport(gpu)],
};

describe("buildSessionReport", () => {
  it("summarises a session", () => {
    expect(buildSessionReport(cpu)).toMatchObject({
      backend: "duckdb",
      datasetSize: "100k",
      query: "1_hop",
      failed: false,
      finalState: "CLOSED",
      setupMs: 1500,
      summary: { counts: { ok: 2, skipped: 0 }, timing: { count: 2, avg: 10 } },
    });
    expect(buildSessionReport(gpu).failureReason).toBe(
      "sirius: setup failed: Error: no CUDA device"
    );
    expect(buildSessionReport(gpu).setupMs).toBeNull();
  });

  it("carries the GPU buffer sizes of the session", () => {
    const withBuffer: SessionResult = {
      ...gpu,
      failed: false,
      setup: { setupMs: 4200, buffer: ["1 GB", "2 GB"] },
    };
    expect(buildSessionReport(withBuffer)).toMatchObject({
      setupMs: 4200,
      buffer: ["1 GB", "2 GB"],
    });
    expect(buildSessionReport(cpu)).not.toHaveProperty("buffer");
  });
});

describe("rankSessions", () => {
  function timed(backend: BackendName, queryName: string, avgMs: number) {
    return buildSessionReport({
      target: { backend, dataset, queryName },
      failed: false,
      states: ["OPENING", "RUNNING", "CLOSING", "CLOSED"],
      samples: [sample(0, avgMs, "ok")],
    });
  }

  const sessions = [
    timed("duckdb", "a", 30),
    timed("duckdb", "b", 10),
    timed("duckdb", "c", 70),
    timed("sirius", "a", 5),
    timed("sirius", "b", 40),
    timed("sirius", "c", 60),
    timed("sirius", "d", 20),
    buildSessionReport(gpu),
  ];

  it("lists the fastest and slowest timed sessions by average", () => {
    const ranking = rankSessions(sessions);
    const label = (s: { backend: string; query: string }) => `${s.backend}/${s.query}`;

    expect(ranking.fastest.map(label)).toEqual([
      "sirius/a",
      "duckdb/b",
      "sirius/d",
      "duckdb/a",
      "sirius/b",
    ]);
    expect(ranking.slowest.map(label)).toEqual([
      "duckdb/c",
      "sirius/c",
      "sirius/b",
      "duckdb/a",
      "sirius/d",
    ]);
  });

  it("averages the session averages per backend", () => {
    expect(rankSessions(sessions).backends).toEqual([
      { backend: "sirius", sessions: 4, avgMs: 31.25 },
      { backend: "duckdb", sessions: 3, avgMs: 110 / 3 },
    ]);
  });

  it("is empty without timed sessions", () => {
    expect(rankSessions([buildSessionReport(gpu)])).toEqual({
      fastest: [],
      slowest: [],
      backends: [],
    });
  });
});

describe("generateReport", () => {
  it("never replaces an earlier report with the same timestamp", () => {
    const dir = mkdtempSync(join(tmpdir(), "graph-bench-report-"));
    try {
      const first = generateReport(report, dir);
      const second = generateReport(report, dir);

      expect(first).toEqual([
        join(dir, "report-2026-01-01T00-00-00.json"),
        join(dir, "report-2026-01-01T00-00-00.md"),
      ]);
      expect(second).toEqual([
        join(dir, "report-2026-01-01T00-00-00-1.json"),
        join(dir, "report-2026-01-01T00-00-00-1.md"),
      ]);
      expect(readdirSync(dir).sort()).toEqual([
        "report-2026-01-01T00-00-00-1.json",
        "report-2026-01-01T00-00-00-1.md",
        "report-2026-01-01T00-00-00.json",
        "report-2026-01-01T00-00-00.md",
      ]);
      expect(readFileSync(second[1] ?? "", "utf8")).toBe(generateMarkdown(report));
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("generateMarkdown", () => {
  const lines = generateMarkdown(report).split("\n");

  it("compares backends side by side", () => {
    expect(lines).toContain("| Dataset | Query | duckdb | sirius |");
    expect(lines).toContain("| 100k | 1_hop | 10ms | FAILED |");
  });

  it("lists per-session statistics", () => {
    expect(lines).toContain(
      "| duckdb | 100k | 1_hop | 8.00ms | 10ms | 12ms | 12ms | 12ms | 2 | 0 | 0 | 0 | 0 | - | - |"
    );
    expect(lines).toContain(
      "| sirius | 100k | 1_hop | - | - | - | - | - | 0 | 0 | 0 | 0 | 2 | - | - |"
    );
  });

  it("lists setup time and GPU buffers per session", () => {
    expect(lines).toContain("| Backend | Dataset | Query | Setup | GPU buffers |");
    expect(lines).toContain("| duckdb | 100k | 1_hop | 1.50s | - |");
    expect(lines).toContain("| sirius | 100k | 1_hop | - | - |");
  });

  it("includes the environment and failures", () => {
    expect(lines).toContain("| Machine | lab-gpu-1 |");
    expect(lines).toContain("graph-bench -s 100k -q 1_hop -n 2");
    expect(lines).toContain("**sirius / 100k / 1_hop:**");
    expect(lines).toContain("sirius: setup failed: Error: no CUDA device");
  });
});
