import { fileTimestamp, writeNewFiles } from "./results.js";
import type { BackendName, SessionResult, SessionState } from "./types.js";
import {
  formatDuration,
  summarizeSamples,
  type EnvironmentInfo,
  type SampleSummary,
} from "./utils.js";

export interface SessionReport {
  backend: BackendName;
  datasetSize: string;
  query: string;
  failed: boolean;
  failureReason?: string;
  /** null for a session that never opened (zero iterations) */
  finalState: SessionState | null;
  /** Engine start and dataset load; null when no session was opened */
  setupMs: number | null;
  buffer?: readonly [string, string];
  summary: SampleSummary;
}

export interface BenchmarkReport {
  timestamp: string;
  command: string;
  environment: EnvironmentInfo;
  iterations: number;
  resultFile: string;
  sessions: SessionReport[];
}

export function buildSessionReport(session: SessionResult): SessionReport {
  const report: SessionReport = {
    backend: session.target.backend,
    datasetSize: session.target.dataset.size,
    query: session.target.queryName,
    failed: session.failed,
    finalState: session.states[session.states.length - 1] ?? null,
    setupMs: session.setup?.setupMs ?? null,
    summary: summarizeSamples(session.samples),
  };
  if (session.failureReason !== undefined) {
    report.failureReason = session.failureReason;
  }
  if (session.setup?.buffer !== undefined) {
    report.buffer = session.setup.buffer;
  }
  return report;
}

export interface BackendAverage {
  backend: BackendName;
  sessions: number;
  /** Mean of the per-session average query times */
  avgMs: number;
}

export interface SessionRanking {
  fastest: SessionReport[];
  slowest: SessionReport[];
  backends: BackendAverage[];
}

/**
 * Rank sessions with at least one timed query by their average query time.
 */
export function rankSessions(sessions: readonly SessionReport[], limit = 5): SessionRanking {
  const timed = sessions
    .filter((s) => s.summary.timing.count > 0)
    .sort((a, b) => a.summary.timing.avg - b.summary.timing.avg);

  const backends: BackendAverage[] = [];
  for (const backend of new Set(timed.map((s) => s.backend))) {
    const own = timed.filter((s) => s.backend === backend);
    const total = own.reduce((sum, s) => sum + s.summary.timing.avg, 0);
    backends.push({ backend, sessions: own.length, avgMs: total / own.length });
  }

  return {
    fastest: timed.slice(0, limit),
    slowest: [...timed].reverse().slice(0, limit),
    backends,
  };
}

/**
 * Write the JSON and Markdown reports next to the result file, never replacing
 * an earlier report. Returns their paths.
 */
export function generateReport(report: BenchmarkReport, reportsDir: string): string[] {
  const timestamp = fileTimestamp(new Date(report.timestamp));
  return writeNewFiles(reportsDir, `report-${timestamp}`, [
    { extension: ".json", content: JSON.stringify(report, null, 2) },
    { extension: ".md", content: generateMarkdown(report) },
  ]);
}

function cell(value: number | null, unit: string): string {
  return value === null ? "-" : `${value.toFixed(1)}${unit}`;
}

export function generateMarkdown(report: BenchmarkReport): string {
  const env = report.environment;

  const lines: string[] = [
    "# Persistent Session Benchmark Report",
    "",
    `**Date:** ${report.timestamp}`,
    `**Queries per session:** ${String(report.iterations)}`,
    `**Result file:** \`${report.resultFile}\``,
    "",
    "## Environment",
    "",
    `| Property | Value |`,
    `|----------|-------|`,
    `| Machine | ${env.label ?? "not specified"} |`,
    `| Total Memory | ${String(env.totalMemoryGB)} GB |`,
    `| Free Memory | ${String(env.freeMemoryGB)} GB |`,
    `| CPU Cores | ${String(env.cpuCores)} |`,
    `| CPU Model | ${env.cpuModel} |`,
    `| Platform | ${env.platform} ${env.osRelease} |`,
    `| Node.js | ${env.nodeVersion} |`,
    "",
    "**Command to reproduce:**",
    "```bash",
    report.command,
    "```",
    "",
    "## Average query time",
    "",
  ];

  // One row per (dataset, query), one column per backend
  const backends = [...new Set(report.sessions.map((s) => s.backend))];
  const keys = [...new Set(report.sessions.map((s) => `${s.datasetSize}|${s.query}`))];

  lines.push(`| Dataset | Query | ${backends.join(" | ")} |`);
  lines.push(`|---------|-------|${backends.map(() => "------:").join("|")}|`);
  for (const key of keys) {
    const [size = "", query = ""] = key.split("|");
    const cells = backends.map((backend) => {
      const session = report.sessions.find(
        (s) => s.backend === backend && s.datasetSize === size && s.query === query
      );
      if (!session) return "-";
      if (session.summary.timing.count === 0) return "FAILED";
      const time = formatDuration(session.summary.timing.avg);
      return session.failed ? `${time} (failed)` : time;
    });
    lines.push(`| ${size} | ${query} | ${cells.join(" | ")} |`);
  }

  lines.push("");
  lines.push("## Sessions");
  lines.push("");
  lines.push(
    "| Backend | Dataset | Query | Min | Avg | Median | P95 | Max | ok | fallback | error | timeout | skipped | GPU util | GPU mem |"
  );
  lines.push(
    "|---------|---------|-------|----:|----:|-------:|----:|----:|---:|---:|---:|---:|---:|---:|---:|"
  );
  for (const s of report.sessions) {
    const { timing, counts } = s.summary;
    const times =
      timing.count === 0
        ? ["-", "-", "-", "-", "-"]
        : [timing.min, timing.avg, timing.median, timing.p95, timing.max].map(formatDuration);
    lines.push(
      `| ${s.backend} | ${s.datasetSize} | ${s.query} | ${times.join(" | ")} | ` +
        `${String(counts.ok)} | ${String(counts.fallback)} | ${String(counts.error)} | ` +
        `${String(counts.timeout)} | ${String(counts.skipped)} | ` +
        `${cell(s.summary.avgUtilizationPct, "%")} | ${cell(s.summary.avgMemoryMb, " MB")} |`
    );
  }
  lines.push("");

  lines.push("## Session setup");
  lines.push("");
  lines.push("| Backend | Dataset | Query | Setup | GPU buffers |");
  lines.push("|---------|---------|-------|------:|-------------|");
  for (const s of report.sessions) {
    const setup = s.setupMs === null ? "-" : formatDuration(s.setupMs);
    const buffer = s.buffer ? s.buffer.join(" / ") : "-";
    lines.push(`| ${s.backend} | ${s.datasetSize} | ${s.query} | ${setup} | ${buffer} |`);
  }
  lines.push("");

  const failed = report.sessions.filter((s) => s.failed);
  if (failed.length > 0) {
    lines.push("## Failed sessions");
    lines.push("");
    for (const s of failed) {
      lines.push(`**${s.backend} / ${s.datasetSize} / ${s.query}:**`);
      lines.push("```");
      lines.push(s.failureReason ?? "Unknown error");
      lines.push("```");
      lines.push("");
    }
  }

  return lines.join("\n");
}
