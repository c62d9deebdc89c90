import os from "node:os";
import type { SampleStatus, TimingSample } from "./types.js";

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 10) return `${ms.toFixed(2)}ms`;
  if (ms < 1000) return `${String(Math.round(ms))}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  if (ms < 3600_000) {
    const minutes = Math.floor(ms / 60_000);
    const seconds = Math.floor((ms % 60_000) / 1000);
    return `${String(minutes)}m ${String(seconds)}s`;
  }
  const hours = Math.floor(ms / 3600_000);
  const minutes = Math.floor((ms % 3600_000) / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${String(hours)}h ${String(minutes)}m ${String(seconds)}s`;
}

export interface Stats {
  count: number;
  min: number;
  max: number;
  avg: number;
  median: number;
  p95: number;
}

/**
 * Calculate statistics from an array of numbers
 */
export function calculateStats(values: number[]): Stats {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0, median: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    count: sorted.length,
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: sum / sorted.length,
    median: sorted[Math.floor(sorted.length / 2)] ?? 0,
    p95: sorted[Math.floor(sorted.length * 0.95)] ?? 0,
  };
}

export type StatusCounts = Record<SampleStatus, number>;

export interface SampleSummary {
  /** Over samples that completed (ok and fallback) */
  timing: Stats;
  counts: StatusCounts;
  /** Mean of the device counters that were available */
  avgUtilizationPct: number | null;
  avgMemoryMb: number | null;
}

function mean(values: number[]): number | null {
  return values.length === 0 ? null : values.reduce((a, b) => a + b, 0) / values.length;
}

export function summarizeSamples(samples: readonly TimingSample[]): SampleSummary {
  const counts: StatusCounts = { ok: 0, fallback: 0, error: 0, timeout: 0, skipped: 0 };
  const elapsed: number[] = [];
  const utilization: number[] = [];
  const memory: number[] = [];

  for (const sample of samples) {
    counts[sample.status]++;
    if (sample.elapsedMs !== null) elapsed.push(sample.elapsedMs);
    if (sample.utilizationPct !== null) utilization.push(sample.utilizationPct);
    if (sample.memoryMb !== null) memory.push(sample.memoryMb);
  }

  return {
    timing: calculateStats(elapsed),
    counts,
    avgUtilizationPct: mean(utilization),
    avgMemoryMb: mean(memory),
  };
}

/**
 * Environment information for reports
 */
export interface EnvironmentInfo {
  /** Free-form machine label given on the command line, e.g. "g5.xlarge" */
  label?: string;
  totalMemoryGB: number;
  freeMemoryGB: number;
  cpuCores: number;
  cpuModel: string;
  platform: string;
  osRelease: string;
  nodeVersion: string;
}

/**
 * Detect environment information
 */
export function getEnvironmentInfo(label?: string): EnvironmentInfo {
  const cpus = os.cpus();
  const result: EnvironmentInfo = {
    totalMemoryGB: Math.round(os.totalmem() / (1024 * 1024 * 1024)),
    freeMemoryGB: Math.round(os.freemem() / (1024 * 1024 * 1024)),
    cpuCores: cpus.length,
    cpuModel: cpus[0]?.model ?? "Unknown",
    platform: os.platform(),
    osRelease: os.release(),
    nodeVersion: process.version,
  };
  if (label) {
    result.label = label;
  }
  return result;
}
