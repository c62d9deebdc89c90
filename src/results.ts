import { mkdirSync, unlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { BackendName, SampleStatus, TimingSample } from "./types.js";

export const RESULT_COLUMNS = [
  "backend",
  "query_name",
  "dataset_size",
  "iteration_index",
  "elapsed_ms",
  "utilization_pct",
  "memory_mb",
  "timestamp",
] as const;

export interface SampleMetadata {
  backend: BackendName;
  queryName: string;
  datasetSize: string;
}

export interface ResultRow extends SampleMetadata {
  iterationIndex: number;
  elapsedMs: number | null;
  utilizationPct: number | null;
  memoryMb: number | null;
  timestamp: string;
  /** Kept in memory for summaries; not one of the file columns */
  status: SampleStatus;
}

/** Quote a CSV field only when it needs it */
export function csvField(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly ResultRow[]): string {
  const lines = [RESULT_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(
      [
        row.backend,
        row.queryName,
        row.datasetSize,
        row.iterationIndex,
        row.elapsedMs,
        row.utilizationPct,
        row.memoryMb,
        row.timestamp,
      ]
        .map(csvField)
        .join(",")
    );
  }
  return `${lines.join("\n")}\n`;
}

/** 2026-10-19T08:30:05.123Z → 2026-10-19T08-30-05 */
export function fileTimestamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, "-").slice(0, 19);
}

/**
 * All samples of a run. Every flush writes the full row set to a new file whose
 * name carries the generation time; an existing file is never overwritten.
 */
export class ResultSet {
  private readonly entries: ResultRow[] = [];

  get rows(): readonly ResultRow[] {
    return this.entries;
  }

  append(sample: TimingSample, meta: SampleMetadata): void {
    this.entries.push({
      ...meta,
      iterationIndex: sample.iterationIndex,
      elapsedMs: sample.elapsedMs,
      utilizationPct: sample.utilizationPct,
      memoryMb: sample.memoryMb,
      timestamp: sample.timestamp,
      status: sample.status,
    });
  }

  flush(dir: string, now: Date = new Date()): string {
    const [path = ""] = writeNewFiles(dir, `persistent-session-${fileTimestamp(now)}`, [
      { extension: ".csv", content: toCsv(this.entries) },
    ]);
    return path;
  }
}

export interface NewFile {
  extension: string;
  content: string;
}

/**
 * Write files sharing one base name without overwriting anything. When a name
 * is taken, every file gets the next free `-1`, `-2`, … suffix together.
 * Returns the paths in the order given.
 */
export function writeNewFiles(dir: string, base: string, files: readonly NewFile[]): string[] {
  mkdirSync(dir, { recursive: true });

  for (let attempt = 0; ; attempt++) {
    const stem = join(dir, attempt === 0 ? base : `${base}-${String(attempt)}`);
    const written: string[] = [];
    try {
      for (const file of files) {
        const path = `${stem}${file.extension}`;
        writeFileSync(path, file.content, { flag: "wx" });
        written.push(path);
      }
      return written;
    } catch (error) {
      if (!(isNodeError(error) && error.code === "EEXIST")) throw error;
      for (const path of written) unlinkSync(path);
    }
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
