import { loadTableStatements, sqlString } from "../sql.js";
import type { DatasetFiles } from "../types.js";

/**
 * Text exchanged with the Sirius shell. Sirius is a DuckDB shell build: it reads
 * statements from stdin and runs GPU work through the gpu_buffer_init and
 * gpu_processing table functions.
 */

export interface OutputMarkers {
  fallbackMarker: string;
  errorMarkers: string[];
  /** stderr lines containing any of these are neither errors nor unknown output */
  ignoredOutput: string[];
}

export type OutputClass = "ok" | "fallback" | "error" | "unknown";

export interface Classification {
  kind: OutputClass;
  /** First line that decided the classification */
  line?: string;
}

export function completionMarker(label: string): string {
  return `__graph_bench_done_${label}__`;
}

/** Shell dot-command printing the marker once everything before it has run */
export function printMarker(marker: string): string {
  return `.print ${sqlString(marker)}`;
}

export function bufferInitStatement(caching: string, processing: string): string {
  return `call gpu_buffer_init(${sqlString(caching)}, ${sqlString(processing)});`;
}

export function gpuProcessingStatement(sql: string): string {
  return `call gpu_processing(${sqlString(sql)});`;
}

/**
 * Statements that prepare a fresh shell: load the dataset, then initialise the
 * device buffers. Nothing may be sent to gpu_processing before this completes.
 */
export function setupScript(
  dataset: DatasetFiles,
  buffer: readonly [string, string],
  marker: string
): string {
  return [
    ...loadTableStatements(dataset),
    bufferInitStatement(buffer[0], buffer[1]),
    printMarker(marker),
    "",
  ].join("\n");
}

export function queryScript(sql: string, marker: string): string {
  return [gpuProcessingStatement(sql), printMarker(marker), ""].join("\n");
}

/**
 * Decide what a query's captured output means. The fallback marker is checked
 * first because it is itself worded as an error. Text on stderr that matches
 * no known marker is reported as unknown instead of being taken for success.
 */
export function classifyOutput(
  stdout: string,
  stderr: string,
  markers: OutputMarkers
): Classification {
  const lines = `${stdout}\n${stderr}`.split("\n");

  const fallback = lines.find((line) => line.includes(markers.fallbackMarker));
  if (fallback !== undefined) {
    return { kind: "fallback", line: fallback.trim() };
  }

  const error = lines.find((line) => markers.errorMarkers.some((m) => line.includes(m)));
  if (error !== undefined) {
    return { kind: "error", line: error.trim() };
  }

  const stray = stderr
    .split("\n")
    .find(
      (line) =>
        line.trim().length > 0 && !markers.ignoredOutput.some((pattern) => line.includes(pattern))
    );
  if (stray !== undefined) {
    return { kind: "unknown", line: stray.trim() };
  }

  return { kind: "ok" };
}
