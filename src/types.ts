export type BackendName = "duckdb" | "sirius";

export const BACKENDS: readonly BackendName[] = ["duckdb", "sirius"];

export interface QuerySpec {
  name: string;
  description: string;
  /** Backend the template was written for (the sql/<backend>/ directory it came from) */
  backend: BackendName;
  /** Single-line SQL containing at least one `{threshold}` placeholder */
  template: string;
  tags: string[];
}

export interface VariedQuery {
  queryText: string;
  generationIndex: number;
}

export interface DatasetFiles {
  size: string;
  nodesPath: string;
  edgesPath: string;
}

export type ExecutionStatus = "ok" | "fallback" | "error" | "timeout";

export type SampleStatus = ExecutionStatus | "skipped";

/** Outcome of one query on a backend, before device sampling */
export interface QueryExecution {
  status: ExecutionStatus;
  /** Wall-clock time of the timed region; null when the query did not complete */
  elapsedMs: number | null;
  rowCount?: number;
  detail?: string;
}

export interface DeviceSample {
  utilizationPct: number | null;
  memoryMb: number | null;
}

export interface TimingSample extends DeviceSample {
  iterationIndex: number;
  elapsedMs: number | null;
  status: SampleStatus;
  error?: string;
  timestamp: string;
}

export interface SessionTarget {
  backend: BackendName;
  dataset: DatasetFiles;
  queryName: string;
}

export type SessionState = "OPENING" | "RUNNING" | "CLOSING" | "CLOSED" | "FAILED";

/** How a backend session was brought up, measured outside every timed query */
export interface SessionSetup {
  /** Engine start, dataset load and device buffer allocation */
  setupMs: number;
  /** gpu_buffer_init sizes [caching, processing], for GPU sessions */
  buffer?: readonly [string, string];
}

export interface SessionResult {
  target: SessionTarget;
  failed: boolean;
  failureReason?: string;
  /** Absent when no backend session was opened */
  setup?: SessionSetup;
  states: SessionState[];
  samples: TimingSample[];
}
