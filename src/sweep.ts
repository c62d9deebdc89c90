import { existsSync } from "node:fs";
import { delimiter, join, resolve, sep } from "node:path";
import type { BenchConfig, VariationPolicy } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { loadQuerySpec } from "./queries.js";
import { ResultSet } from "./results.js";
import type { BackendRunner } from "./runners.js";
import type { ResourceSampler } from "./sampler.js";
import { runSession } from "./session.js";
import type {
  BackendName,
  DatasetFiles,
  QuerySpec,
  SessionResult,
  SessionTarget,
  TimingSample,
} from "./types.js";

export interface SweepPlan {
  backends: BackendName[];
  datasetSizes: string[];
  queries: string[];
  iterations: number;
}

export interface PlannedSession {
  target: SessionTarget;
  spec: QuerySpec;
}

export function datasetFiles(dataDir: string, size: string): DatasetFiles {
  return {
    size,
    nodesPath: resolve(dataDir, `nodes_${size}.csv`),
    edgesPath: resolve(dataDir, `edges_${size}.csv`),
  };
}

/** A bare command name (e.g. a stdbuf wrapper) is looked up on PATH, as spawn does */
export function commandExists(command: string, env: NodeJS.ProcessEnv = process.env): boolean {
  if (command.includes(sep) || command.includes("/")) return existsSync(command);
  return (env.PATH ?? "")
    .split(delimiter)
    .filter((dir) => dir.length > 0)
    .some((dir) => existsSync(join(dir, command)));
}

/**
 * Check everything a sweep needs before any session opens and expand the plan
 * into its sessions, backend → dataset size → query. All problems are reported
 * together.
 */
export function prepareSweep(
  plan: SweepPlan,
  config: BenchConfig,
  env: NodeJS.ProcessEnv = process.env
): PlannedSession[] {
  const problems: string[] = [];

  const datasets = plan.datasetSizes.map((size) => datasetFiles(config.dataDir, size));
  for (const dataset of datasets) {
    for (const path of [dataset.nodesPath, dataset.edgesPath]) {
      if (!existsSync(path)) problems.push(`Dataset file not found: ${path}`);
    }
  }

  const specs = new Map<string, QuerySpec>();
  for (const backend of plan.backends) {
    for (const name of plan.queries) {
      try {
        specs.set(`${backend}/${name}`, loadQuerySpec(config.sqlDir, backend, name));
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        problems.push(...error.problems);
      }
    }
  }

  if (plan.backends.includes("sirius") && !commandExists(config.sirius.binary, env)) {
    problems.push(`Sirius binary not found: ${config.sirius.binary}`);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  const sessions: PlannedSession[] = [];
  for (const backend of plan.backends) {
    for (const dataset of datasets) {
      for (const queryName of plan.queries) {
        const spec = specs.get(`${backend}/${queryName}`);
        if (spec) {
          sessions.push({ target: { backend, dataset, queryName }, spec });
        }
      }
    }
  }
  return sessions;
}

export interface SweepOptions {
  runners: Record<BackendName, BackendRunner>;
  sampler: ResourceSampler;
  iterations: number;
  variation: VariationPolicy;
  maxConsecutiveFailures: number;
  outputDir: string;
  now?: () => Date;
  onSessionStart?: (target: SessionTarget, index: number, total: number) => void;
  onSessionEnd?: (result: SessionResult) => void;
  onSample?: (sample: TimingSample) => void;
}

export interface SweepResult {
  sessions: SessionResult[];
  failedSessions: SessionResult[];
  resultFile: string;
}

/**
 * Run every planned session in order, one at a time, then write all samples to
 * a new result file. A failed session does not stop the sweep.
 */
export async function runSweep(
  planned: readonly PlannedSession[],
  options: SweepOptions
): Promise<SweepResult> {
  const now = options.now ?? (() => new Date());
  const results = new ResultSet();
  const sessions: SessionResult[] = [];

  for (const [index, { target, spec }] of planned.entries()) {
    options.onSessionStart?.(target, index, planned.length);
    const session = await runSession(
      options.runners[target.backend],
      target,
      spec,
      options.iterations,
      {
        sampler: options.sampler,
        variation: options.variation,
        maxConsecutiveFailures: options.maxConsecutiveFailures,
        onSample: options.onSample,
        now,
      }
    );
    for (const sample of session.samples) {
      results.append(sample, {
        backend: target.backend,
        queryName: target.queryName,
        datasetSize: target.dataset.size,
      });
    }
    sessions.push(session);
    options.onSessionEnd?.(session);
  }

  const resultFile = results.flush(options.outputDir, now());
  return {
    sessions,
    failedSessions: sessions.filter((s) => s.failed),
    resultFile,
  };
}
