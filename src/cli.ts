import { dirname } from "node:path";
import { parseArgs } from "node:util";
import { loadConfig, type BenchConfig } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { setLogLevel } from "./logger.js";
import { QUERIES } from "./queries.js";
import {
  buildSessionReport,
  generateReport,
  rankSessions,
  type BenchmarkReport,
  type SessionReport,
} from "./report.js";
import { DuckDBRunner, type BackendRunner } from "./runners.js";
import { NvidiaSmiSampler, type ResourceSampler } from "./sampler.js";
import { SiriusRunner } from "./sirius/runner.js";
import { prepareSweep, runSweep, type PlannedSession, type SweepPlan } from "./sweep.js";
import { BACKENDS, type BackendName, type SessionResult } from "./types.js";
import { formatDuration, getEnvironmentInfo, summarizeSamples } from "./utils.js";

export const HELP = `
Usage: graph-bench [options]

Options:
  --duckdb              Benchmark DuckDB (CPU, in-process)
  --sirius              Benchmark Sirius (GPU, persistent shell)
  -s, --size <list>     Dataset sizes, comma separated (default: 100k,1m,5m,20m)
  -q, --query <list>    Query names, comma separated (default: all)
  -n, --iterations <n>  Queries per session (default: 100)
  --quick               Quick run with the reduced iteration count (default: 10)
  --timeout <ms>        Per-query timeout (default: 300000)
  -d, --data-dir <dir>  Directory with nodes_<size>.csv and edges_<size>.csv
  -o, --output-dir <dir>  Directory for result files
  -c, --config <file>   Config file (default: bench.config.json if present)
  -e, --env <label>     Machine label for report metadata
  --report              Also write JSON and Markdown reports
  -v, --verbose         Debug logging, including engine output
  -h, --help            Show this help message

If no backend is specified, both are benchmarked.

Queries: ${QUERIES.map((q) => q.name).join(", ")}

Exit codes: 0 all sessions completed, 1 a session failed, 2 configuration error.

Examples:
  graph-bench                              # Both backends, all sizes and queries
  graph-bench --quick                      # 10 queries per session
  graph-bench --sirius -s 5m -q 2_hop      # One GPU session
  graph-bench --duckdb -n 50 --report      # CPU only, with reports
`;

export interface CliOptions {
  help: boolean;
  backends: BackendName[];
  allBackends: boolean;
  sizes?: string[];
  queries?: string[];
  iterations?: number;
  quick: boolean;
  timeoutMs?: number;
  dataDir?: string;
  outputDir?: string;
  configPath?: string;
  env?: string;
  report: boolean;
  verbose: boolean;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

// Accepts underscore separators (e.g., 1_000)
function parseCount(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d[\d_]*$/.test(value)) {
    throw new ConfigurationError([`${flag}: expected a non-negative integer, got "${value}"`]);
  }
  return Number.parseInt(value.replace(/_/g, ""), 10);
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        duckdb: { type: "boolean", default: false },
        sirius: { type: "boolean", default: false },
        size: { type: "string", short: "s" },
        query: { type: "string", short: "q" },
        iterations: { type: "string", short: "n" },
        quick: { type: "boolean", default: false },
        timeout: { type: "string" },
        "data-dir": { type: "string", short: "d" },
        "output-dir": { type: "string", short: "o" },
        config: { type: "string", short: "c" },
        env: { type: "string", short: "e" },
        report: { type: "boolean", default: false },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    }).values;
  } catch (error) {
    throw new ConfigurationError([errorMessage(error)]);
  }
}

export function parseCli(argv: string[]): CliOptions {
  const values = parseFlags(argv);
  const noBackendSelected = !values.duckdb && !values.sirius;
  const backends = BACKENDS.filter((b) => noBackendSelected || values[b]);

  const timeoutMs = parseCount("--timeout", values.timeout);
  if (timeoutMs === 0) {
    throw new ConfigurationError(["--timeout: must be greater than zero"]);
  }

  return {
    help: values.help,
    backends,
    allBackends: noBackendSelected,
    sizes: parseList(values.size),
    queries: parseList(values.query),
    iterations: parseCount("--iterations", values.iterations),
    quick: values.quick,
    timeoutMs,
    dataDir: values["data-dir"],
    outputDir: values["output-dir"],
    configPath: values.config,
    env: values.env,
    report: values.report,
    verbose: values.verbose,
  };
}

/**
 * Apply command-line overrides to the loaded config. --quick takes precedence
 * over --iterations.
 */
export function buildPlan(
  cli: CliOptions,
  loaded: BenchConfig
): { plan: SweepPlan; config: BenchConfig } {
  const config: BenchConfig = {
    ...loaded,
    dataDir: cli.dataDir ?? loaded.dataDir,
    outputDir: cli.outputDir ?? loaded.outputDir,
    queryTimeoutMs: cli.timeoutMs ?? loaded.queryTimeoutMs,
  };
  const iterations = cli.quick ? config.quickIterations : (cli.iterations ?? config.iterations);
  return {
    plan: {
      backends: cli.backends,
      datasetSizes: cli.sizes ?? config.datasetSizes,
      queries: cli.queries ?? config.queries,
      iterations,
    },
    config,
  };
}

/** Command line that reproduces a run */
export function reproduceCommand(cli: CliOptions, plan: SweepPlan): string {
  const parts = ["graph-bench"];
  if (!cli.allBackends) {
    for (const backend of plan.backends) parts.push(`--${backend}`);
  }
  parts.push(`-s ${plan.datasetSizes.join(",")}`);
  parts.push(`-q ${plan.queries.join(",")}`);
  parts.push(`-n ${String(plan.iterations)}`);
  if (cli.timeoutMs !== undefined) parts.push(`--timeout ${String(cli.timeoutMs)}`);
  if (cli.dataDir) parts.push(`-d ${cli.dataDir}`);
  if (cli.configPath) parts.push(`-c ${cli.configPath}`);
  if (cli.env) parts.push(`--env ${cli.env}`);
  return parts.join(" ");
}

export interface CliDependencies {
  runners?: Record<BackendName, BackendRunner>;
  sampler?: ResourceSampler;
  out?: (line: string) => void;
  err?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

interface PreparedRun {
  plan: SweepPlan;
  config: BenchConfig;
  sessions: PlannedSession[];
}

function prepareRun(cli: CliOptions, deps: CliDependencies): PreparedRun {
  const { plan, config } = buildPlan(cli, loadConfig(cli.configPath, deps.env, deps.cwd));
  return { plan, config, sessions: prepareSweep(plan, config, deps.env) };
}

function describeSession(session: SessionResult): string {
  const { backend, dataset, queryName } = session.target;
  return `${backend.padEnd(8)} | ${dataset.size.padEnd(5)} | ${queryName.padEnd(14)}`;
}

function describeReport(report: SessionReport): string {
  return (
    `${report.backend.padEnd(8)} | ${report.datasetSize.padEnd(5)} | ${report.query.padEnd(14)} | ` +
    formatDuration(report.summary.timing.avg)
  );
}

/**
 * Run the benchmark CLI and return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));

  let cli: CliOptions;
  let prepared: PreparedRun;
  try {
    cli = parseCli(argv);
    if (cli.help) {
      out(HELP);
      return 0;
    }
    prepared = prepareRun(cli, deps);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      err(error.display());
      return error.exitCode;
    }
    throw error;
  }

  setLogLevel(cli.verbose ? "debug" : prepared.config.logLevel);
  const { plan, config, sessions } = prepared;
  out("=== Persistent Session Benchmarks ===");
  out(`Backends: ${plan.backends.join(", ")}`);
  out(`Dataset sizes: ${plan.datasetSizes.join(", ")}`);
  out(`Queries: ${plan.queries.join(", ")}`);
  out(`Queries per session: ${String(plan.iterations)}${cli.quick ? " (quick)" : ""}`);

  const runners = deps.runners ?? {
    duckdb: new DuckDBRunner({ queryTimeoutMs: config.queryTimeoutMs }),
    sirius: new SiriusRunner({ config: config.sirius, queryTimeoutMs: config.queryTimeoutMs }),
  };
  const sampler =
    deps.sampler ?? new NvidiaSmiSampler(config.sampler.command, config.sampler.gpuIndex);

  const startedAt = new Date();
  const result = await runSweep(sessions, {
    runners,
    sampler,
    iterations: plan.iterations,
    variation: config.variation,
    maxConsecutiveFailures: config.maxConsecutiveFailures,
    outputDir: config.outputDir,
    onSessionStart: (target, index, total) => {
      out(
        `\n[${String(index + 1)}/${String(total)}] ${target.backend} | ${target.dataset.size} | ${target.queryName}`
      );
    },
    onSessionEnd: (session) => {
      const summary = summarizeSamples(session.samples);
      const { counts, timing } = summary;
      const tally =
        `ok=${String(counts.ok)} fallback=${String(counts.fallback)} ` +
        `error=${String(counts.error)} timeout=${String(counts.timeout)} skipped=${String(counts.skipped)}`;
      if (session.failed) {
        err(`  Failed: ${session.failureReason ?? "unknown error"} (${tally})`);
      } else if (timing.count > 0) {
        out(
          `  Results: min=${formatDuration(timing.min)}, avg=${formatDuration(timing.avg)}, ` +
            `p95=${formatDuration(timing.p95)}, max=${formatDuration(timing.max)} (${tally})`
        );
      } else {
        out(`  Completed without timings (${tally})`);
      }
    },
  });

  out(`\nResults saved to: ${result.resultFile}`);

  const sessionReports = result.sessions.map(buildSessionReport);
  if (cli.report) {
    const report: BenchmarkReport = {
      timestamp: startedAt.toISOString(),
      command: reproduceCommand(cli, plan),
      environment: getEnvironmentInfo(cli.env),
      iterations: plan.iterations,
      resultFile: result.resultFile,
      sessions: sessionReports,
    };
    for (const path of generateReport(report, dirname(result.resultFile))) {
      out(`Generated report: ${path}`);
    }
  }

  out("\n=== Summary ===");
  out(`Sessions: ${String(result.sessions.length)}, failed: ${String(result.failedSessions.length)}`);

  const ranking = rankSessions(sessionReports);
  if (ranking.fastest.length > 0) {
    out(`\nTop ${String(ranking.fastest.length)} fastest (avg query time):`);
    ranking.fastest.forEach((s, i) => out(`  ${String(i + 1)}. ${describeReport(s)}`));
    out(`\nTop ${String(ranking.slowest.length)} slowest (avg query time):`);
    ranking.slowest.forEach((s, i) => out(`  ${String(i + 1)}. ${describeReport(s)}`));
    out("");
    for (const { backend, sessions: count, avgMs } of ranking.backends) {
      out(`${backend}: ${String(count)} sessions, avg ${formatDuration(avgMs)} per query`);
    }
  }
  for (const session of result.failedSessions) {
    err(`  ${describeSession(session)} | ${session.failureReason ?? "unknown error"}`);
  }

  return result.failedSessions.length > 0 ? 1 : 0;
}
