export { QUERIES, THRESHOLD_PLACEHOLDER, cleanSql, findQuery, loadQuerySpec } from "./queries.js";
export { thresholdFor, varyQuery } from "./variator.js";
export { DuckDBRunner, type BackendRunner, type BackendSession } from "./runners.js";
export { SiriusRunner, bufferFor, type SiriusRunnerOptions } from "./sirius/runner.js";
export { ChildEngineProcess, type EngineProcess } from "./sirius/engine-process.js";
export { classifyOutput, type OutputMarkers } from "./sirius/protocol.js";
export { NvidiaSmiSampler, parseNvidiaSmi, type ResourceSampler } from "./sampler.js";
export { runSession, type SessionOptions } from "./session.js";
export { ResultSet, RESULT_COLUMNS, toCsv } from "./results.js";
export { prepareSweep, runSweep, type SweepPlan, type SweepResult } from "./sweep.js";
export { generateReport, type BenchmarkReport } from "./report.js";
export { loadConfig, parseConfig, type BenchConfig, type SiriusConfig } from "./config.js";
export { ConfigurationError, SessionStartError, EngineExitedError, QueryTimeoutError } from "./errors.js";
export { formatDuration, calculateStats, summarizeSamples } from "./utils.js";
export type * from "./types.js";
