import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "bench.config.json";

const BufferRangeSchema = z.tuple([z.string().min(1), z.string().min(1)]);

export const SiriusConfigSchema = z.object({
  /** Sirius build of the DuckDB shell */
  binary: z.string().min(1).default("~/sirius/build/release/duckdb"),
  args: z.array(z.string()).default([]),
  /** gpu_buffer_init sizes per dataset size: [caching, processing] */
  bufferSizes: z.record(z.string(), BufferRangeSchema).default({
    "10k": ["256 MB", "512 MB"],
    "50k": ["512 MB", "1 GB"],
    "100k": ["1 GB", "2 GB"],
    "1m": ["2 GB", "4 GB"],
    "5m": ["4 GB", "8 GB"],
    "20m": ["8 GB", "16 GB"],
  }),
  defaultBuffer: BufferRangeSchema.default(["512 MB", "1 GB"]),
  /** Printed by Sirius when a plan could not run on the GPU and DuckDB executed it instead */
  fallbackMarker: z.string().min(1).default("Error in GPUExecuteQuery, fallback to DuckDB"),
  errorMarkers: z
    .array(z.string().min(1))
    .default(["Error:", "Parser Error", "Binder Error", "Catalog Error", "Conversion Error"]),
  ignoredOutput: z.array(z.string().min(1)).default([]),
  /** Covers process start, CSV load and device buffer allocation */
  startupTimeoutMs: z.number().int().positive().default(600_000),
  stopGraceMs: z.number().int().nonnegative().default(5_000),
});

export const BenchConfigSchema = z.object({
  dataDir: z.string().min(1).default("data/processed"),
  sqlDir: z.string().min(1).default("sql"),
  outputDir: z.string().min(1).default("results/persistent_session"),
  datasetSizes: z.array(z.string().min(1)).min(1).default(["100k", "1m", "5m", "20m"]),
  queries: z
    .array(z.string().min(1))
    .min(1)
    .default(["1_hop", "2_hop", "3_hop", "k_hop", "shortest_path"]),
  iterations: z.number().int().nonnegative().default(100),
  quickIterations: z.number().int().nonnegative().default(10),
  maxConsecutiveFailures: z.number().int().positive().default(3),
  variation: z
    .object({
      base: z.number().int().default(0),
      step: z.number().int().positive().default(1),
    })
    .default({}),
  queryTimeoutMs: z.number().int().positive().default(300_000),
  sirius: SiriusConfigSchema.default({}),
  sampler: z
    .object({
      command: z.string().min(1).default("nvidia-smi"),
      gpuIndex: z.number().int().nonnegative().default(0),
    })
    .default({}),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("warn"),
});

export type BenchConfig = z.infer<typeof BenchConfigSchema>;
export type SiriusConfig = z.infer<typeof SiriusConfigSchema>;
export type VariationPolicy = BenchConfig["variation"];

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Validate a raw config object, applying defaults and environment overrides.
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): BenchConfig {
  const result = BenchConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  const config = result.data;
  if (env.SIRIUS_BINARY) {
    config.sirius.binary = env.SIRIUS_BINARY;
  }
  const envLevel = env.LOG_LEVEL;
  if (envLevel) {
    const level = BenchConfigSchema.shape.logLevel.safeParse(envLevel);
    if (!level.success) {
      throw new ConfigurationError([`LOG_LEVEL: unknown level "${envLevel}"`]);
    }
    config.logLevel = level.data;
  }
  config.sirius.binary = expandHome(config.sirius.binary);
  return config;
}

/**
 * Load the config file if one is given or present in the working directory;
 * otherwise every setting takes its default.
 */
export function loadConfig(
  path?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): BenchConfig {
  const file = resolve(cwd, path ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(file)) {
    if (path) {
      throw new ConfigurationError([`Config file not found: ${file}`]);
    }
    return parseConfig({}, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (error) {
    throw new ConfigurationError([`${file}: ${errorMessage(error)}`]);
  }
  return parseConfig(raw, env);
}
