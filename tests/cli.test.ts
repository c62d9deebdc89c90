import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { buildPlan, parseCli, reproduceCommand, runCli, type CliDependencies } from "../src/cli.js";
import { parseConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";
import type { BenchmarkReport } from "../src/report.js";
import { FakeRunner } from "./helpers/fake-runner.js";

const SQL_DIR = fileURLToPath(new URL("../sql", import.meta.url));

describe("parseCli", () => {
  it("selects both backends by default", () => {
    const cli = parseCli([]);
    expect(cli.backends).toEqual(["duckdb", "sirius"]);
    expect(cli.allBackends).toBe(true);
    expect(cli.quick).toBe(false);
    expect(cli.sizes).toBeUndefined();
  });

  it("parses lists and numbers", () => {
    const cli = parseCli([
      "--sirius",
      "-s",
      "5m, 20m",
      "-q",
      "2_hop",
      "-n",
      "1_000",
      "--timeout",
      "60000",
    ]);
    expect(cli).toMatchObject({
      backends: ["sirius"],
      allBackends: false,
      sizes: ["5m", "20m"],
      queries: ["2_hop"],
      iterations: 1000,
      timeoutMs: 60000,
    });
  });

  it("rejects malformed numbers", () => {
    expect(() => parseCli(["-n", "ten"])).toThrow(
      'Configuration error: --iterations: expected a non-negative integer, got "ten"'
    );
    expect(() => parseCli(["--timeout", "0"])).toThrow("--timeout: must be greater than zero");
  });

  it("rejects unknown options", () => {
    expect(() => parseCli(["--gpu"])).toThrow(ConfigurationError);
  });
});

describe("buildPlan", () => {
  const config = parseConfig({}, {});

  it("uses config defaults", () => {
    const { plan } = buildPlan(parseCli([]), config);
    expect(plan).toEqual({
      backends: ["duckdb", "sirius"],
      datasetSizes: ["100k", "1m", "5m", "20m"],
      queries: ["1_hop", "2_hop", "3_hop", "k_hop", "shortest_path"],
      iterations: 100,
    });
  });

  it("applies quick mode and overrides", () => {
    const { plan, config: effective } = buildPlan(
      parseCli(["--quick", "-n", "50", "-d", "/data", "--timeout", "1000"]),
      config
    );
    expect(plan.iterations).toBe(10);
    expect(effective.dataDir).toBe("/data");
    expect(effective.queryTimeoutMs).toBe(1000);
  });

  it("takes the iteration count from the command line", () => {
    expect(buildPlan(parseCli(["-n", "50"]), config).plan.iterations).toBe(50);
  });

  it("builds a reproducible command line", () => {
    const cli = parseCli(["--duckdb", "-s", "100k", "-n", "5", "-e", "g5.xlarge"]);
    const { plan } = buildPlan(cli, config);
    expect(reproduceCommand(cli, plan)).toBe(
      "graph-bench --duckdb -s 100k -q 1_hop,2_hop,3_hop,k_hop,shortest_path -n 5 --env g5.xlarge"
    );
  });
});

describe("runCli", () => {
  let dir: string;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "graph-bench-cli-"));
    writeFileSync(join(dir, "nodes_10k.csv"), "txId,class\n1,1\n");
    writeFileSync(join(dir, "edges_10k.csv"), "txId1,txId2\n1,1\n");
    writeFileSync(join(dir, "sirius-shell"), "");
    writeFileSync(
      join(dir, "bench.config.json"),
      JSON.stringify({
        dataDir: dir,
        sqlDir: SQL_DIR,
        outputDir: join(dir, "out"),
        datasetSizes: ["10k"],
        queries: ["1_hop"],
        sirius: { binary: join(dir, "sirius-shell") },
      })
    );
    out = [];
    err = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function deps(runners: CliDependencies["runners"]): CliDependencies {
    return {
      runners,
      sampler: { sample: () => Promise.resolve({ utilizationPct: null, memoryMb: null }) },
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      env: {},
      cwd: dir,
    };
  }

  const healthy = {
    duckdb: new FakeRunner("duckdb", () => ({ status: "ok", elapsedMs: 5 })),
    sirius: new FakeRunner("sirius", () => ({ status: "ok", elapsedMs: 5 })),
  };

  it("prints help", async () => {
    await expect(runCli(["--help"], deps(healthy))).resolves.toBe(0);
    expect(out[0]).toContain("Usage: graph-bench [options]");
  });

  it("exits with 2 on a configuration error", async () => {
    await expect(runCli(["-s", "1m"], deps(healthy))).resolves.toBe(2);
    expect(err).toEqual([
      [
        "Configuration error:",
        `  - Dataset file not found: ${join(dir, "nodes_1m.csv")}`,
        `  - Dataset file not found: ${join(dir, "edges_1m.csv")}`,
      ].join("\n"),
    ]);
  });

  it("runs the sweep and writes reports", async () => {
    const code = await runCli(["--duckdb", "-n", "2", "--report", "-e", "ci-box"], deps(healthy));

    expect(code).toBe(0);
    expect(out).toContain("\n[1/1] duckdb | 10k | 1_hop");
    expect(out).toContain(
      "  Results: min=5.00ms, avg=5.00ms, p95=5.00ms, max=5.00ms " +
        "(ok=2 fallback=0 error=0 timeout=0 skipped=0)"
    );
    expect(err).toEqual([]);

    const files = readdirSync(join(dir, "out"));
    expect(files.filter((f) => f.endsWith(".csv"))).toHaveLength(1);
    const reportFile = files.find((f) => f.endsWith(".json"));
    expect(reportFile).toBeDefined();
    expect(files.filter((f) => f.endsWith(".md"))).toHaveLength(1);

    const report: BenchmarkReport = JSON.parse(
      readFileSync(join(dir, "out", reportFile ?? ""), "utf8")
    );
    expect(report.command).toBe("graph-bench --duckdb -s 10k -q 1_hop -n 2 --env ci-box");
    expect(report.environment.label).toBe("ci-box");
    expect(report.sessions).toHaveLength(1);
  });

  it("ranks sessions by average query time in the summary", async () => {
    const runners = {
      duckdb: new FakeRunner("duckdb", (_, session) => ({
        status: "ok",
        elapsedMs: session === 0 ? 5 : 20,
      })),
      sirius: healthy.sirius,
    };
    const code = await runCli(["--duckdb", "-q", "1_hop,2_hop", "-n", "2"], deps(runners));

    expect(code).toBe(0);
    const summary = out.slice(out.indexOf("\n=== Summary ==="));
    expect(summary).toEqual([
      "\n=== Summary ===",
      "Sessions: 2, failed: 0",
      "\nTop 2 fastest (avg query time):",
      "  1. duckdb   | 10k   | 1_hop          | 5.00ms",
      "  2. duckdb   | 10k   | 2_hop          | 20ms",
      "\nTop 2 slowest (avg query time):",
      "  1. duckdb   | 10k   | 2_hop          | 20ms",
      "  2. duckdb   | 10k   | 1_hop          | 5.00ms",
      "",
      "duckdb: 2 sessions, avg 13ms per query",
    ]);
  });

  it("exits with 1 when a session fails", async () => {
    const broken = {
      duckdb: healthy.duckdb,
      sirius: new FakeRunner("sirius", () => ({ status: "ok", elapsedMs: 5 }), {
        startError: new Error("sirius: setup failed: Error: no CUDA device"),
      }),
    };
    const code = await runCli(["--sirius", "-n", "2"], deps(broken));

    expect(code).toBe(1);
    expect(err).toContain(
      "  Failed: sirius: setup failed: Error: no CUDA device " +
        "(ok=0 fallback=0 error=0 timeout=0 skipped=2)"
    );
  });
});
