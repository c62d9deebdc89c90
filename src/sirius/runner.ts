import type { Logger } from "pino";
import type { SiriusConfig } from "../config.js";
import { QueryTimeoutError, SessionStartError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { BackendRunner, BackendSession } from "../runners.js";
import type { DatasetFiles, QueryExecution, SessionSetup, VariedQuery } from "../types.js";
import { ChildEngineProcess, type EngineProcess } from "./engine-process.js";
import {
  classifyOutput,
  completionMarker,
  queryScript,
  setupScript,
  type OutputMarkers,
} from "./protocol.js";

export interface SiriusRunnerOptions {
  config: SiriusConfig;
  queryTimeoutMs: number;
  /** Defaults to spawning config.binary */
  createEngine?: () => EngineProcess;
}

export function bufferFor(config: SiriusConfig, datasetSize: string): readonly [string, string] {
  return config.bufferSizes[datasetSize] ?? config.defaultBuffer;
}

/**
 * GPU backend. Sirius has no persistent library binding, so each session keeps
 * one interactive shell alive and feeds it queries over stdin.
 */
export class SiriusRunner implements BackendRunner {
  readonly name = "sirius";

  constructor(private readonly options: SiriusRunnerOptions) {}

  async startSession(dataset: DatasetFiles): Promise<BackendSession> {
    const { config } = this.options;
    const createEngine =
      this.options.createEngine ??
      (() =>
        new ChildEngineProcess({
          command: config.binary,
          args: config.args,
          stopGraceMs: config.stopGraceMs,
        }));

    const session = new SiriusSession(dataset, createEngine, this.options);
    await session.open();
    return session;
  }
}

class SiriusSession implements BackendSession {
  private engine: EngineProcess | null = null;
  private sequence = 0;
  private restarts = 0;
  /** Measured on the first open; restarts after a timeout do not replace it */
  setup: SessionSetup = { setupMs: 0 };
  private readonly markers: OutputMarkers;
  private readonly log: Logger;

  constructor(
    private readonly dataset: DatasetFiles,
    private readonly createEngine: () => EngineProcess,
    private readonly options: SiriusRunnerOptions
  ) {
    const { fallbackMarker, errorMarkers, ignoredOutput } = options.config;
    this.markers = { fallbackMarker, errorMarkers, ignoredOutput };
    this.log = logger.child({ backend: "sirius", dataset: dataset.size });
  }

  /** Start the shell, load the graph and initialise device buffers. */
  async open(): Promise<void> {
    const engine = this.createEngine();
    const buffer = bufferFor(this.options.config, this.dataset.size);
    const start = performance.now();
    try {
      await engine.start();
      const marker = this.nextMarker("setup");
      engine.send(setupScript(this.dataset, buffer, marker));
      const output = await engine.readUntil(marker, this.options.config.startupTimeoutMs);
      const outcome = classifyOutput(output.stdout, output.stderr, this.markers);
      if (outcome.kind === "error") {
        throw new SessionStartError("sirius", `setup failed: ${outcome.line ?? ""}`);
      }
      if (outcome.kind !== "ok") {
        this.log.warn({ line: outcome.line }, "unexpected output during setup");
      }
    } catch (error) {
      await engine.stop({ force: true });
      if (error instanceof SessionStartError) throw error;
      throw new SessionStartError("sirius", errorMessage(error), { cause: error });
    }
    this.engine = engine;
    const setupMs = performance.now() - start;
    if (this.restarts === 0) {
      this.setup = { setupMs, buffer };
    }
    this.log.debug({ buffer, setupMs, restarts: this.restarts }, "engine ready");
  }

  async execute(query: VariedQuery): Promise<QueryExecution> {
    const engine = this.engine;
    if (!engine) throw new Error("Not connected");

    const marker = this.nextMarker(String(query.generationIndex));
    const start = performance.now();
    let stdout: string;
    let stderr: string;
    try {
      engine.send(queryScript(query.queryText, marker));
      ({ stdout, stderr } = await engine.readUntil(marker, this.options.queryTimeoutMs));
    } catch (error) {
      if (error instanceof QueryTimeoutError) {
        this.log.warn({ timeoutMs: error.timeoutMs }, "query timed out, restarting engine");
        await this.restart();
        return { status: "timeout", elapsedMs: null, detail: error.message };
      }
      throw error;
    }
    const elapsedMs = performance.now() - start;

    const outcome = classifyOutput(stdout, stderr, this.markers);
    switch (outcome.kind) {
      case "ok":
        return { status: "ok", elapsedMs };
      case "fallback":
        return { status: "fallback", elapsedMs, detail: outcome.line };
      case "error":
        return { status: "error", elapsedMs: null, detail: outcome.line };
      case "unknown":
        return {
          status: "error",
          elapsedMs: null,
          detail: `unrecognised engine output: ${outcome.line ?? ""}`,
        };
    }
  }

  async stop(): Promise<void> {
    const engine = this.engine;
    this.engine = null;
    if (engine) {
      await engine.stop();
    }
  }

  /** A hung engine is killed and replaced by a freshly initialised one. */
  private async restart(): Promise<void> {
    const engine = this.engine;
    this.engine = null;
    if (engine) {
      await engine.stop({ force: true });
    }
    this.restarts += 1;
    await this.open();
  }

  private nextMarker(label: string): string {
    this.sequence += 1;
    return completionMarker(`${String(this.sequence)}_${label}`);
  }
}
