import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { EngineExitedError, QueryTimeoutError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";

export interface EngineOutput {
  stdout: string;
  stderr: string;
}

/**
 * A long-lived interactive engine driven over stdin. The session that created it
 * owns it exclusively and issues one command batch at a time.
 */
export interface EngineProcess {
  readonly alive: boolean;
  start(): Promise<void>;
  send(text: string): void;
  /**
   * Resolve with everything written since the previous read once stdout carries
   * a line equal to `marker`. Rejects with EngineExitedError or QueryTimeoutError.
   */
  readUntil(marker: string, timeoutMs: number): Promise<EngineOutput>;
  /** Ask the engine to quit; with `force`, kill it right away. Idempotent. */
  stop(options?: { force?: boolean }): Promise<void>;
}

/** The parts of a child process the engine wrapper uses */
export interface EngineHandle {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "spawn", listener: () => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
  once(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
}

export type SpawnEngine = (command: string, args: string[]) => EngineHandle;

const spawnChild: SpawnEngine = (command, args) => spawn(command, args);

interface PendingRead {
  marker: string;
  resolve: (output: EngineOutput) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface ChildEngineOptions {
  command: string;
  args: string[];
  /** How long stop() waits for the engine to exit on its own before killing it */
  stopGraceMs: number;
  spawn?: SpawnEngine;
}

/**
 * Runs the engine as a child process. Its output is captured in full: it is
 * handed to the caller with each read and logged at debug level, never printed.
 */
export class ChildEngineProcess implements EngineProcess {
  private handle: EngineHandle | null = null;
  private stdoutBuffer = "";
  private stderrBuffer = "";
  private pending: PendingRead | null = null;
  private exited: { code: number | null; signal: NodeJS.Signals | null } | null = null;
  private closed: Promise<void> = Promise.resolve();
  private readonly log = logger.child({ component: "engine" });

  constructor(private readonly options: ChildEngineOptions) {}

  get alive(): boolean {
    return this.handle !== null && this.exited === null;
  }

  start(): Promise<void> {
    if (this.handle) {
      return Promise.reject(new Error("Engine process already started"));
    }
    const spawnEngine = this.options.spawn ?? spawnChild;
    const handle = spawnEngine(this.options.command, this.options.args);
    this.handle = handle;

    handle.stdout.setEncoding("utf8");
    handle.stderr.setEncoding("utf8");
    handle.stdout.on("data", (chunk: string) => {
      this.log.debug({ stream: "stdout", text: chunk }, "engine output");
      this.stdoutBuffer += chunk;
      this.checkPending();
    });
    handle.stderr.on("data", (chunk: string) => {
      this.log.debug({ stream: "stderr", text: chunk }, "engine output");
      this.stderrBuffer += chunk;
    });
    handle.stdin.on("error", (error: Error) => {
      this.log.debug({ err: error }, "engine stdin error");
    });

    this.closed = new Promise<void>((resolve) => {
      handle.once("close", (code, signal) => {
        this.onClose(code, signal);
        resolve();
      });
    });

    return new Promise<void>((resolve, reject) => {
      let spawned = false;
      handle.once("spawn", () => {
        spawned = true;
        this.log.debug({ command: this.options.command }, "engine started");
        resolve();
      });
      handle.once("error", (error) => {
        this.log.warn({ err: error }, "engine process error");
        if (!spawned) {
          this.exited = { code: null, signal: null };
          reject(new Error(`Could not start ${this.options.command}: ${errorMessage(error)}`));
        }
      });
    });
  }

  send(text: string): void {
    const handle = this.handle;
    if (!handle || this.exited) {
      throw new EngineExitedError(
        this.exited?.code ?? null,
        this.exited?.signal ?? null,
        this.transcript()
      );
    }
    this.log.debug({ text }, "engine input");
    handle.stdin.write(text);
  }

  readUntil(marker: string, timeoutMs: number): Promise<EngineOutput> {
    if (this.pending) {
      return Promise.reject(new Error("A read is already pending on this engine"));
    }
    if (!this.alive) {
      return Promise.reject(
        new EngineExitedError(
          this.exited?.code ?? null,
          this.exited?.signal ?? null,
          this.transcript()
        )
      );
    }
    return new Promise<EngineOutput>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new QueryTimeoutError(timeoutMs, this.transcript()));
      }, timeoutMs);
      this.pending = { marker, resolve, reject, timer };
      this.checkPending();
    });
  }

  async stop(options: { force?: boolean } = {}): Promise<void> {
    const handle = this.handle;
    if (!handle) return;

    if (this.pending) {
      const pending = this.pending;
      this.pending = null;
      clearTimeout(pending.timer);
      pending.reject(new Error("Engine process stopped"));
    }

    if (this.exited === null) {
      if (!options.force) {
        handle.stdin.end(".quit\n");
        if (await settlesWithin(this.closed, this.options.stopGraceMs)) {
          this.handle = null;
          return;
        }
        this.log.warn({ graceMs: this.options.stopGraceMs }, "engine did not quit, killing it");
      }
      handle.kill("SIGKILL");
      await settlesWithin(this.closed, this.options.stopGraceMs);
    }
    this.handle = null;
  }

  private checkPending(): void {
    const pending = this.pending;
    if (!pending) return;

    const lines = this.stdoutBuffer.split("\n");
    // The last element is an unterminated line still being written
    const index = lines
      .slice(0, -1)
      .findIndex((line) => line.replace(/\r$/, "") === pending.marker);
    if (index === -1) return;

    const stdout = lines.slice(0, index).join("\n");
    this.stdoutBuffer = lines.slice(index + 1).join("\n");
    this.pending = null;
    clearTimeout(pending.timer);

    // stderr arrives on its own pipe; let already-readable chunks land first
    setImmediate(() => {
      const stderr = this.stderrBuffer;
      this.stderrBuffer = "";
      pending.resolve({ stdout, stderr });
    });
  }

  private onClose(code: number | null, signal: NodeJS.Signals | null): void {
    this.exited = { code, signal };
    this.log.debug({ code, signal }, "engine exited");
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      clearTimeout(pending.timer);
      pending.reject(new EngineExitedError(code, signal, this.transcript()));
    }
  }

  private transcript(): string {
    return [this.stdoutBuffer, this.stderrBuffer].filter((s) => s.length > 0).join("\n");
  }
}

/** True when `promise` settles within `ms`; the timer never outlives the wait. */
async function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => {
      resolve(false);
    }, ms);
  });
  try {
    return await Promise.race([promise.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}
