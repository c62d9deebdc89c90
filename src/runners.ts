import { DuckDBInstance, type DuckDBConnection } from "@duckdb/node-api";
import { SessionStartError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { loadTableStatements } from "./sql.js";
import type {
  BackendName,
  DatasetFiles,
  QueryExecution,
  SessionSetup,
  VariedQuery,
} from "./types.js";

export interface BackendRunner {
  readonly name: BackendName;
  /** Open a session with the dataset loaded; throws SessionStartError on failure */
  startSession(dataset: DatasetFiles): Promise<BackendSession>;
}

export interface BackendSession {
  readonly setup: SessionSetup;
  /**
   * Run one query. Query-level failures come back as a status; a throw means
   * the session itself is no longer usable.
   */
  execute(query: VariedQuery): Promise<QueryExecution>;
  /** Release the session. Safe to call more than once. */
  stop(): Promise<void>;
}

export interface DuckDBRunnerOptions {
  /** Queries running longer are interrupted and recorded as timeouts */
  queryTimeoutMs?: number;
  /** Defaults to a fresh in-memory database */
  createInstance?: () => Promise<DuckDBInstance>;
}

const DEFAULT_QUERY_TIMEOUT_MS = 300_000;

/**
 * CPU backend: DuckDB in process, one in-memory database per session.
 */
export class DuckDBRunner implements BackendRunner {
  readonly name = "duckdb";

  private readonly queryTimeoutMs: number;
  private readonly createInstance: () => Promise<DuckDBInstance>;

  constructor(options: DuckDBRunnerOptions = {}) {
    this.queryTimeoutMs = options.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.createInstance = options.createInstance ?? (() => DuckDBInstance.create(":memory:"));
  }

  async startSession(dataset: DatasetFiles): Promise<BackendSession> {
    const start = performance.now();
    let instance: DuckDBInstance | null = null;
    let connection: DuckDBConnection;
    try {
      instance = await this.createInstance();
      connection = await instance.connect();
    } catch (error) {
      instance?.closeSync();
      throw new SessionStartError(this.name, `could not open database: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      for (const statement of loadTableStatements(dataset)) {
        await connection.run(statement);
      }
    } catch (error) {
      connection.closeSync();
      instance.closeSync();
      throw new SessionStartError(
        this.name,
        `could not load dataset ${dataset.size}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    const setupMs = performance.now() - start;
    logger.debug({ backend: this.name, dataset: dataset.size, setupMs }, "dataset loaded");

    return new DuckDBSession(instance, connection, { setupMs }, this.queryTimeoutMs);
  }
}

class DuckDBSession implements BackendSession {
  private instance: DuckDBInstance | null;
  private connection: DuckDBConnection | null;

  constructor(
    instance: DuckDBInstance,
    connection: DuckDBConnection,
    readonly setup: SessionSetup,
    private readonly queryTimeoutMs: number
  ) {
    this.instance = instance;
    this.connection = connection;
  }

  async execute(query: VariedQuery): Promise<QueryExecution> {
    const connection = this.connection;
    if (!connection) throw new Error("Not connected");

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      connection.interrupt();
    }, this.queryTimeoutMs);

    const start = performance.now();
    try {
      const reader = await connection.runAndReadAll(query.queryText);
      const rowCount = reader.getRows().length;
      return { status: "ok", elapsedMs: performance.now() - start, rowCount };
    } catch (error) {
      if (timedOut) {
        return {
          status: "timeout",
          elapsedMs: null,
          detail: `Query exceeded ${String(this.queryTimeoutMs)}ms and was interrupted`,
        };
      }
      return { status: "error", elapsedMs: null, detail: errorMessage(error) };
    } finally {
      clearTimeout(timer);
    }
  }

  stop(): Promise<void> {
    if (this.connection) {
      this.connection.closeSync();
      this.connection = null;
    }
    if (this.instance) {
      this.instance.closeSync();
      this.instance = null;
    }
    return Promise.resolve();
  }
}
