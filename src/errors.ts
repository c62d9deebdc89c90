/**
 * Raised before any session opens when the sweep cannot run as configured:
 * missing dataset files, malformed query templates, an unavailable engine binary
 * or an invalid config file. Never recovered.
 */
export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(
      problems.length === 1
        ? `Configuration error: ${problems[0] ?? ""}`
        : `Configuration error (${String(problems.length)} problems)`
    );
    this.name = "ConfigurationError";
  }

  display(): string {
    return ["Configuration error:", ...this.problems.map((p) => `  - ${p}`)].join("\n");
  }

  get exitCode(): number {
    return 2;
  }
}

/** A backend session could not be opened (engine start, data load or buffer init failed). */
export class SessionStartError extends Error {
  constructor(
    public readonly backend: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${backend}: ${message}`, options);
    this.name = "SessionStartError";
  }
}

/** The engine subprocess went away while the harness was waiting on it. */
export class EngineExitedError extends Error {
  constructor(
    public readonly code: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly transcript: string
  ) {
    super(
      `Engine process exited unexpectedly (code=${String(code)}, signal=${String(signal)})`
    );
    this.name = "EngineExitedError";
  }
}

export class QueryTimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    public readonly transcript: string
  ) {
    super(`No completion marker after ${String(timeoutMs)}ms`);
    this.name = "QueryTimeoutError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
