import type { VariationPolicy } from "./config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { BackendRunner, BackendSession } from "./runners.js";
import type { ResourceSampler } from "./sampler.js";
import type {
  QuerySpec,
  SessionResult,
  SessionState,
  SessionTarget,
  TimingSample,
} from "./types.js";
import { varyQuery } from "./variator.js";

export interface SessionOptions {
  sampler: ResourceSampler;
  variation: VariationPolicy;
  /** Consecutive error or timeout samples that end the session */
  maxConsecutiveFailures: number;
  /** Called after every sample, e.g. for progress output */
  onSample?: (sample: TimingSample) => void;
  now?: () => Date;
}

/**
 * Run `iterations` varied queries over one persistent backend session.
 *
 * The session moves OPENING → RUNNING → CLOSING → CLOSED, passing through
 * FAILED before CLOSING on a fatal error. Iterations run one after another and
 * each yields exactly one sample. An iteration cut short by a fatal error is
 * recorded as an error, and those never attempted after it as skipped. The
 * backend session is stopped on every exit path, and no failure inside the
 * session escapes this function.
 */
export async function runSession(
  runner: BackendRunner,
  target: SessionTarget,
  spec: QuerySpec,
  iterations: number,
  options: SessionOptions
): Promise<SessionResult> {
  const now = options.now ?? (() => new Date());
  const log = logger.child({
    backend: target.backend,
    dataset: target.dataset.size,
    query: target.queryName,
  });
  const result: SessionResult = { target, failed: false, states: [], samples: [] };

  if (iterations === 0) {
    return result;
  }

  const enter = (state: SessionState): void => {
    result.states.push(state);
    log.debug({ state }, "session state");
  };

  const record = (sample: TimingSample): void => {
    result.samples.push(sample);
    options.onSample?.(sample);
  };

  const fail = (reason: string): void => {
    result.failed = true;
    result.failureReason = reason;
    enter("FAILED");
    log.warn({ reason }, "session failed");
  };

  let session: BackendSession | null = null;
  // Iteration whose query was sent but has no sample yet
  let inFlight: number | null = null;
  enter("OPENING");
  try {
    session = await runner.startSession(target.dataset);
    result.setup = session.setup;
    enter("RUNNING");

    let consecutiveFailures = 0;
    for (let i = 0; i < iterations; i++) {
      inFlight = i;
      const query = varyQuery(spec, i, options.variation);
      const execution = await session.execute(query);
      const device = await options.sampler.sample(target.backend);

      const sample: TimingSample = {
        iterationIndex: i,
        elapsedMs: execution.elapsedMs,
        utilizationPct: device.utilizationPct,
        memoryMb: device.memoryMb,
        status: execution.status,
        timestamp: now().toISOString(),
      };
      if (execution.detail !== undefined) sample.error = execution.detail;
      record(sample);
      inFlight = null;
      log.debug({ iteration: i, ...execution }, "query done");

      if (execution.status === "error" || execution.status === "timeout") {
        consecutiveFailures++;
        if (consecutiveFailures >= options.maxConsecutiveFailures) {
          fail(
            `${String(consecutiveFailures)} consecutive failures, last: ${execution.detail ?? execution.status}`
          );
          break;
        }
      } else if (execution.status === "ok") {
        consecutiveFailures = 0;
      }
    }
  } catch (error) {
    fail(errorMessage(error));
    if (inFlight !== null) {
      record({
        iterationIndex: inFlight,
        elapsedMs: null,
        utilizationPct: null,
        memoryMb: null,
        status: "error",
        error: result.failureReason,
        timestamp: now().toISOString(),
      });
    }
  } finally {
    enter("CLOSING");
    if (session) {
      try {
        await session.stop();
      } catch (error) {
        log.warn({ err: errorMessage(error) }, "error while closing session");
      }
    }
    enter("CLOSED");
  }

  for (let i = result.samples.length; i < iterations; i++) {
    record({
      iterationIndex: i,
      elapsedMs: null,
      utilizationPct: null,
      memoryMb: null,
      status: "skipped",
      error: result.failureReason,
      timestamp: now().toISOString(),
    });
  }

  return result;
}
