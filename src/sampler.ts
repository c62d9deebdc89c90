import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { BackendName, DeviceSample } from "./types.js";

export interface ResourceSampler {
  /** Best effort: absent counters come back as null, never as an error. */
  sample(backend: BackendName): Promise<DeviceSample>;
}

export type ExecCommand = (command: string, args: string[]) => Promise<string>;

const execFileAsync = promisify(execFile);

const runCommand: ExecCommand = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { timeout: 10_000 });
  return stdout;
};

const EMPTY_SAMPLE: DeviceSample = { utilizationPct: null, memoryMb: null };

function parseCounter(field: string | undefined): number | null {
  if (field === undefined) return null;
  const value = Number.parseFloat(field.trim());
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse `nvidia-smi --query-gpu=utilization.gpu,memory.used --format=csv,noheader,nounits`
 * output, e.g. "87, 10240".
 */
export function parseNvidiaSmi(output: string): DeviceSample {
  const line = output.split("\n").find((l) => l.trim().length > 0);
  if (line === undefined) return EMPTY_SAMPLE;
  const [utilization, memory] = line.split(",");
  return { utilizationPct: parseCounter(utilization), memoryMb: parseCounter(memory) };
}

/**
 * Reads GPU counters through nvidia-smi. The CPU backend has no device, so
 * DuckDB sessions get empty samples without running anything.
 */
export class NvidiaSmiSampler implements ResourceSampler {
  private readonly log = logger.child({ component: "sampler" });

  constructor(
    private readonly command = "nvidia-smi",
    private readonly gpuIndex = 0,
    private readonly exec: ExecCommand = runCommand
  ) {}

  async sample(backend: BackendName): Promise<DeviceSample> {
    if (backend === "duckdb") return EMPTY_SAMPLE;
    try {
      const output = await this.exec(this.command, [
        "--query-gpu=utilization.gpu,memory.used",
        "--format=csv,noheader,nounits",
        `--id=${String(this.gpuIndex)}`,
      ]);
      return parseNvidiaSmi(output);
    } catch (error) {
      this.log.debug({ err: errorMessage(error) }, "device counters unavailable");
      return EMPTY_SAMPLE;
    }
  }
}
