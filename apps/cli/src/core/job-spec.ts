import type {
  FtsubConfig,
  JobSpec,
  QueueMap,
  TrainingPreset,
} from "@ftsub/shared";
import { ENV_VARS } from "@ftsub/shared";
import { JobSpecError } from "@/lib/errors.ts";
import { resolvePreset } from "./presets.ts";

/** Values given on the command line; each one wins over env and config. */
export interface JobFlags {
  preset?: string;
  gpu?: string;
  type?: string;
  name?: string;
}

export type Env = Record<string, string | undefined>;

export interface ResolvedJob {
  preset: TrainingPreset;
  spec: JobSpec;
}

/**
 * Job names become file names (`<name>.sh`, `.out`, `.err`) in the
 * working directory and the argument of `#BSUB -J`.
 */
export function validateJobName(name: string): string {
  if (name.length === 0) {
    throw new JobSpecError("Job name must not be empty.");
  }
  if (name === "." || name === "..") {
    throw new JobSpecError(`Invalid job name: "${name}".`);
  }
  if (/[/\\]/.test(name)) {
    throw new JobSpecError(
      `Invalid job name: "${name}". Path separators are not allowed.`,
    );
  }
  if (/\s/.test(name)) {
    throw new JobSpecError(
      `Invalid job name: "${name}". Whitespace is not allowed.`,
    );
  }
  return name;
}

export function parseGpuCount(input: string): number {
  const trimmed = input.trim();
  const count = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (!Number.isSafeInteger(count) || count <= 0) {
    throw new JobSpecError(
      `Invalid GPU count: "${input}". Must be a positive integer (e.g., 1, 2, 4).`,
    );
  }
  return count;
}

/**
 * Check a spec built elsewhere (tests, library callers) against the same
 * rules resolveJob applies.
 */
export function assertValidJobSpec(spec: JobSpec): void {
  validateJobName(spec.jobName);
  if (!Number.isSafeInteger(spec.gpuCount) || spec.gpuCount < 1) {
    throw new JobSpecError(
      `Invalid GPU count: ${spec.gpuCount}. Must be a positive integer.`,
    );
  }
}

export function normalizeGpuType(input: string): string {
  const gpuType = input.trim().toUpperCase();
  if (gpuType.length === 0) {
    throw new JobSpecError("GPU type must not be empty.");
  }
  return gpuType;
}

/**
 * Pick the queue for a GPU type. Types without an entry fall back to the
 * default queue instead of failing.
 */
export function selectQueue(gpuType: string, queues: QueueMap): string {
  const key = gpuType.toUpperCase();
  for (const [type, queue] of Object.entries(queues.byGpuType)) {
    if (type.toUpperCase() === key) return queue;
  }
  return queues.default;
}

export function queueMapFromConfig(config: FtsubConfig): QueueMap {
  return {
    default: config.queues.default,
    byGpuType: config.queues.by_gpu_type,
  };
}

// Empty variables count as unset, same as ${VAR:-default}
function fromEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Build the job description from flags, then environment, then config
 * defaults, then the preset's own job name.
 */
export function resolveJob(
  flags: JobFlags,
  env: Env,
  config: FtsubConfig,
  forwardedArgs: string[] = [],
): ResolvedJob {
  const preset = resolvePreset(flags.preset ?? config.defaults.preset, config);

  const rawType =
    flags.type ?? fromEnv(env, ENV_VARS.gpuType) ?? config.defaults.gpu_type;
  const rawCount = flags.gpu ?? fromEnv(env, ENV_VARS.gpuCount);
  const rawName =
    flags.name ?? fromEnv(env, ENV_VARS.jobName) ?? preset.jobName;

  return {
    preset,
    spec: {
      gpuType: normalizeGpuType(rawType),
      gpuCount:
        rawCount === undefined
          ? config.defaults.gpu_count
          : parseGpuCount(rawCount),
      jobName: validateJobName(rawName),
      forwardedArgs: [...forwardedArgs],
    },
  };
}
