import type { QueueMap } from "./types.ts";

/**
 * LSF queues on the cluster. V100 nodes sit behind their own queue;
 * everything else (A100 and newer) goes to the default GPU queue.
 */
export const DEFAULT_QUEUES: QueueMap = {
  default: "gpu2",
  byGpuType: {
    V100: "gpu",
  },
};

export const JOB_DEFAULTS = {
  gpuType: "A100",
  gpuCount: 1,
  preset: "llama-factory",
} as const;

/** Environment variables read when a flag is not given. */
export const ENV_VARS = {
  gpuType: "GPU",
  gpuCount: "GPUNUM",
  jobName: "JOBNAME",
} as const;

export const JOB_FILES = {
  script: (jobName: string) => `${jobName}.sh`,
  stdout: (jobName: string) => `${jobName}.out`,
  stderr: (jobName: string) => `${jobName}.err`,
} as const;
