// --- Job description ---

export interface JobSpec {
  /** Upper-cased GPU model, e.g. "V100" or "A100". Selects the queue. */
  gpuType: string;
  gpuCount: number;
  /** Scheduler job name; also the base name of the .sh/.out/.err files */
  jobName: string;
  forwardedArgs: string[];
}

export interface QueueMap {
  /** Queue used for any GPU type without an explicit entry */
  default: string;
  byGpuType: Record<string, string>;
}

export interface TrainingPreset {
  name: string;
  command: string;
  jobName: string;
  description?: string;
}

// --- Submission ---

export interface BsubReceipt {
  jobId: string;
  queue: string;
}

export interface SubmissionResult {
  jobId: string | null;
  queue: string | null;
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Path the job file was written to (already removed on return) */
  scriptPath: string;
}

// --- Trainer logs ---

export interface LossPoint {
  step: number;
  loss: number;
  epoch?: number;
  learningRate?: number;
}

// --- Config types ---

export interface FtsubConfig {
  queues: {
    default: string;
    by_gpu_type: Record<string, string>;
  };
  defaults: {
    gpu_type: string;
    gpu_count: number;
    preset: string;
  };
  presets: Record<
    string,
    {
      command: string;
      job_name: string;
      description?: string;
    }
  >;
}
