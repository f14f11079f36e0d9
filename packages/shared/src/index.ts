export {
  DEFAULT_QUEUES,
  JOB_DEFAULTS,
  ENV_VARS,
  JOB_FILES,
} from "./constants.ts";
export type {
  JobSpec,
  QueueMap,
  TrainingPreset,
  BsubReceipt,
  SubmissionResult,
  LossPoint,
  FtsubConfig,
} from "./types.ts";
