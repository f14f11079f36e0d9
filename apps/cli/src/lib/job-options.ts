import type { Command } from "commander";
import type { FtsubConfig } from "@ftsub/shared";
import { ENV_VARS } from "@ftsub/shared";
import { loadConfig } from "@/core/config.ts";
import {
  resolveJob,
  queueMapFromConfig,
  type JobFlags,
  type ResolvedJob,
} from "@/core/job-spec.ts";
import { LsfClient } from "@/core/lsf.ts";

/**
 * Add the options that shape a job to a Commander command. Anything the
 * user doesn't pass falls back to $GPU / $GPUNUM / $JOBNAME, then config.
 */
export function addJobOptions(cmd: Command): Command {
  return cmd
    .option("-p, --preset <name>", "training entry point (see `ftsub presets`)")
    .option("-g, --gpu <n>", `number of GPUs (env: ${ENV_VARS.gpuCount})`)
    .option("-t, --type <type>", `GPU type (env: ${ENV_VARS.gpuType})`)
    .option("--name <name>", `job name (env: ${ENV_VARS.jobName})`);
}

export interface PreparedJob extends ResolvedJob {
  config: FtsubConfig;
  lsf: LsfClient;
}

export function prepareJob(
  flags: JobFlags,
  forwardedArgs: string[],
): PreparedJob {
  const config = loadConfig();
  const resolved = resolveJob(flags, process.env, config, forwardedArgs);
  const lsf = new LsfClient({ queues: queueMapFromConfig(config) });
  return { ...resolved, config, lsf };
}
