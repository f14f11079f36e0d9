import type { JobSpec, QueueMap } from "@ftsub/shared";
import { JOB_FILES } from "@ftsub/shared";
import { selectQueue } from "@/core/job-spec.ts";
import { JOB_SHELL } from "@/lib/constants.ts";
import { JobSpecError } from "@/lib/errors.ts";
import { shellJoin } from "@/lib/shell-quote.ts";

/**
 * Generate the `#BSUB` directive block for a job.
 */
export function generateDirectives(spec: JobSpec, queues: QueueMap): string[] {
  const queue = selectQueue(spec.gpuType, queues);
  if (!/^\S+$/.test(queue)) {
    throw new JobSpecError(`Invalid queue name: ${JSON.stringify(queue)}.`);
  }

  return [
    `#BSUB -gpu "num=${spec.gpuCount}:mode=exclusive_process"`,
    `#BSUB -n ${spec.gpuCount}`,
    `#BSUB -q ${queue}`,
    `#BSUB -o ${JOB_FILES.stdout(spec.jobName)}`,
    `#BSUB -e ${JOB_FILES.stderr(spec.jobName)}`,
    `#BSUB -J ${spec.jobName}`,
  ];
}

/**
 * The training command with forwarded arguments appended. Arguments that
 * need no quoting are copied as typed.
 */
export function buildCommandLine(
  trainingCommand: string,
  forwardedArgs: string[],
): string {
  const command = trainingCommand.trim();
  if (/[\r\n]/.test(command)) {
    throw new JobSpecError(
      `Training command must be a single line: ${JSON.stringify(command)}.`,
    );
  }
  if (forwardedArgs.length === 0) return command;
  return `${command} ${shellJoin(forwardedArgs)}`;
}

/**
 * Generate a complete LSF job file: interpreter line, directives, and the
 * single command line that launches training.
 */
export function generateJobScript(
  spec: JobSpec,
  trainingCommand: string,
  queues: QueueMap,
): string {
  const lines: string[] = [`#!${JOB_SHELL}`];

  lines.push(...generateDirectives(spec, queues));
  lines.push(buildCommandLine(trainingCommand, spec.forwardedArgs));

  return lines.join("\n") + "\n";
}
