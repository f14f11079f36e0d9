import { rmSync, writeFileSync } from "fs";
import { join } from "path";
import { execa } from "execa";
import type { JobSpec, QueueMap, SubmissionResult } from "@ftsub/shared";
import { DEFAULT_QUEUES, JOB_FILES } from "@ftsub/shared";
import { assertValidJobSpec } from "./job-spec.ts";
import { generateJobScript } from "@/templates/bsub.ts";
import { parseBsubOutput } from "@/parsers/bsub.ts";
import { BSUB_BIN } from "@/lib/constants.ts";
import { SchedulerUnavailableError } from "@/lib/errors.ts";

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd: string;
  /** File streamed to the child's stdin */
  inputFile: string;
}

/**
 * Runs an external command to completion. A non-zero exit is a normal
 * result, not an exception; only a command that cannot be started throws.
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: RunOptions,
) => Promise<CommandOutput>;

export const execaRunner: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    cwd: options.cwd,
    inputFile: options.inputFile,
    reject: false,
  });

  if (result.failed && "code" in result && result.code === "ENOENT") {
    throw new SchedulerUnavailableError(file);
  }

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? 1,
  };
};

export interface LsfClientOptions {
  /** Directory the job file is written to and bsub runs in */
  cwd?: string;
  queues?: QueueMap;
  bsubPath?: string;
  runner?: CommandRunner;
}

export class LsfClient {
  private cwd: string;
  private queues: QueueMap;
  private bsubPath: string;
  private runner: CommandRunner;

  constructor(options: LsfClientOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.queues = options.queues ?? DEFAULT_QUEUES;
    this.bsubPath = options.bsubPath ?? BSUB_BIN;
    this.runner = options.runner ?? execaRunner;
  }

  render(spec: JobSpec, trainingCommand: string): string {
    assertValidJobSpec(spec);
    return generateJobScript(spec, trainingCommand, this.queues);
  }

  scriptPath(jobName: string): string {
    return join(this.cwd, JOB_FILES.script(jobName));
  }

  /**
   * Write `<jobName>.sh`, feed it to bsub on stdin, and remove it again.
   * The file is removed on every path out, including a failed write or spawn.
   * An existing file with the same name is overwritten.
   */
  async submit(
    spec: JobSpec,
    trainingCommand: string,
  ): Promise<SubmissionResult> {
    const script = this.render(spec, trainingCommand);
    const scriptPath = this.scriptPath(spec.jobName);

    try {
      writeFileSync(scriptPath, script, { mode: 0o755 });
      const output = await this.runner(this.bsubPath, [], {
        cwd: this.cwd,
        inputFile: scriptPath,
      });
      const receipt = parseBsubOutput(output.stdout);

      return {
        jobId: receipt?.jobId ?? null,
        queue: receipt?.queue ?? null,
        exitCode: output.exitCode,
        stdout: output.stdout.trim(),
        stderr: output.stderr.trim(),
        scriptPath,
      };
    } finally {
      rmSync(scriptPath, { force: true });
    }
  }
}
