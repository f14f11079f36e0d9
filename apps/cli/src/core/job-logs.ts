import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { JOB_FILES } from "@ftsub/shared";
import { validateJobName } from "./job-spec.ts";

export interface JobLogs {
  outPath: string;
  errPath: string;
  /** null when the file doesn't exist yet (job pending, or wrong cwd) */
  out: string | null;
  err: string | null;
}

function readIfPresent(path: string): string | null {
  return existsSync(path) ? readFileSync(path, "utf-8") : null;
}

/**
 * Read the `#BSUB -o` / `-e` files of a job. LSF writes them relative to
 * the submission directory, so `cwd` should be where `submit` ran.
 */
export function readJobLogs(cwd: string, jobName: string): JobLogs {
  validateJobName(jobName);
  const outPath = join(cwd, JOB_FILES.stdout(jobName));
  const errPath = join(cwd, JOB_FILES.stderr(jobName));

  return {
    outPath,
    errPath,
    out: readIfPresent(outPath),
    err: readIfPresent(errPath),
  };
}
