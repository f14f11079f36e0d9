import type { Command } from "commander";
import ora from "ora";
import type { SubmissionResult, TrainingPreset } from "@ftsub/shared";
import { JOB_FILES } from "@ftsub/shared";
import { addJobOptions, prepareJob } from "@/lib/job-options.ts";
import { formatDetail, reportError, theme } from "@/lib/theme.ts";
import type { JobFlags } from "@/core/job-spec.ts";

interface SubmitOptions extends JobFlags {
  dryRun?: boolean;
  json?: boolean;
}

export function registerSubmitCommand(program: Command) {
  const cmd = program
    .command("submit")
    .description("Submit a fine-tuning job to LSF")
    .passThroughOptions()
    .allowUnknownOption()
    .argument("[args...]", "arguments forwarded to the training command");

  addJobOptions(cmd)
    .option("--dry-run", "print the job file instead of submitting it")
    .option("--json", "output as JSON")
    .addHelpText(
      "after",
      "\nUse -- before forwarded flags that clash with ftsub's own:\n  ftsub submit -g 2 -- --name run7",
    )
    .action(async (args: string[], options: SubmitOptions) => {
      try {
        await runSubmit(args, options);
      } catch (error) {
        reportError(error, options.json);
        process.exit(1);
      }
    });
}

async function runSubmit(args: string[], options: SubmitOptions) {
  const { preset, spec, lsf } = prepareJob(options, args);

  if (options.dryRun) {
    const script = lsf.render(spec, preset.command);
    if (options.json) {
      console.log(
        JSON.stringify({ spec, preset: preset.name, script }, null, 2),
      );
    } else {
      process.stdout.write(script);
    }
    return;
  }

  const spinner = options.json
    ? null
    : ora(`Submitting ${spec.jobName}...`).start();
  let result: SubmissionResult;
  try {
    result = await lsf.submit(spec, preset.command);
  } finally {
    spinner?.stop();
  }

  const outcome = describeSubmission(result, spec.jobName);

  if (options.json) {
    console.log(
      JSON.stringify(
        { jobName: spec.jobName, preset: preset.name, ...result },
        null,
        2,
      ),
    );
  } else {
    printResult(result, outcome, spec.jobName, preset);
  }

  if (outcome.exitCode !== 0) {
    process.exitCode = outcome.exitCode;
  }
}

export interface SubmissionOutcome {
  status: "submitted" | "unconfirmed" | "failed";
  message: string;
  /** Process exit code: bsub's own status */
  exitCode: number;
}

export function describeSubmission(
  result: SubmissionResult,
  jobName: string,
): SubmissionOutcome {
  if (result.exitCode !== 0) {
    return {
      status: "failed",
      message: `Error: bsub exited with code ${result.exitCode}`,
      exitCode: result.exitCode,
    };
  }

  if (!result.jobId) {
    return {
      status: "unconfirmed",
      message: `bsub did not report a job ID for ${jobName}`,
      exitCode: 0,
    };
  }

  return {
    status: "submitted",
    message: `Submitted ${jobName} as job ${result.jobId} to queue ${result.queue}`,
    exitCode: 0,
  };
}

function printResult(
  result: SubmissionResult,
  outcome: SubmissionOutcome,
  jobName: string,
  preset: TrainingPreset,
): void {
  if (result.stdout) console.log(theme.muted(result.stdout));
  if (result.stderr) console.error(theme.muted(result.stderr));

  if (outcome.status === "failed") {
    console.error(theme.error(`\n${outcome.message}`));
    return;
  }

  if (outcome.status === "unconfirmed") {
    console.log(theme.warning(`\n  ⚠ ${outcome.message}`));
    return;
  }

  console.log(theme.success(`✓ ${outcome.message}`));
  console.log(formatDetail("Preset", `${preset.name} (${preset.command})`));
  console.log(
    formatDetail(
      "Output",
      `${JOB_FILES.stdout(jobName)}, ${JOB_FILES.stderr(jobName)}`,
    ),
  );
  console.log();
  console.log(theme.muted(`  ftsub logs ${jobName}`));
  console.log(theme.muted(`  ftsub loss ${jobName}`));
}
