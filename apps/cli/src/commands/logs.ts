import type { Command } from "commander";
import { readJobLogs } from "@/core/job-logs.ts";
import { reportError, theme } from "@/lib/theme.ts";

interface LogsOptions {
  out?: boolean;
  err?: boolean;
}

export function registerLogsCommand(program: Command) {
  program
    .command("logs")
    .description("View a job's output files in the current directory")
    .argument("<jobName>", "job name used at submission")
    .option("--out", "show stdout only")
    .option("--err", "show stderr only")
    .action((jobName: string, options: LogsOptions) => {
      try {
        runLogs(jobName, options);
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}

function runLogs(jobName: string, options: LogsOptions) {
  const logs = readJobLogs(process.cwd(), jobName);
  // Neither flag means both streams
  const showOut = options.out || !options.err;
  const showErr = options.err || !options.out;

  if (showOut) printStream(logs.outPath, logs.out);
  if (showErr) printStream(logs.errPath, logs.err);
}

function printStream(path: string, content: string | null): void {
  console.log(theme.info(`\n==> ${path} <==`));
  if (content === null) {
    console.log(theme.muted("  (not written yet)"));
    return;
  }
  process.stdout.write(content.endsWith("\n") ? content : content + "\n");
}
