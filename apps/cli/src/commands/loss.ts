import type { Command } from "commander";
import { readJobLogs } from "@/core/job-logs.ts";
import { parseTrainerLoss, sampleEvery, smoothLoss } from "@/parsers/index.ts";
import { DEFAULT_LOSS_ALPHA } from "@/lib/constants.ts";
import { renderTable } from "@/lib/table.ts";
import { formatDetail, reportError, theme } from "@/lib/theme.ts";

interface LossOptions {
  alpha: string;
  every: string;
  json?: boolean;
}

export function registerLossCommand(program: Command) {
  program
    .command("loss")
    .description("Summarize training loss from a job's output file")
    .argument("<jobName>", "job name used at submission")
    .option(
      "--alpha <weight>",
      "smoothing weight of the newest value (0-1]",
      String(DEFAULT_LOSS_ALPHA),
    )
    .option("--every <n>", "show every n-th logging step", "1")
    .option("--json", "output as JSON")
    .action((jobName: string, options: LossOptions) => {
      try {
        runLoss(jobName, options);
      } catch (error) {
        reportError(error, options.json);
        process.exit(1);
      }
    });
}

export function parseAlpha(input: string): number {
  const alpha = Number.parseFloat(input);
  if (Number.isNaN(alpha) || alpha <= 0 || alpha > 1) {
    throw new Error(
      `Invalid smoothing weight: "${input}". Must be in (0, 1], e.g. 0.1.`,
    );
  }
  return alpha;
}

export function parseEvery(input: string): number {
  const every = parseInt(input, 10);
  if (isNaN(every) || every <= 0) {
    throw new Error(`Invalid --every: "${input}". Must be a positive integer.`);
  }
  return every;
}

function runLoss(jobName: string, options: LossOptions) {
  const alpha = parseAlpha(options.alpha);
  const every = parseEvery(options.every);

  const logs = readJobLogs(process.cwd(), jobName);
  if (logs.out === null) {
    throw new Error(`No output file at ${logs.outPath}. Has the job started?`);
  }

  const points = smoothLoss(parseTrainerLoss(logs.out), alpha);
  const shown = sampleEvery(points, every);

  if (options.json) {
    console.log(JSON.stringify({ jobName, alpha, points: shown }, null, 2));
    return;
  }

  if (points.length === 0) {
    console.log(theme.muted(`\nNo loss entries in ${logs.outPath} yet.`));
    return;
  }

  console.log(theme.info(`\nTraining loss (${jobName}):`));
  renderTable({
    headers: ["STEP", "EPOCH", "LOSS", "SMOOTHED"],
    rows: shown.map((p) => [
      String(p.step),
      p.epoch === undefined ? "-" : p.epoch.toFixed(2),
      p.loss.toFixed(4),
      p.smoothed.toFixed(4),
    ]),
  });

  const first = points[0];
  const last = points[points.length - 1];
  if (first && last) {
    console.log();
    console.log(formatDetail("Steps logged", String(points.length)));
    console.log(
      formatDetail(
        "Smoothed loss",
        `${first.smoothed.toFixed(4)} → ${last.smoothed.toFixed(4)}`,
      ),
    );
  }
}
