#!/usr/bin/env node
import { Command } from "commander";
import pkg from "./package.json";
import { registerSubmitCommand } from "./src/commands/submit.ts";
import { registerRenderCommand } from "./src/commands/render.ts";
import { registerPresetsCommand } from "./src/commands/presets.ts";
import { registerInitCommand } from "./src/commands/init.ts";
import { registerLogsCommand } from "./src/commands/logs.ts";
import { registerLossCommand } from "./src/commands/loss.ts";

function buildProgram(): Command {
  const program = new Command();

  program
    .version(pkg.version)
    .name("ftsub")
    .enablePositionalOptions()
    .description("render and submit LSF fine-tuning jobs")
    .addHelpText(
      "after",
      "\nEnvironment:  GPU (type), GPUNUM (count), JOBNAME (job name)",
    );

  registerSubmitCommand(program);
  registerRenderCommand(program);
  registerPresetsCommand(program);
  registerInitCommand(program);
  registerLogsCommand(program);
  registerLossCommand(program);

  return program;
}

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
