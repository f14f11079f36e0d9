import type { Command } from "commander";
import { addJobOptions, prepareJob } from "@/lib/job-options.ts";
import { reportError } from "@/lib/theme.ts";
import type { JobFlags } from "@/core/job-spec.ts";

export function registerRenderCommand(program: Command) {
  const cmd = program
    .command("render")
    .description("Print the LSF job file without submitting it")
    .passThroughOptions()
    .allowUnknownOption()
    .argument("[args...]", "arguments forwarded to the training command");

  addJobOptions(cmd).action((args: string[], options: JobFlags) => {
    try {
      const { preset, spec, lsf } = prepareJob(options, args);
      // Plain stdout so the result can be piped: ftsub render | bsub
      process.stdout.write(lsf.render(spec, preset.command));
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  });
}
