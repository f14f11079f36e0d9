import type { Command } from "commander";
import { loadConfig } from "@/core/config.ts";
import { listPresets } from "@/core/presets.ts";
import { renderTable } from "@/lib/table.ts";
import { reportError, theme } from "@/lib/theme.ts";

export function registerPresetsCommand(program: Command) {
  program
    .command("presets")
    .description("List training entry points")
    .option("--json", "output as JSON")
    .action((options: { json?: boolean }) => {
      try {
        runPresets(options);
      } catch (error) {
        reportError(error, options.json);
        process.exit(1);
      }
    });
}

function runPresets(options: { json?: boolean }) {
  const config = loadConfig();
  const presets = listPresets(config);
  const defaultName = config.defaults.preset;

  if (options.json) {
    console.log(
      JSON.stringify(
        presets.map((p) => ({ ...p, default: p.name === defaultName })),
        null,
        2,
      ),
    );
    return;
  }

  console.log(theme.info("\nTraining presets:"));
  renderTable({
    headers: ["NAME", "JOB NAME", "COMMAND"],
    rows: presets.map((p) => [
      p.name === defaultName ? theme.accent(`${p.name} *`) : p.name,
      p.jobName,
      p.command,
    ]),
  });
  console.log(
    theme.muted(`\n  * default (ftsub submit -p <name> to pick another)`),
  );
}
