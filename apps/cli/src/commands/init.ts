import { existsSync } from "fs";
import type { Command } from "commander";
import { confirm, input, select } from "@inquirer/prompts";
import type { FtsubConfig } from "@ftsub/shared";
import { defaultConfig, loadConfig, saveConfig } from "@/core/config.ts";
import { listPresets } from "@/core/presets.ts";
import { normalizeGpuType, parseGpuCount } from "@/core/job-spec.ts";
import { CONFIG_FILE } from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";
import { formatDetail, theme } from "@/lib/theme.ts";

export function registerInitCommand(program: Command) {
  program
    .command("init")
    .description("Write default job settings to ~/.ftsub/config.toml")
    .option("--force", "overwrite an existing config without asking")
    .action(async (options: { force?: boolean }) => {
      try {
        await runInit(options);
      } catch (error) {
        if (error instanceof Error) {
          if (error.message.includes("User force closed")) {
            console.log("\n");
            process.exit(0);
          }
          console.error(theme.error(`\nSetup failed: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

function validateWith(check: (value: string) => unknown) {
  return (value: string): true | string => {
    try {
      check(value);
      return true;
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  };
}

function validateQueue(value: string): true | string {
  return /^\S+$/.test(value.trim()) || "Queue names must be a single word.";
}

function loadCurrentConfig(force?: boolean): FtsubConfig {
  try {
    return loadConfig();
  } catch (error) {
    // --force replaces a broken file instead of refusing to start
    if (force && error instanceof ConfigError) return defaultConfig();
    throw error;
  }
}

async function runInit(options: { force?: boolean }) {
  if (existsSync(CONFIG_FILE) && !options.force) {
    const overwrite = await confirm({
      message: `${CONFIG_FILE} already exists. Overwrite?`,
      default: false,
    });
    if (!overwrite) {
      console.log(theme.muted("Kept existing config."));
      return;
    }
  }

  // Start from whatever is there so custom presets survive a re-init
  const current = loadCurrentConfig(options.force);

  const gpuType = await input({
    message: "Default GPU type:",
    default: current.defaults.gpu_type,
    validate: validateWith(normalizeGpuType),
  });

  const gpuCount = await input({
    message: "Default GPU count:",
    default: String(current.defaults.gpu_count),
    validate: validateWith(parseGpuCount),
  });

  const preset = await select({
    message: "Default training preset:",
    default: current.defaults.preset,
    choices: listPresets(current).map((p) => ({
      name: `${p.name}  ${theme.muted(p.command)}`,
      value: p.name,
    })),
  });

  const defaultQueue = await input({
    message: "Default LSF queue:",
    default: current.queues.default,
    validate: validateQueue,
  });

  const v100Queue = await input({
    message: "Queue for V100 jobs:",
    default: current.queues.by_gpu_type["V100"] ?? "gpu",
    validate: validateQueue,
  });

  const config: FtsubConfig = {
    queues: {
      default: defaultQueue.trim(),
      by_gpu_type: { ...current.queues.by_gpu_type, V100: v100Queue.trim() },
    },
    defaults: {
      gpu_type: normalizeGpuType(gpuType),
      gpu_count: parseGpuCount(gpuCount),
      preset,
    },
    presets: current.presets,
  };

  saveConfig(config);

  console.log(theme.success(`\n✓ Saved ${CONFIG_FILE}`));
  console.log(
    formatDetail(
      "Defaults",
      `${config.defaults.gpu_count}x ${config.defaults.gpu_type}, preset ${preset}`,
    ),
  );
  console.log(
    formatDetail(
      "Queues",
      `V100 → ${config.queues.by_gpu_type["V100"]}, other → ${config.queues.default}`,
    ),
  );
}
