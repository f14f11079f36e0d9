import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { parse as parseTOML, stringify as stringifyTOML } from "smol-toml";
import { z } from "zod";
import type { FtsubConfig } from "@ftsub/shared";
import { DEFAULT_QUEUES, JOB_DEFAULTS } from "@ftsub/shared";
import { CONFIG_FILE } from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";

// Queue names land on a `#BSUB -q` line
const QueueNameSchema = z
  .string()
  .regex(/^\S+$/, "Queue names must be a single word without whitespace");

export const PresetEntrySchema = z.object({
  command: z
    .string()
    .min(1)
    .regex(/^[^\r\n]+$/, "Commands must fit on one line"),
  job_name: z
    .string()
    .regex(/^[^\s/\\]+$/, "Job names may not contain whitespace or slashes"),
  description: z.string().optional(),
});

export const FtsubConfigSchema = z.object({
  queues: z
    .object({
      default: QueueNameSchema.default(DEFAULT_QUEUES.default),
      by_gpu_type: z
        .record(QueueNameSchema)
        .default({ ...DEFAULT_QUEUES.byGpuType }),
    })
    .default({}),
  defaults: z
    .object({
      gpu_type: z.string().min(1).default(JOB_DEFAULTS.gpuType),
      gpu_count: z.number().int().positive().default(JOB_DEFAULTS.gpuCount),
      preset: z.string().min(1).default(JOB_DEFAULTS.preset),
    })
    .default({}),
  presets: z.record(PresetEntrySchema).default({}),
});

export function defaultConfig(): FtsubConfig {
  return FtsubConfigSchema.parse({});
}

/**
 * Load the user config. A missing file is not an error: every field has
 * a default, so callers always get a complete config back.
 */
export function loadConfig(path: string = CONFIG_FILE): FtsubConfig {
  if (!existsSync(path)) {
    return defaultConfig();
  }

  try {
    const raw = readFileSync(path, "utf-8");
    return FtsubConfigSchema.parse(parseTOML(raw));
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(
        `Invalid config at ${path}: ${error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join(", ")}`,
      );
    }
    throw new ConfigError(
      `Failed to read config at ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

export function saveConfig(
  config: FtsubConfig,
  path: string = CONFIG_FILE,
): void {
  const validated = FtsubConfigSchema.parse(config);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  writeFileSync(path, stringifyTOML(validated), { mode: 0o600 });
}
