import { z } from "zod";
import type { FtsubConfig, TrainingPreset } from "@ftsub/shared";
import builtinPresetData from "../../presets.json";
import { ConfigError, UnknownPresetError } from "@/lib/errors.ts";
import { PresetEntrySchema } from "./config.ts";

const PresetFileSchema = z.record(PresetEntrySchema);

type PresetEntries = z.infer<typeof PresetFileSchema>;

/** Built-in presets are bundled into the CLI, so they load from any directory. */
export function loadBuiltinPresets(
  data: unknown = builtinPresetData,
): PresetEntries {
  try {
    return PresetFileSchema.parse(data);
  } catch (error) {
    throw new ConfigError(
      `Failed to load built-in presets: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Built-in presets with the user's config presets layered on top.
 * A config entry with the same name replaces the built-in one entirely.
 */
export function listPresets(
  config: FtsubConfig,
  builtins: PresetEntries = loadBuiltinPresets(),
): TrainingPreset[] {
  const merged = { ...builtins, ...config.presets };
  return Object.entries(merged).map(([name, entry]) => ({
    name,
    command: entry.command,
    jobName: entry.job_name,
    description: entry.description,
  }));
}

export function resolvePreset(
  name: string,
  config: FtsubConfig,
  builtins?: PresetEntries,
): TrainingPreset {
  const presets = listPresets(config, builtins);
  const preset = presets.find((p) => p.name === name);
  if (!preset) {
    throw new UnknownPresetError(
      name,
      presets.map((p) => p.name),
    );
  }
  return preset;
}
