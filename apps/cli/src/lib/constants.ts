import { homedir } from "os";
import { join } from "path";

// Local config
export const FTSUB_DIR = join(homedir(), ".ftsub");
export const CONFIG_FILE = join(FTSUB_DIR, "config.toml");

// Scheduler client
export const BSUB_BIN = "bsub";

// Interpreter line of generated job files
export const JOB_SHELL = "/bin/sh";

// Trainer log smoothing (exponential moving average weight)
export const DEFAULT_LOSS_ALPHA = 0.1;
