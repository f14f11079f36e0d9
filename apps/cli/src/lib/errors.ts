export class FtsubError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends FtsubError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

export class JobSpecError extends FtsubError {
  constructor(message: string) {
    super(message, "JOB_SPEC_ERROR");
  }
}

export class UnknownPresetError extends FtsubError {
  constructor(name: string, known: string[]) {
    super(
      `Unknown preset: "${name}". Available: ${known.join(", ")}`,
      "UNKNOWN_PRESET",
    );
  }
}

export class SchedulerUnavailableError extends FtsubError {
  constructor(bin: string) {
    super(
      `Cannot run "${bin}". Make sure you are on an LSF login node and ${bin} is on your PATH.`,
      "SCHEDULER_UNAVAILABLE",
    );
  }
}
