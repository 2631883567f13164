// Collaborator failure taxonomy.
// Command rejections (already active, busy, ...) are CommandResult values, not errors.

export class DeviceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeviceUnavailableError";
  }
}

export class TranscriptionError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Transcription failed: ${reason}`);
    this.name = "TranscriptionError";
    this.reason = reason;
  }
}

export class InputInjectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputInjectionError";
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}
