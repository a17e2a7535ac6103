// Error types surfaced to callers. Per-archive scan failures are not thrown;
// they are collected in the sync/build stats instead.

export class CoachError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "CoachError";
  }
}

/** Stage of the save-file pipeline that failed */
export type DecodeStage = "read" | "magic" | "decrypt" | "decompress" | "json";

export class DecodeError extends CoachError {
  readonly stage: DecodeStage;

  constructor(stage: DecodeStage, message: string, options: { cause?: unknown } = {}) {
    super(`[${stage}] ${message}`, options);
    this.name = "DecodeError";
    this.stage = stage;
  }
}

/** A required input (reader module, save file, directory) is missing or unusable */
export class ConfigError extends CoachError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
