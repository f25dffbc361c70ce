/** stage identifiers reported by build pipelines */
export type BuildStage =
  | "preflight"
  | "kernel"
  | "userland"
  | "runtime"
  | "application"
  | "init"
  | "archive"
  | "image"
  | "export"
  | "rootfs"
  | "firmware"
  | "package";

export type ValidationCheck = "exists" | "size" | "boot" | "functional";

/** bytes of tool output kept on a failure */
const MAX_FAILURE_OUTPUT = 16 * 1024;

/**
 * Thrown when a build configuration is rejected, before any work starts.
 */
export class ConfigurationError extends Error {
  /** offending field path (e.g. `vmOptions.memoryMb`) */
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(field ? `invalid ${field}: ${message}` : message);
    this.name = "ConfigurationError";
    this.field = field;
  }
}

/**
 * Thrown by the pre-flight check when required host tools are absent.
 */
export class DependencyMissingError extends Error {
  readonly missing: readonly string[];

  constructor(missing: readonly string[], context?: string) {
    const prefix = context ? `${context}: ` : "";
    super(`${prefix}missing required tools: ${missing.join(", ")}`);
    this.name = "DependencyMissingError";
    this.missing = Object.freeze([...missing]);
  }
}

/**
 * A build stage aborted. `output` holds the tail of the failing tool's output.
 */
export class StageFailure extends Error {
  readonly stage: BuildStage;
  readonly detail: string;
  readonly output: string;

  constructor(stage: BuildStage, detail: string, output = "") {
    super(`${stage} stage failed: ${detail}`);
    this.name = "StageFailure";
    this.stage = stage;
    this.detail = detail;
    this.output = tailOutput(output);
  }
}

/**
 * A validation check failed. Reported inside the validation report, never
 * retried.
 */
export class ValidationFailure extends Error {
  readonly check: ValidationCheck;
  readonly detail: string;

  constructor(check: ValidationCheck, detail: string) {
    super(`${check} check failed: ${detail}`);
    this.name = "ValidationFailure";
    this.check = check;
    this.detail = detail;
  }
}

export function tailOutput(output: string, limit = MAX_FAILURE_OUTPUT): string {
  if (output.length <= limit) return output;
  return output.slice(output.length - limit);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
