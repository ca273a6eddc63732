/**
 * Publish error taxonomy.
 *
 * Every failure that ends a publish run is one of these. The action entry
 * point does not retry or recover: it writes evidence and fails the step.
 */

export type PublishErrorCode =
  | "INVALID_MODE"
  | "MISSING_VERSION"
  | "EXTERNAL_TOOL_FAILURE"
  | "CONFIG_INVALID";

export type ValidationIssue = {
  level: "error" | "warning";
  code: string;
  path: string;
  message: string;
  suggestion?: string;
};

export abstract class PublishError extends Error {
  abstract readonly code: PublishErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidModeError extends PublishError {
  readonly code = "INVALID_MODE";

  constructor(readonly mode: string) {
    super(`mode must be "nightly" or "release" (got "${mode}")`);
  }
}

export class MissingVersionError extends PublishError {
  readonly code = "MISSING_VERSION";

  constructor(readonly source?: string) {
    super(
      source
        ? `release mode requires a version, but none was resolved from ${source}`
        : "release mode requires a non-empty version"
    );
  }
}

/** exitCode is undefined when the tool never started (not on PATH, spawn error). */
export class ExternalToolFailure extends PublishError {
  readonly code = "EXTERNAL_TOOL_FAILURE";

  constructor(readonly command: string, readonly exitCode: number | undefined, readonly cause?: unknown) {
    super(
      exitCode === undefined
        ? `${command} could not be started: ${cause instanceof Error ? cause.message : String(cause)}`
        : `${command} failed with exit code ${exitCode}`
    );
  }
}

export class ConfigError extends PublishError {
  readonly code = "CONFIG_INVALID";

  constructor(message: string, readonly issues: ValidationIssue[] = []) {
    super(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
