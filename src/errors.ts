/**
 * Error types for the proposal pipeline.
 *
 * Configuration errors are raised before any side effect and are never retried.
 * Tool failures are not errors here: they travel as ValidationReport data.
 * AuditWriteError is the one failure that must always surface.
 */

export type ErrorCode =
  | "CONFIGURATION"
  | "NOT_ALLOW_LISTED"
  | "SCOPE_NOT_ALLOWED"
  | "MISSING_CREDENTIAL"
  | "UNSUPPORTED_PLATFORM"
  | "INVALID_REPO_URL"
  | "INVALID_PROPOSAL_URL"
  | "INVALID_FILE_SET"
  | "SANDBOX_TIMEOUT"
  | "SANDBOX_EXECUTION"
  | "VALIDATION_FAILED"
  | "PUBLISH_FAILED"
  | "AUDIT_WRITE_FAILED";

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, code: ErrorCode = "CONFIGURATION", options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class NotAllowListedError extends ConfigurationError {
  constructor(readonly target: string) {
    super(`Target not allow-listed: ${target}`, "NOT_ALLOW_LISTED");
  }
}

export class ScopeNotAllowedError extends ConfigurationError {
  constructor(
    readonly scope: string,
    readonly value: string,
    readonly allowed: readonly string[],
  ) {
    super(`${scope} not allowed: ${value}. Allowed: ${allowed.join(", ")}`, "SCOPE_NOT_ALLOWED");
  }
}

export class MissingCredentialError extends ConfigurationError {
  constructor(readonly platform: string) {
    super(`No ${platform} token configured`, "MISSING_CREDENTIAL");
  }
}

export class UnsupportedPlatformError extends ConfigurationError {
  constructor(readonly url: string) {
    super(`Unsupported repository platform: ${url}`, "UNSUPPORTED_PLATFORM");
  }
}

export class InvalidRepoUrlError extends ConfigurationError {
  constructor(readonly url: string, platform: string) {
    super(`Invalid ${platform} repository URL: ${url}`, "INVALID_REPO_URL");
  }
}

export class InvalidProposalUrlError extends ConfigurationError {
  constructor(readonly url: string, platform: string) {
    super(`Invalid ${platform} proposal URL: ${url}`, "INVALID_PROPOSAL_URL");
  }
}

export class InvalidFileSetError extends ConfigurationError {
  constructor(readonly path: string, reason: string) {
    super(`Invalid file path '${path}': ${reason}`, "INVALID_FILE_SET");
  }
}

export class SandboxTimeoutError extends PipelineError {
  constructor(readonly tool: string, readonly timeoutMs: number) {
    super("SANDBOX_TIMEOUT", `${tool} timed out after ${timeoutMs}ms`);
  }
}

export class SandboxExecutionError extends PipelineError {
  constructor(readonly tool: string, message: string, options?: { cause?: unknown }) {
    super("SANDBOX_EXECUTION", `${tool}: ${message}`, options);
  }
}

export class ValidationFailedError extends PipelineError {
  constructor(message: string) {
    super("VALIDATION_FAILED", message);
  }
}

export class PublishError extends PipelineError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("PUBLISH_FAILED", message, options);
  }
}

export class AuditWriteError extends PipelineError {
  constructor(readonly file: string, options?: { cause?: unknown }) {
    super("AUDIT_WRITE_FAILED", `Failed to write audit entry to ${file}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
