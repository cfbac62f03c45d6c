export type ErrorCode =
  | "conflict"
  | "not_found"
  | "invalid_state"
  | "record_unreadable"
  | "bad_request"
  | "config"
  | "fetch_failed"
  | "dependency_install_failed"
  | "sbom_generation_failed"
  | "scan_failed"
  | "tool_acquisition_failed"
  | "malformed_input"
  | "empty_input"
  | "stage_timeout"
  | "cancelled"
  | "internal";

export class BomkeeperError extends Error {
  readonly code: ErrorCode = "internal";

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "BomkeeperError";
  }
}

// =============================================================================
// REGISTRY ERRORS
// =============================================================================

export class JobConflictError extends BomkeeperError {
  override readonly code = "conflict";

  constructor(public readonly jobId: string, public readonly status: string) {
    super(`Job '${jobId}' already exists and is ${status}`);
    this.name = "JobConflictError";
  }
}

export class JobNotFoundError extends BomkeeperError {
  override readonly code = "not_found";

  constructor(public readonly jobId: string) {
    super(`Job '${jobId}' not found`);
    this.name = "JobNotFoundError";
  }
}

export class InvalidJobStateError extends BomkeeperError {
  override readonly code = "invalid_state";

  constructor(message: string) {
    super(message);
    this.name = "InvalidJobStateError";
  }
}

/** A terminal record on disk is missing or no longer parses. */
export class RecordUnreadableError extends BomkeeperError {
  override readonly code = "record_unreadable";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RecordUnreadableError";
  }
}

export class InvalidRequestError extends BomkeeperError {
  override readonly code = "bad_request";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InvalidRequestError";
  }
}

export class ConfigError extends BomkeeperError {
  override readonly code = "config";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

// =============================================================================
// STAGE ERRORS
// =============================================================================

export class FetchError extends BomkeeperError {
  override readonly code = "fetch_failed";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "FetchError";
  }
}

export class DependencyInstallError extends BomkeeperError {
  override readonly code = "dependency_install_failed";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DependencyInstallError";
  }
}

export class SbomGenerationError extends BomkeeperError {
  override readonly code = "sbom_generation_failed";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SbomGenerationError";
  }
}

export class ScanError extends BomkeeperError {
  override readonly code = "scan_failed";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ScanError";
  }
}

export class ToolAcquisitionError extends BomkeeperError {
  override readonly code = "tool_acquisition_failed";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ToolAcquisitionError";
  }
}

export class StageTimeoutError extends BomkeeperError {
  override readonly code = "stage_timeout";

  constructor(
    public readonly stage: string,
    public readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(`Stage ${stage} timed out after ${timeoutMs}ms`, cause);
    this.name = "StageTimeoutError";
  }
}

export class JobCancelledError extends BomkeeperError {
  override readonly code = "cancelled";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "JobCancelledError";
  }
}

// =============================================================================
// RECONCILIATION INPUT ERRORS
// =============================================================================

export class EmptyInputError extends BomkeeperError {
  override readonly code = "empty_input";

  constructor(public readonly source: string) {
    super(`${source} is empty`);
    this.name = "EmptyInputError";
  }
}

export class MalformedInputError extends BomkeeperError {
  override readonly code = "malformed_input";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "MalformedInputError";
  }
}

export type StageErrorFactory = (message: string, cause?: unknown) => BomkeeperError;

export function resolveErrorCode(error: unknown): ErrorCode {
  if (error instanceof BomkeeperError) return error.code;
  return "internal";
}
