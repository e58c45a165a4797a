/**
 * Error codes for all CLI error types.
 * Each code maps to a specific failure with predefined messaging.
 */
export type ErrorCode =
  // External CLI errors
  | "CLI_NOT_FOUND"
  | "CLI_COMMAND_FAILED"
  | "CLI_OUTPUT_INVALID"
  | "AUTH_LOGIN_FAILED"
  // Lookup errors
  | "APP_NOT_FOUND"
  // Filesystem errors
  | "DIRECTORY_NOT_FOUND"
  | "NOT_A_DIRECTORY"
  | "DOWNLOAD_TIMEOUT"
  | "ARCHIVE_EXISTS"
  | "FILE_OPERATION_FAILED"
  | "METADATA_NOT_FOUND"
  | "METADATA_AMBIGUOUS"
  // Archive errors
  | "ARCHIVE_INVALID"
  // Validation errors
  | "VALIDATION_CONFIG_INVALID"
  | "VALIDATION_INVALID_OPTION"
  // Generic
  | "UNKNOWN_ERROR";

/** Steps of a sync run, in execution order. */
export type SyncStep =
  | "prepare"
  | "authenticate"
  | "resolve"
  | "download"
  | "archive"
  | "clean"
  | "extract"
  | "rename"
  | "format";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  details?: string;
  step?: SyncStep;
  cause?: Error;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;
  readonly step?: SyncStep;

  constructor(code: ErrorCode, message: string, options?: CLIErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
    this.step = options?.step;
  }

  /**
   * Copy of this error tagged with the step it failed in.
   */
  atStep(step: SyncStep): CLIError {
    return new CLIError(this.code, this.message, {
      suggestion: this.suggestion,
      example: this.example,
      details: this.details,
      step,
      cause: this.cause instanceof Error ? this.cause : undefined,
    });
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
