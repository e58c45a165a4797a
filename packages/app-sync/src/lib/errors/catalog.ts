import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

// ============================================================================
// External CLI Errors
// ============================================================================

export function cliNotFound(executable: string): CLIError {
  return new CLIError("CLI_NOT_FOUND", `Can't run "${executable}"`, {
    suggestion: "Install the platform CLI and make sure it is on your PATH",
    details: "Set cli.executable in the config file if it lives elsewhere",
  });
}

export function cliCommandFailed(command: string, exitCode: number | null, stderr?: string): CLIError {
  const status = exitCode === null ? "was terminated" : `exited with code ${exitCode}`;
  return new CLIError("CLI_COMMAND_FAILED", `"${command}" ${status}`, {
    details: stderr?.trim() || undefined,
  });
}

export function cliOutputInvalid(command: string, reason: string): CLIError {
  return new CLIError("CLI_OUTPUT_INVALID", `Unexpected output from "${command}"`, {
    suggestion: "Check that the platform CLI is up to date",
    details: reason,
  });
}

export function loginFailed(executable: string, details?: string): CLIError {
  return new CLIError("AUTH_LOGIN_FAILED", "Login to the platform failed", {
    suggestion: "Log in manually once, then run the sync again",
    example: `${executable} auth:login`,
    details,
  });
}

// ============================================================================
// Lookup Errors
// ============================================================================

export function applicationNotFound(referenceId: string): CLIError {
  return new CLIError("APP_NOT_FOUND", `No application with reference id "${referenceId}"`, {
    suggestion: "List the applications you can access and check the reference id",
    example: "app-sync list",
  });
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function directoryNotFound(label: string, path: string): CLIError {
  return new CLIError("DIRECTORY_NOT_FOUND", `${label} "${path}" not found`, {
    suggestion: "Check the path exists and try again",
  });
}

export function notADirectory(label: string, path: string): CLIError {
  return new CLIError("NOT_A_DIRECTORY", `${label} "${path}" is not a directory`, {
    suggestion: "Provide the path of a directory",
  });
}

export function downloadTimedOut(directory: string, seconds: number): CLIError {
  return new CLIError("DOWNLOAD_TIMEOUT", `No new ZIP appeared in "${directory}" after ${seconds} seconds`, {
    suggestion: "Check the browser finished the download, or raise --timeout",
    details: "The download directory must match where your browser saves files",
  });
}

export function archiveExists(path: string): CLIError {
  return new CLIError("ARCHIVE_EXISTS", `"${path}" already exists`, {
    suggestion: "Wait a second and run the sync again",
  });
}

export function fileOperationFailed(operation: string, path: string, reason?: string): CLIError {
  return new CLIError("FILE_OPERATION_FAILED", `Couldn't ${operation} "${path}"`, {
    suggestion: "Check file permissions or if another app has it open",
    details: reason,
  });
}

export function metadataNotFound(suffix: string, directory: string): CLIError {
  return new CLIError("METADATA_NOT_FOUND", `No ${suffix} file found in "${directory}"`, {
    suggestion: "The archive may not contain an application source tree",
  });
}

export function metadataAmbiguous(suffix: string, files: string[]): CLIError {
  return new CLIError("METADATA_AMBIGUOUS", `Found ${files.length} ${suffix} files`, {
    suggestion: "Remove the extra descriptor files and rename them by hand",
    details: files.join(", "),
  });
}

// ============================================================================
// Archive Errors
// ============================================================================

export function archiveInvalid(path: string, reason?: string): CLIError {
  return new CLIError("ARCHIVE_INVALID", `"${path}" is not a valid ZIP archive`, {
    suggestion: "Download the archive again",
    details: reason,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}

/**
 * Normalize anything thrown into a CLIError.
 */
export function toCLIError(error: unknown): CLIError {
  return error instanceof CLIError ? error : unknownError(error);
}
