/**
 * JSON output utilities for machine-readable CLI output.
 */

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface SyncResultJson {
  referenceId: string;
  applicationId: string;
  archivePath: string;
  sourceDir: string;
  extractedFiles: number;
  removedEntries: number;
  renamed: Array<{ from: string; to: string }>;
  formatted: string[];
}

export interface ApplicationListJson {
  applications: Array<{
    id: string;
    referenceId: string;
    name?: string;
  }>;
  total: number;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}
