/**
 * Global CLI context for shared options and state.
 */

import { getOutputMode } from "./output/mode.js";

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Log debug output */
  verbose: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  verbose: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(argv: string[] = process.argv): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (getOutputMode(argv) === "json") {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (process.env.APP_SYNC_QUIET === "1" || process.env.APP_SYNC_QUIET === "true") {
    currentContext.quiet = true;
  }

  if (argv.includes("--verbose")) {
    currentContext.verbose = true;
  }

  return currentContext;
}

export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
