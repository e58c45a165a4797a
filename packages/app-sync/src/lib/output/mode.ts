/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tty" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tty`: Interactive terminal, spinners enabled
 * - `static`: Plain text output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(argv: string[] = process.argv): OutputMode {
  if (argv.includes("--json") || process.env.APP_SYNC_JSON === "1") {
    return "json";
  }

  if (process.env.CI) {
    return "static";
  }

  // Piped output
  if (!process.stdout.isTTY) {
    return "static";
  }

  if (process.env.TERM === "dumb") {
    return "static";
  }

  return "tty";
}
