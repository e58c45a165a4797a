import type { CommandRunner, CommandResult } from "./ports/command-runner.js";
import type { Logger } from "./logger.js";
import { CLIError } from "./errors/types.js";
import { cliCommandFailed, cliNotFound, loginFailed } from "./errors/catalog.js";
import { parseApplicationListing, type ApplicationEntry } from "./listing.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PlatformCliOptions {
  /** Executable name or path, without the Windows ".cmd" suffix */
  executable: string;
  /** Subcommand that downloads a source archive by application id */
  downloadCommand: string;
  platform?: NodeJS.Platform;
}

export interface PlatformCli {
  /** Resolved executable actually started */
  readonly executable: string;
  authenticate(): Promise<void>;
  listApplications(): Promise<ApplicationEntry[]>;
  downloadSource(applicationId: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const LOGIN_COMMAND = "auth:login";
export const LIST_COMMAND = "apps:list";

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * npm-installed CLIs are started through a ".cmd" shim on Windows.
 */
export function resolveExecutable(executable: string, platform: NodeJS.Platform): string {
  if (platform !== "win32") return executable;
  return /\.(cmd|bat|exe)$/i.test(executable) ? executable : `${executable}.cmd`;
}

/**
 * Build the URL the platform serves an application's source archive from.
 */
export function sourceArchiveUrl(apiBaseUrl: string, applicationId: string): string {
  const base = apiBaseUrl.replace(/\/+$/, "");
  return `${base}/devtools/v1/appbuilder/${encodeURIComponent(applicationId)}/source/archive`;
}

/**
 * Create a wrapper around the platform's command-line client.
 */
export function createPlatformCli(
  runner: CommandRunner,
  options: PlatformCliOptions,
  logger?: Logger
): PlatformCli {
  const executable = resolveExecutable(options.executable, options.platform ?? process.platform);

  async function run(args: string[]): Promise<CommandResult> {
    logger?.debug("Running platform CLI", { executable, args });

    let result: CommandResult;
    try {
      result = await runner.run(executable, args);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        throw cliNotFound(executable);
      }
      throw new CLIError("CLI_COMMAND_FAILED", `Couldn't start "${executable}"`, {
        details: (error as Error).message,
        cause: error instanceof Error ? error : undefined,
      });
    }

    logger?.debug("Platform CLI finished", { args, exitCode: result.exitCode });
    return result;
  }

  function commandLine(args: string[]): string {
    return [executable, ...args].join(" ");
  }

  return {
    executable,

    async authenticate(): Promise<void> {
      const result = await run([LOGIN_COMMAND]);
      if (result.exitCode !== 0) {
        throw loginFailed(executable, result.stderr.trim() || result.stdout.trim() || undefined);
      }
    },

    async listApplications(): Promise<ApplicationEntry[]> {
      const args = [LIST_COMMAND];
      const result = await run(args);
      if (result.exitCode !== 0) {
        throw cliCommandFailed(commandLine(args), result.exitCode, result.stderr);
      }
      return parseApplicationListing(result.stdout);
    },

    async downloadSource(applicationId: string): Promise<void> {
      const args = [options.downloadCommand, applicationId];
      const result = await run(args);
      if (result.exitCode !== 0) {
        throw cliCommandFailed(commandLine(args), result.exitCode, result.stderr);
      }
    },
  };
}
