import { execFile } from "child_process";
import type { CommandRunner, CommandResult } from "../ports/command-runner.js";

/** Listing output can be large for accounts with many applications */
const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

/**
 * Batch files on Windows can only be started through a shell.
 */
function needsShell(executable: string, platform: NodeJS.Platform): boolean {
  return platform === "win32" && /\.(cmd|bat)$/i.test(executable);
}

/**
 * Create a command runner backed by child_process.execFile.
 */
export function createExecCommandRunner(
  platform: NodeJS.Platform = process.platform
): CommandRunner {
  return {
    run(executable: string, args: string[]): Promise<CommandResult> {
      return new Promise((resolve, reject) => {
        execFile(
          executable,
          args,
          {
            maxBuffer: MAX_BUFFER_BYTES,
            windowsHide: true,
            shell: needsShell(executable, platform),
          },
          (error, stdout, stderr) => {
            if (!error) {
              resolve({ exitCode: 0, stdout, stderr });
              return;
            }

            if (typeof error.code === "number") {
              resolve({ exitCode: error.code, stdout, stderr });
            } else if (error.signal) {
              resolve({ exitCode: null, stdout, stderr });
            } else {
              // ENOENT, EACCES, maxBuffer exceeded
              reject(error);
            }
          }
        );
      });
    },
  };
}
