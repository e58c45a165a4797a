/**
 * Abstraction for running external executables.
 * Allows testing the platform CLI integration without spawning processes.
 */
export interface CommandResult {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /**
   * Run an executable to completion.
   * Resolves for any exit code; rejects only when the process cannot be started.
   */
  run(executable: string, args: string[]): Promise<CommandResult>;
}
