import type { ResolvedConfig } from "./config.js";
import type { CLIContext } from "./cli-context.js";
import type { BrowserService, Clock, DelayFn } from "./ports/index.js";
import { createLogger, type Logger, type LogLevel } from "./logger.js";
import { createPlatformCli, type PlatformCli } from "./platform-cli.js";
import { createExecCommandRunner, createSystemBrowser, realDelay, systemClock } from "./adapters/index.js";

/**
 * Collaborators a command needs, swapped for fakes in tests.
 */
export interface Runtime {
  cli: PlatformCli;
  browser: BrowserService;
  clock: Clock;
  delay: DelayFn;
  logger: Logger;
}

export type RuntimeFactory = (config: ResolvedConfig, context: CLIContext) => Runtime;

/**
 * Log level for a run: --verbose wins, JSON mode keeps stdout for the result.
 */
export function effectiveLogLevel(config: ResolvedConfig, context: CLIContext): LogLevel {
  if (context.verbose) return "debug";
  if (context.json && config.logLevel !== "error") return "warn";
  return config.logLevel;
}

/**
 * Build the real runtime: child processes, system browser and wall clock.
 */
export const createRuntime: RuntimeFactory = (config, context) => {
  const logger = createLogger({
    level: effectiveLogLevel(config, context),
    json: config.logJson || context.json,
  });

  return {
    cli: createPlatformCli(
      createExecCommandRunner(),
      { executable: config.executable, downloadCommand: config.downloadCommand },
      logger.child({ component: "platform-cli" })
    ),
    browser: createSystemBrowser(config.browser),
    clock: systemClock,
    delay: realDelay,
    logger,
  };
};
