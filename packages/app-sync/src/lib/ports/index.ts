export type { Clock } from "./clock.js";
export type { DelayFn } from "./timer.js";
export type { BrowserService } from "./browser.js";
export type { CommandRunner, CommandResult } from "./command-runner.js";
