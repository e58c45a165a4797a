export { systemClock, fixedClock } from "./system-clock.js";
export { realDelay } from "./real-timers.js";
export { createSystemBrowser } from "./system-browser.js";
export { createExecCommandRunner } from "./exec-command-runner.js";
