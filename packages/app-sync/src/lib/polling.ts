import type { DelayFn } from "./ports/timer.js";
import { realDelay } from "./adapters/real-timers.js";

/**
 * Options for the generic polling function.
 */
export interface PollingOptions<T> {
  /** Function to fetch current state; undefined means "not yet" */
  fetch: () => T | undefined | Promise<T | undefined>;
  /** Interval between polls in milliseconds */
  intervalMs: number;
  /** Maximum number of poll attempts */
  maxAttempts: number;
  /** Error to throw once attempts are exhausted */
  onTimeout?: () => Error;
  /** Optional delay function for testing */
  delay?: DelayFn;
}

/**
 * Poll until `fetch` yields a value or attempts run out.
 */
export async function poll<T>(options: PollingOptions<T>): Promise<T> {
  const { fetch, intervalMs, maxAttempts, onTimeout, delay = realDelay } = options;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await fetch();
    if (result !== undefined) {
      return result;
    }

    if (attempt < maxAttempts) {
      await delay(intervalMs);
    }
  }

  throw onTimeout?.() ?? new Error("Polling timed out");
}
