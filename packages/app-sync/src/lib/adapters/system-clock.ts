import type { Clock } from "../ports/clock.js";

export const systemClock: Clock = {
  newDate: () => new Date(),
};

/**
 * Clock frozen at a given instant.
 */
export function fixedClock(date: Date): Clock {
  return {
    newDate: () => new Date(date.getTime()),
  };
}
