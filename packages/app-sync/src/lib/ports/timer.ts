/**
 * Promise-based delay function type.
 * Used by polling so tests can skip real waits.
 */
export type DelayFn = (ms: number) => Promise<void>;
