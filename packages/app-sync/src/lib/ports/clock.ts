/**
 * Source of the current time. Archive names and log timestamps read it,
 * so tests can pin both to a known instant.
 */
export interface Clock {
  newDate(): Date;
}
