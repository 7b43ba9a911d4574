/**
 * Primitive aliases shared by every package.
 */

/** A principal: a user, a verifier, or a component acting on its own behalf. */
export type Address = string;

/** Seconds since the Unix epoch, as reported by a Clock. */
export type Timestamp = number;

export const SECONDS_PER_DAY = 86_400;

/**
 * Exhaustiveness check for tagged unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
