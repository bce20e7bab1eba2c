/** Milliseconds, possibly fractional. */
export type Milliseconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = Milliseconds

export type Duration = { milliseconds: Milliseconds }

export function durationOf(milliseconds: Milliseconds): Duration {
  return { milliseconds }
}
