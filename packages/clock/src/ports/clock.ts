import type { Milliseconds } from "./time"

export interface Clock {
  /** Current time. Prefer `nowMs()` for arithmetic. */
  now(): Date

  /** Milliseconds since the Unix epoch. */
  nowMs(): Milliseconds
}
