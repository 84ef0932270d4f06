import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Used for timestamps written to reports and documents; prefer `nowMs()`
   * for arithmetic.
   */
  now(): Date

  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Pause for `ms` milliseconds.
   *
   * Resolves (never rejects) as soon as `signal` aborts, so callers check
   * `signal.aborted` afterwards to tell a completed pause from an interrupted one.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
