import type { Milliseconds, UnixMs } from "@bulkmail/clock"

export interface AttemptContext {
  /** 0-indexed attempt number */
  attempt: number

  /** attempt + 1 */
  attemptsSoFar: number

  /** Epoch ms when the first attempt started */
  startedAt: UnixMs

  /** ms since the first attempt started, in clock time */
  elapsedMs: Milliseconds
}

export interface RetryAttemptInfo extends AttemptContext {
  /** ms until the next attempt, null once attempts are over */
  nextDelayMs: Milliseconds | null

  isLastAttempt: boolean
}

export type RetryFn<T> = (ctx: AttemptContext) => Promise<T>
