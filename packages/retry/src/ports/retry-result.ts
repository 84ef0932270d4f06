import type { Milliseconds } from "@bulkmail/clock"

export type SuccessfulRetryResult<T> = {
  success: true
  value: T
  attempts: number
  elapsedMs: Milliseconds
}

export type FailedRetryResult = {
  success: false

  /** The error thrown by the last attempt */
  error: unknown
  attempts: number
  elapsedMs: Milliseconds
}

export type RetryResult<T> = SuccessfulRetryResult<T> | FailedRetryResult
