import type { AttemptContext } from "./attempt-context"

/** Decides whether a thrown error is worth another attempt. */
export interface ErrorPredicate {
  shouldRetry(error: unknown, ctx: AttemptContext): boolean
}
