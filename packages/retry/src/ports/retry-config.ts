import type { DelayPolicy } from "./delay-policy"
import type { RetryObserver } from "./observer"
import type { ErrorPredicate } from "./predicates"

/**
 * @remarks
 * `maxAttempts` is total tries, not retries.
 * - maxAttempts=1 → try once, no retry
 * - maxAttempts=3 → try once + up to 2 retries
 *
 * Without an `errorPredicate` every error is retried until attempts run out.
 */
export interface RetryConfig {
  /** Total attempts (not retries). Must be >= 1 */
  maxAttempts: number

  delay: DelayPolicy

  errorPredicate?: ErrorPredicate

  observer?: RetryObserver
}
