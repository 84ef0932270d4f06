import type { RetryAttemptInfo } from "./attempt-context"

/**
 * Failure hooks, e.g. for logging each retry.
 *
 * @remarks
 * A throwing observer is a programmer error and rejects `tryExecute`.
 */
export interface RetryObserver {
  /** A failed attempt that will be retried after `info.nextDelayMs`. */
  onError?(error: unknown, info: RetryAttemptInfo): void | Promise<void>

  /** The failure that ended the attempts, by predicate or by count. */
  onExhausted?(error: unknown, info: RetryAttemptInfo): void | Promise<void>
}
