import type { RetryFn } from "./attempt-context"
import type { RetryConfig } from "./retry-config"
import type { RetryResult } from "./retry-result"

/**
 * Runs a function until it resolves, the error predicate declines, or
 * `maxAttempts` is reached, sleeping on the injected clock in between.
 *
 * `tryExecute()` resolves with a result wrapper for both outcomes. It rejects
 * only for programmer errors: an invalid config, or a predicate or observer
 * that throws.
 */
export interface IRetryExecutor {
  tryExecute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<RetryResult<T>>
}
