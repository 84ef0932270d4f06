import type { Clock, UnixMs } from "@bulkmail/clock"
import type { AttemptContext, RetryAttemptInfo, RetryFn } from "../ports/attempt-context"
import type { RetryConfig } from "../ports/retry-config"
import type { IRetryExecutor } from "../ports/retry-executor"
import type { RetryResult } from "../ports/retry-result"

export type RetryExecutorDeps = {
  clock: Clock
}

export function createRetryExecutor(deps: RetryExecutorDeps): IRetryExecutor {
  return new RetryExecutor(deps)
}

type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: unknown }

class RetryExecutor implements IRetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async tryExecute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<RetryResult<T>> {
    this.validateConfig(config)

    const { maxAttempts, errorPredicate, observer } = config
    const startedAt = this.deps.clock.nowMs()

    for (let attempt = 0; ; attempt++) {
      const ctx = this.buildContext(attempt, startedAt)
      const attemptResult = await this.tryAttempt(fn, ctx)

      if (attemptResult.ok) {
        return {
          success: true,
          value: attemptResult.value,
          attempts: ctx.attemptsSoFar,
          elapsedMs: this.deps.clock.nowMs() - startedAt,
        }
      }

      const { error } = attemptResult
      const isLastAttempt = attempt === maxAttempts - 1
      const shouldRetry = !isLastAttempt && (errorPredicate?.shouldRetry(error, ctx) ?? true)

      if (!shouldRetry) {
        await observer?.onExhausted?.(error, this.buildAttemptInfo(ctx, null, true))

        return {
          success: false,
          error,
          attempts: ctx.attemptsSoFar,
          elapsedMs: this.deps.clock.nowMs() - startedAt,
        }
      }

      const nextDelayMs = config.delay.getDelay(attempt).milliseconds

      await observer?.onError?.(error, this.buildAttemptInfo(ctx, nextDelayMs, false))
      if (nextDelayMs > 0) await this.deps.clock.sleep(nextDelayMs)
    }
  }

  private async tryAttempt<T>(fn: RetryFn<T>, ctx: AttemptContext): Promise<AttemptResult<T>> {
    try {
      return { ok: true, value: await fn(ctx) }
    } catch (error) {
      return { ok: false, error }
    }
  }

  private validateConfig(config: RetryConfig): void {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`)
    }
  }

  private buildContext(attempt: number, startedAt: UnixMs): AttemptContext {
    return {
      attempt,
      attemptsSoFar: attempt + 1,
      startedAt,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
    }
  }

  private buildAttemptInfo(
    ctx: AttemptContext,
    nextDelayMs: number | null,
    isLastAttempt: boolean,
  ): RetryAttemptInfo {
    return { ...ctx, nextDelayMs, isLastAttempt }
  }
}
