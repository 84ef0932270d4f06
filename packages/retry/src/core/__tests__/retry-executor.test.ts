import { FakeClock } from "@bulkmail/clock"
import type { AttemptContext, RetryAttemptInfo } from "../../ports/attempt-context"
import type { DelayPolicy } from "../../ports/delay-policy"
import { constant } from "../delays/constant"
import { createRetryExecutor } from "../retry-executor"

function failingThen<T>(failures: string[], value: T) {
  const calls: AttemptContext[] = []
  const fn = async (ctx: AttemptContext): Promise<T> => {
    calls.push(ctx)
    const message = failures[calls.length - 1]
    if (message !== undefined) throw new Error(message)
    return value
  }

  return { fn, calls }
}

describe("createRetryExecutor", () => {
  let clock: FakeClock
  let delay: DelayPolicy

  beforeEach(() => {
    clock = new FakeClock(1_000)
    delay = constant({ delay: { milliseconds: 100 } })
  })

  describe("config validation", () => {
    it.each([0, -1, 2.5, Number.NaN])("throws RangeError for maxAttempts = %s", async (n) => {
      const executor = createRetryExecutor({ clock })

      await expect(
        executor.tryExecute(async () => "ok", { maxAttempts: n, delay }),
      ).rejects.toThrow(RangeError)
    })
  })

  describe("attempts", () => {
    it("resolves on the first success without sleeping", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn, calls } = failingThen([], "sent")

      const result = await executor.tryExecute(fn, { maxAttempts: 3, delay })

      expect(result).toEqual({ success: true, value: "sent", attempts: 1, elapsedMs: 0 })
      expect(calls).toHaveLength(1)
      expect(clock.sleeps).toEqual([])
    })

    it("succeeds after two failures with three attempts", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn, calls } = failingThen(["timeout", "timeout"], "sent")

      const result = await executor.tryExecute(fn, { maxAttempts: 3, delay })

      expect(result).toMatchObject({ success: true, value: "sent", attempts: 3 })
      expect(calls).toHaveLength(3)
      expect(clock.sleeps).toEqual([100, 100])
    })

    it("keeps the last error after exhausting all attempts", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn, calls } = failingThen(["first", "second"], "never")

      const result = await executor.tryExecute(fn, { maxAttempts: 2, delay })

      expect(result).toMatchObject({ success: false, attempts: 2, error: new Error("second") })
      expect(calls).toHaveLength(2)
      expect(clock.sleeps).toEqual([100])
    })
  })

  describe("tryExecute", () => {
    it("reports attempts and elapsed virtual time on success", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn } = failingThen(["boom"], 42)

      const result = await executor.tryExecute(fn, { maxAttempts: 3, delay })

      expect(result).toEqual({ success: true, value: 42, attempts: 2, elapsedMs: 100 })
    })

    it("returns a failure result when exhausted", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn } = failingThen(["a", "b", "c"], 0)

      const result = await executor.tryExecute(fn, { maxAttempts: 3, delay })

      expect(result.success).toBe(false)
      if (result.success) return
      expect(result.attempts).toBe(3)
      expect(result.elapsedMs).toBe(200)
      expect(result.error).toBeInstanceOf(Error)
      expect(String(result.error)).toBe("Error: c")
    })

    it("passes attempt context to fn on each attempt", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn, calls } = failingThen(["a", "b"], "ok")

      await executor.tryExecute(fn, { maxAttempts: 3, delay })

      expect(calls.map((c) => [c.attempt, c.attemptsSoFar, c.startedAt, c.elapsedMs])).toEqual([
        [0, 1, 1_000, 0],
        [1, 2, 1_000, 100],
        [2, 3, 1_000, 200],
      ])
    })

    it("maxAttempts = 1 never sleeps", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn, calls } = failingThen(["only"], "x")

      const result = await executor.tryExecute(fn, { maxAttempts: 1, delay })

      expect(result.success).toBe(false)
      expect(calls).toHaveLength(1)
      expect(clock.sleeps).toEqual([])
    })
  })

  describe("delay policy", () => {
    it("asks the policy with the 0-indexed attempt that failed", async () => {
      const executor = createRetryExecutor({ clock })
      const seen: number[] = []
      const policy: DelayPolicy = {
        getDelay: (attempt) => {
          seen.push(attempt)
          return { milliseconds: (attempt + 1) * 10 }
        },
      }
      const { fn } = failingThen(["a", "b"], "ok")

      await executor.tryExecute(fn, { maxAttempts: 3, delay: policy })

      expect(seen).toEqual([0, 1])
      expect(clock.sleeps).toEqual([10, 20])
    })

    it("skips sleep when delay is 0", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn, calls } = failingThen(["a"], "ok")

      await executor.tryExecute(fn, {
        maxAttempts: 2,
        delay: constant({ delay: { milliseconds: 0 } }),
      })

      expect(calls).toHaveLength(2)
      expect(clock.sleeps).toEqual([])
    })
  })

  describe("errorPredicate", () => {
    it("stops retrying when the predicate returns false", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn, calls } = failingThen(["permanent", "never reached"], "ok")

      const result = await executor.tryExecute(fn, {
        maxAttempts: 3,
        delay,
        errorPredicate: { shouldRetry: (error) => String(error) !== "Error: permanent" },
      })

      expect(result.success).toBe(false)
      expect(calls).toHaveLength(1)
      expect(clock.sleeps).toEqual([])
    })

    it("is not consulted on the last attempt", async () => {
      const executor = createRetryExecutor({ clock })
      const shouldRetry = vi.fn(() => true)
      const { fn } = failingThen(["a", "b"], "ok")

      await executor.tryExecute(fn, { maxAttempts: 2, delay, errorPredicate: { shouldRetry } })

      expect(shouldRetry).toHaveBeenCalledTimes(1)
    })
  })

  describe("observer", () => {
    it("reports retries with the next delay and exhaustion as last attempt", async () => {
      const executor = createRetryExecutor({ clock })
      const retries: RetryAttemptInfo[] = []
      const exhausted: RetryAttemptInfo[] = []
      const { fn } = failingThen(["a", "b"], "ok")

      await executor.tryExecute(fn, {
        maxAttempts: 2,
        delay,
        observer: {
          onError: (_error, info) => {
            retries.push(info)
          },
          onExhausted: (_error, info) => {
            exhausted.push(info)
          },
        },
      })

      expect(retries.map((i) => [i.attempt, i.nextDelayMs, i.isLastAttempt])).toEqual([
        [0, 100, false],
      ])
      expect(exhausted.map((i) => [i.attempt, i.nextDelayMs, i.isLastAttempt])).toEqual([
        [1, null, true],
      ])
    })

    it("reports a predicate refusal as exhaustion", async () => {
      const executor = createRetryExecutor({ clock })
      const onError = vi.fn()
      const onExhausted = vi.fn()
      const { fn } = failingThen(["permanent"], "ok")

      await executor.tryExecute(fn, {
        maxAttempts: 3,
        delay,
        errorPredicate: { shouldRetry: () => false },
        observer: { onError, onExhausted },
      })

      expect(onError).not.toHaveBeenCalled()
      expect(onExhausted).toHaveBeenCalledWith(
        new Error("permanent"),
        expect.objectContaining({ attempt: 0, nextDelayMs: null, isLastAttempt: true }),
      )
    })

    it("propagates observer errors from tryExecute", async () => {
      const executor = createRetryExecutor({ clock })
      const { fn } = failingThen(["a"], "ok")

      await expect(
        executor.tryExecute(fn, {
          maxAttempts: 2,
          delay,
          observer: {
            onError: () => {
              throw new Error("observer broke")
            },
          },
        }),
      ).rejects.toThrow("observer broke")
    })
  })
})
