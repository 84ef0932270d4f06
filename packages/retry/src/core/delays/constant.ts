import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export interface ConstantOptions {
  /** Fixed delay between attempts */
  delay: Delay
}

export function constant(options: ConstantOptions): DelayPolicy {
  const { milliseconds } = options.delay

  if (!Number.isFinite(milliseconds) || milliseconds < 0) {
    throw new RangeError(`delay must be a finite number >= 0 (got ${milliseconds})`)
  }

  return {
    getDelay(_attempt: number): Delay {
      return { milliseconds }
    },
  }
}
