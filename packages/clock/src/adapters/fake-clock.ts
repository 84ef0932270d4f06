import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Deterministic clock for tests.
 *
 * `sleep()` never waits: it records the requested duration and moves virtual
 * time forward by it, so pacing can be asserted through `sleeps`.
 */
export class FakeClock implements Clock {
  readonly sleeps: Milliseconds[] = []
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.sleeps.push(ms)
    this.advance(Math.max(0, ms))
  }
}
