import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  it("starts at the given instant", () => {
    const clock = new FakeClock(1_700_000_000_000)

    expect(clock.now().toISOString()).toBe("2023-11-14T22:13:20.000Z")
  })

  it("records sleeps and advances virtual time by their duration", async () => {
    const clock = new FakeClock(0)

    await clock.sleep(3000)
    await clock.sleep(0)
    await clock.sleep(2000)

    expect(clock.sleeps).toEqual([3000, 0, 2000])
    expect(clock.nowMs()).toBe(5000)
  })

  it("does not record a sleep when the signal is already aborted", async () => {
    const clock = new FakeClock(0)
    const ac = new AbortController()
    ac.abort()

    await clock.sleep(1000, ac.signal)

    expect(clock.sleeps).toEqual([])
    expect(clock.nowMs()).toBe(0)
  })

  it("advance() and set() move time explicitly", () => {
    const clock = new FakeClock(100)

    clock.advance(50)
    expect(clock.nowMs()).toBe(150)

    clock.set(10)
    expect(clock.nowMs()).toBe(10)
  })
})
