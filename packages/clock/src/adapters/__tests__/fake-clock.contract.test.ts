import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { FakeClock } from "../fake-clock"

describeClockContract({
  name: "FakeClock",
  make: () => new FakeClock(Date.UTC(2026, 0, 15, 9, 0, 0)),
})
