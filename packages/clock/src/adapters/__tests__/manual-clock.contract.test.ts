import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { ManualClock } from "../manual-clock"

describeClockContract({
  name: "ManualClock",
  make: () => new ManualClock(Date.now()),
})
