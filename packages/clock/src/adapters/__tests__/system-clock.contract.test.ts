import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { SystemClock } from "../system-clock"

describeClockContract({
  name: "SystemClock",
  make: () => ({
    clock: new SystemClock(),
    elapse: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  }),
})
