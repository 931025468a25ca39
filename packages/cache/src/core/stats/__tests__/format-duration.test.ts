import { formatDuration } from "../format-duration"

describe("formatDuration", () => {
  it.each([
    [0, "0s"],
    [1, "1ms"],
    [250, "250ms"],
    [999, "999ms"],
    [1_000, "1s"],
    [1_500, "1.5s"],
    [59_000, "59s"],
    [60_000, "1m0s"],
    [100_000, "1m40s"],
    [3_600_000, "1h0m0s"],
    [5_430_250, "1h30m30.25s"],
    [-1_500, "-1.5s"],
  ])("formats %i ms as %s", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected)
  })
})
