import { assertValidIntervalMs, isValidCapacity, normalizeTtlMs } from "../validation"

describe("isValidCapacity", () => {
  it.each([0, 1, 1_000])("accepts %d", (value) => {
    expect(isValidCapacity(value)).toBe(true)
  })

  it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])("rejects %d", (value) => {
    expect(isValidCapacity(value)).toBe(false)
  })
})

describe("assertValidIntervalMs", () => {
  it("accepts zero and positive values", () => {
    expect(() => assertValidIntervalMs(0, "intervalMs")).not.toThrow()
    expect(() => assertValidIntervalMs(250, "intervalMs")).not.toThrow()
  })

  it("throws a RangeError naming the option", () => {
    expect(() => assertValidIntervalMs(-5, "clearingIntervalMs")).toThrow(
      new RangeError("clearingIntervalMs must be a non-negative finite number, got: -5"),
    )
  })

  it("rejects non-finite values", () => {
    expect(() => assertValidIntervalMs(Number.NaN, "intervalMs")).toThrow(RangeError)
  })
})

describe("normalizeTtlMs", () => {
  it("keeps finite values, negative ones included", () => {
    expect(normalizeTtlMs(250)).toBe(250)
    expect(normalizeTtlMs(0)).toBe(0)
    expect(normalizeTtlMs(-5)).toBe(-5)
  })

  it.each([Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY])(
    "maps %d to no expiry",
    (value) => {
      expect(normalizeTtlMs(value)).toBe(0)
    },
  )
})
