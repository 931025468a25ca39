import { FakeClock } from "@tidecache/clock"
import type { LogLevelName } from "../../../ports/log-level"
import { ConsoleLogger } from "../console-logger"

describe("ConsoleLogger behavior", () => {
  function makeLineCaptureConsole() {
    const lines: string[] = []
    const calls: { method: LogLevelName; line: string }[] = []

    const capture = (method: LogLevelName) => (line: unknown) => {
      const text = String(line)

      lines.push(text)
      calls.push({ method, line: text })
    }

    const fakeConsole = {
      trace: capture("trace"),
      debug: capture("debug"),
      info: capture("info"),
      warn: capture("warn"),
      error: capture("error"),
    }

    return { lines, calls, fakeConsole }
  }

  const clock = () => new FakeClock(Date.parse("2024-03-01T12:00:00.000Z"))

  it("emits parseable JSON stamped by the injected clock", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole, clock: clock() },
      { level: "trace", prettify: false },
      { cache: "sessions" },
    )

    logger.info("cache created", { capacity: 10 })

    expect(lines).toEqual([
      '{"timestamp":"2024-03-01T12:00:00.000Z","level":"info","message":"cache created","cache":"sessions","capacity":10}',
    ])
  })

  it("prettify true emits a human-readable line", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole, clock: clock() },
      { level: "trace", prettify: true },
      { cache: "sessions" },
    )

    logger.warn("hello")

    expect(lines).toEqual(['2024-03-01T12:00:00.000Z WARN hello {"cache":"sessions"}'])
  })

  it("only emits log entries at or above the configured level", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "warn", prettify: false },
    )

    logger.info("ignored")
    logger.warn("included")
    logger.error("included-too")

    const levels = lines.map((l) => JSON.parse(l).level)
    expect(levels).toEqual(["warn", "error"])
  })

  it("defaults to info level when no minimum level is configured", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { prettify: false })

    logger.debug("ignored")
    logger.info("included")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}").message).toBe("included")
  })

  it("serializes Error values and their causes into a JSON-safe form", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "trace", prettify: false },
    )

    logger.error("sweep failed", { err: new Error("boom", { cause: new Error("root") }) })
    logger.error("sweep failed again", { err: { code: "e_custom" } })

    const first = JSON.parse(lines[0] ?? "{}")
    const second = JSON.parse(lines[1] ?? "{}")

    expect(first.err).toMatchObject({ name: "Error", message: "boom" })
    expect(first.err.cause).toMatchObject({ name: "Error", message: "root" })
    expect(second.err).toEqual({ code: "e_custom" })
  })

  it("routes fatal to console.error", () => {
    const { calls, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "trace", prettify: false },
    )

    logger.fatal("boom")

    expect(calls).toHaveLength(1)
    expect(calls[0]?.method).toBe("error")
  })

  it("does not throw when log metadata cannot be serialized", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "trace", prettify: false },
    )

    const circular: Record<string, unknown> = { a: 1 }
    circular.self = circular

    logger.info("circular", { circular })

    expect(lines).toEqual(['{"message":"Failed to stringify log payload"}'])
  })

  it("drops undefined metadata and reserved keys", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole, clock: clock() },
      { level: "trace", prettify: false },
    )

    logger.info("hello", { key: undefined, removed: 2, level: "fatal", message: "nope" })

    expect(lines).toEqual([
      '{"timestamp":"2024-03-01T12:00:00.000Z","level":"info","message":"hello","removed":2}',
    ])
  })
})
