import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ cache: "sessions" })
      const child = parent.child({ operation: "sweep" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        cache: "sessions",
        operation: "sweep",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ cache: "sessions" })
      const child = parent.child({ cache: "queries" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.cache).toBe("queries")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ cache: "sessions" })
      const child = parent.child({ operation: "evict" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ cache: "sessions" })
      expect(logs[0]?.payload).not.toHaveProperty("operation")
      expect(logs[1]?.payload).toMatchObject({ cache: "sessions", operation: "evict" })
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ cache: "sessions" })
      scoped.info("hello", { cache: "queries", key: "k:1" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ cache: "queries", key: "k:1" })
    })

    it("keeps the message apart from the meta fields", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "memory-cache" }).debug("entry evicted", { key: "k:1" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.level).toBe("debug")
      expect(logs[0]?.message).toBe("entry evicted")
      expect(logs[0]?.payload).toMatchObject({ module: "memory-cache", key: "k:1" })
    })

    it("clear() drops what was captured so far", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      logger.info("first")
      clear()
      logger.info("second")

      expect(read().map((l) => l.message)).toEqual(["second"])
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
