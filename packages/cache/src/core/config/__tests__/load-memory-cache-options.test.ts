import { EnvSource, ObjectSource } from "@tidecache/config"
import { loadMemoryCacheOptions } from "../load-memory-cache-options"

describe("loadMemoryCacheOptions", () => {
  it("falls back to defaults when nothing is set", async () => {
    const opts = await loadMemoryCacheOptions({ sources: [new EnvSource({ env: {} })] })

    expect(opts).toStrictEqual({
      capacity: 0,
      clearingIntervalMs: 0,
      evictionPolicy: "lru",
      name: undefined,
    })
  })

  it("reads CACHE_-prefixed variables and coerces them", async () => {
    const env = {
      CACHE_CAPACITY: "500",
      CACHE_CLEARING_INTERVAL_MS: "2000",
      CACHE_EVICTION_POLICY: " LFU ",
      CAPACITY: "1",
    }

    const opts = await loadMemoryCacheOptions({
      sources: [new EnvSource({ prefix: "CACHE_", env })],
      name: "sessions",
    })

    expect(opts).toStrictEqual({
      capacity: 500,
      clearingIntervalMs: 2000,
      evictionPolicy: "lfu",
      name: "sessions",
    })
  })

  it("lets later sources override earlier ones", async () => {
    const opts = await loadMemoryCacheOptions({
      sources: [
        new EnvSource({ prefix: "CACHE_", env: { CACHE_CAPACITY: "10" } }),
        new ObjectSource({ CAPACITY: 20, EVICTION_POLICY: "mru" }),
      ],
    })

    expect(opts.capacity).toBe(20)
    expect(opts.evictionPolicy).toBe("mru")
  })

  it("reads process.env with the CACHE_ prefix by default", async () => {
    vi.stubEnv("CACHE_EVICTION_POLICY", "random")

    try {
      const opts = await loadMemoryCacheOptions()

      expect(opts.evictionPolicy).toBe("random")
    } finally {
      vi.unstubAllEnvs()
    }
  })

  it("rejects an unknown policy", async () => {
    await expect(
      loadMemoryCacheOptions({ sources: [new ObjectSource({ EVICTION_POLICY: "fifo" })] }),
    ).rejects.toThrow(/^Configuration validation failed:[\s\S]*EVICTION_POLICY/)
  })

  it("rejects a negative capacity", async () => {
    await expect(
      loadMemoryCacheOptions({ sources: [new ObjectSource({ CAPACITY: -1 })] }),
    ).rejects.toThrow(/^Configuration validation failed:[\s\S]*CAPACITY/)
  })
})
