import { type ConfigSource, EnvSource, loadConfig } from "@tidecache/config"
import { z } from "zod"
import { cacheEvictionPolicies } from "../../ports/cache-eviction-policy"
import type { MemoryCacheOptions } from "../../ports/cache-options"

export const memoryCacheConfigSchema = z.object({
  CAPACITY: z.coerce.number().int().nonnegative().default(0),
  CLEARING_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
  EVICTION_POLICY: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(cacheEvictionPolicies))
    .default("lru"),
})

export type MemoryCacheConfig = z.infer<typeof memoryCacheConfigSchema>

export type LoadMemoryCacheOptionsOptions = {
  /** Later sources win. Defaults to the `CACHE_`-prefixed environment. */
  sources?: ConfigSource[]
  name?: string
}

export async function loadMemoryCacheOptions({
  sources = [new EnvSource({ prefix: "CACHE_" })],
  name,
}: LoadMemoryCacheOptionsOptions = {}): Promise<MemoryCacheOptions> {
  const config = await loadConfig({ schema: memoryCacheConfigSchema, sources })

  return {
    capacity: config.value.CAPACITY,
    clearingIntervalMs: config.value.CLEARING_INTERVAL_MS,
    evictionPolicy: config.value.EVICTION_POLICY,
    name,
  }
}
