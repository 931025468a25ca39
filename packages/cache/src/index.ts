export { createMemoryCache } from "./adapters/memory/create-memory-cache"
export { MemoryCache, type MemoryCacheDeps } from "./adapters/memory/memory-cache"
export { seededRandom } from "./adapters/random/seeded-random"
export { systemRandom } from "./adapters/random/system-random"
export {
  type LoadMemoryCacheOptionsOptions,
  loadMemoryCacheOptions,
  type MemoryCacheConfig,
  memoryCacheConfigSchema,
} from "./core/config/load-memory-cache-options"
export {
  CacheError,
  type CacheErrorCode,
  cacheErrorCodes,
  emptyCacheError,
  invalidCapacityError,
  invalidPolicyError,
  notFoundError,
} from "./core/errors/cache-error"
export { createEvictionStrategy } from "./core/eviction/create-eviction-strategy"
export type { EvictionCandidates, EvictionStrategy } from "./core/eviction/eviction-strategy"
export { ExpirySweeper } from "./core/expiry/expiry-sweeper"
export { isExpired } from "./core/expiry/is-expired"
export { formatDuration } from "./core/stats/format-duration"
export { formatStats } from "./core/stats/format-stats"
export type { Cache } from "./ports/cache"
export { type CacheEntry, NO_EXPIRY } from "./ports/cache-entry"
export {
  type CacheEvictionPolicy,
  cacheEvictionPolicies,
  evictionPolicyName,
  isCacheEvictionPolicy,
} from "./ports/cache-eviction-policy"
export { DEFAULT_CLEARING_INTERVAL_MS, type MemoryCacheOptions } from "./ports/cache-options"
export { type CacheFailure, type CacheOk, type CacheResult, fail, ok } from "./ports/cache-result"
export type { CacheStats, CacheStatsEntry } from "./ports/cache-stats"
export type { RandomSource } from "./ports/random-source"
