import { NullLogger } from "@tidecache/logger"
import { describeCacheContract } from "../../../ports/__tests__/cache.contract"
import { seededRandom } from "../../random/seeded-random"
import { MemoryCache } from "../memory-cache"

describeCacheContract(
  "MemoryCache",
  (clock) =>
    new MemoryCache<string, string>(
      { clock, logger: new NullLogger(), random: seededRandom(1) },
      { capacity: 0, clearingIntervalMs: 0, evictionPolicy: "lru" },
    ),
)
