import { MemoryCacheDriver } from "../../adapters/memory/memory-cache-driver"
import { RedisCacheDriver } from "../../adapters/redis/redis-cache-driver"
import { describeCacheDriverContract } from "../../ports/__tests__/cache-driver.contract"
import { FakeRedisClient } from "../../tests/utils/fake-redis-client"
import { StackCacheDriver } from "../stack-cache-driver"

describeCacheDriverContract({
  name: "StackCacheDriver (memory over redis)",
  make: (clock, opts) =>
    new StackCacheDriver(
      [
        new MemoryCacheDriver({ clock }, { maxEntries: 100 }),
        new RedisCacheDriver(
          { client: new FakeRedisClient(clock), clock },
          { keyspacePrefix: "test:cache:" },
        ),
      ],
      opts,
    ),
})
