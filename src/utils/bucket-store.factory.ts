import { Provider } from '@nestjs/common';
import { RATE_LIMIT_BUCKET_STORE, RATE_LIMIT_CONFIG } from './constants';
import { RateLimitConfig } from '../interfaces/config.interface';
import { IBucketStore } from '../interfaces/bucket-store.interface';
import { MemoryBucketStore } from '../adapters/memory-bucket.store';
import { RedisBucketStore } from '../adapters/redis-bucket.store';
import { resolveRateLimitConfig } from './config';

/**
 * Build the bucket store selected by the configuration: the prebuilt `store`
 * if one is given, Redis when `redis` is set, memory otherwise.
 * The choice is made once; it is never revisited per request.
 */
export function createBucketStore(config: RateLimitConfig): IBucketStore {
  const resolved = resolveRateLimitConfig(config);

  if (resolved.store) {
    return resolved.store;
  }

  if (resolved.redis) {
    return new RedisBucketStore({
      rate: resolved.rate,
      capacity: resolved.capacity,
      keyPrefix: resolved.keyPrefix,
      ttlSeconds: resolved.ttlSeconds,
      timeoutMs: resolved.timeoutMs,
      redis: resolved.redis,
    });
  }

  return new MemoryBucketStore({
    rate: resolved.rate,
    capacity: resolved.capacity,
    idleTimeoutMs: resolved.idleTimeoutMs,
    maxBuckets: resolved.maxBuckets,
  });
}

/**
 * Creates the bucket store provider from the registered configuration
 *
 * @returns Provider for the bucket store
 */
export function createBucketStoreProvider(): Provider {
  return {
    provide: RATE_LIMIT_BUCKET_STORE,
    useFactory: (config: RateLimitConfig): IBucketStore =>
      createBucketStore(config),
    inject: [RATE_LIMIT_CONFIG],
  };
}
