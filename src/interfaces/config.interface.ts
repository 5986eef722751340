import { ModuleMetadata, Type } from '@nestjs/common';
import type { Redis } from 'ioredis';
import { KeyFunc } from '../utils/key-extractors';
import { IBucketStore } from './bucket-store.interface';

/**
 * Connection options for the Redis coordination store
 */
export interface RedisConnectionOptions {
  /**
   * Existing client to use. It is shared, not owned: the store never closes it.
   */
  client?: Redis;

  url?: string;
  host?: string;
  port?: number;
  password?: string;
}

/**
 * Configuration for one rate limiter
 */
export interface RateLimitConfig {
  /**
   * Tokens added to a bucket per second
   */
  rate: number;

  /**
   * Maximum tokens a bucket can hold (burst size)
   */
  capacity: number;

  /**
   * Extracts the partition key from a request.
   * When omitted all traffic shares one global bucket.
   */
  keyFunc?: KeyFunc;

  /**
   * Redis connection. When present, buckets are shared across every instance
   * pointed at the same Redis; otherwise they live in this process only.
   */
  redis?: RedisConnectionOptions;

  /**
   * Prebuilt store to use instead of the memory or Redis one
   */
  store?: IBucketStore;

  /**
   * Prefix for bucket keys in Redis
   * @default 'ratelimit:'
   */
  keyPrefix?: string;

  /**
   * Seconds of inactivity after which a bucket expires in Redis.
   * Refreshed on every access.
   * @default 60
   */
  ttlSeconds?: number;

  /**
   * Upper bound in milliseconds on one Redis round trip
   * @default 100
   */
  timeoutMs?: number;

  /**
   * Decision to take when the store fails or times out.
   * true admits the request, false rejects it.
   * @default true
   */
  failOpen?: boolean;

  /**
   * In-process buckets untouched for this long are removed by the sweep.
   * A bucket is kept regardless until it has had time to refill to capacity.
   * @default ttlSeconds * 1000
   */
  idleTimeoutMs?: number;

  /**
   * How often the idle sweep runs. 0 disables it.
   * @default 60000
   */
  sweepIntervalMs?: number;

  /**
   * Maximum number of in-process buckets; the least recently used is evicted
   * beyond it. 0 means unbounded.
   * @default 0
   */
  maxBuckets?: number;
}

/**
 * Configuration with every default applied
 */
export interface ResolvedRateLimitConfig
  extends Required<Omit<RateLimitConfig, 'redis' | 'store'>> {
  redis?: RedisConnectionOptions;
  store?: IBucketStore;
}

/**
 * Interface for async config factory
 */
export interface RateLimitConfigFactory {
  createRateLimitConfig(): Promise<RateLimitConfig> | RateLimitConfig;
}

/**
 * Options for async module configuration
 */
export interface RateLimitAsyncConfig extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Existing provider implementing the config factory interface
   */
  useExisting?: Type<RateLimitConfigFactory>;

  /**
   * Class that implements config factory interface
   */
  useClass?: Type<RateLimitConfigFactory>;

  /**
   * Factory function for config
   */
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  useFactory?: (...args: any[]) => Promise<RateLimitConfig> | RateLimitConfig;

  /**
   * Dependencies to inject into factory function
   */
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  inject?: any[];
}
