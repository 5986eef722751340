import { Injectable, Logger } from '@nestjs/common';
import { Redis, RedisOptions } from 'ioredis';
import { IBucketStore } from '../interfaces/bucket-store.interface';
import { RedisConnectionOptions } from '../interfaces/config.interface';
import { BucketStoreError } from '../exceptions/bucket-store.error';
import { TOKEN_BUCKET_SCRIPT } from './token-bucket.script';
import { REDIS_BUCKET_STORE } from './types';

export interface RedisBucketStoreOptions {
  rate: number;
  capacity: number;
  keyPrefix: string;
  ttlSeconds: number;
  timeoutMs: number;
  redis: RedisConnectionOptions;
}

// Commands must fail fast while Redis is unreachable instead of queueing
const OWNED_CLIENT_OPTIONS: RedisOptions = {
  enableOfflineQueue: false,
  maxRetriesPerRequest: 1,
  lazyConnect: true,
};

/**
 * Redis bucket store.
 * Every decision is one EVAL of the token bucket script, so any number of
 * service instances sharing a Redis observe one consistent budget per key.
 *
 * The refill uses the calling process's clock; instances sharing a key need
 * loosely synchronized clocks (NTP or similar) for fair refills.
 */
@Injectable()
export class RedisBucketStore implements IBucketStore {
  readonly backend = REDIS_BUCKET_STORE;

  private readonly logger = new Logger(RedisBucketStore.name);
  private readonly client: Redis;
  private readonly ownsClient: boolean;
  private connecting?: Promise<void>;

  constructor(private readonly options: RedisBucketStoreOptions) {
    const { client, url, host, port, password } = options.redis;

    if (client) {
      this.client = client;
      this.ownsClient = false;
    } else {
      this.client = url
        ? new Redis(url, OWNED_CLIENT_OPTIONS)
        : new Redis({
            ...OWNED_CLIENT_OPTIONS,
            host: host || 'localhost',
            port: port || 6379,
            password,
          });
      this.ownsClient = true;
      this.client.on('error', (error: Error) =>
        this.logger.warn(`Redis connection error: ${error.message}`),
      );
    }
  }

  /**
   * Generate a Redis key for a bucket
   */
  private getBucketKey(key: string): string {
    return `${this.options.keyPrefix}${key}`;
  }

  /**
   * Connect and check the connection, each within `timeoutMs`.
   * An unreachable Redis is logged, not thrown: the service still starts and
   * the rate limiter applies its failure policy until Redis comes back.
   */
  async initialize(): Promise<void> {
    try {
      await this.withDeadline(this.connect());
      await this.withDeadline(this.client.ping());
      this.logger.log(
        `Initialized RedisBucketStore with prefix: ${this.options.keyPrefix}`,
      );
    } catch (error) {
      this.logger.warn(
        `Redis unreachable at startup: ${errorMessage(error)}`,
      );
    }
  }

  async allow(key: string, now: number, signal?: AbortSignal): Promise<boolean> {
    const { rate, capacity, ttlSeconds } = this.options;

    if (signal?.aborted) {
      throw new BucketStoreError('aborted', 'Rate limit check aborted');
    }

    const result = await this.withDeadline(
      this.connect().then(() =>
        this.client.eval(
          TOKEN_BUCKET_SCRIPT,
          1,
          this.getBucketKey(key),
          rate,
          capacity,
          now,
          ttlSeconds,
        ),
      ),
      signal,
    );

    if (result === 1) {
      return true;
    }
    if (result === 0) {
      return false;
    }
    throw new BucketStoreError(
      'protocol',
      `Unexpected token bucket script reply: ${String(result)}`,
    );
  }

  async close(): Promise<void> {
    if (!this.ownsClient) {
      return;
    }
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.debug(
        `Redis quit failed, disconnecting: ${errorMessage(error)}`,
      );
      this.client.disconnect();
    }
  }

  /**
   * Open an owned client that has not connected yet, so a store used without
   * initialize() still reaches Redis. Concurrent callers share one attempt.
   */
  private connect(): Promise<void> {
    if (!this.ownsClient || this.client.status !== 'wait') {
      return this.connecting ?? Promise.resolve();
    }
    if (!this.connecting) {
      this.connecting = this.client.connect().finally(() => {
        this.connecting = undefined;
      });
    }
    return this.connecting;
  }

  /**
   * Settle with `operation`, unless the timeout elapses or `signal` aborts
   * first. The timer and abort listener are released either way.
   */
  private withDeadline<T>(
    operation: Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const { timeoutMs } = this.options;

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const settle = (done: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        done();
      };

      const onAbort = () =>
        settle(() =>
          reject(new BucketStoreError('aborted', 'Rate limit check aborted')),
        );

      const timer = setTimeout(
        () =>
          settle(() =>
            reject(
              new BucketStoreError(
                'timeout',
                `Redis did not answer within ${timeoutMs}ms`,
              ),
            ),
          ),
        timeoutMs,
      );
      signal?.addEventListener('abort', onAbort, { once: true });

      operation.then(
        (value) => settle(() => resolve(value)),
        (error: unknown) =>
          settle(() =>
            reject(
              error instanceof BucketStoreError
                ? error
                : new BucketStoreError('unavailable', errorMessage(error), error),
            ),
          ),
      );
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
