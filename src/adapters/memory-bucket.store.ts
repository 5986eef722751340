import { Injectable, Logger } from '@nestjs/common';
import { IBucketStore } from '../interfaces/bucket-store.interface';
import { IBucketState } from '../interfaces/bucket.interface';
import { createBucket, refillAndConsume } from '../utils/token-bucket';
import { MEMORY_BUCKET_STORE } from './types';

export interface MemoryBucketStoreOptions {
  rate: number;
  capacity: number;

  /**
   * Buckets untouched for this long are removed by sweep(), once they have
   * also had time to refill completely
   */
  idleTimeoutMs: number;

  /**
   * Least recently used buckets are evicted beyond this size. 0 means unbounded.
   */
  maxBuckets?: number;
}

/**
 * In-memory bucket store.
 * Buckets only exist in this process, so each instance of a service enforces
 * its own budget.
 *
 * allow() runs to completion without yielding to the event loop. Lookup,
 * creation and the refill/consume transition of a bucket are therefore never
 * interleaved with another request's, for the same key or any other.
 */
@Injectable()
export class MemoryBucketStore implements IBucketStore {
  readonly backend = MEMORY_BUCKET_STORE;

  private readonly logger = new Logger(MemoryBucketStore.name);
  // Map iteration order doubles as recency order: least recently used first
  private readonly buckets: Map<string, IBucketState> = new Map();

  constructor(private readonly options: MemoryBucketStoreOptions) {}

  async initialize(): Promise<void> {
    // Nothing to do for memory store
  }

  allow(key: string, now: number): boolean {
    let bucket = this.buckets.get(key);
    if (bucket) {
      this.buckets.delete(key);
    } else {
      bucket = createBucket(this.options.capacity, now);
    }
    this.buckets.set(key, bucket);
    this.evictOverflow();

    return refillAndConsume(
      bucket,
      this.options.rate,
      this.options.capacity,
      now,
    );
  }

  /**
   * Remove idle buckets. A bucket only qualifies once it has been untouched
   * for the idle timeout and long enough to be full again, so a key that
   * comes back after a sweep gets no more tokens than refill would give it.
   */
  sweep(now: number): number {
    const { rate, capacity, idleTimeoutMs } = this.options;
    const refillMs = Math.ceil((capacity / rate) * 1000);
    const cutoff = now - Math.max(idleTimeoutMs, refillMs);
    let removed = 0;

    for (const [key, bucket] of this.buckets) {
      if (bucket.lastUpdate < cutoff) {
        this.buckets.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.debug(
        `Swept ${removed} idle buckets, ${this.buckets.size} remaining`,
      );
    }
    return removed;
  }

  /**
   * Number of buckets currently held
   */
  get size(): number {
    return this.buckets.size;
  }

  /**
   * Snapshot of a bucket's state, for inspection
   */
  getBucket(key: string): IBucketState | null {
    const bucket = this.buckets.get(key);
    return bucket ? { ...bucket } : null;
  }

  async close(): Promise<void> {
    this.buckets.clear();
  }

  private evictOverflow(): void {
    const maxBuckets = this.options.maxBuckets ?? 0;
    if (maxBuckets <= 0) {
      return;
    }

    for (const key of this.buckets.keys()) {
      if (this.buckets.size <= maxBuckets) {
        break;
      }
      this.buckets.delete(key);
      this.logger.debug(`Evicted least recently used bucket ${key}`);
    }
  }
}
