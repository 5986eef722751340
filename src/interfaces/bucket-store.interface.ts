import { BucketStoreBackend } from '../adapters/types';

/**
 * Interface for stores that hold token buckets keyed by partition key
 */
export interface IBucketStore {
  /**
   * Which backend this store is
   */
  readonly backend: BucketStoreBackend;

  /**
   * Prepare the store for use (connectivity checks and the like)
   */
  initialize(): Promise<void>;

  /**
   * Refill the bucket for `key` up to `now` and try to consume one token.
   * Resolves to true if a token was consumed.
   *
   * Stores that can decide without I/O return the boolean directly.
   *
   * @param key Partition key
   * @param now Caller's clock, in milliseconds since epoch
   * @param signal Aborts the wait for a remote store
   */
  allow(
    key: string,
    now: number,
    signal?: AbortSignal,
  ): boolean | Promise<boolean>;

  /**
   * Remove buckets idle since before `now - idleTimeoutMs`.
   * Only stores that keep buckets in process implement this.
   * @returns Number of buckets removed
   */
  sweep?(now: number): number;

  /**
   * Release connections and other resources owned by the store
   */
  close(): Promise<void>;
}
