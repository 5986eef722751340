import { IBucketState } from '../interfaces/bucket.interface';

/**
 * A bucket that has never been seen starts full
 */
export function createBucket(capacity: number, now: number): IBucketState {
  return { tokens: capacity, lastUpdate: now };
}

/**
 * Refill `bucket` for the time elapsed up to `now`, then try to take one token.
 * The bucket is updated in place, tokens and timestamp together.
 *
 * A `now` earlier than the last update adds nothing and leaves the timestamp
 * where it was, so lastUpdate never moves backwards.
 *
 * @returns true if a token was consumed
 */
export function refillAndConsume(
  bucket: IBucketState,
  rate: number,
  capacity: number,
  now: number,
): boolean {
  const elapsedMs = Math.max(0, now - bucket.lastUpdate);
  const tokens = Math.min(capacity, bucket.tokens + (elapsedMs / 1000) * rate);
  const lastUpdate = Math.max(bucket.lastUpdate, now);

  if (tokens >= 1) {
    bucket.tokens = tokens - 1;
    bucket.lastUpdate = lastUpdate;
    return true;
  }

  bucket.tokens = tokens;
  bucket.lastUpdate = lastUpdate;
  return false;
}
