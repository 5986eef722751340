export const MEMORY_BUCKET_STORE = 'memory';
export const REDIS_BUCKET_STORE = 'redis';

export type BucketStoreBackend =
  | typeof MEMORY_BUCKET_STORE
  | typeof REDIS_BUCKET_STORE;
