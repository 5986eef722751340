import 'reflect-metadata';

// Module
export { RateLimitModule } from './rate-limit.module';

// Services
export { RateLimiterService } from './services/rate-limiter.service';

// Boundary
export { AdmissionMiddleware } from './middleware/admission.middleware';
export { AdmissionGuard } from './guards/admission.guard';

// Interfaces
export {
  RateLimitConfig,
  RateLimitAsyncConfig,
  RateLimitConfigFactory,
  RedisConnectionOptions,
  ResolvedRateLimitConfig,
} from './interfaces/config.interface';
export { IBucketStore } from './interfaces/bucket-store.interface';
export { IBucketState, AdmissionDecision } from './interfaces/bucket.interface';

// Exceptions
export {
  RateLimitExceededException,
  RateLimitExceededBody,
  RateLimitErrorDetail,
  RATE_LIMIT_REASON,
} from './exceptions/rate-limit-exceeded.exception';
export {
  BucketStoreError,
  BucketStoreFailureReason,
} from './exceptions/bucket-store.error';

// Key functions
export {
  KeyFunc,
  keyFuncGlobal,
  keyFuncByIp,
  keyFuncByPath,
  keyFuncByIpAndPath,
  keyFuncByClientId,
  keyFuncByClientIdAndPath,
  keyFuncByHeader,
  keyFuncFromName,
} from './utils/key-extractors';
export { setClientId, getClientId } from './utils/client-identity';

// Configuration
export {
  validateRateLimitConfig,
  resolveRateLimitConfig,
  rateLimitConfigFromEnv,
  rateLimitByIp,
  rateLimitByIpRedis,
} from './utils/config';
export {
  RATE_LIMIT_CONFIG,
  RATE_LIMIT_BUCKET_STORE,
  GLOBAL_KEY,
} from './utils/constants';

// Bucket stores (for extending)
export { createBucketStore } from './utils/bucket-store.factory';
export {
  MemoryBucketStore,
  MemoryBucketStoreOptions,
} from './adapters/memory-bucket.store';
export {
  RedisBucketStore,
  RedisBucketStoreOptions,
} from './adapters/redis-bucket.store';
export { BucketStoreBackend } from './adapters/types';
