import { ConfigService } from '@nestjs/config';
import {
  RateLimitConfig,
  RedisConnectionOptions,
  ResolvedRateLimitConfig,
} from '../interfaces/config.interface';
import {
  DEFAULT_KEY_PREFIX,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TTL_SECONDS,
} from './constants';
import { keyFuncByIp, keyFuncFromName, keyFuncGlobal } from './key-extractors';

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Throws if the configuration cannot describe a working limiter.
 * A capacity below 1 would deny everything and is treated as a mistake,
 * not as a policy.
 */
export function validateRateLimitConfig(config: RateLimitConfig): void {
  if (!Number.isFinite(config.rate) || config.rate <= 0) {
    throw new Error(
      `Rate limit config rate must be a positive number, got ${config.rate}`,
    );
  }

  if (!Number.isInteger(config.capacity) || config.capacity < 1) {
    throw new Error(
      `Rate limit config capacity must be an integer of at least 1, got ${config.capacity}`,
    );
  }

  if (config.ttlSeconds !== undefined && !isPositiveInteger(config.ttlSeconds)) {
    throw new Error(
      `Rate limit config ttlSeconds must be a positive integer, got ${config.ttlSeconds}`,
    );
  }

  if (config.timeoutMs !== undefined && !isPositiveInteger(config.timeoutMs)) {
    throw new Error(
      `Rate limit config timeoutMs must be a positive integer, got ${config.timeoutMs}`,
    );
  }

  for (const field of [
    'idleTimeoutMs',
    'sweepIntervalMs',
    'maxBuckets',
  ] as const) {
    const value = config[field];
    if (value !== undefined && !isNonNegativeInteger(value)) {
      throw new Error(
        `Rate limit config ${field} must be a non-negative integer, got ${value}`,
      );
    }
  }

  const redis = config.redis;
  if (redis && !redis.client && !redis.url && !redis.host) {
    throw new Error(
      'Rate limit redis options require a client, url or host',
    );
  }
}

/**
 * Validate `config` and fill in every default
 */
export function resolveRateLimitConfig(
  config: RateLimitConfig,
): ResolvedRateLimitConfig {
  validateRateLimitConfig(config);

  const ttlSeconds = config.ttlSeconds ?? DEFAULT_TTL_SECONDS;

  return {
    rate: config.rate,
    capacity: config.capacity,
    keyFunc: config.keyFunc ?? keyFuncGlobal(),
    redis: config.redis,
    store: config.store,
    keyPrefix: config.keyPrefix ?? DEFAULT_KEY_PREFIX,
    ttlSeconds,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    failOpen: config.failOpen ?? true,
    idleTimeoutMs: config.idleTimeoutMs ?? ttlSeconds * 1000,
    sweepIntervalMs: config.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS,
    maxBuckets: config.maxBuckets ?? 0,
  };
}

function readNumber(
  configService: ConfigService,
  name: string,
): number | undefined {
  const raw = configService.get<string | number>(name);
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(
  configService: ConfigService,
  name: string,
): boolean | undefined {
  const raw = configService.get<string | boolean>(name);
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (typeof raw === 'boolean') {
    return raw;
  }
  const normalized = raw.toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  throw new Error(`${name} must be true or false, got "${raw}"`);
}

/**
 * Build a rate limit config from environment variables:
 *
 * - RATE_LIMIT_RATE (required) tokens per second
 * - RATE_LIMIT_CAPACITY (required) burst size
 * - RATE_LIMIT_KEY key function name, see keyFuncFromName()
 * - RATE_LIMIT_REDIS_URL enables the shared Redis backend
 * - RATE_LIMIT_KEY_PREFIX, RATE_LIMIT_TTL_SECONDS, RATE_LIMIT_TIMEOUT_MS
 * - RATE_LIMIT_FAIL_OPEN
 *
 * @example
 * ```typescript
 * RateLimitModule.forRootAsync({
 *   imports: [ConfigModule],
 *   inject: [ConfigService],
 *   useFactory: rateLimitConfigFromEnv,
 * })
 * ```
 */
export function rateLimitConfigFromEnv(
  configService: ConfigService,
): RateLimitConfig {
  const rate = readNumber(configService, 'RATE_LIMIT_RATE');
  const capacity = readNumber(configService, 'RATE_LIMIT_CAPACITY');
  if (rate === undefined || capacity === undefined) {
    throw new Error('RATE_LIMIT_RATE and RATE_LIMIT_CAPACITY must be set');
  }

  const keyName = configService.get<string>('RATE_LIMIT_KEY');
  const redisUrl = configService.get<string>('RATE_LIMIT_REDIS_URL');

  return {
    rate,
    capacity,
    keyFunc: keyName ? keyFuncFromName(keyName) : undefined,
    redis: redisUrl ? { url: redisUrl } : undefined,
    keyPrefix: configService.get<string>('RATE_LIMIT_KEY_PREFIX') || undefined,
    ttlSeconds: readNumber(configService, 'RATE_LIMIT_TTL_SECONDS'),
    timeoutMs: readNumber(configService, 'RATE_LIMIT_TIMEOUT_MS'),
    failOpen: readBoolean(configService, 'RATE_LIMIT_FAIL_OPEN'),
  };
}

/**
 * Per client address limit held in this process
 */
export function rateLimitByIp(rate: number, capacity: number): RateLimitConfig {
  return { rate, capacity, keyFunc: keyFuncByIp() };
}

/**
 * Per client address limit shared through Redis
 */
export function rateLimitByIpRedis(
  redis: RedisConnectionOptions,
  rate: number,
  capacity: number,
): RateLimitConfig {
  return { rate, capacity, keyFunc: keyFuncByIp(), redis };
}
