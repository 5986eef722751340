import type { Request } from 'express';
import { ConfigService } from '@nestjs/config';
import {
  rateLimitByIp,
  rateLimitByIpRedis,
  rateLimitConfigFromEnv,
  resolveRateLimitConfig,
  validateRateLimitConfig,
} from '../config';

function mockConfigService(env: Record<string, string>): ConfigService {
  return {
    get: jest.fn((name: string) => env[name]),
  } as unknown as ConfigService;
}

const req = {
  headers: {},
  socket: { remoteAddress: '10.0.0.1' },
  originalUrl: '/api/users',
  url: '/api/users',
} as unknown as Request;

describe('rate limit config', () => {
  describe('validateRateLimitConfig', () => {
    it('should accept a minimal valid config', () => {
      expect(() => validateRateLimitConfig({ rate: 0.5, capacity: 1 })).not.toThrow();
    });

    it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
      'should reject rate %p',
      (rate) => {
        expect(() => validateRateLimitConfig({ rate, capacity: 1 })).toThrow(
          'rate must be a positive number',
        );
      },
    );

    it.each([0, -3, 1.5])('should reject capacity %p', (capacity) => {
      expect(() => validateRateLimitConfig({ rate: 1, capacity })).toThrow(
        'capacity must be an integer of at least 1',
      );
    });

    it('should reject a non-positive ttlSeconds', () => {
      expect(() =>
        validateRateLimitConfig({ rate: 1, capacity: 1, ttlSeconds: 0 }),
      ).toThrow('ttlSeconds must be a positive integer');
    });

    it('should reject a non-positive timeoutMs', () => {
      expect(() =>
        validateRateLimitConfig({ rate: 1, capacity: 1, timeoutMs: -5 }),
      ).toThrow('timeoutMs must be a positive integer');
    });

    it('should reject a negative maxBuckets', () => {
      expect(() =>
        validateRateLimitConfig({ rate: 1, capacity: 1, maxBuckets: -1 }),
      ).toThrow('maxBuckets must be a non-negative integer');
    });

    it('should reject redis options without a way to connect', () => {
      expect(() =>
        validateRateLimitConfig({ rate: 1, capacity: 1, redis: { port: 6379 } }),
      ).toThrow('Rate limit redis options require a client, url or host');
    });
  });

  describe('resolveRateLimitConfig', () => {
    it('should fill in defaults', () => {
      const resolved = resolveRateLimitConfig({ rate: 10, capacity: 20 });

      expect(resolved).toEqual(
        expect.objectContaining({
          rate: 10,
          capacity: 20,
          keyPrefix: 'ratelimit:',
          ttlSeconds: 60,
          timeoutMs: 100,
          failOpen: true,
          idleTimeoutMs: 60_000,
          sweepIntervalMs: 60_000,
          maxBuckets: 0,
        }),
      );
      expect(resolved.keyFunc(req)).toBe('global');
    });

    it('should derive the idle timeout from ttlSeconds', () => {
      const resolved = resolveRateLimitConfig({
        rate: 10,
        capacity: 20,
        ttlSeconds: 5,
      });

      expect(resolved.idleTimeoutMs).toBe(5000);
    });

    it('should keep explicit values', () => {
      const resolved = resolveRateLimitConfig({
        rate: 10,
        capacity: 20,
        failOpen: false,
        keyPrefix: 'api:',
      });

      expect(resolved.failOpen).toBe(false);
      expect(resolved.keyPrefix).toBe('api:');
    });
  });

  describe('rateLimitConfigFromEnv', () => {
    it('should read the limiter from environment variables', () => {
      const configService = mockConfigService({
        RATE_LIMIT_RATE: '2.5',
        RATE_LIMIT_CAPACITY: '10',
        RATE_LIMIT_KEY: 'ip-path',
        RATE_LIMIT_REDIS_URL: 'redis://cache:6379',
        RATE_LIMIT_KEY_PREFIX: 'edge:',
        RATE_LIMIT_TTL_SECONDS: '120',
        RATE_LIMIT_TIMEOUT_MS: '50',
        RATE_LIMIT_FAIL_OPEN: 'false',
      });

      const config = rateLimitConfigFromEnv(configService);

      expect(config).toEqual(
        expect.objectContaining({
          rate: 2.5,
          capacity: 10,
          redis: { url: 'redis://cache:6379' },
          keyPrefix: 'edge:',
          ttlSeconds: 120,
          timeoutMs: 50,
          failOpen: false,
        }),
      );
      expect(config.keyFunc?.(req)).toBe('10.0.0.1:/api/users');
    });

    it('should leave optional settings undefined when unset', () => {
      const config = rateLimitConfigFromEnv(
        mockConfigService({ RATE_LIMIT_RATE: '1', RATE_LIMIT_CAPACITY: '1' }),
      );

      expect(config).toEqual({
        rate: 1,
        capacity: 1,
        keyFunc: undefined,
        redis: undefined,
        keyPrefix: undefined,
        ttlSeconds: undefined,
        timeoutMs: undefined,
        failOpen: undefined,
      });
    });

    it('should require rate and capacity', () => {
      expect(() =>
        rateLimitConfigFromEnv(mockConfigService({ RATE_LIMIT_RATE: '1' })),
      ).toThrow('RATE_LIMIT_RATE and RATE_LIMIT_CAPACITY must be set');
    });

    it('should reject a malformed number', () => {
      expect(() =>
        rateLimitConfigFromEnv(
          mockConfigService({ RATE_LIMIT_RATE: 'fast', RATE_LIMIT_CAPACITY: '1' }),
        ),
      ).toThrow('RATE_LIMIT_RATE must be a number, got "fast"');
    });

    it('should reject a malformed boolean', () => {
      expect(() =>
        rateLimitConfigFromEnv(
          mockConfigService({
            RATE_LIMIT_RATE: '1',
            RATE_LIMIT_CAPACITY: '1',
            RATE_LIMIT_FAIL_OPEN: 'maybe',
          }),
        ),
      ).toThrow('RATE_LIMIT_FAIL_OPEN must be true or false, got "maybe"');
    });
  });

  describe('convenience builders', () => {
    it('should build a per-address limiter', () => {
      const config = rateLimitByIp(100, 200);

      expect(config.rate).toBe(100);
      expect(config.capacity).toBe(200);
      expect(config.redis).toBeUndefined();
      expect(config.keyFunc?.(req)).toBe('10.0.0.1');
    });

    it('should build a per-address limiter shared through redis', () => {
      const config = rateLimitByIpRedis({ url: 'redis://cache:6379' }, 100, 200);

      expect(config.redis).toEqual({ url: 'redis://cache:6379' });
      expect(config.keyFunc?.(req)).toBe('10.0.0.1');
    });
  });
});
