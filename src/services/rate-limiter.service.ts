import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { Request } from 'express';
import {
  RateLimitConfig,
  ResolvedRateLimitConfig,
} from '../interfaces/config.interface';
import { IBucketStore } from '../interfaces/bucket-store.interface';
import { AdmissionDecision } from '../interfaces/bucket.interface';
import { BucketStoreError } from '../exceptions/bucket-store.error';
import {
  RATE_LIMIT_BUCKET_STORE,
  RATE_LIMIT_CONFIG,
  RATE_LIMIT_SWEEP_INTERVAL,
} from '../utils/constants';
import { resolveRateLimitConfig } from '../utils/config';
import { createBucketStore } from '../utils/bucket-store.factory';

let sweepIntervalCount = 0;

@Injectable()
export class RateLimiterService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly config: ResolvedRateLimitConfig;
  private readonly store: IBucketStore;
  private sweepIntervalName: string | null = null;

  /**
   * @param config Limiter configuration, validated here: an invalid one throws
   * @param store Store to use; built from the configuration when omitted
   */
  constructor(
    @Inject(RATE_LIMIT_CONFIG) config: RateLimitConfig,
    @Optional() @Inject(RATE_LIMIT_BUCKET_STORE) store?: IBucketStore,
    @Optional() private readonly schedulerRegistry?: SchedulerRegistry,
  ) {
    this.config = resolveRateLimitConfig(config);
    this.store = store ?? createBucketStore(config);
  }

  /**
   * Which backend decides for this limiter
   */
  get backend(): IBucketStore['backend'] {
    return this.store.backend;
  }

  async onModuleInit(): Promise<void> {
    await this.store.initialize();
    this.logger.log(
      `Rate limiter ready: ${this.config.rate} tokens/s, capacity ${this.config.capacity}, ${this.store.backend} backend`,
    );

    const { sweepIntervalMs } = this.config;
    if (!this.store.sweep || sweepIntervalMs <= 0 || !this.schedulerRegistry) {
      return;
    }

    const name = `${RATE_LIMIT_SWEEP_INTERVAL}:${++sweepIntervalCount}`;
    const interval = setInterval(() => this.sweep(), sweepIntervalMs);
    interval.unref();
    this.schedulerRegistry.addInterval(name, interval);
    this.sweepIntervalName = name;
    this.logger.log(`Registered idle bucket sweep every ${sweepIntervalMs}ms`);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.sweepIntervalName && this.schedulerRegistry) {
      this.schedulerRegistry.deleteInterval(this.sweepIntervalName);
      this.sweepIntervalName = null;
    }
    await this.store.close();
  }

  /**
   * Decide whether `req` is admitted, using the configured key function
   *
   * @param req Incoming request
   * @param signal Abandons the check when the request goes away
   */
  decide(req: Request, signal?: AbortSignal): Promise<AdmissionDecision> {
    return this.allow(this.config.keyFunc(req), Date.now(), signal);
  }

  /**
   * Refill the bucket for `key` up to `now` and try to consume one token.
   *
   * A store failure never surfaces as an error: it is logged and resolved to
   * ALLOW, or to DENY when the limiter is configured with `failOpen: false`.
   * The store is not retried.
   */
  async allow(
    key: string,
    now: number = Date.now(),
    signal?: AbortSignal,
  ): Promise<AdmissionDecision> {
    try {
      const allowed = await this.store.allow(key, now, signal);
      if (!allowed) {
        this.logger.debug(`Rate limit exceeded for key ${key}`);
        return AdmissionDecision.DENY;
      }
      return AdmissionDecision.ALLOW;
    } catch (error) {
      const decision = this.config.failOpen
        ? AdmissionDecision.ALLOW
        : AdmissionDecision.DENY;
      if (error instanceof BucketStoreError && error.reason === 'aborted') {
        // The client went away; not a store problem
        this.logger.debug(`Rate limit check for key ${key} aborted`);
        return decision;
      }
      this.logger.warn(
        `Rate limit store failure for key ${key}, decision ${decision}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return decision;
    }
  }

  /**
   * Remove idle in-process buckets now
   * @returns Number of buckets removed; always 0 for stores that do not sweep
   */
  sweep(now: number = Date.now()): number {
    return this.store.sweep ? this.store.sweep(now) : 0;
  }
}
