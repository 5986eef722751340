import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import {
  RateLimitAsyncConfig,
  RateLimitConfig,
  RateLimitConfigFactory,
} from './interfaces/config.interface';
import {
  RATE_LIMIT_BUCKET_STORE,
  RATE_LIMIT_CONFIG,
} from './utils/constants';
import { validateRateLimitConfig } from './utils/config';
import { createBucketStoreProvider } from './utils/bucket-store.factory';
import { RateLimiterService } from './services/rate-limiter.service';
import { AdmissionMiddleware } from './middleware/admission.middleware';
import { AdmissionGuard } from './guards/admission.guard';

const exportedProviders = [
  RateLimiterService,
  AdmissionMiddleware,
  AdmissionGuard,
  RATE_LIMIT_BUCKET_STORE,
];

/**
 * Token bucket admission control. Use forRoot or forRootAsync to configure and register.
 */
@Module({})
export class RateLimitModule {
  /**
   * Register the rate limiter with static configuration
   *
   * @param config Configuration for the rate limiter
   * @returns Dynamic module
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     RateLimitModule.forRoot({
   *       rate: 100,
   *       capacity: 200,
   *       keyFunc: keyFuncByIp(),
   *       redis: { url: 'redis://localhost:6379' },
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: RateLimitConfig): DynamicModule {
    validateRateLimitConfig(config);

    const configProvider: Provider = {
      provide: RATE_LIMIT_CONFIG,
      useValue: config,
    };

    return {
      module: RateLimitModule,
      imports: [ScheduleModule.forRoot()],
      providers: [
        configProvider,
        createBucketStoreProvider(),
        RateLimiterService,
        AdmissionMiddleware,
        AdmissionGuard,
      ],
      exports: exportedProviders,
    };
  }

  /**
   * Register the rate limiter with async configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     RateLimitModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) => ({
   *         rate: configService.get('RATE_LIMIT_RATE'),
   *         capacity: configService.get('RATE_LIMIT_CAPACITY'),
   *         keyFunc: keyFuncByIpAndPath(),
   *       }),
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: RateLimitAsyncConfig): DynamicModule {
    const providers: Provider[] = [
      RateLimitModule.createAsyncConfigProvider(asyncConfig),
      createBucketStoreProvider(),
      RateLimiterService,
      AdmissionMiddleware,
      AdmissionGuard,
    ];

    if (asyncConfig.useClass) {
      providers.push(asyncConfig.useClass);
    }

    return {
      module: RateLimitModule,
      imports: [ScheduleModule.forRoot(), ...(asyncConfig.imports || [])],
      providers,
      exports: exportedProviders,
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: RateLimitAsyncConfig,
  ): Provider {
    const { useFactory } = options;
    if (useFactory) {
      return {
        provide: RATE_LIMIT_CONFIG,
        useFactory: async (...args: unknown[]) => {
          const config = await useFactory(...args);
          validateRateLimitConfig(config);
          return config;
        },
        inject: options.inject || [],
      };
    }

    const factoryType = options.useClass || options.useExisting;
    if (factoryType) {
      return {
        provide: RATE_LIMIT_CONFIG,
        useFactory: async (configFactory: RateLimitConfigFactory) => {
          const config = await configFactory.createRateLimitConfig();
          validateRateLimitConfig(config);
          return config;
        },
        inject: [factoryType],
      };
    }

    throw new Error(
      'Invalid RateLimitAsyncConfig. Must provide useFactory, useClass, or useExisting.',
    );
  }
}
