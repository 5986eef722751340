import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { RateLimiterService } from '../services/rate-limiter.service';
import { AdmissionDecision } from '../interfaces/bucket.interface';
import { RateLimitExceededException } from '../exceptions/rate-limit-exceeded.exception';

/**
 * Middleware that rejects requests whose bucket is empty with a 429.
 * Admitted requests continue down the chain untouched.
 *
 * @example
 * ```typescript
 * export class AppModule implements NestModule {
 *   configure(consumer: MiddlewareConsumer) {
 *     consumer.apply(AdmissionMiddleware).forRoutes('*');
 *   }
 * }
 * ```
 */
@Injectable()
export class AdmissionMiddleware implements NestMiddleware {
  constructor(private readonly rateLimiter: RateLimiterService) {}

  async use(req: Request, res: Response, next: NextFunction): Promise<void> {
    // A client hanging up abandons a pending Redis check
    const abort = new AbortController();
    const onClose = () => abort.abort();
    res.once('close', onClose);

    let decision: AdmissionDecision;
    try {
      decision = await this.rateLimiter.decide(req, abort.signal);
    } finally {
      res.off('close', onClose);
    }

    if (decision === AdmissionDecision.DENY) {
      const exception = new RateLimitExceededException();
      res.status(exception.getStatus()).json(exception.getResponse());
      return;
    }

    next();
  }
}
