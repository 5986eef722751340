import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import type { Request } from 'express';
import { RateLimiterService } from '../services/rate-limiter.service';
import { AdmissionDecision } from '../interfaces/bucket.interface';
import { RateLimitExceededException } from '../exceptions/rate-limit-exceeded.exception';

/**
 * Guard flavour of the admission check, for controllers and routes:
 * a denied request raises RateLimitExceededException, which Nest renders as a 429.
 *
 * @example
 * ```typescript
 * @UseGuards(AdmissionGuard)
 * @Controller('search')
 * export class SearchController {}
 * ```
 */
@Injectable()
export class AdmissionGuard implements CanActivate {
  constructor(private readonly rateLimiter: RateLimiterService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<Request>();
    const decision = await this.rateLimiter.decide(req);

    if (decision === AdmissionDecision.DENY) {
      throw new RateLimitExceededException();
    }
    return true;
  }
}
