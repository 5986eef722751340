import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Field-level error entry of a rejection body
 */
export interface RateLimitErrorDetail {
  field: string;
  message: string;
}

export interface RateLimitExceededBody {
  statusCode: number;
  message: string;
  errors: RateLimitErrorDetail[];
}

/**
 * Machine-readable reason code carried in `errors[0].field`
 */
export const RATE_LIMIT_REASON = 'rate_limit';

/**
 * 429 Too Many Requests, raised when a request's bucket is empty
 */
export class RateLimitExceededException extends HttpException {
  constructor() {
    const body: RateLimitExceededBody = {
      statusCode: HttpStatus.TOO_MANY_REQUESTS,
      message: 'rate limit exceeded',
      errors: [{ field: RATE_LIMIT_REASON, message: 'too many requests' }],
    };
    super(body, HttpStatus.TOO_MANY_REQUESTS);
  }
}
