import { ExecutionContext, HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AdmissionGuard } from '../admission.guard';
import { RateLimiterService } from '../../services/rate-limiter.service';
import { AdmissionDecision } from '../../interfaces/bucket.interface';
import { RateLimitExceededException } from '../../exceptions/rate-limit-exceeded.exception';

describe('AdmissionGuard', () => {
  let guard: AdmissionGuard;
  let rateLimiter: { decide: jest.Mock };
  const mockRequest = { headers: { 'x-forwarded-for': '10.0.0.1' } };

  const mockContext = {
    switchToHttp: jest.fn().mockReturnValue({
      getRequest: jest.fn().mockReturnValue(mockRequest),
    }),
  } as unknown as ExecutionContext;

  beforeEach(async () => {
    rateLimiter = { decide: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdmissionGuard,
        { provide: RateLimiterService, useValue: rateLimiter },
      ],
    }).compile();

    guard = module.get<AdmissionGuard>(AdmissionGuard);
  });

  it('should activate an admitted request', async () => {
    rateLimiter.decide.mockResolvedValue(AdmissionDecision.ALLOW);

    await expect(guard.canActivate(mockContext)).resolves.toBe(true);
    expect(rateLimiter.decide).toHaveBeenCalledWith(mockRequest);
  });

  it('should throw a 429 exception for a denied request', async () => {
    rateLimiter.decide.mockResolvedValue(AdmissionDecision.DENY);

    const error = await guard.canActivate(mockContext).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitExceededException);
    expect(error).toMatchObject({ status: HttpStatus.TOO_MANY_REQUESTS });
  });
});
