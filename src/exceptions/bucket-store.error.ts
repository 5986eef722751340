export type BucketStoreFailureReason =
  | 'timeout'
  | 'aborted'
  | 'unavailable'
  | 'protocol';

/**
 * Raised by a bucket store that could not reach a decision.
 * The rate limiter turns it into an admission decision according to its
 * fail-open setting; it never reaches the request handler.
 */
export class BucketStoreError extends Error {
  readonly cause?: unknown;

  constructor(
    readonly reason: BucketStoreFailureReason,
    message: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = BucketStoreError.name;
    this.cause = cause;
  }
}
