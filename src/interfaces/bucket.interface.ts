/**
 * State of a single token bucket
 */
export interface IBucketState {
  /**
   * Tokens currently available, between 0 and the configured capacity
   */
  tokens: number;

  /**
   * Timestamp in milliseconds (Date.now()) of the last refill/consume transition
   */
  lastUpdate: number;
}

/**
 * Outcome of an admission check
 */
export enum AdmissionDecision {
  ALLOW = 'allow',
  DENY = 'deny',
}
