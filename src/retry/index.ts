/**
 * Retry Module
 *
 * Bounded exponential backoff around a zero-argument async operation.
 * Policies are plain values so their parameters can be inspected and tested
 * on their own.
 *
 * Wait after failed attempt k (1-indexed): min(maxWait, minWait * 2^(k-1)) seconds.
 * No wait follows the final attempt, and the last error is re-thrown as is.
 */

import { isRetryableFailure } from '../errors/index.js';
import type { Logger } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface RetryPolicy {
  readonly name: string;
  /** >= 1 */
  readonly maxAttempts: number;
  readonly minWaitSeconds: number;
  readonly maxWaitSeconds: number;
  readonly isRetryable: (error: unknown) => boolean;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryOptions {
  sleep?: SleepFn;
  logger?: Logger;
}

// ============================================================================
// Policies
// ============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createRetryPolicy(policy: RetryPolicy): RetryPolicy {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
  }
  if (policy.minWaitSeconds < 0 || policy.maxWaitSeconds < policy.minWaitSeconds) {
    throw new RangeError(
      `wait bounds must satisfy 0 <= minWait <= maxWait, got ${policy.minWaitSeconds}/${policy.maxWaitSeconds}`
    );
  }
  return Object.freeze({ ...policy });
}

/** Remote API: short waits */
export const CLOUD_RETRY_POLICY: RetryPolicy = createRetryPolicy({
  name: 'cloud',
  maxAttempts: 3,
  minWaitSeconds: 1,
  maxWaitSeconds: 10,
  isRetryable: isRetryableFailure,
});

/** Local service that may still be starting up: longer waits */
export const LOCAL_RETRY_POLICY: RetryPolicy = createRetryPolicy({
  name: 'local',
  maxAttempts: 3,
  minWaitSeconds: 2,
  maxWaitSeconds: 15,
  isRetryable: isRetryableFailure,
});

export function withMaxAttempts(policy: RetryPolicy, maxAttempts: number): RetryPolicy {
  return createRetryPolicy({ ...policy, maxAttempts });
}

/**
 * Seconds to wait after failed attempt `attempt` (1-indexed)
 */
export function backoffSeconds(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxWaitSeconds, policy.minWaitSeconds * 2 ** (attempt - 1));
}

/**
 * Total wait accumulated when every attempt fails with a retryable error
 */
export function totalBackoffSeconds(policy: RetryPolicy): number {
  let total = 0;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    total += backoffSeconds(policy, attempt);
  }
  return total;
}

// ============================================================================
// Execution
// ============================================================================

export async function executeWithRetry<T>(
  policy: RetryPolicy,
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        throw error;
      }

      const waitSeconds = backoffSeconds(policy, attempt);
      options.logger?.warn(`${policy.name} attempt ${attempt} failed, retrying in ${waitSeconds}s`, {
        attempt,
        maxAttempts: policy.maxAttempts,
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(waitSeconds * 1000);
    }
  }
}
