import { TransientProviderError } from './errors';
import { describeError, logger } from './logger';
import { sleep } from './async';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffCoefficient: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffCoefficient: 2,
  maxDelayMs: 10_000,
};

/** Delay before the retry that follows failed attempt number `attempt` (1-based). */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffCoefficient, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Runs `fn` until it succeeds or the policy gives up. Only retryable
 * TransientProviderErrors are retried; anything else propagates at once.
 * On exhaustion the last failure is rethrown as a non-retryable
 * TransientProviderError.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  provider: string,
  fn: (attempt: number) => Promise<T>,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!(err instanceof TransientProviderError) || !err.retryable) throw err;

      if (attempt >= policy.maxAttempts) {
        throw new TransientProviderError(
          provider,
          `${provider} failed after ${attempt} attempts: ${err.message}`,
          false,
        );
      }

      const delay = retryDelay(policy, attempt);
      logger.warn('Retrying provider call', {
        provider,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs: delay,
        error: describeError(err),
      });
      await sleep(delay);
    }
  }
}
