/**
 * Bounded exponential backoff for retryable remote errors.
 */
import { RemoteApiError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { RetryPolicy } from './types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export interface RetryHooks {
  /** Defaults to a timer that rejects when `signal` aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Defaults to Math.random */
  random?: () => number;
  signal?: AbortSignal;
}

/**
 * Delay before retry number `attempt` (1-based): full jitter over
 * `min(maxDelayMs, baseDelayMs * 2^(attempt-1))`.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  return Math.floor(random() * ceiling);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RemoteApiError('Cancelled', 'Request was cancelled', false, 'cancelled'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RemoteApiError('Cancelled', 'Request was cancelled', false, 'cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation`, retrying only RemoteApiErrors marked retryable, up to
 * `policy.maxAttempts` attempts in total. The last error is rethrown as-is.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const random = hooks.random ?? Math.random;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof RemoteApiError) || !error.retryable || attempt >= maxAttempts) {
        throw error;
      }
      const delay = backoffDelay(attempt, policy, random);
      logger.warn(`${error.apiCode}: retrying in ${delay} ms (attempt ${attempt + 1}/${maxAttempts})`);
      await wait(delay, hooks.signal);
    }
  }
}
