/**
 * Adapter Call Resilience
 *
 * Per-call timeout plus retry with exponential backoff and jitter, applied at
 * the source adapter boundary.
 *
 * DESIGN:
 * - Exponential backoff: delay = initial * (multiplier ^ (attempt - 1)), capped
 * - Jitter: +/- jitterFactor of the delay
 * - Each attempt gets its own timeout
 * - Retry predicate: only transient failures are retried
 */

import {
  AdapterTimeoutError,
  RetryExhaustedError,
  type RetryAttempt,
} from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'resilience' });

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  readonly jitterFactor: number;
}

export interface ResilienceOptions {
  /** Operation label for logs and errors */
  readonly operation?: string;
  readonly timeoutMs?: number;
  readonly retry?: Partial<RetryPolicy>;
  readonly isRetryable?: (error: Error) => boolean;
  /** Injected for tests */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

export const DEFAULT_TIMEOUT_MS = 30_000;

const TRANSIENT_PATTERNS = [
  'timeout',
  'timed out',
  'etimedout',
  'econnrefused',
  'econnreset',
  'enetunreach',
  'network',
  'rate limit',
  '429',
  '503',
  '504',
  'service unavailable',
  'temporary',
];

/**
 * Default retry predicate: timeouts, network faults, rate limits and
 * upstream unavailability
 */
export function isTransientError(error: Error): boolean {
  if (error instanceof AdapterTimeoutError) return true;
  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  const jitterRange = capped * policy.jitterFactor;
  const jitter = random() * 2 * jitterRange - jitterRange;
  return Math.max(0, Math.floor(capped + jitter));
}

/**
 * Reject with AdapterTimeoutError if `fn` has not settled within `timeoutMs`
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AdapterTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an adapter call with a per-attempt timeout and retries.
 *
 * @throws RetryExhaustedError after the last attempt or on a non-retryable error
 *
 * @example
 * ```typescript
 * const summary = await callWithResilience(() => wiki.fetchSummary(title), {
 *   operation: 'encyclopedia.summary',
 *   timeoutMs: 10_000,
 * });
 * ```
 */
export async function callWithResilience<T>(
  fn: () => Promise<T>,
  options: ResilienceOptions = {}
): Promise<T> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
  const operation = options.operation ?? 'adapter call';
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const isRetryable = options.isRetryable ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;
  const attempts: RetryAttempt[] = [];

  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(fn, timeoutMs, operation);
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const delayMs = backoffDelay(attempt, policy, options.random);
      attempts.push({ attemptNumber: attempt, delayMs, error });

      if (!isRetryable(error) || attempt >= policy.maxAttempts) {
        throw new RetryExhaustedError(attempts, error);
      }

      log.warn('Adapter call failed, retrying', {
        operation,
        attempt,
        delayMs,
        error: error.message,
      });
      await sleep(delayMs);
    }
  }
}
