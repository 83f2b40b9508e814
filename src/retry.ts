import { RATE_LIMIT_FALLBACK_MS, interpret, classifyFailure } from './classifier.js';
import { fail, type ClassifiedError, type ErrorKind, type Result } from './errors.js';
import { logger } from './logging/index.js';
import { cancelledFailure, type RequestDescriptor, type Transport } from './transport.js';

export interface RetryPolicy {
  /** Total calls including the first one. */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs: number;
  /** Upper bound of the random delay added to each wait. */
  readonly jitterMs: number;
  readonly retryOn: ReadonlySet<ErrorKind>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30_000,
  jitterMs: 1000,
  retryOn: new Set<ErrorKind>(['RateLimit', 'Network']),
});

/** setTimeout fires immediately for anything above 2^31 - 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/** A Retry-After may exceed the backoff cap by this factor before the call gives up. */
export const RETRY_AFTER_LIMIT_FACTOR = 10;

/**
 * Longest server-requested wait the controller will sit through before a
 * retry. Never below the wait assumed for a 429 without Retry-After.
 */
export function maxWaitMs(policy: RetryPolicy): number {
  return Math.min(Math.max(policy.maxDelayMs * RETRY_AFTER_LIMIT_FACTOR, RATE_LIMIT_FALLBACK_MS), MAX_TIMER_MS);
}

/**
 * Policy for writes that are not safe to repeat: a 429 means the request was
 * rejected before being applied, a network failure may have landed.
 */
export function writeSafePolicy(policy: RetryPolicy): RetryPolicy {
  return Object.freeze({ ...policy, retryOn: new Set<ErrorKind>(['RateLimit']) });
}

export function isRetryable(error: ClassifiedError, policy: RetryPolicy): boolean {
  if (error.kind === 'Network' && error.cancelled) return false;
  return policy.retryOn.has(error.kind);
}

/**
 * Delay before the retry that follows `attempt` (1-based):
 * min(base * multiplier^(attempt-1), cap) + jitter, raised to the server's
 * Retry-After for rate limits.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  error?: ClassifiedError,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
  const computed = Math.min(exponential, policy.maxDelayMs) + Math.floor(random() * policy.jitterMs);
  if (error?.kind === 'RateLimit') {
    return Math.max(error.retryAfterMs, computed);
  }
  return computed;
}

/** Resolves true after `ms`, or false as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  const delay = Math.min(Math.max(0, ms), MAX_TIMER_MS);

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, delay);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryControllerOptions {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  random?: () => number;
}

export class RetryController {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  private readonly random: () => number;

  constructor(
    private readonly transport: Transport,
    options: RetryControllerOptions = {}
  ) {
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Sends the request, retrying retryable failures with backoff. Returns the
   * first success or the last classified error unchanged.
   */
  async execute(
    descriptor: RequestDescriptor,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    signal?: AbortSignal
  ): Promise<Result<unknown>> {
    let current: RequestDescriptor = { ...descriptor, attempt: 1 };

    if (signal?.aborted) {
      return fail(classifyFailure(cancelledFailure(), { resource: current.resource, path: current.path }));
    }

    for (;;) {
      const outcome = await this.transport.send(current, signal);
      const result = interpret(outcome, current);
      if (result.ok) return result;

      const error = result.error;
      if (!isRetryable(error, policy) || current.attempt >= policy.maxAttempts) {
        if (current.attempt > 1) {
          logger.warning('Giving up after retries', {
            method: current.method,
            path: current.path,
            attempts: current.attempt,
            kind: error.kind,
          }, 'retry');
        }
        return result;
      }

      if (error.kind === 'RateLimit' && error.retryAfterMs > maxWaitMs(policy)) {
        logger.warning('Retry-After exceeds wait limit, not retrying', {
          method: current.method,
          path: current.path,
          attempts: current.attempt,
          retry_after_ms: error.retryAfterMs,
          limit_ms: maxWaitMs(policy),
        }, 'retry');
        return result;
      }

      const delay = computeBackoffDelay(current.attempt, policy, error, this.random);
      logger.notice('Retrying request', {
        method: current.method,
        path: current.path,
        attempt: current.attempt,
        kind: error.kind,
        delay_ms: delay,
      }, 'retry');

      const completed = await this.sleep(delay, signal);
      if (!completed || signal?.aborted) {
        return result;
      }

      current = { ...current, attempt: current.attempt + 1 };
    }
  }
}
