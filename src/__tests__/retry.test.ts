import { afterEach, describe, it, expect, vi } from 'vitest';
import { classify } from '../classifier.js';
import {
  DEFAULT_RETRY_POLICY,
  MAX_TIMER_MS,
  RetryController,
  computeBackoffDelay,
  maxWaitMs,
  sleep,
  writeSafePolicy,
  type RetryPolicy,
} from '../retry.js';
import type { RequestDescriptor } from '../transport.js';
import { BOARD_ID, StubTransport, instantSleep, networkFailure, respond } from './helpers.js';

const descriptor: RequestDescriptor = {
  method: 'GET',
  path: `/boards/${BOARD_ID}`,
  query: {},
  resource: { kind: 'board', id: BOARD_ID },
  attempt: 1,
};

const noJitter: RetryPolicy = { ...DEFAULT_RETRY_POLICY, jitterMs: 0 };

function recordingSleep(delays: number[]) {
  return async (ms: number): Promise<boolean> => {
    delays.push(ms);
    return true;
  };
}

describe('RetryController', () => {
  it('makes exactly three calls when every call is rate limited', async () => {
    const transport = new StubTransport(() => respond(429, 'API_TOKEN_LIMIT_EXCEEDED', { 'retry-after': '1' }));
    const controller = new RetryController(transport, { sleep: instantSleep });

    const result = await controller.execute(descriptor);

    expect(transport.calls).toHaveLength(3);
    expect(transport.calls.map((call) => call.attempt)).toEqual([1, 2, 3]);
    expect(result).toEqual({
      ok: false,
      error: classify(429, 'API_TOKEN_LIMIT_EXCEEDED', {
        headers: { 'retry-after': '1' },
        resource: descriptor.resource,
      }),
    });
  });

  it('does not retry Forbidden', async () => {
    const transport = new StubTransport(() => respond(403, 'unauthorized permission requested'));
    const controller = new RetryController(transport, { sleep: instantSleep });

    const result = await controller.execute(descriptor);

    expect(transport.calls).toHaveLength(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Forbidden');
  });

  it('does not retry NotFound or Unauthorized', async () => {
    for (const status of [404, 401]) {
      const transport = new StubTransport(() => respond(status, 'nope'));
      const controller = new RetryController(transport, { sleep: instantSleep });
      await controller.execute(descriptor);
      expect(transport.calls).toHaveLength(1);
    }
  });

  it('recovers from a network failure on the next attempt', async () => {
    let calls = 0;
    const transport = new StubTransport(() => (++calls === 1 ? networkFailure() : respond(200, { id: BOARD_ID })));
    const controller = new RetryController(transport, { sleep: instantSleep });

    const result = await controller.execute(descriptor);

    expect(transport.calls).toHaveLength(2);
    expect(result).toEqual({ ok: true, value: { id: BOARD_ID } });
  });

  it('waits with exponential backoff between attempts', async () => {
    const delays: number[] = [];
    const transport = new StubTransport(() => networkFailure());
    const controller = new RetryController(transport, { sleep: recordingSleep(delays), random: () => 0 });

    await controller.execute(descriptor, noJitter);

    expect(delays).toEqual([1000, 2000]);
  });

  it('waits at least as long as the server asks', async () => {
    const delays: number[] = [];
    const transport = new StubTransport(() => respond(429, '', { 'retry-after': '5' }));
    const controller = new RetryController(transport, { sleep: recordingSleep(delays), random: () => 0 });

    await controller.execute(descriptor, noJitter);

    expect(delays).toEqual([5000, 5000]);
  });

  it('returns the rate limit instead of waiting past the limit', async () => {
    const delays: number[] = [];
    const transport = new StubTransport(() => respond(429, '', { 'retry-after': '3000000' }));
    const controller = new RetryController(transport, { sleep: recordingSleep(delays) });

    const result = await controller.execute(descriptor);

    expect(transport.calls).toHaveLength(1);
    expect(delays).toEqual([]);
    expect(result.ok).toBe(false);
    if (result.ok || result.error.kind !== 'RateLimit') return;
    expect(result.error.retryAfterMs).toBe(3_000_000_000);
  });

  it('still waits for a Retry-After at the limit', async () => {
    const delays: number[] = [];
    const transport = new StubTransport(() => respond(429, '', { 'retry-after': '300' }));
    const controller = new RetryController(transport, { sleep: recordingSleep(delays), random: () => 0 });

    await controller.execute(descriptor, noJitter);

    expect(delays).toEqual([300_000, 300_000]);
  });

  it('honours maxAttempts from the policy', async () => {
    const transport = new StubTransport(() => networkFailure());
    const controller = new RetryController(transport, { sleep: instantSleep });

    await controller.execute(descriptor, { ...DEFAULT_RETRY_POLICY, maxAttempts: 5 });

    expect(transport.calls).toHaveLength(5);
  });

  it('retries only rate limits under the write-safe policy', async () => {
    const failing = new StubTransport(() => networkFailure());
    const limited = new StubTransport(() => respond(429, ''));
    const policy = writeSafePolicy(DEFAULT_RETRY_POLICY);

    await new RetryController(failing, { sleep: instantSleep }).execute(descriptor, policy);
    await new RetryController(limited, { sleep: instantSleep }).execute(descriptor, policy);

    expect(failing.calls).toHaveLength(1);
    expect(limited.calls).toHaveLength(3);
  });

  it('stops retrying when cancelled during the wait', async () => {
    const controller = new AbortController();
    const transport = new StubTransport(() => respond(429, ''));
    const retry = new RetryController(transport, {
      sleep: async () => {
        controller.abort();
        return false;
      },
    });

    const result = await retry.execute(descriptor, DEFAULT_RETRY_POLICY, controller.signal);

    expect(transport.calls).toHaveLength(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('RateLimit');
  });

  it('does not call the transport when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const transport = new StubTransport(() => respond(200, {}));

    const result = await new RetryController(transport).execute(descriptor, DEFAULT_RETRY_POLICY, controller.signal);

    expect(transport.calls).toHaveLength(0);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Network');
    if (result.error.kind !== 'Network') return;
    expect(result.error.cancelled).toBe(true);
  });

  it('never retries a cancelled request', async () => {
    const transport = new StubTransport(() => ({
      type: 'failure',
      code: 'ERR_CANCELED',
      message: 'Request was cancelled',
      timedOut: false,
      cancelled: true,
    }));

    await new RetryController(transport, { sleep: instantSleep }).execute(descriptor);

    expect(transport.calls).toHaveLength(1);
  });
});

describe('computeBackoffDelay', () => {
  it('grows exponentially from the base delay', () => {
    expect(computeBackoffDelay(1, noJitter)).toBe(1000);
    expect(computeBackoffDelay(2, noJitter)).toBe(2000);
    expect(computeBackoffDelay(3, noJitter)).toBe(4000);
  });

  it('caps the exponential part and adds jitter', () => {
    expect(computeBackoffDelay(10, DEFAULT_RETRY_POLICY, undefined, () => 0.5)).toBe(30_500);
  });

  it('prefers a larger Retry-After for rate limits', () => {
    const error = classify(429, '', { headers: { 'retry-after': '12' } });
    expect(computeBackoffDelay(1, noJitter, error)).toBe(12_000);
  });
});

describe('maxWaitMs', () => {
  it('allows ten times the backoff cap', () => {
    expect(maxWaitMs(DEFAULT_RETRY_POLICY)).toBe(300_000);
  });

  it('never drops below the fallback wait for rate limits', () => {
    expect(maxWaitMs({ ...DEFAULT_RETRY_POLICY, maxDelayMs: 1000 })).toBe(60_000);
  });

  it('stays within what a timer can hold', () => {
    expect(maxWaitMs({ ...DEFAULT_RETRY_POLICY, maxDelayMs: 1_000_000_000 })).toBe(MAX_TIMER_MS);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('clamps delays a timer cannot hold', async () => {
    vi.useFakeTimers();
    let settled = false;
    const pending = sleep(3_000_000_000).then((completed) => {
      settled = true;
      return completed;
    });

    await vi.advanceTimersByTimeAsync(1000);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS);
    await expect(pending).resolves.toBe(true);
  });

  it('resolves false as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBe(false);
  });

  it('resolves true after the delay', async () => {
    await expect(sleep(1)).resolves.toBe(true);
  });
});
