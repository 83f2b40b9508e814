import { describe, it, expect } from 'vitest';
import { QueuedTransport } from '../admission.js';
import type { RequestDescriptor } from '../transport.js';
import { StubTransport, respond } from './helpers.js';

const descriptor: RequestDescriptor = { method: 'GET', path: '/members/me', query: {}, attempt: 1 };

function gate() {
  let open = () => {};
  const opened = new Promise<void>((resolve) => {
    open = () => resolve();
  });
  return { opened, open };
}

describe('QueuedTransport', () => {
  it('bounds concurrent requests', async () => {
    let active = 0;
    let peak = 0;
    const inner = new StubTransport(() => respond(200, {}));
    const queued = new QueuedTransport(
      {
        send: async (request) => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return inner.send(request);
        },
      },
      { concurrency: 2 }
    );

    const results = await Promise.all([1, 2, 3, 4, 5].map(() => queued.send(descriptor)));

    expect(peak).toBe(2);
    expect(inner.calls).toHaveLength(5);
    expect(results.every((result) => result.type === 'response')).toBe(true);
  });

  it('does not forward an already cancelled request', async () => {
    const inner = new StubTransport(() => respond(200, {}));
    const queued = new QueuedTransport(inner, { concurrency: 1 });
    const controller = new AbortController();
    controller.abort();

    const result = await queued.send(descriptor, controller.signal);

    expect(inner.calls).toHaveLength(0);
    expect(result.type === 'failure' && result.cancelled).toBe(true);
  });

  it('drops a request cancelled while waiting for a slot', async () => {
    const blocker = gate();
    const inner = new StubTransport(() => respond(200, {}));
    const queued = new QueuedTransport(
      {
        send: async (request) => {
          await blocker.opened;
          return inner.send(request);
        },
      },
      { concurrency: 1 }
    );
    const controller = new AbortController();

    const first = queued.send(descriptor);
    const second = queued.send(descriptor, controller.signal);
    controller.abort();
    blocker.open();
    const [, cancelled] = await Promise.all([first, second]);

    expect(cancelled.type === 'failure' && cancelled.cancelled).toBe(true);
    expect(inner.calls).toHaveLength(1);
  });

  it('reports queue status', () => {
    const queued = new QueuedTransport(new StubTransport(() => respond(200, {})), { concurrency: 3 });

    expect(queued.getQueueStatus()).toEqual({ size: 0, pending: 0, isPaused: false });
  });
});
