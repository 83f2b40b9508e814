import { default as PQueue } from 'p-queue';
import { logger } from './logging/index.js';
import {
  cancelledFailure,
  type RequestDescriptor,
  type Transport,
  type TransportResult,
} from './transport.js';

/** Trello counts requests per token over 10 second windows. */
export const RATE_WINDOW_MS = 10_000;

export interface AdmissionOptions {
  concurrency: number;
  /** Requests admitted per window; 0 disables the cap */
  perWindow?: number;
  windowMs?: number;
}

/**
 * Admission control in front of a transport: bounds concurrent requests and,
 * optionally, requests per window.
 */
export class QueuedTransport implements Transport {
  private readonly queue: PQueue;

  constructor(
    private readonly inner: Transport,
    options: AdmissionOptions
  ) {
    const perWindow = options.perWindow ?? 0;
    this.queue = new PQueue({
      concurrency: options.concurrency,
      ...(perWindow > 0 ? { interval: options.windowMs ?? RATE_WINDOW_MS, intervalCap: perWindow } : {}),
    });

    logger.info('Admission queue initialized', {
      max_concurrent: options.concurrency,
      per_window: perWindow || null,
    }, 'admission');
  }

  async send(descriptor: RequestDescriptor, signal?: AbortSignal): Promise<TransportResult> {
    if (signal?.aborted) {
      return cancelledFailure();
    }

    try {
      return await this.queue.add(() => this.inner.send(descriptor, signal), {
        signal,
        throwOnTimeout: true,
      });
    } catch (error: unknown) {
      // p-queue rejects tasks whose signal aborted while they waited
      if (signal?.aborted) {
        return cancelledFailure();
      }
      throw error;
    }
  }

  getQueueStatus(): { size: number; pending: number; isPaused: boolean } {
    return {
      size: this.queue.size,
      pending: this.queue.pending,
      isPaused: this.queue.isPaused,
    };
  }
}
