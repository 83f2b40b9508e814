import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { logger } from './logging/index.js';
import { setupLoggingMiddleware } from './middleware/logging-middleware.js';
import type { ResourceRef } from './errors.js';
import type { Credentials } from './config.js';

// ============================================
// REQUEST / RESPONSE TYPES
// ============================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RequestDescriptor {
  readonly method: HttpMethod;
  /** Path relative to the API base URL, e.g. `/boards/{id}` */
  readonly path: string;
  readonly query: Readonly<Record<string, string>>;
  readonly body?: Readonly<Record<string, unknown>>;
  /** Resource addressed by the call, used for error messages. */
  readonly resource?: ResourceRef;
  /** 1 for the first call, incremented by the retry controller. */
  readonly attempt: number;
}

export interface HttpResponse {
  type: 'response';
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export interface TransportFailure {
  type: 'failure';
  code: string;
  message: string;
  timedOut: boolean;
  cancelled: boolean;
}

export type TransportResult = HttpResponse | TransportFailure;

/**
 * Issues exactly one HTTP request per call. Implementations never retry and
 * never throw for HTTP error statuses.
 */
export interface Transport {
  send(descriptor: RequestDescriptor, signal?: AbortSignal): Promise<TransportResult>;
}

export function cancelledFailure(): TransportFailure {
  return {
    type: 'failure',
    code: 'ERR_CANCELED',
    message: 'Request was cancelled',
    timedOut: false,
    cancelled: true,
  };
}

// ============================================
// AXIOS TRANSPORT
// ============================================

export interface AxiosTransportOptions {
  baseUrl: string;
  credentials: Credentials;
  timeoutMs: number;
  /** Masks credential values in failure messages. */
  redact?: (text: string) => string;
  /** Replaces the network layer; used by tests. */
  adapter?: AxiosAdapter;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class AxiosTransport implements Transport {
  private readonly http: AxiosInstance;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly redact: (text: string) => string;

  constructor(options: AxiosTransportOptions) {
    this.timeoutMs = options.timeoutMs;
    this.redact = options.redact ?? ((text) => text);
    this.authorization = oauthHeader(options.credentials);

    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      // Error statuses are data for the classifier, not exceptions
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    setupLoggingMiddleware(this.http);

    logger.info('Transport initialized', {
      base_url: options.baseUrl,
      timeout_ms: options.timeoutMs,
    }, 'transport');
  }

  async send(descriptor: RequestDescriptor, signal?: AbortSignal): Promise<TransportResult> {
    if (signal?.aborted) {
      return cancelledFailure();
    }

    try {
      const response = await this.http.request<unknown>({
        method: descriptor.method,
        url: descriptor.path,
        params: descriptor.query,
        data: descriptor.body,
        headers: { Authorization: this.authorization },
        signal,
      });

      return {
        type: 'response',
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: response.data,
      };
    } catch (error: unknown) {
      return this.toFailure(error, signal);
    }
  }

  private toFailure(error: unknown, signal?: AbortSignal): TransportFailure {
    if (axios.isCancel(error) || signal?.aborted) {
      return cancelledFailure();
    }

    if (axios.isAxiosError(error)) {
      const code = error.code ?? 'ERR_NETWORK';
      const timedOut = TIMEOUT_CODES.has(code);
      return {
        type: 'failure',
        code,
        message: timedOut
          ? `Request timeout after ${this.timeoutMs}ms`
          : this.redact(error.message || 'Network error occurred'),
        timedOut,
        cancelled: false,
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    return {
      type: 'failure',
      code: 'ERR_TRANSPORT',
      message: this.redact(message),
      timedOut: false,
      cancelled: false,
    };
  }
}

function oauthHeader(credentials: Credentials): string {
  return `OAuth oauth_consumer_key="${credentials.apiKey}", oauth_token="${credentials.token}"`;
}

function normalizeHeaders(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[name.toLowerCase()] = value;
    } else if (typeof value === 'number') {
      result[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[name.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}
