import { describe, it, expect, vi } from 'vitest';
import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { createRedactor } from '../config.js';
import { AxiosTransport, type RequestDescriptor } from '../transport.js';
import { BOARD_ID } from './helpers.js';

const credentials = { apiKey: 'test-key', token: 'test-secret' };

function reply(config: InternalAxiosRequestConfig, status: number, data: unknown, headers: Record<string, string> = {}): AxiosResponse {
  return { data, status, statusText: String(status), headers, config };
}

function createTransport(adapter: AxiosAdapter): AxiosTransport {
  return new AxiosTransport({
    baseUrl: 'https://api.trello.test/1',
    credentials,
    timeoutMs: 30_000,
    redact: createRedactor([credentials.apiKey, credentials.token]),
    adapter,
  });
}

const getBoard: RequestDescriptor = {
  method: 'GET',
  path: `/boards/${BOARD_ID}`,
  query: { fields: 'id' },
  attempt: 1,
};

describe('AxiosTransport', () => {
  it('sends credentials in the OAuth Authorization header', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const transport = createTransport(async (config) => {
      seen.push(config);
      return reply(config, 200, { id: BOARD_ID });
    });

    await transport.send(getBoard);

    expect(seen).toHaveLength(1);
    expect(seen[0].headers.get('Authorization')).toBe('OAuth oauth_consumer_key="test-key", oauth_token="test-secret"');
    expect(seen[0].url).toBe(`/boards/${BOARD_ID}`);
    expect(seen[0].params).toEqual({ fields: 'id' });
  });

  it('serializes the body as JSON', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const transport = createTransport(async (config) => {
      seen.push(config);
      return reply(config, 200, {});
    });

    await transport.send({ method: 'POST', path: '/cards', query: {}, body: { name: 'Card', idList: 'x' }, attempt: 1 });

    expect(seen[0].method).toBe('post');
    expect(seen[0].data).toBe('{"name":"Card","idList":"x"}');
  });

  it('returns error statuses as responses', async () => {
    const transport = createTransport(async (config) =>
      reply(config, 429, 'API_TOKEN_LIMIT_EXCEEDED', { 'Retry-After': '7' })
    );

    const result = await transport.send(getBoard);

    expect(result).toEqual({
      type: 'response',
      status: 429,
      headers: { 'retry-after': '7' },
      body: 'API_TOKEN_LIMIT_EXCEEDED',
    });
  });

  it('reports timeouts', async () => {
    const transport = createTransport(async (config) => {
      throw new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED', config);
    });

    const result = await transport.send(getBoard);

    expect(result).toEqual({
      type: 'failure',
      code: 'ECONNABORTED',
      message: 'Request timeout after 30000ms',
      timedOut: true,
      cancelled: false,
    });
  });

  it('masks credentials in network failure messages', async () => {
    const transport = createTransport(async (config) => {
      throw new AxiosError('connect ECONNREFUSED token=test-secret', 'ECONNREFUSED', config);
    });

    const result = await transport.send(getBoard);

    expect(result).toEqual({
      type: 'failure',
      code: 'ECONNREFUSED',
      message: 'connect ECONNREFUSED token=***REDACTED***',
      timedOut: false,
      cancelled: false,
    });
  });

  it('does not send when the signal is already aborted', async () => {
    const adapter = vi.fn<AxiosAdapter>(async (config) => reply(config, 200, {}));
    const transport = createTransport(adapter);
    const controller = new AbortController();
    controller.abort();

    const result = await transport.send(getBoard, controller.signal);

    expect(adapter).not.toHaveBeenCalled();
    expect(result).toEqual({
      type: 'failure',
      code: 'ERR_CANCELED',
      message: 'Request was cancelled',
      timedOut: false,
      cancelled: true,
    });
  });
});
