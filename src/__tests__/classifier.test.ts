import { describe, it, expect } from 'vitest';
import {
  RATE_LIMIT_FALLBACK_MS,
  classify,
  classifyFailure,
  interpret,
  parseRetryAfter,
  resourceFromPath,
} from '../classifier.js';
import type { RequestDescriptor } from '../transport.js';
import { BOARD_ID, networkFailure, respond } from './helpers.js';

describe('classify', () => {
  it.each([
    [401, 'Unauthorized'],
    [403, 'Forbidden'],
    [404, 'NotFound'],
    [429, 'RateLimit'],
    [400, 'BadRequest'],
    [422, 'BadRequest'],
    [405, 'Unknown'],
    [409, 'Unknown'],
    [418, 'Unknown'],
    [500, 'Unknown'],
    [502, 'Unknown'],
    [503, 'Unknown'],
  ])('maps HTTP %i to %s', (status, kind) => {
    const error = classify(status, 'something went wrong');
    expect(error.kind).toBe(kind);
    expect(error.status).toBe(status);
  });

  it('names the resource in NotFound messages', () => {
    const error = classify(404, 'The requested resource was not found.', {
      resource: { kind: 'board', id: BOARD_ID },
    });

    expect(error).toEqual({
      kind: 'NotFound',
      message: `Board '${BOARD_ID}' not found. Please verify the ID and try again.`,
      resourceKind: 'board',
      resourceId: BOARD_ID,
      status: 404,
    });
  });

  it('derives the resource from the request path', () => {
    const error = classify(403, 'unauthorized permission requested', { path: '/cards/abc123/actions' });

    expect(error.resourceKind).toBe('card');
    expect(error.resourceId).toBe('abc123');
    expect(error.message).toBe("Permission denied for Card 'abc123'. Check your board or workspace permissions.");
  });

  it('treats field-level 400 bodies as Validation', () => {
    const error = classify(400, 'invalid value for idList');

    expect(error.kind).toBe('Validation');
    if (error.kind !== 'Validation') return;
    expect(error.violations).toEqual([{ field: 'idList', message: 'invalid value for idList' }]);
  });

  it('reads field errors from a 422 JSON body', () => {
    const error = classify(422, { errors: [{ field: 'name', message: 'name is too long' }] });

    expect(error.kind).toBe('Validation');
    if (error.kind !== 'Validation') return;
    expect(error.violations).toEqual([{ field: 'name', message: 'name is too long' }]);
  });

  it('keeps a 400 without field detail as BadRequest', () => {
    const error = classify(400, 'malformed request', { resource: { kind: 'list', id: 'l1' } });

    expect(error.kind).toBe('BadRequest');
    expect(error.message).toBe("Bad request for List 'l1': malformed request");
  });

  it('preserves status and body verbatim for unmapped statuses', () => {
    const error = classify(500, 'upstream exploded', { method: 'GET', path: '/boards/b1' });

    expect(error).toEqual({
      kind: 'Unknown',
      message: "Unexpected HTTP 500 from GET /boards/b1 (Board 'b1'): upstream exploded",
      body: 'upstream exploded',
      resourceKind: 'board',
      resourceId: 'b1',
      status: 500,
    });
  });

  it('takes the retry delay from Retry-After', () => {
    const error = classify(429, 'API_TOKEN_LIMIT_EXCEEDED', { headers: { 'retry-after': '5' } });

    expect(error.kind).toBe('RateLimit');
    if (error.kind !== 'RateLimit') return;
    expect(error.retryAfterMs).toBe(5000);
    expect(error.message).toBe('Rate limit exceeded while accessing resource. Retry after 5 seconds.');
  });

  it('falls back to 60 seconds when Retry-After is absent', () => {
    const error = classify(429, '');

    expect(error.kind).toBe('RateLimit');
    if (error.kind !== 'RateLimit') return;
    expect(error.retryAfterMs).toBe(RATE_LIMIT_FALLBACK_MS);
    expect(error.retryAfterMs).toBe(60_000);
  });

  it('returns structurally equal errors for the same input', () => {
    const inputs: Array<[number, unknown]> = [
      [401, 'invalid token'],
      [404, 'not found'],
      [400, 'invalid value for idBoard'],
      [429, ''],
      [503, { message: 'maintenance' }],
    ];

    for (const [status, body] of inputs) {
      const context = { path: `/boards/${BOARD_ID}`, headers: { 'retry-after': '2' } };
      const first = classify(status, body, context);
      const second = classify(status, body, context);
      expect(second).toEqual(first);
      expect(second).not.toBe(first);
    }
  });
});

describe('parseRetryAfter', () => {
  const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');

  it.each([
    ['5', 5000],
    ['0', 0],
    ['-3', 0],
    ['1.5', 1500],
    ['Wed, 21 Oct 2026 07:28:30 GMT', 30_000],
    ['Wed, 21 Oct 2026 07:27:00 GMT', 0],
    ['soon', RATE_LIMIT_FALLBACK_MS],
    ['', RATE_LIMIT_FALLBACK_MS],
  ])('parses %j as %i ms', (header, expected) => {
    expect(parseRetryAfter(header, now)).toBe(expected);
  });

  it('uses the fallback when the header is missing', () => {
    expect(parseRetryAfter(undefined, now)).toBe(60_000);
  });
});

describe('classifyFailure', () => {
  it('maps a timeout to a Network error', () => {
    const error = classifyFailure(
      { type: 'failure', code: 'ECONNABORTED', message: 'Request timeout after 30000ms', timedOut: true, cancelled: false },
      { resource: { kind: 'board', id: 'b1' } }
    );

    expect(error).toEqual({
      kind: 'Network',
      message: "Network error while accessing Board 'b1': Request timeout after 30000ms",
      code: 'ECONNABORTED',
      timedOut: true,
      cancelled: false,
      resourceKind: 'board',
      resourceId: 'b1',
    });
  });

  it('includes the failure code for connection errors', () => {
    const error = classifyFailure(networkFailure('ECONNRESET'));
    expect(error.message).toBe('Network error while accessing resource: socket hang up (ECONNRESET)');
  });
});

describe('interpret', () => {
  const descriptor: RequestDescriptor = {
    method: 'GET',
    path: `/boards/${BOARD_ID}`,
    query: { fields: 'id' },
    attempt: 1,
  };

  it('returns the body of a 2xx response', () => {
    expect(interpret(respond(200, { id: BOARD_ID }), descriptor)).toEqual({ ok: true, value: { id: BOARD_ID } });
  });

  it('classifies a non-2xx response using the descriptor', () => {
    const result = interpret(respond(404, 'not found'), descriptor);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('NotFound');
    expect(result.error.resourceId).toBe(BOARD_ID);
  });

  it('classifies transport failures as Network', () => {
    const result = interpret(networkFailure(), descriptor);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Network');
  });
});

describe('resourceFromPath', () => {
  it.each([
    ['/boards/b1', { kind: 'board', id: 'b1' }],
    ['/organizations/eng_team2/members', { kind: 'workspace', id: 'eng_team2' }],
    ['/search', undefined],
    ['/members/me?fields=id', { kind: 'member', id: 'me' }],
  ])('resolves %s', (path, expected) => {
    expect(resourceFromPath(path)).toEqual(expected);
  });
});
