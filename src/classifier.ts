import {
  describeResource,
  ok,
  fail,
  resourceFields,
  type ClassifiedError,
  type FieldViolation,
  type ResourceKind,
  type ResourceRef,
  type Result,
} from './errors.js';
import type { RequestDescriptor, TransportFailure, TransportResult } from './transport.js';

/** Used when a 429 carries no usable Retry-After header. */
export const RATE_LIMIT_FALLBACK_MS = 60_000;

const MAX_BODY_LENGTH = 2000;

export interface ClassifyContext {
  headers?: Readonly<Record<string, string>>;
  resource?: ResourceRef;
  method?: string;
  path?: string;
  /** Clock used to resolve an HTTP-date Retry-After; defaults to Date.now() */
  now?: number;
}

// ============================================
// RESOURCE RESOLUTION
// ============================================

const PATH_SEGMENTS: Record<string, ResourceKind> = {
  boards: 'board',
  lists: 'list',
  cards: 'card',
  checklists: 'checklist',
  labels: 'label',
  actions: 'action',
  customFields: 'customField',
  members: 'member',
  organizations: 'workspace',
  webhooks: 'webhook',
};

/** `/boards/abc/lists` → board 'abc'. */
export function resourceFromPath(path: string | undefined): ResourceRef | undefined {
  if (!path) return undefined;
  const [segment, id] = path.split('?')[0].split('/').filter(Boolean);
  const kind = segment ? PATH_SEGMENTS[segment] : undefined;
  if (!kind) return undefined;
  return id ? { kind, id: decodeURIComponent(id) } : { kind };
}

// ============================================
// BODY HELPERS
// ============================================

export function bodyText(body: unknown): string {
  if (body === undefined || body === null) return '';
  if (typeof body === 'string') return body;
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}

function summarize(body: unknown): string {
  const text = bodyText(body).trim();
  return text.length > MAX_BODY_LENGTH ? `${text.slice(0, MAX_BODY_LENGTH)}…` : text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const INVALID_VALUE = /invalid value for (\w+)/i;

/**
 * Field-level detail in a 400/422 body. Trello reports these either as text
 * ("invalid value for idList") or as an object naming the field.
 */
function extractViolations(body: unknown): FieldViolation[] {
  if (typeof body === 'string') {
    const match = INVALID_VALUE.exec(body);
    return match ? [{ field: match[1], message: body.trim() }] : [];
  }

  if (!isRecord(body)) return [];

  if (Array.isArray(body.errors)) {
    return body.errors.flatMap((entry): FieldViolation[] => {
      if (isRecord(entry) && typeof entry.field === 'string') {
        const message = typeof entry.message === 'string' ? entry.message : `invalid value for ${entry.field}`;
        return [{ field: entry.field, message }];
      }
      return [];
    });
  }

  if (typeof body.field === 'string') {
    const message = typeof body.message === 'string' ? body.message : `invalid value for ${body.field}`;
    return [{ field: body.field, message }];
  }

  const text = typeof body.message === 'string' ? body.message : typeof body.error === 'string' ? body.error : '';
  return extractViolations(text);
}

// ============================================
// RETRY-AFTER
// ============================================

/**
 * Parses a Retry-After header given as delta-seconds or an HTTP date.
 * Never negative; falls back to RATE_LIMIT_FALLBACK_MS when absent or unparseable.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number {
  if (value === undefined || value.trim() === '') return RATE_LIMIT_FALLBACK_MS;

  const trimmed = value.trim();
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Math.max(0, Math.round(Number(trimmed) * 1000));
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return RATE_LIMIT_FALLBACK_MS;
  return Math.max(0, date - now);
}

// ============================================
// CLASSIFICATION
// ============================================

/** Maps a non-2xx response to exactly one classified error. Pure. */
export function classify(status: number, body: unknown, context: ClassifyContext = {}): ClassifiedError {
  const resource = context.resource ?? resourceFromPath(context.path);
  const subject = describeResource(resource);
  const base = { ...resourceFields(resource), status };

  switch (status) {
    case 401:
      return {
        kind: 'Unauthorized',
        message: `Authentication failed while accessing ${subject}. Invalid or expired API key or token.`,
        ...base,
      };

    case 403:
      return {
        kind: 'Forbidden',
        message: `Permission denied for ${subject}. Check your board or workspace permissions.`,
        ...base,
      };

    case 404:
      return {
        kind: 'NotFound',
        message: `${subject} not found. Please verify the ID and try again.`,
        ...base,
      };

    case 429: {
      const retryAfterMs = parseRetryAfter(context.headers?.['retry-after'], context.now);
      return {
        kind: 'RateLimit',
        message: `Rate limit exceeded while accessing ${subject}. Retry after ${Math.ceil(retryAfterMs / 1000)} seconds.`,
        retryAfterMs,
        ...base,
      };
    }

    case 400:
    case 422: {
      const violations = extractViolations(body);
      if (violations.length > 0) {
        return {
          kind: 'Validation',
          message: `Invalid request for ${subject}: ${violations.map((v) => v.message).join('; ')}`,
          violations,
          ...base,
        };
      }
      const detail = summarize(body);
      return {
        kind: 'BadRequest',
        message: detail ? `Bad request for ${subject}: ${detail}` : `Bad request for ${subject}.`,
        ...base,
      };
    }

    default: {
      const text = bodyText(body);
      const route = context.method && context.path ? ` from ${context.method} ${context.path}` : '';
      return {
        kind: 'Unknown',
        message: `Unexpected HTTP ${status}${route} (${subject}): ${summarize(body) || 'empty response'}`,
        body: text,
        ...base,
      };
    }
  }
}

export function classifyFailure(failure: TransportFailure, context: ClassifyContext = {}): ClassifiedError {
  const resource = context.resource ?? resourceFromPath(context.path);
  const subject = describeResource(resource);
  const reason = failure.cancelled
    ? 'request was cancelled'
    : failure.timedOut
      ? failure.message
      : `${failure.message} (${failure.code})`;

  return {
    kind: 'Network',
    message: `Network error while accessing ${subject}: ${reason}`,
    code: failure.code,
    timedOut: failure.timedOut,
    cancelled: failure.cancelled,
    ...resourceFields(resource),
  };
}

/** 2xx → ok with the body; anything else → the classified error. */
export function interpret(result: TransportResult, descriptor: RequestDescriptor, now?: number): Result<unknown> {
  const context: ClassifyContext = {
    resource: descriptor.resource,
    method: descriptor.method,
    path: descriptor.path,
    now,
  };

  if (result.type === 'failure') {
    return fail(classifyFailure(result, context));
  }

  if (result.status >= 200 && result.status < 300) {
    return ok(result.body);
  }

  return fail(classify(result.status, result.body, { ...context, headers: result.headers }));
}
