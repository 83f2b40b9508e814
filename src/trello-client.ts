import type { z } from 'zod';
import { RetryController, DEFAULT_RETRY_POLICY, writeSafePolicy, type RetryPolicy } from './retry.js';
import { fail, ok, resourceFields, describeResource, type ResourceRef, type Result } from './errors.js';
import type { HttpMethod, RequestDescriptor } from './transport.js';

export type QueryValue = string | number | boolean | readonly string[] | undefined | null;

export interface CallOptions {
  query?: Record<string, QueryValue>;
  resource?: ResourceRef;
  signal?: AbortSignal;
}

export interface WriteOptions extends CallOptions {
  body?: Record<string, unknown>;
  /**
   * Marks the write as safe to repeat (full updates, set-style operations).
   * Other writes only retry rate limits.
   */
  idempotent?: boolean;
}

export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Drops undefined/null values and stringifies the rest. */
export function toQuery(values: Record<string, QueryValue> = {}): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined || value === null) continue;
    query[key] = Array.isArray(value) ? value.join(',') : String(value);
  }
  return query;
}

/** Drops undefined values so that unset fields are not sent. */
export function compact(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

export class TrelloClient {
  private readonly readPolicy: RetryPolicy;
  private readonly writePolicy: RetryPolicy;

  constructor(
    private readonly retry: RetryController,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY
  ) {
    this.readPolicy = policy;
    this.writePolicy = writeSafePolicy(policy);
  }

  get(path: string, options?: CallOptions): Promise<Result<unknown>>;
  get<T>(path: string, options: CallOptions & { schema: Decoder<T> }): Promise<Result<T>>;
  async get<T>(path: string, options: CallOptions & { schema?: Decoder<T> } = {}): Promise<Result<unknown>> {
    const descriptor = this.describe('GET', path, options);
    const result = await this.retry.execute(descriptor, this.readPolicy, options.signal);
    return options.schema ? decode(result, options.schema, descriptor) : result;
  }

  post(path: string, options: WriteOptions = {}): Promise<Result<unknown>> {
    return this.write('POST', path, options);
  }

  put(path: string, options: WriteOptions = {}): Promise<Result<unknown>> {
    return this.write('PUT', path, options);
  }

  delete(path: string, options: WriteOptions = {}): Promise<Result<unknown>> {
    return this.write('DELETE', path, options);
  }

  private write(method: HttpMethod, path: string, options: WriteOptions): Promise<Result<unknown>> {
    const descriptor = this.describe(method, path, options);
    const policy = options.idempotent ? this.readPolicy : this.writePolicy;
    return this.retry.execute(descriptor, policy, options.signal);
  }

  private describe(method: HttpMethod, path: string, options: WriteOptions): RequestDescriptor {
    return {
      method,
      path,
      query: toQuery(options.query),
      ...(options.body ? { body: compact(options.body) } : {}),
      ...(options.resource ? { resource: options.resource } : {}),
      attempt: 1,
    };
  }
}

function decode<T>(result: Result<unknown>, schema: Decoder<T>, descriptor: RequestDescriptor): Result<T> {
  if (!result.ok) return result;

  const parsed = schema.safeParse(result.value);
  if (parsed.success) return ok(parsed.data);

  return fail({
    kind: 'Unknown',
    message: `Unexpected response shape from ${descriptor.method} ${descriptor.path} (${describeResource(descriptor.resource)})`,
    body: JSON.stringify(result.value) ?? '',
    ...resourceFields(descriptor.resource),
  });
}
