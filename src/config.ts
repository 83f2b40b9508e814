import { z } from 'zod';

// ============================================
// ENVIRONMENT SCHEMA
// ============================================

const intFromEnv = (fallback: string) =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((val) => parseInt(val, 10));

const EnvSchema = z
  .object({
    TRELLO_API_KEY: z
      .string({ required_error: 'TRELLO_API_KEY is required' })
      .trim()
      .min(1, 'TRELLO_API_KEY must not be empty')
      .describe('Trello API key'),

    TRELLO_TOKEN: z
      .string({ required_error: 'TRELLO_TOKEN is required' })
      .trim()
      .min(1, 'TRELLO_TOKEN must not be empty')
      .describe('Trello API token'),

    TRELLO_API_URL: z
      .string()
      .optional()
      .default('https://api.trello.com/1')
      .pipe(z.string().url('TRELLO_API_URL must be a valid URL'))
      .transform((url) => url.replace(/\/+$/, ''))
      .describe('Trello API base URL'),

    TRELLO_MAX_RETRIES: intFromEnv('3')
      .refine(
        (val) => !isNaN(val) && val >= 1 && val <= 10,
        'TRELLO_MAX_RETRIES must be between 1 and 10'
      )
      .describe('Maximum total attempts per request, first call included'),

    TRELLO_RETRY_BASE_DELAY_MS: intFromEnv('1000')
      .refine(
        (val) => !isNaN(val) && val >= 0,
        'TRELLO_RETRY_BASE_DELAY_MS must be a non-negative integer'
      )
      .describe('Backoff delay before the first retry'),

    TRELLO_RETRY_MAX_DELAY_MS: intFromEnv('30000')
      .refine(
        (val) => !isNaN(val) && val >= 0,
        'TRELLO_RETRY_MAX_DELAY_MS must be a non-negative integer'
      )
      .describe('Upper bound for a computed backoff delay'),

    TRELLO_REQUEST_TIMEOUT_MS: intFromEnv('30000')
      .refine(
        (val) => !isNaN(val) && val > 0 && val <= 120000,
        'TRELLO_REQUEST_TIMEOUT_MS must be between 1 and 120000'
      )
      .describe('Request timeout in milliseconds'),

    TRELLO_MAX_CONCURRENT_REQUESTS: intFromEnv('5')
      .refine(
        (val) => !isNaN(val) && val > 0 && val <= 20,
        'TRELLO_MAX_CONCURRENT_REQUESTS must be between 1 and 20'
      )
      .describe('Maximum concurrent API requests'),

    TRELLO_RATE_LIMIT_PER_WINDOW: intFromEnv('0')
      .refine(
        (val) => !isNaN(val) && val >= 0,
        'TRELLO_RATE_LIMIT_PER_WINDOW must be a non-negative integer'
      )
      .describe('Requests admitted per 10 second window (0 to disable)'),
  })
  .refine((env) => env.TRELLO_RETRY_MAX_DELAY_MS >= env.TRELLO_RETRY_BASE_DELAY_MS, {
    message: 'TRELLO_RETRY_MAX_DELAY_MS must not be lower than TRELLO_RETRY_BASE_DELAY_MS',
    path: ['TRELLO_RETRY_MAX_DELAY_MS'],
  });

// ============================================
// APP CONFIG
// ============================================

export interface Credentials {
  readonly apiKey: string;
  readonly token: string;
}

export interface AppConfig {
  readonly credentials: Credentials;
  readonly apiUrl: string;
  readonly requestTimeoutMs: number;
  readonly maxConcurrentRequests: number;
  /** 0 disables the per-window cap */
  readonly rateLimitPerWindow: number;
  readonly retry: {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validates the environment and returns a frozen configuration object.
 * Throws ConfigError when credentials are missing or a value is out of range.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse({
    TRELLO_API_KEY: env.TRELLO_API_KEY,
    TRELLO_TOKEN: env.TRELLO_TOKEN,
    TRELLO_API_URL: env.TRELLO_API_URL,
    TRELLO_MAX_RETRIES: env.TRELLO_MAX_RETRIES,
    TRELLO_RETRY_BASE_DELAY_MS: env.TRELLO_RETRY_BASE_DELAY_MS,
    TRELLO_RETRY_MAX_DELAY_MS: env.TRELLO_RETRY_MAX_DELAY_MS,
    TRELLO_REQUEST_TIMEOUT_MS: env.TRELLO_REQUEST_TIMEOUT_MS,
    TRELLO_MAX_CONCURRENT_REQUESTS: env.TRELLO_MAX_CONCURRENT_REQUESTS,
    TRELLO_RATE_LIMIT_PER_WINDOW: env.TRELLO_RATE_LIMIT_PER_WINDOW,
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `  - ${err.path.join('.')}: ${err.message}`)
    );
  }

  const data = result.data;
  return Object.freeze({
    credentials: Object.freeze({ apiKey: data.TRELLO_API_KEY, token: data.TRELLO_TOKEN }),
    apiUrl: data.TRELLO_API_URL,
    requestTimeoutMs: data.TRELLO_REQUEST_TIMEOUT_MS,
    maxConcurrentRequests: data.TRELLO_MAX_CONCURRENT_REQUESTS,
    rateLimitPerWindow: data.TRELLO_RATE_LIMIT_PER_WINDOW,
    retry: Object.freeze({
      maxAttempts: data.TRELLO_MAX_RETRIES,
      baseDelayMs: data.TRELLO_RETRY_BASE_DELAY_MS,
      maxDelayMs: data.TRELLO_RETRY_MAX_DELAY_MS,
    }),
  });
}

/** Configuration safe to show to the host: everything except credentials. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    api_url: config.apiUrl,
    request_timeout_ms: config.requestTimeoutMs,
    max_concurrent_requests: config.maxConcurrentRequests,
    rate_limit_per_window: config.rateLimitPerWindow || null,
    max_attempts: config.retry.maxAttempts,
    retry_base_delay_ms: config.retry.baseDelayMs,
    retry_max_delay_ms: config.retry.maxDelayMs,
  };
}

// ============================================
// SECRET REDACTION
// ============================================

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Returns a function that masks every occurrence of the given secrets. */
export function createRedactor(secrets: readonly string[]): (text: string) => string {
  const patterns = secrets
    .filter((secret) => secret.length > 0)
    .map((secret) => new RegExp(escapeRegExp(secret), 'g'));

  return (text: string) => {
    if (!text) return text;
    let redacted = text;
    for (const pattern of patterns) {
      redacted = redacted.replace(pattern, '***REDACTED***');
    }
    // OAuth header values, wherever they come from
    return redacted.replace(/(oauth_(?:consumer_key|token)=)"[^"]*"/gi, '$1"***REDACTED***"');
  };
}
