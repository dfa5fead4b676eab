/**
 * HTTP Client for BRAHMS Sync
 *
 * Wraps native fetch with:
 * - Configurable timeouts via AbortController
 * - Error classification (HTTP status, timeout, network, JSON parse)
 * - Exponential backoff with jitter for retryable failures
 * - zod validation of JSON responses
 *
 * Retries are per request. Callers pass `retries: 0` for requests that are
 * not idempotent.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 30000 }, logger);
 * const page = await client.fetchJSON(url, SpeciesPageSchema);
 * ```
 */

import type { z } from 'zod';
import type { Logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 2) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor to prevent thundering herd (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
  /** Default: 'GET' */
  readonly method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';
  readonly body?: RequestInit['body'];
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response, with the response body for diagnostics
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;
  readonly responseBody: string;

  constructor(message: string, statusCode: number, url: string, responseBody = '') {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    this.responseBody = responseBody;
  }
}

export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection failed, DNS resolution failed, etc.
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

/**
 * Body is not JSON, or not the expected shape
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export const DEFAULT_HTTP_CONFIG: HTTPClientConfig = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 30000,
  userAgent: 'brahms-sync/1.0',
  jitterFactor: 0.1,
};

export class HTTPClient {
  private readonly config: HTTPClientConfig;
  private readonly logger?: Logger;

  constructor(config?: Partial<HTTPClientConfig>, logger?: Logger) {
    this.config = { ...DEFAULT_HTTP_CONFIG, ...config };
    this.logger = logger;
  }

  /**
   * Fetch, parse and validate a JSON response
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPJSONParseError} If the body is not JSON of the expected shape
   */
  async fetchJSON<T>(url: string, schema: z.ZodType<T>, options?: FetchOptions): Promise<T> {
    const response = await this.fetchWithRetry(url, options);
    return this.parseJSON(url, response, schema);
  }

  /**
   * Parse and validate a response body already fetched
   */
  async parseJSON<T>(url: string, response: Response, schema: z.ZodType<T>): Promise<T> {
    const text = await response.text();

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new HTTPJSONParseError(url, text, error instanceof Error ? error : new Error(String(error)));
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw new HTTPJSONParseError(url, text, result.error);
    }
    return result.data;
  }

  /**
   * Fetch raw response with retry logic
   *
   * Resolves only for 2xx responses.
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxRetries = options?.retries ?? this.config.maxRetries;

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt === maxRetries + 1;

      try {
        const response = await this.fetchWithTimeout(url, options);

        if (response.ok) {
          return response;
        }

        const error = new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url,
          await this.readBody(response)
        );

        if (!this.isRetryableStatus(response.status) || isLastAttempt) {
          throw error;
        }

        this.logger?.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          statusCode: response.status,
          url,
        });
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(failure) || isLastAttempt) {
          throw failure;
        }

        this.logger?.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          error: failure.message,
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: options?.method ?? 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        body: options?.body,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
    }
  }

  /**
   * Exponential backoff with jitter, capped at maxDelayMs
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Jitter range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 || // Request Timeout
      status === 429 || // Too Many Requests
      status === 500 ||
      status === 502 ||
      status === 503 ||
      status === 504
    );
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
