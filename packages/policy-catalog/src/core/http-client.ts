/**
 * HTTP Client for the remote sources
 *
 * GET only. Retries transient failures (timeouts, dropped connections,
 * 408/429/5xx) with capped exponential backoff; a 404 is a value in the
 * `OrNull` variants. Pacing is the caller's job (see RequestPacer).
 *
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 15000 });
 * const listing = await client.fetchJSON(contentsUrl, { headers: { Accept: 'application/vnd.github+json' } });
 * const page = await client.fetchTextOrNull(definitionPageUrl);
 * ```
 */

import { USER_AGENT } from './constants.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ module: 'http-client' });

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Retries after the first attempt (default: 3) */
  readonly maxRetries: number;
  /** Delay before the first retry; doubles per retry (default: 1000) */
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  /** Per-attempt timeout (default: 30000) */
  readonly timeoutMs: number;
  readonly userAgent: string;
  /** Fraction of the delay added or removed at random (default: 0.1) */
  readonly jitterFactor: number;
}

export interface RequestOptions {
  /** Merged over the User-Agent header */
  readonly headers?: Readonly<Record<string, string>>;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Response with a non-2xx status
 */
export class HTTPError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly url: string
  ) {
    super(message);
    this.name = 'HTTPError';
  }
}

export class HTTPTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`No response from ${url} within ${timeoutMs}ms`);
    this.name = 'HTTPTimeoutError';
  }
}

/**
 * fetch rejected: DNS, refused connection, TLS
 */
export class HTTPNetworkError extends Error {
  constructor(
    readonly url: string,
    readonly cause: Error
  ) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
  }
}

export class HTTPJSONParseError extends Error {
  /** First 500 characters of the body */
  readonly responseText: string;

  constructor(
    readonly url: string,
    responseText: string,
    readonly cause: Error
  ) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.responseText = responseText.slice(0, 500);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isRetryable(error: Error): boolean {
  if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
    return true;
  }
  return error instanceof HTTPError && RETRYABLE_STATUSES.has(error.statusCode);
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 3,
      initialDelayMs: 1000,
      maxDelayMs: 30000,
      timeoutMs: 30000,
      userAgent: USER_AGENT,
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * @throws {HTTPError} Non-retryable status, or a retryable one on the last attempt
   * @throws {HTTPJSONParseError} When the body is not JSON
   */
  async fetchJSON(url: string, options?: RequestOptions): Promise<unknown> {
    return this.parseJSON(url, await this.fetchText(url, options));
  }

  async fetchText(url: string, options?: RequestOptions): Promise<string> {
    const response = await this.request(url, options);
    return response.text();
  }

  /**
   * fetchJSON, with 404 resolving to null
   */
  async fetchJSONOrNull(url: string, options?: RequestOptions): Promise<unknown> {
    const text = await this.fetchTextOrNull(url, options);
    return text === null ? null : this.parseJSON(url, text);
  }

  /**
   * fetchText, with 404 resolving to null
   */
  async fetchTextOrNull(url: string, options?: RequestOptions): Promise<string | null> {
    try {
      return await this.fetchText(url, options);
    } catch (error) {
      if (error instanceof HTTPError && error.statusCode === 404) {
        return null;
      }
      throw error;
    }
  }

  private async request(url: string, options?: RequestOptions): Promise<Response> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      let failure: Error;
      try {
        const response = await this.attempt(url, options);
        if (response.ok) {
          return response;
        }
        failure = new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
      } catch (error) {
        failure = toError(error);
      }

      if (attempt >= attempts || !isRetryable(failure)) {
        throw failure;
      }

      logger.warn('HTTP attempt failed, retrying', {
        url,
        attempt,
        maxAttempts: attempts,
        error: failure.message,
      });
      await new Promise<void>((resolve) => setTimeout(resolve, this.backoffDelay(attempt)));
    }
  }

  private async attempt(url: string, options?: RequestOptions): Promise<Response> {
    const { timeoutMs } = this.config;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': this.config.userAgent, ...options?.headers },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, toError(error));
    } finally {
      clearTimeout(timer);
    }
  }

  private parseJSON(url: string, text: string): unknown {
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(url, text, toError(error));
    }
  }

  private backoffDelay(attempt: number): number {
    const base = Math.min(this.config.initialDelayMs * 2 ** (attempt - 1), this.config.maxDelayMs);
    const jitter = (Math.random() * 2 - 1) * base * this.config.jitterFactor;
    return Math.max(0, Math.floor(base + jitter));
  }
}
