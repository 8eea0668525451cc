import { getLogger, type Logger } from '@ratesync/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import * as RateLimitCore from './core/rate-limit.js';
import type { HttpEffects, HttpResponse, RateLimitState } from './core/types.js';
import { createInitialRateLimitState } from './core/types.js';
import type { HttpClientConfig, HttpRequestOptions } from './types.js';
import { HttpError, RateLimitError, ResponseValidationError, TimeoutError } from './types.js';

interface ResolvedConfig extends HttpClientConfig {
  defaultHeaders: Record<string, string>;
  retries: number;
  timeout: number;
}

/**
 * GET-only JSON client for provider APIs: rate limited, retried, time bounded,
 * and schema validated.
 */
export class HttpClient {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private rateLimitState: RateLimitState;

  // Serializes access to rateLimitState across concurrent requests
  private rateLimiterLock: Promise<void> = Promise.resolve();

  private closePromise: Promise<void> | undefined;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'ratesync/0.1.0',
        ...config.defaultHeaders,
      },
      retries: config.retries ?? 3,
      timeout: config.timeout ?? 10_000,
    };

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.rateLimitState = createInitialRateLimitState(config.rateLimit);

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.config.timeout}ms, Retries: ${this.config.retries}`
    );
  }

  /**
   * GET `endpoint` and validate the JSON body with `options.schema`.
   *
   * Network failures and timeouts are retried with exponential backoff; HTTP
   * error statuses other than 429 and validation failures are returned at once.
   */
  async get<T>(endpoint: string, options: HttpRequestOptions<T>): Promise<Result<T, Error>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const timeout = options.timeout ?? this.config.timeout;
    const maxAttempts = this.config.retries;
    let lastError: Error | undefined;

    await this.waitForRateLimit();

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        this.effects.log(
          'debug',
          `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${maxAttempts}`
        );

        const response = await this.effects.fetch(url, {
          headers: { ...this.config.defaultHeaders, ...options.headers },
          method: 'GET',
          signal: controller.signal,
        });

        if (!response.ok) {
          const errorText = await response.text().catch(() => 'Unknown error');

          if (response.status === 429) {
            const delay = this.rateLimitDelay(response, attempt);
            if (attempt < maxAttempts) {
              this.effects.log(
                'warn',
                `Rate limit 429 response received, waiting before retry - Delay: ${delay}ms, Attempt: ${attempt}/${maxAttempts}`
              );
              await this.effects.delay(delay);
              continue;
            }
            return err(new RateLimitError(`${this.config.providerName} rate limit exceeded`, delay));
          }

          return err(new HttpError(`HTTP ${response.status}: ${errorText.slice(0, 200)}`, response.status, errorText));
        }

        const data: unknown = response.status === 204 ? undefined : await response.json();
        return this.validate(data, options, endpoint, url, response.status);
      } catch (error) {
        lastError =
          error instanceof Error && error.name === 'AbortError'
            ? new TimeoutError(timeout)
            : error instanceof Error
              ? error
              : new Error(String(error));

        this.effects.log(
          'warn',
          `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${maxAttempts}, Error: ${lastError.message}`,
          { providerName: this.config.providerName }
        );

        if (attempt < maxAttempts) {
          const delay = HttpUtils.calculateExponentialBackoff(attempt, 1000, 10_000);
          this.effects.log('debug', `Retrying after delay - Delay: ${delay}ms, NextAttempt: ${attempt + 1}`);
          await this.effects.delay(delay);
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    return err(lastError ?? new Error('Request failed with unknown error'));
  }

  /**
   * Close keep-alive connections so the process can exit. Idempotent.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.agent.close().then(
        () => this.logger.debug('HTTP agent closed'),
        (error: unknown) => {
          this.logger.error({ error }, 'Failed to close HTTP agent');
          throw error;
        }
      );
    }
    return this.closePromise;
  }

  private validate<T>(
    data: unknown,
    options: HttpRequestOptions<T>,
    endpoint: string,
    url: string,
    status: number
  ): Result<T, Error> {
    const parseResult = options.schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const truncatedPayload = (JSON.stringify(data) ?? 'undefined').slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      { providerName: this.config.providerName, status, truncatedPayload, url: HttpUtils.sanitizeUrl(url) }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.config.providerName,
        endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }

  private rateLimitDelay(response: HttpResponse, attempt: number): number {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    const info = HttpUtils.parseRateLimitHeaders(headers, this.effects.now());
    return HttpUtils.calculateExponentialBackoff(attempt, info.delayMs ?? 2000, 60_000);
  }

  /**
   * Wait for a token; the lock is never held while sleeping.
   */
  private async waitForRateLimit(): Promise<void> {
    while (true) {
      const previousLock = this.rateLimiterLock;
      let releaseLock: () => void = () => undefined;
      this.rateLimiterLock = new Promise<void>((resolve) => {
        releaseLock = resolve;
      });

      let waitTimeMs = 0;
      try {
        await previousLock;
        const now = this.effects.now();
        this.rateLimitState = RateLimitCore.refillTokens(this.rateLimitState, now);

        if (RateLimitCore.shouldAllowRequest(this.rateLimitState, now)) {
          this.rateLimitState = RateLimitCore.consumeToken(this.rateLimitState, now);
          return;
        }

        waitTimeMs = RateLimitCore.calculateWaitTime(this.rateLimitState, now);
        this.effects.log('debug', `Rate limit enforced, waiting ${waitTimeMs}ms before sending request`);
      } finally {
        releaseLock();
      }

      await this.effects.delay(waitTimeMs);
    }
  }
}
