import { setTimeout as delay } from 'node:timers/promises';
import { ApiErrorSchema, SearchResponseSchema } from './schemas.js';
import { SessionError, sanitizeError } from './errors.js';
import type { FetchResult, StatusReporter } from './types.js';

/** Seconds added on top of the primary rate limit reset time */
const PRIMARY_RESET_BUFFER_SECONDS = 5;

/** Wait used when a primary rate limit response carries no reset header */
const PRIMARY_FALLBACK_WAIT_SECONDS = 60;

/** First secondary rate limit wait; doubles after every attempt */
export const SECONDARY_BACKOFF_SECONDS = 60;

/** Attempts per search request under secondary rate limiting, the first request included */
export const MAX_ATTEMPTS = 5;

/** Longest stretch a countdown goes without a status update */
const STATUS_INTERVAL_SECONDS = 5;

/** Status, headers and JSON body of a response, whatever the status code */
export interface HttpResponse {
  status: number;
  headers: Record<string, string | number | undefined>;
  data: unknown;
}

/**
 * Issues one GET and resolves with the response for every HTTP status.
 * Rejects only on transport failures (DNS, connection reset, ...).
 */
export type Transport = (url: string) => Promise<HttpResponse>;

export interface ClientOptions {
  /** Current time in epoch milliseconds */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function getHeader(response: HttpResponse, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return String(value);
    }
  }
  return undefined;
}

function apiMessage(data: unknown): string {
  const parsed = ApiErrorSchema.safeParse(data);
  return parsed.success ? parsed.data.message : '';
}

/** Quota exhausted: 403 with `X-RateLimit-Remaining: 0` */
export function isPrimaryRateLimit(response: HttpResponse): boolean {
  const remaining = getHeader(response, 'x-ratelimit-remaining');
  return response.status === 403 && remaining !== undefined && Number(remaining) === 0;
}

/** Opaque abuse throttle: 403 whose message mentions the secondary rate limit */
export function isSecondaryRateLimit(response: HttpResponse): boolean {
  return (
    response.status === 403 &&
    apiMessage(response.data).toLowerCase().includes('secondary rate limit')
  );
}

/**
 * GitHub client that absorbs both rate limit failure modes.
 *
 * Primary limits come with a known reset time, so the client waits exactly that
 * long and retries once. Secondary limits have no reset time; the client backs off
 * exponentially and gives up after {@link MAX_ATTEMPTS} attempts. Waits are reported
 * through the StatusReporter at least every {@link STATUS_INTERVAL_SECONDS} seconds.
 *
 * Requests are only allowed inside {@link RateLimitedClient.session}.
 */
export class RateLimitedClient {
  private transport: Transport | null = null;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly connect: () => Transport,
    options: ClientOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /** Open a transport, run `fn`, and close the transport again */
  async session<T>(fn: () => Promise<T>): Promise<T> {
    if (this.transport) {
      throw new SessionError('A client session is already active.');
    }
    this.transport = this.connect();
    try {
      return await fn();
    } finally {
      this.transport = null;
    }
  }

  /** Run a search request and return its items, retrying through rate limits */
  async execute(url: string, reporter: StatusReporter): Promise<FetchResult> {
    const transport = this.requireSession();

    let response: HttpResponse;
    try {
      response = await transport(url);
    } catch (error: unknown) {
      return this.fail(reporter, `Request failed: ${sanitizeError(error)}`);
    }

    if (isPrimaryRateLimit(response)) {
      await this.countdown(
        this.primaryWaitSeconds(response),
        (s) => `Primary rate limit hit. Sleeping for ${s} seconds`,
        reporter,
      );
      // Single retry; whatever comes back is final unless it is a secondary limit
      try {
        response = await transport(url);
      } catch (error: unknown) {
        return this.fail(reporter, `Request failed: ${sanitizeError(error)}`);
      }
    }

    if (isSecondaryRateLimit(response)) {
      return this.secondaryBackoff(transport, url, reporter);
    }

    if (response.status === 200) {
      return this.success(response);
    }

    return this.fail(reporter, `Request failed: ${response.status} ${apiMessage(response.data)}`.trim());
  }

  /**
   * Fetch the reviews of one pull request (`<pull request api url>/reviews`).
   * Never throws for HTTP or transport failures: those yield an empty list.
   */
  async fetchReviews(pullRequestApiUrl: string, reporter: StatusReporter): Promise<unknown[]> {
    const transport = this.requireSession();
    const url = `${pullRequestApiUrl}/reviews`;

    try {
      const response = await transport(url);
      if (response.status === 200 && Array.isArray(response.data)) {
        return response.data;
      }
      reporter.reportStatus(`Could not load reviews from ${url}: ${response.status}`);
    } catch (error: unknown) {
      reporter.reportStatus(`Could not load reviews from ${url}: ${sanitizeError(error)}`);
    }
    return [];
  }

  private requireSession(): Transport {
    if (!this.transport) {
      throw new SessionError();
    }
    return this.transport;
  }

  private primaryWaitSeconds(response: HttpResponse): number {
    const reset = Number(getHeader(response, 'x-ratelimit-reset'));
    if (!Number.isFinite(reset)) {
      return PRIMARY_FALLBACK_WAIT_SECONDS;
    }
    return reset - this.now() / 1000 + PRIMARY_RESET_BUFFER_SECONDS;
  }

  private async secondaryBackoff(
    transport: Transport,
    url: string,
    reporter: StatusReporter,
  ): Promise<FetchResult> {
    let backoff = SECONDARY_BACKOFF_SECONDS;

    // Attempt 1 was the request that hit the limit
    for (let attempt = 2; attempt <= MAX_ATTEMPTS; attempt++) {
      await this.countdown(
        backoff,
        (s) => `Secondary rate limit hit. Sleeping for ${s} seconds.`,
        reporter,
      );
      backoff *= 2;

      let response: HttpResponse;
      try {
        response = await transport(url);
      } catch (error: unknown) {
        reporter.reportStatus(`Request failed during rate limit backoff: ${sanitizeError(error)}`);
        continue;
      }

      if (response.status === 200) {
        return this.success(response);
      }
      if (response.status === 422) {
        reporter.reportStatus(`Validation failed: ${apiMessage(response.data)}`);
      } else if (response.status !== 403) {
        reporter.reportStatus(`Received response: ${response.status} ${apiMessage(response.data)}`.trim());
      }
    }

    return this.fail(reporter, `Giving up after ${MAX_ATTEMPTS} attempts (secondary rate limit)`);
  }

  private async countdown(
    seconds: number,
    message: (remaining: number) => string,
    reporter: StatusReporter,
  ): Promise<void> {
    let remaining = seconds;
    while (remaining > 0) {
      reporter.reportStatus(message(Math.ceil(remaining)));
      const step = Math.min(remaining, STATUS_INTERVAL_SECONDS);
      await this.sleep(step * 1000);
      remaining -= step;
    }
  }

  private success(response: HttpResponse): FetchResult {
    const parsed = SearchResponseSchema.safeParse(response.data);
    return { ok: true, items: parsed.success ? parsed.data.items : [] };
  }

  private fail(reporter: StatusReporter, reason: string): FetchResult {
    reporter.reportStatus(reason);
    return { ok: false, reason };
  }
}
