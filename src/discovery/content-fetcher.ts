/**
 * HTTP content fetcher backed by got.
 *
 * Implements the ContentFetcher contract: every call resolves to a
 * success/failure result and never throws. Transient network errors and
 * 5xx responses are retried with backoff; other failures are returned
 * immediately.
 */

import got, { type Got } from 'got';
import { getLogger } from '../shared/logger.js';
import { DiscoveryError, errorMessage } from '../shared/errors.js';
import { retry } from '../shared/retry.js';
import {
  BROWSER_HEADERS,
  DEFAULT_LIMITS,
  JSON_HEADERS,
  MINIMAL_HEADERS,
  USER_AGENTS,
} from '../shared/constants.js';
import { pickRandom } from '../shared/utils.js';
import type {
  ContentFetcher,
  FetchOptions,
  FetchResult,
  HeaderProfile,
} from './types.js';

const log = getLogger('http', { component: 'content-fetcher' });

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'HTTP_5XX']);

/** Network-level failures reported by got, and 5xx responses rethrown below. */
export function isTransientFetchError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && TRANSIENT_CODES.has(String(error.code));
}

export interface HttpContentFetcherOptions {
  /** Default per-request timeout. Default: 15s */
  timeoutMs?: number;
  /** Attempts per call, including the first. Default: 2 */
  maxAttempts?: number;
  /** Backoff base between attempts. Default: 1s */
  retryDelayMs?: number;
}

function headersFor(profile: HeaderProfile): Record<string, string> {
  switch (profile) {
    case 'minimal':
      return { ...MINIMAL_HEADERS };
    case 'json':
      return { ...JSON_HEADERS, 'User-Agent': pickRandom(USER_AGENTS) };
    case 'browser':
      return { ...BROWSER_HEADERS, 'User-Agent': pickRandom(USER_AGENTS) };
  }
}

export class HttpContentFetcher implements ContentFetcher {
  private readonly client: Got;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpContentFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LIMITS.HTTP_TIMEOUT_MS;
    this.maxAttempts = options.maxAttempts ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.client = got.extend({
      retry: { limit: 0 },
      followRedirect: true,
      throwHttpErrors: false,
    });
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const profile = options.headers ?? 'browser';
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    try {
      const response = await retry(
        async () => {
          const res = await this.client.get(url, {
            headers: { ...headersFor(profile), ...options.extraHeaders },
            searchParams: options.searchParams,
            timeout: { request: timeoutMs },
            responseType: 'text',
          });
          if (res.statusCode >= 500) {
            throw new DiscoveryError(`HTTP ${res.statusCode} fetching ${url}`, 'HTTP_5XX', url);
          }
          return res;
        },
        {
          attempts: this.maxAttempts,
          delayMs: this.retryDelayMs,
          isTransient: isTransientFetchError,
        },
      );

      if (response.statusCode < 200 || response.statusCode >= 300) {
        log.warn({ url, statusCode: response.statusCode }, 'Non-2xx response');
        return {
          success: false,
          error: `HTTP ${response.statusCode}`,
          statusCode: response.statusCode,
        };
      }

      log.debug({ url, statusCode: response.statusCode, bytes: response.body.length }, 'Fetched page');
      return { success: true, content: response.body, statusCode: response.statusCode };
    } catch (error) {
      const message = errorMessage(error);
      log.warn({ url, headers: profile, timeoutMs, error: message }, 'Fetch failed');
      return { success: false, error: message };
    }
  }

  async fetchJson(url: string, options: FetchOptions = {}): Promise<FetchResult<unknown>> {
    const result = await this.fetch(url, { ...options, headers: options.headers ?? 'json' });
    if (!result.success) {
      return result;
    }

    try {
      const content: unknown = JSON.parse(result.content);
      return { success: true, content, statusCode: result.statusCode };
    } catch (error) {
      log.warn({ url, error: errorMessage(error) }, 'Response is not valid JSON');
      return { success: false, error: `Invalid JSON: ${errorMessage(error)}`, statusCode: result.statusCode };
    }
  }
}
