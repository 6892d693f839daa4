import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { DEVICE_CONFIG, DeviceConfig, RetryPolicy } from '../../config/device.config';
import { CLOCK, Clock, sleep, systemClock } from '../clock';
import { DeviceApiError, UnreachableError } from '../errors/device-api.error';
import { DeviceHttpClient } from './device-http.client';
import { ResponseCache } from './response-cache';

export type FetchSource = 'network' | 'cache';

export interface FetchResult {
  readonly data: unknown;
  readonly source: FetchSource;
  /** 0 for fresh responses, otherwise the age of the cached entry */
  readonly ageMs: number;
}

export interface FetchOptions {
  signal?: AbortSignal;
  /** Overrides the configured retry count */
  maxRetries?: number;
  /**
   * Fall back to the response cache on exhaustion (default true). Successful
   * responses are stored either way.
   */
  useCache?: boolean;
}

/**
 * Backoff delay before retry number `retry` (0-based): base * 2^retry, capped,
 * then stretched by up to `jitterRatio`.
 */
export function backoffDelay(
  policy: RetryPolicy,
  retry: number,
  random: () => number = Math.random,
): number {
  const delay = Math.min(policy.baseDelayMs * 2 ** retry, policy.maxDelayMs);
  return delay * (1 + random() * policy.jitterRatio);
}

/**
 * Retrying Device Client
 *
 * Wraps DeviceHttpClient GETs with bounded exponential backoff and a stale
 * cache. Auth and rate-limit failures propagate at once and never read the
 * cache. Transient failures are retried; once retries run out, a cached
 * response younger than the TTL is returned instead of the error.
 */
@Injectable()
export class RetryingDeviceClient {
  private readonly logger = new Logger(RetryingDeviceClient.name);
  private readonly cache: ResponseCache;
  private readonly policy: RetryPolicy;
  private readonly clock: Clock;

  constructor(
    private readonly http: DeviceHttpClient,
    @Inject(DEVICE_CONFIG) config: DeviceConfig,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.policy = config.retry;
    this.clock = clock ?? systemClock;
    this.cache = new ResponseCache(config.cacheTtlMs, this.clock);
  }

  async fetchWithRetry(
    path: string,
    options: FetchOptions = {},
  ): Promise<FetchResult> {
    const maxRetries = options.maxRetries ?? this.policy.maxRetries;
    const useCache = options.useCache ?? true;
    let lastError: DeviceApiError | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const outcome = await this.attempt(path, options.signal);
      if (outcome.ok) {
        this.cache.store(path, outcome.data);
        return { data: outcome.data, source: 'network', ageMs: 0 };
      }
      lastError = outcome.error;

      if (options.signal?.aborted) {
        throw outcome.error;
      }

      if (attempt < maxRetries) {
        const delay = backoffDelay(this.policy, attempt);
        this.logger.debug(
          `Request to ${path} failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${delay}ms: ${outcome.error.message}`,
        );
        try {
          await sleep(delay, options.signal);
        } catch (error) {
          throw new UnreachableError(
            `Request to ${path} cancelled during backoff`,
            path,
            error,
          );
        }
      }
    }

    const cached = useCache ? this.cache.lookup(path) : undefined;
    if (cached) {
      this.logger.debug(
        `Request to ${path} failed, using cached data (age ${Math.round(cached.ageMs / 1000)}s)`,
      );
      return { data: cached.data, source: 'cache', ageMs: cached.ageMs };
    }

    throw (
      lastError ??
      new UnreachableError(`Connection error for ${path} after ${maxRetries + 1} attempts`, path)
    );
  }

  /**
   * Single retry, no cache fallback. Used to validate credentials.
   */
  probe(path: string, signal?: AbortSignal): Promise<FetchResult> {
    return this.fetchWithRetry(path, { signal, maxRetries: 1, useCache: false });
  }

  /**
   * One request. Retryable failures are returned, everything else is thrown.
   */
  private async attempt(
    path: string,
    signal: AbortSignal | undefined,
  ): Promise<{ ok: true; data: unknown } | { ok: false; error: DeviceApiError }> {
    try {
      return { ok: true, data: await this.http.get(path, { signal }) };
    } catch (error) {
      if (error instanceof DeviceApiError && error.retryable) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  clearCache(): void {
    this.cache.clear();
  }
}
