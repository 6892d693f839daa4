import type { Clock } from '../clock';

interface CacheEntry {
  readonly data: unknown;
  readonly storedAt: number;
}

export interface CachedResponse {
  readonly data: unknown;
  readonly ageMs: number;
}

/**
 * Last successful response per endpoint. One entry per key, overwritten on
 * every success; entries older than the TTL are never served.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock,
  ) {}

  store(key: string, data: unknown): void {
    this.entries.set(key, { data, storedAt: this.clock.now() });
  }

  /** Returns the entry when it is younger than the TTL */
  lookup(key: string): CachedResponse | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    const ageMs = this.clock.now() - entry.storedAt;
    return ageMs < this.ttlMs ? { data: entry.data, ageMs } : undefined;
  }

  clear(): void {
    this.entries.clear();
  }
}
