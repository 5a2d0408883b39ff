import { colors } from './colors';

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

/**
 * Keyed cache with a fixed time-to-live.
 * Expired entries stay readable through getStale() until overwritten or invalidated.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry || this.now() - entry.storedAt >= this.ttlMs) {
      return undefined;
    }
    return entry.value;
  }

  getStale(key: string): T | undefined {
    return this.entries.get(key)?.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Fetch through a cache.
 * - fresh entry: returned without calling the fetcher
 * - fetch failure with an older entry: the stale value is returned
 * - fetch failure with nothing cached: `emptyValue` is cached for a full TTL
 *   so repeated failures do not hammer the upstream
 */
export async function cachedFetch<T>(
  cache: TtlCache<T>,
  key: string,
  fetcher: () => Promise<T>,
  emptyValue: T
): Promise<T> {
  const fresh = cache.get(key);
  if (fresh !== undefined) {
    console.log(`  ${colors.gray}cache hit: ${key}${colors.reset}`);
    return fresh;
  }

  try {
    const value = await fetcher();
    cache.set(key, value);
    return value;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    const stale = cache.getStale(key);
    if (stale !== undefined) {
      console.warn(`  ${colors.yellow}${key}: ${message}; serving stale data${colors.reset}`);
      return stale;
    }
    console.warn(`  ${colors.yellow}${key}: ${message}; caching empty result${colors.reset}`);
    cache.set(key, emptyValue);
    return emptyValue;
  }
}
