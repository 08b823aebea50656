import type { RawResponse } from '@/types/config';
import type { HttpCache } from '@/types/http-cache';

/**
 * Cache inspection for responses and eviction of the underlying HTTP cache.
 * Concurrency of eviction is left to the cache implementation.
 */
export class CacheController {
  constructor(private readonly cache: HttpCache) {}

  async evictAll(): Promise<void> {
    await this.cache.evictAll();
  }

  wasCacheServed(response: RawResponse): boolean {
    return response.cacheResponse !== null;
  }

  cachedRequestTimestamp(response: RawResponse): Date | null {
    return response.cacheResponse ? new Date(response.cacheResponse.sentRequestAtMillis) : null;
  }
}
