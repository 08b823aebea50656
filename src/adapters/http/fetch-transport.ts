import type { ConfigTransport } from './transport';
import type { FetchOptions, LocationCode, RawResponse } from '@/types/config';
import type { CachedHttpEntry, HttpCache } from '@/types/http-cache';
import { headersToRecord, isFresh, isStorable } from '@/utils/cache-control';
import { SYSTEM_CLOCK, type Clock } from '@/utils/clock';

export const DEFAULT_PATH_TEMPLATE = '/version/v1/configuration/country/{location}/app_config';

const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchTransportOptions {
  baseUrl: string;
  /** Request path; `{location}` is replaced by the URL-encoded location code */
  pathTemplate?: string;
  cache?: HttpCache;
  timeoutMs?: number;
  fetchFn?: FetchLike;
  clock?: Clock;
}

/**
 * `fetch`-based transport with a private HTTP cache in front of it.
 *
 * Fresh entries are served without a network call. Stale entries carrying a
 * validator are revalidated with a conditional request; a 304 answer serves
 * the cached body. Only cache-served responses carry `cacheResponse`.
 */
export class FetchConfigTransport implements ConfigTransport {
  private readonly baseUrl: string;
  private readonly pathTemplate: string;
  private readonly cache: HttpCache | undefined;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly clock: Clock;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.pathTemplate = options.pathTemplate ?? DEFAULT_PATH_TEMPLATE;
    this.cache = options.cache;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.clock = options.clock ?? SYSTEM_CLOCK;
  }

  urlFor(locationCode: LocationCode): string {
    return this.baseUrl + this.pathTemplate.replace('{location}', encodeURIComponent(locationCode));
  }

  async get(locationCode: LocationCode, options: FetchOptions = {}): Promise<RawResponse> {
    const url = this.urlFor(locationCode);
    const cached = await this.readCache(url);

    if (cached && isFresh(cached, this.clock.now())) {
      console.debug('[HTTP_CACHE] Serving fresh cached response for', url);
      return {
        status: cached.status,
        headers: new Headers(cached.headers),
        body: cached.body,
        cacheResponse: { sentRequestAtMillis: cached.sentRequestAtMillis },
      };
    }

    const requestHeaders = new Headers({ Accept: 'application/zip' });
    if (cached) {
      const etag = cached.headers['etag'];
      const lastModified = cached.headers['last-modified'];
      if (etag) requestHeaders.set('If-None-Match', etag);
      if (lastModified) requestHeaders.set('If-Modified-Since', lastModified);
    }

    const sentRequestAtMillis = this.clock.now();
    const response = await this.fetchFn(url, {
      method: 'GET',
      headers: requestHeaders,
      signal: this.requestSignal(options.signal),
    });
    const receivedResponseAtMillis = this.clock.now();

    if (response.status === 304 && cached) {
      return this.revalidated(url, cached, response.headers, sentRequestAtMillis, receivedResponseAtMillis);
    }

    const body = new Uint8Array(await response.arrayBuffer());

    if (response.status === 200 && isStorable(response.headers)) {
      await this.writeCache(url, {
        status: response.status,
        headers: headersToRecord(response.headers),
        body,
        sentRequestAtMillis,
        receivedResponseAtMillis,
      });
    }

    return {
      status: response.status,
      headers: response.headers,
      body,
      cacheResponse: null,
    };
  }

  private async revalidated(
    url: string,
    cached: CachedHttpEntry,
    notModifiedHeaders: Headers,
    sentRequestAtMillis: number,
    receivedResponseAtMillis: number
  ): Promise<RawResponse> {
    console.debug('[HTTP_CACHE] Cached response revalidated for', url);

    // Headers of the 304 (Date, Cache-Control, ETag) replace the stored ones
    const headers = new Headers(cached.headers);
    notModifiedHeaders.forEach((value, name) => {
      headers.set(name, value);
    });

    await this.writeCache(url, {
      ...cached,
      headers: headersToRecord(headers),
      sentRequestAtMillis,
      receivedResponseAtMillis,
    });

    return {
      status: cached.status,
      headers,
      body: cached.body,
      cacheResponse: { sentRequestAtMillis: cached.sentRequestAtMillis },
    };
  }

  // The cache is best-effort: read failures are misses, write failures are dropped
  private async readCache(url: string): Promise<CachedHttpEntry | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(url);
    } catch (error) {
      console.warn('[HTTP_CACHE] Cache read failed, treating as miss:', url, error);
      return null;
    }
  }

  private async writeCache(url: string, entry: CachedHttpEntry): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.put(url, entry);
    } catch (error) {
      console.warn('[HTTP_CACHE] Cache write failed, response not stored:', url, error);
    }
  }

  private requestSignal(callerSignal: AbortSignal | undefined): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return callerSignal ? AbortSignal.any([callerSignal, timeout]) : timeout;
  }
}
