import type { CachedHttpEntry } from '@/types/http-cache';

export interface CacheControl {
  /** `max-age` in seconds, when present */
  maxAge?: number;
  noCache: boolean;
  noStore: boolean;
}

/**
 * Parse the directives of a Cache-Control header that matter for a private client cache
 */
export function parseCacheControl(header: string | null | undefined): CacheControl {
  const control: CacheControl = { noCache: false, noStore: false };
  if (!header) {
    return control;
  }

  for (const directive of header.split(',')) {
    const [rawName, rawValue] = directive.split('=');
    const name = rawName.trim().toLowerCase();

    if (name === 'no-cache') {
      control.noCache = true;
    } else if (name === 'no-store') {
      control.noStore = true;
    } else if (name === 'max-age' && rawValue !== undefined) {
      const seconds = Number.parseInt(rawValue.trim().replace(/^"|"$/g, ''), 10);
      if (Number.isFinite(seconds) && seconds >= 0) {
        control.maxAge = seconds;
      }
    }
  }

  return control;
}

/**
 * Whether a cached entry may be served without contacting the server
 */
export function isFresh(entry: CachedHttpEntry, now: number): boolean {
  const control = parseCacheControl(entry.headers['cache-control']);
  if (control.noCache || control.noStore || control.maxAge === undefined) {
    return false;
  }

  const ageMs = now - entry.receivedResponseAtMillis;
  return ageMs >= 0 && ageMs < control.maxAge * 1000;
}

/**
 * Whether a successful response is worth storing: it must not forbid storage
 * and must carry something that allows reuse or revalidation
 */
export function isStorable(headers: Headers): boolean {
  const control = parseCacheControl(headers.get('cache-control'));
  if (control.noStore) {
    return false;
  }

  return control.maxAge !== undefined || headers.has('etag') || headers.has('last-modified');
}

/**
 * Flatten headers into a plain record with lower-cased names
 */
export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, name) => {
    record[name.toLowerCase()] = value;
  });
  return record;
}
