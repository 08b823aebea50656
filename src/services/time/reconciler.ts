import { parseHttpDate } from '@/utils/http-date';

export interface TimeSourceInput {
  headers: Headers;
  /** Original request time of a cache-served response, `null` for live responses */
  cachedRequestTimestamp: Date | null;
}

/**
 * One candidate for the server's clock. Returns `null` to defer to the next source.
 */
export type TimeSource = (input: TimeSourceInput) => Date | null;

export const dateHeaderSource: TimeSource = ({ headers }) => {
  const rawDate = headers.get('Date');
  if (rawDate === null) {
    console.warn('[TIME] Server date unavailable');
    return null;
  }

  const serverDate = parseHttpDate(rawDate);
  if (!serverDate) {
    console.warn('[TIME] Failed to parse server date:', rawDate);
  }
  return serverDate;
};

export const cacheTimestampSource: TimeSource = ({ cachedRequestTimestamp }) => cachedRequestTimestamp;

/** Header first, then the cache's recorded request time */
export const DEFAULT_TIME_SOURCES: readonly TimeSource[] = [dateHeaderSource, cacheTimestampSource];

/**
 * Derives the authoritative server time from an ordered list of sources
 */
export class TimeReconciler {
  constructor(private readonly sources: readonly TimeSource[] = DEFAULT_TIME_SOURCES) {}

  /**
   * @returns the first time any source yields, or `null` when the caller
   * should fall back to its local clock
   */
  resolveServerTime(headers: Headers, cachedRequestTimestamp: Date | null): Date | null {
    for (const source of this.sources) {
      const time = source({ headers, cachedRequestTimestamp });
      if (time) {
        return time;
      }
    }
    return null;
  }
}
