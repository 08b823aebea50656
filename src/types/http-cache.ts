// HTTP cache adapter types

export interface CachedHttpEntry {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
  /** Epoch milliseconds at which the network request was sent */
  sentRequestAtMillis: number;
  /** Epoch milliseconds at which the network response arrived */
  receivedResponseAtMillis: number;
}

export interface HttpCache {
  get(key: string): Promise<CachedHttpEntry | null>;
  put(key: string, entry: CachedHttpEntry): Promise<void>;
  /** Removes every entry. Evicting an empty cache is a no-op. */
  evictAll(): Promise<void>;
}
