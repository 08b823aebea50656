import type { CachedHttpEntry, HttpCache } from '@/types/http-cache';

// In-process HTTP cache, lost on restart
export class MemoryHttpCache implements HttpCache {
  private readonly entries = new Map<string, CachedHttpEntry>();

  async get(key: string): Promise<CachedHttpEntry | null> {
    return this.entries.get(key) ?? null;
  }

  async put(key: string, entry: CachedHttpEntry): Promise<void> {
    this.entries.set(key, entry);
  }

  async evictAll(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
