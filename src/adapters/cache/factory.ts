import type { HttpCache } from '@/types/http-cache';
import { MemoryHttpCache } from './memory';
import { FilesystemHttpCache } from './filesystem';

export type HttpCacheType = 'memory' | 'filesystem';

export interface HttpCacheConfig {
  type: HttpCacheType;
  path: string;
}

export function createHttpCache(config: HttpCacheConfig): HttpCache {
  if (config.type === 'filesystem') {
    console.info('[HTTP_CACHE] Using filesystem cache at', config.path);
    return new FilesystemHttpCache(config.path);
  }

  console.info('[HTTP_CACHE] Using in-memory cache');
  return new MemoryHttpCache();
}
