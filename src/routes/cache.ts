import { Hono } from 'hono';
import type { ConfigFetcher } from '@/services/config/fetcher';

export function cacheRoutes(fetcher: ConfigFetcher) {
  const routes = new Hono();

  routes.post('/evict', async (c) => {
    await fetcher.clearCache();
    return c.body(null, 204);
  });

  return routes;
}
