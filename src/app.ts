import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { healthRoutes } from './routes/health';
import { configRoutes } from './routes/config';
import { cacheRoutes } from './routes/cache';
import type { ConfigFetcher } from './services/config/fetcher';
import type { LocationCode } from './types/config';

export interface AppDeps {
  fetcher: ConfigFetcher;
  homeLocation: LocationCode;
}

export function createApp({ fetcher, homeLocation }: AppDeps) {
  const app = new Hono();

  // Global middleware
  app.use('*', logger());

  app.route('/health', healthRoutes);
  app.route('/config', configRoutes(fetcher, homeLocation));
  app.route('/cache', cacheRoutes(fetcher));

  // 404 handler
  app.notFound((c) => {
    return c.text('Not Found', 404);
  });

  // Error handler
  app.onError((err, c) => {
    console.error('Application error:', err);
    return c.text('Internal Server Error', 500);
  });

  return app;
}
