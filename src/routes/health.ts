import { Hono } from 'hono';

export const healthRoutes = new Hono();

healthRoutes.get('/', (c) => {
  return c.json({
    status: 'healthy',
    service: 'signed-config-download',
    timestamp: new Date().toISOString(),
  });
});
