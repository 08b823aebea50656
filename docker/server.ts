import { serve } from '@hono/node-server';
import { createApp } from '../src/app';
import { loadServiceConfig } from '../src/config';
import { createHttpCache } from '../src/adapters/cache/factory';
import { FetchConfigTransport } from '../src/adapters/http/fetch-transport';
import { CacheController } from '../src/services/cache/controller';
import { ConfigFetcher } from '../src/services/config/fetcher';
import { SignatureVerifier } from '../src/services/signature/verifier';
import type { Env } from '../src/types/env';

const env: Env = {
  CONFIG_BASE_URL: process.env.CONFIG_BASE_URL,
  CONFIG_PATH_TEMPLATE: process.env.CONFIG_PATH_TEMPLATE,
  CONFIG_LOCATION: process.env.CONFIG_LOCATION,
  VERIFICATION_KEYS: process.env.VERIFICATION_KEYS,
  HTTP_CACHE_TYPE: process.env.HTTP_CACHE_TYPE === 'filesystem' ? 'filesystem' : 'memory',
  HTTP_CACHE_PATH: process.env.HTTP_CACHE_PATH,
  HTTP_TIMEOUT_MS: process.env.HTTP_TIMEOUT_MS,
  PORT: process.env.PORT,
  HOST: process.env.HOST,
};

const config = loadServiceConfig(env);
const cache = createHttpCache(config.httpCache);

const fetcher = new ConfigFetcher({
  transport: new FetchConfigTransport({
    baseUrl: config.baseUrl,
    pathTemplate: config.pathTemplate,
    cache,
    timeoutMs: config.timeoutMs,
  }),
  verifier: new SignatureVerifier(config.verificationKeys),
  cacheController: new CacheController(cache),
});

const app = createApp({ fetcher, homeLocation: config.homeLocation });

console.log(`🚀 Signed config download service starting...`);
console.log(`🌐 Server: http://${config.host}:${config.port}`);
console.log(`📡 Upstream: ${config.baseUrl}`);
console.log(`🔑 Trusted keys: ${config.verificationKeys.length}`);
console.log(`💾 HTTP cache: ${config.httpCache.type}`);

serve({
  fetch: app.fetch,
  port: config.port,
  hostname: config.host,
});

console.log(`✅ Config service running on http://${config.host}:${config.port}`);
