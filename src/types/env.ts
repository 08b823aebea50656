// Environment variables read by the Docker/Node.js entry point

export interface Env {
  // Upstream configuration server
  CONFIG_BASE_URL?: string;
  CONFIG_PATH_TEMPLATE?: string;
  CONFIG_LOCATION?: string;

  // Trusted signing keys (PEM blocks or comma-separated base64 SPKI)
  VERIFICATION_KEYS?: string;

  // HTTP cache
  HTTP_CACHE_TYPE?: 'memory' | 'filesystem';
  HTTP_CACHE_PATH?: string;
  HTTP_TIMEOUT_MS?: string;

  // Server
  PORT?: string;
  HOST?: string;
}
