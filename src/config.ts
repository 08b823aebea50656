import type crypto from 'node:crypto';
import type { HttpCacheConfig } from '@/adapters/cache/factory';
import { DEFAULT_PATH_TEMPLATE } from '@/adapters/http/fetch-transport';
import { ConfigurationError } from '@/errors';
import { parseVerificationKeys } from '@/services/signature/verification-keys';
import type { LocationCode } from '@/types/config';
import type { Env } from '@/types/env';
import { toLocationCode } from '@/utils/location-code';

const DEFAULT_LOCATION = 'DE';
const DEFAULT_CACHE_PATH = '/data/http-cache';
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_PORT = 3000;
const DEFAULT_HOST = '0.0.0.0';

export interface ServiceConfig {
  baseUrl: string;
  pathTemplate: string;
  homeLocation: LocationCode;
  verificationKeys: crypto.KeyObject[];
  httpCache: HttpCacheConfig;
  timeoutMs: number;
  port: number;
  host: string;
}

export function loadServiceConfig(env: Env): ServiceConfig {
  const baseUrl = env.CONFIG_BASE_URL?.trim();
  if (!baseUrl) {
    throw new ConfigurationError('CONFIG_BASE_URL is not configured');
  }
  if (!/^https?:\/\//.test(baseUrl)) {
    throw new ConfigurationError(`CONFIG_BASE_URL must be an http(s) URL: "${baseUrl}"`);
  }

  const rawKeys = env.VERIFICATION_KEYS;
  if (!rawKeys?.trim()) {
    throw new ConfigurationError('VERIFICATION_KEYS is not configured');
  }

  const pathTemplate = env.CONFIG_PATH_TEMPLATE || DEFAULT_PATH_TEMPLATE;
  if (!pathTemplate.includes('{location}')) {
    throw new ConfigurationError('CONFIG_PATH_TEMPLATE must contain {location}');
  }

  return {
    baseUrl,
    pathTemplate,
    homeLocation: toLocationCode(env.CONFIG_LOCATION || DEFAULT_LOCATION),
    verificationKeys: parseVerificationKeys(rawKeys),
    httpCache: {
      type: env.HTTP_CACHE_TYPE === 'filesystem' ? 'filesystem' : 'memory',
      path: env.HTTP_CACHE_PATH || DEFAULT_CACHE_PATH,
    },
    timeoutMs: positiveInteger('HTTP_TIMEOUT_MS', env.HTTP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    port: positiveInteger('PORT', env.PORT, DEFAULT_PORT),
    host: env.HOST || DEFAULT_HOST,
  };
}

function positiveInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
