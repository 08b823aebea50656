import { ConfigurationError } from '@/errors';
import type { LocationCode } from '@/types/config';

/**
 * Validate location code format
 * Codes are interpolated into the request path, so only URL-safe characters are allowed
 */
export function isValidLocationCode(value: string): value is LocationCode {
  return /^[A-Za-z0-9_-]{1,32}$/.test(value);
}

export function toLocationCode(value: string): LocationCode {
  const trimmed = value.trim();
  if (!isValidLocationCode(trimmed)) {
    throw new ConfigurationError(`Invalid location code: "${value}"`);
  }
  return trimmed;
}
