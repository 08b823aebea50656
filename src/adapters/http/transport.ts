import type { FetchOptions, LocationCode, RawResponse } from '@/types/config';

/**
 * Issues the configuration request for a location
 */
export interface ConfigTransport {
  get(locationCode: LocationCode, options?: FetchOptions): Promise<RawResponse>;
}
