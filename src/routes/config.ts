import { Hono, type Context } from 'hono';
import { CorruptArchiveError, CorruptSignatureError, MissingEntryError, TransportError } from '@/errors';
import type { ConfigFetcher } from '@/services/config/fetcher';
import type { LocationCode } from '@/types/config';
import { isValidLocationCode } from '@/utils/location-code';

/**
 * Serve the verified configuration payload.
 * Time reconciliation results travel in response headers.
 */
export function configRoutes(fetcher: ConfigFetcher, homeLocation: LocationCode) {
  const routes = new Hono();

  routes.get('/', (c) => serveConfig(c, fetcher, homeLocation));

  routes.get('/:location', async (c) => {
    const location = c.req.param('location');
    if (!isValidLocationCode(location)) {
      return c.text('Invalid location code', 400);
    }
    return serveConfig(c, fetcher, location);
  });

  return routes;
}

async function serveConfig(c: Context, fetcher: ConfigFetcher, locationCode: LocationCode): Promise<Response> {
  try {
    const download = await fetcher.fetch(locationCode, { signal: c.req.raw.signal });

    return new Response(download.rawData, {
      headers: {
        'Content-Type': 'application/octet-stream',
        'Content-Length': download.rawData.byteLength.toString(),
        'Cache-Control': 'no-store',
        'X-Server-Time': download.serverTime.toISOString(),
        'X-Local-Offset-Ms': download.localOffset.toString(),
      },
    });
  } catch (error) {
    if (error instanceof TransportError) {
      console.error('[CONFIG] Upstream returned', error.status, 'for', locationCode);
      return c.json({ error: 'upstream_status', status: error.status }, 502);
    }
    if (error instanceof MissingEntryError || error instanceof CorruptArchiveError) {
      console.error('[CONFIG] Invalid archive for', locationCode, '-', error.message);
      return c.json({ error: 'invalid_archive' }, 502);
    }
    if (error instanceof CorruptSignatureError) {
      console.error('[CONFIG] Rejected signature for', locationCode, '-', error.reason);
      return c.json({ error: 'invalid_signature' }, 502);
    }
    throw error;
  }
}
