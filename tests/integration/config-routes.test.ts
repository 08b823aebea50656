import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { createApp } from '@/app';
import { ConfigFetcher } from '@/services/config/fetcher';
import { CacheController } from '@/services/cache/controller';
import { SignatureVerifier } from '@/services/signature/verifier';
import { MemoryHttpCache } from '@/adapters/cache/memory';
import type { ConfigTransport } from '@/adapters/http/transport';
import { toLocationCode } from '@/utils/location-code';
import { buildZip } from '../helpers/zip';
import { bytes, generateEcKey } from '../helpers/keys';

describe('config routes', () => {
  const signingKey = generateEcKey();
  const payload = bytes('CFG');

  let get: Mock<ConfigTransport['get']>;
  let cache: MemoryHttpCache;
  let app: ReturnType<typeof createApp>;

  function respondWith(status: number, body: Uint8Array, headers: Record<string, string> = {}) {
    get.mockResolvedValue({ status, headers: new Headers(headers), body, cacheResponse: null });
  }

  beforeEach(() => {
    for (const level of ['log', 'info', 'debug', 'warn', 'error'] as const) {
      vi.spyOn(console, level).mockImplementation(() => undefined);
    }

    get = vi.fn<ConfigTransport['get']>();
    cache = new MemoryHttpCache();
    const fetcher = new ConfigFetcher({
      transport: { get },
      verifier: new SignatureVerifier([signingKey.publicKey]),
      cacheController: new CacheController(cache),
      clock: { now: () => Date.UTC(2022, 0, 5, 8, 0, 5) },
    });
    app = createApp({ fetcher, homeLocation: toLocationCode('DE') });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('serves the verified payload for the home location', async () => {
    respondWith(
      200,
      buildZip([
        { name: 'export.bin', data: payload },
        { name: 'export.sig', data: signingKey.sign(payload) },
      ]),
      { Date: 'Wed, 05 Jan 2022 08:00:00 GMT' }
    );

    const res = await app.request('/config');

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('application/octet-stream');
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    expect(res.headers.get('X-Server-Time')).toBe('2022-01-05T08:00:00.000Z');
    expect(res.headers.get('X-Local-Offset-Ms')).toBe('-5000');
    expect(new Uint8Array(await res.arrayBuffer())).toEqual(payload);
    expect(get.mock.calls[0][0]).toBe('DE');
  });

  it('fetches the location named in the path', async () => {
    respondWith(
      200,
      buildZip([
        { name: 'export.bin', data: payload },
        { name: 'export.sig', data: signingKey.sign(payload) },
      ])
    );

    const res = await app.request('/config/AT');

    expect(res.status).toBe(200);
    expect(res.headers.get('X-Local-Offset-Ms')).toBe('0');
    expect(get.mock.calls[0][0]).toBe('AT');
  });

  it('rejects invalid location codes', async () => {
    const res = await app.request('/config/a%20b');

    expect(res.status).toBe(400);
    expect(await res.text()).toBe('Invalid location code');
    expect(get).not.toHaveBeenCalled();
  });

  it('maps upstream failures to 502', async () => {
    respondWith(500, bytes('boom'));

    const res = await app.request('/config');

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'upstream_status', status: 500 });
  });

  it('maps archive problems to 502', async () => {
    respondWith(200, buildZip([{ name: 'export.bin', data: payload }]));

    const res = await app.request('/config');

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'invalid_archive' });
  });

  it('never exposes a payload whose signature fails', async () => {
    respondWith(
      200,
      buildZip([
        { name: 'export.bin', data: payload },
        { name: 'export.sig', data: generateEcKey().sign(payload) },
      ])
    );

    const res = await app.request('/config');

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'invalid_signature' });
  });

  it('returns 500 for unexpected failures', async () => {
    get.mockRejectedValue(new TypeError('fetch failed'));

    const res = await app.request('/config');

    expect(res.status).toBe(500);
    expect(await res.text()).toBe('Internal Server Error');
  });

  it('evicts the HTTP cache', async () => {
    const evictAll = vi.spyOn(cache, 'evictAll');

    const res = await app.request('/cache/evict', { method: 'POST' });

    expect(res.status).toBe(204);
    expect(evictAll).toHaveBeenCalledTimes(1);
  });

  it('reports health', async () => {
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', service: 'signed-config-download' });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await app.request('/unknown');

    expect(res.status).toBe(404);
    expect(await res.text()).toBe('Not Found');
  });
});
