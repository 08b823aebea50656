import type { ConfigTransport } from '@/adapters/http/transport';
import { CorruptSignatureError, MissingEntryError, TransportError } from '@/errors';
import { CacheController } from '@/services/cache/controller';
import { SignatureVerifier } from '@/services/signature/verifier';
import { TimeReconciler } from '@/services/time/reconciler';
import { unzipArchive } from '@/services/zip/extractor';
import type { ConfigDownload, FetchOptions, LocationCode } from '@/types/config';
import { SYSTEM_CLOCK, type Clock } from '@/utils/clock';

export const EXPORT_BINARY_FILE_NAME = 'export.bin';
export const EXPORT_SIGNATURE_FILE_NAME = 'export.sig';

export interface ConfigFetcherDeps {
  transport: ConfigTransport;
  verifier: SignatureVerifier;
  cacheController: CacheController;
  reconciler?: TimeReconciler;
  clock?: Clock;
}

/**
 * Downloads the signed configuration archive for a location, verifies it and
 * reconciles the server clock against the local one.
 *
 * Fails with:
 * - `TransportError` on a non-success HTTP status
 * - `CorruptArchiveError` when the body is not a readable ZIP
 * - `MissingEntryError` when `export.bin` or `export.sig` is absent
 * - `CorruptSignatureError` when the signature does not validate
 *
 * Nothing is returned unless verification succeeded.
 */
export class ConfigFetcher {
  private readonly transport: ConfigTransport;
  private readonly verifier: SignatureVerifier;
  private readonly cacheController: CacheController;
  private readonly reconciler: TimeReconciler;
  private readonly clock: Clock;

  constructor(deps: ConfigFetcherDeps) {
    this.transport = deps.transport;
    this.verifier = deps.verifier;
    this.cacheController = deps.cacheController;
    this.reconciler = deps.reconciler ?? new TimeReconciler();
    this.clock = deps.clock ?? SYSTEM_CLOCK;
  }

  async fetch(locationCode: LocationCode, options: FetchOptions = {}): Promise<ConfigDownload> {
    console.info('[CONFIG] Fetching config for location:', locationCode);

    const response = await this.transport.get(locationCode, options);
    if (response.status < 200 || response.status > 299) {
      throw new TransportError(response);
    }

    // A cached response was requested earlier; its send time is the local reference
    const cachedRequestTimestamp = this.cacheController.cachedRequestTimestamp(response);
    const localTime = cachedRequestTimestamp ?? new Date(this.clock.now());
    if (this.cacheController.wasCacheServed(response)) {
      console.debug('[CONFIG] Response served from cache, requested at', localTime.toISOString());
    }

    const rawData = await this.verifiedPayload(response.body);

    const serverTime = this.reconciler.resolveServerTime(response.headers, cachedRequestTimestamp) ?? localTime;
    const localOffset = serverTime.getTime() - localTime.getTime();
    console.debug(`[CONFIG] Time offset was ${localOffset}ms`);

    // Cancelled while unpacking: produce nothing
    options.signal?.throwIfAborted();

    return { rawData, serverTime, localOffset };
  }

  async clearCache(): Promise<void> {
    console.info('[CONFIG] clearCache()');
    await this.cacheController.evictAll();
  }

  private async verifiedPayload(body: Uint8Array): Promise<Uint8Array> {
    const files = await unzipArchive(body);

    const exportBinary = files.get(EXPORT_BINARY_FILE_NAME);
    const exportSignature = files.get(EXPORT_SIGNATURE_FILE_NAME);

    if (!exportBinary || !exportSignature) {
      throw new MissingEntryError([...files.keys()]);
    }

    const result = this.verifier.check(exportBinary, exportSignature);
    if (!result.verified) {
      console.error('[CONFIG] Signature verification failed:', result.reason);
      throw new CorruptSignatureError(result.reason);
    }

    return result.payload;
  }
}
