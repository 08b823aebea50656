/**
 * Opaque identifier of the regional configuration to download.
 * Build one with `toLocationCode`.
 */
export type LocationCode = string & { readonly __brand: 'LocationCode' };

/**
 * Present on a response whose body came from the local HTTP cache
 */
export interface CacheResponseInfo {
  /** Epoch milliseconds at which the original network request was sent */
  sentRequestAtMillis: number;
}

/**
 * Transport-level result of a configuration request
 */
export interface RawResponse {
  status: number;
  headers: Headers;
  body: Uint8Array;
  /** `null` when the response was fetched live */
  cacheResponse: CacheResponseInfo | null;
}

/**
 * A verified configuration bundle together with the reconciled server time
 */
export interface ConfigDownload {
  /** The `export.bin` payload, only ever populated after signature verification */
  rawData: Uint8Array;
  serverTime: Date;
  /** `serverTime - localTime` in milliseconds; negative when the local clock is ahead */
  localOffset: number;
}

export type RejectionReason = 'no-trusted-keys' | 'signature-mismatch' | 'verification-error';

export type VerificationResult =
  | { verified: true; payload: Uint8Array }
  | { verified: false; reason: RejectionReason };

export interface FetchOptions {
  signal?: AbortSignal;
}
