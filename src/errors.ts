import type { RawResponse, RejectionReason } from '@/types/config';

/**
 * Base class for every failure raised while downloading a configuration bundle
 */
export class ConfigDownloadError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The server answered with a non-success status. Not retried here.
 */
export class TransportError extends ConfigDownloadError {
  readonly status: number;

  constructor(readonly response: RawResponse) {
    super('TRANSPORT_ERROR', `HTTP ${response.status}`);
    this.status = response.status;
  }
}

export class MissingEntryError extends ConfigDownloadError {
  constructor(readonly foundEntries: string[]) {
    super('MISSING_ENTRY', `Unknown files: [${foundEntries.join(', ')}]`);
  }
}

export class CorruptArchiveError extends ConfigDownloadError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CORRUPT_ARCHIVE', message, options);
  }
}

/**
 * The signature entry is present but does not validate under any trusted key
 */
export class CorruptSignatureError extends ConfigDownloadError {
  constructor(readonly reason: RejectionReason) {
    super('CORRUPT_SIGNATURE', `Signature rejected: ${reason}`);
  }
}

export class ConfigurationError extends ConfigDownloadError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
  }
}
