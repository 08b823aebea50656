import { promises as fs } from 'fs';
import path from 'path';
import crypto from 'crypto';
import type { CachedHttpEntry, HttpCache } from '@/types/http-cache';

type EntryMetadata = Omit<CachedHttpEntry, 'body'>;

interface StoredMetadata extends EntryMetadata {
  bodySha256: string;
}

const PUT_ATTEMPTS = 2;

// Filesystem HTTP cache for Docker/Node.js
// Each entry is a `.bin` body next to a `.meta` JSON file, named by the SHA-256 of the key
export class FilesystemHttpCache implements HttpCache {
  constructor(private basePath: string) {}

  async get(key: string): Promise<CachedHttpEntry | null> {
    const filePath = this.pathFor(key);

    let metadata: StoredMetadata | null;
    try {
      const metadataContent = await fs.readFile(`${filePath}.meta`, 'utf-8');
      metadata = parseMetadata(JSON.parse(metadataContent));
    } catch (error) {
      if (isNotFound(error)) return null;
      if (error instanceof SyntaxError) {
        console.warn(`[HTTP_CACHE] Ignoring unreadable metadata for ${key}`);
        return null;
      }
      throw error;
    }

    if (!metadata) {
      console.warn(`[HTTP_CACHE] Ignoring malformed metadata for ${key}`);
      return null;
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await fs.readFile(`${filePath}.bin`));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    // Body replaced by a newer put after the metadata was read
    if (sha256(body) !== metadata.bodySha256) {
      return null;
    }

    const { bodySha256: _digest, ...entryMetadata } = metadata;
    return { ...entryMetadata, body };
  }

  async put(key: string, entry: CachedHttpEntry): Promise<void> {
    const filePath = this.pathFor(key);
    const { body, ...metadata } = entry;
    const stored: StoredMetadata = { ...metadata, bodySha256: sha256(body) };

    for (let attempt = 1; ; attempt++) {
      try {
        await fs.mkdir(this.basePath, { recursive: true });
        // Body first: metadata only ever points at a complete body
        await writeAtomically(`${filePath}.bin`, body);
        await writeAtomically(`${filePath}.meta`, JSON.stringify(stored));
        return;
      } catch (error) {
        // Directory evicted mid-write
        if (!isNotFound(error) || attempt >= PUT_ATTEMPTS) throw error;
      }
    }
  }

  async evictAll(): Promise<void> {
    const evicting = `${this.basePath}.evicting-${crypto.randomUUID()}`;
    try {
      await fs.rename(this.basePath, evicting);
    } catch (error) {
      if (isNotFound(error)) return;
      throw error;
    }
    await fs.rm(evicting, { recursive: true, force: true, maxRetries: 3 });
  }

  private pathFor(key: string): string {
    return path.join(this.basePath, sha256(key));
  }
}

async function writeAtomically(target: string, data: Uint8Array | string): Promise<void> {
  const temporary = `${target}.${crypto.randomUUID()}.tmp`;
  try {
    await fs.writeFile(temporary, data);
    await fs.rename(temporary, target);
  } catch (error) {
    await fs.rm(temporary, { force: true });
    throw error;
  }
}

function sha256(data: Uint8Array | string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseMetadata(value: unknown): StoredMetadata | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const status = field(value, 'status');
  const headers = field(value, 'headers');
  const sentRequestAtMillis = field(value, 'sentRequestAtMillis');
  const receivedResponseAtMillis = field(value, 'receivedResponseAtMillis');
  const bodySha256 = field(value, 'bodySha256');

  if (
    typeof status !== 'number' ||
    typeof sentRequestAtMillis !== 'number' ||
    typeof receivedResponseAtMillis !== 'number' ||
    typeof bodySha256 !== 'string' ||
    typeof headers !== 'object' ||
    headers === null
  ) {
    return null;
  }

  const headerRecord: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(headers)) {
    if (typeof headerValue === 'string') {
      headerRecord[name] = headerValue;
    }
  }

  return { status, headers: headerRecord, sentRequestAtMillis, receivedResponseAtMillis, bodySha256 };
}

function field(value: object, name: string): unknown {
  return Reflect.get(value, name);
}
