import { unzipRaw } from 'unzipit';
import { CorruptArchiveError } from '@/errors';
import type { ArchiveEntries } from '@/types/zip';

/**
 * Decompress a ZIP archive held in memory into a map of file name to bytes.
 *
 * Every entry is read before the promise resolves; callers never see a
 * partially filled map. Fails with `CorruptArchiveError` when the central
 * directory cannot be read or an entry cannot be decompressed.
 */
export async function unzipArchive(bytes: Uint8Array): Promise<ArchiveEntries> {
  const { entries } = await unzipRaw(bytes).catch((error: unknown) => {
    throw new CorruptArchiveError(`Failed to read ZIP central directory: ${describeError(error)}`, {
      cause: error,
    });
  });

  const files: ArchiveEntries = new Map();

  for (const entry of entries) {
    if (entry.isDirectory) {
      continue;
    }

    try {
      const data = await entry.arrayBuffer();
      // Later duplicates overwrite earlier ones
      files.set(entry.name, new Uint8Array(data));
    } catch (error) {
      throw new CorruptArchiveError(`Failed to decompress file ${entry.name}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  return files;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
