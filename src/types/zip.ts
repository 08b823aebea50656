/**
 * Entries of a decompressed archive, keyed by file name.
 *
 * Directory entries are not included. When an archive lists the same name
 * twice, the later entry in central-directory order wins.
 */
export type ArchiveEntries = Map<string, Uint8Array>;
