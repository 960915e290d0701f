/**
 * Directory listing for VFS archives, without writing anything to disk.
 */
import { resolve } from 'node:path';
import type { VfsEntry } from './types/vfs-entry.js';
import type { VfsHeader } from './types/vfs-header.js';
import { VfsReader } from './vfs-reader.js';
import type { VfsReaderOptions } from './vfs-reader.js';

export type ListedEntry = Pick<VfsEntry, 'index' | 'name' | 'size' | 'offset'>;

export interface ArchiveListing {
  readonly archivePath: string;
  readonly totalSize: number;
  readonly header: VfsHeader;
  readonly entries: readonly ListedEntry[];
}

/**
 * Decodes and range-checks every entry of an archive.
 *
 * @throws {VfsFormatError} On the first malformed header or entry
 */
export async function listArchive(archivePath: string, options: VfsReaderOptions = {}): Promise<ArchiveListing> {
  const resolvedArchive = resolve(archivePath);

  return VfsReader.using(resolvedArchive, async (reader) => {
    const header = await reader.readHeader();
    const entries: ListedEntry[] = [];
    for await (const entry of reader.entries(header)) {
      entries.push({ index: entry.index, name: entry.name, size: entry.size, offset: entry.offset });
    }
    return { archivePath: resolvedArchive, totalSize: reader.totalSize, header, entries };
  }, options);
}
