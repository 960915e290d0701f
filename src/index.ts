/**
 * vfs-unpack - Main entry point
 *
 * Reads LP1C VFS game archives and extracts their files to a directory tree.
 */

// Re-export extraction
export { extractArchive, Extractor } from './extract.js';
export type { ExtractOptions, ExtractSummary } from './extract.js';

// Re-export listing
export { listArchive } from './list.js';
export type { ArchiveListing, ListedEntry } from './list.js';

// Re-export the container reader
export { VfsReader, validateRange } from './vfs-reader.js';
export type { VfsReaderOptions } from './vfs-reader.js';

export { VfsError, VfsFormatError, VfsIoError, VfsInternalError } from './errors.js';
export type { VfsErrorContext, VfsFormatErrorCode, VfsIoErrorCode } from './errors.js';

export { defaultOutputDir, toPlatformPath } from './paths.js';
export * from './constants/vfs-format.js';
export type { VfsEntry } from './types/vfs-entry.js';
export type { VfsHeader } from './types/vfs-header.js';
export type { Logger } from './types/logger.js';
