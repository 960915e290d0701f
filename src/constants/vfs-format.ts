/**
 * Layout constants for LP1C VFS archives.
 */

/** Magic at offset 0, as ASCII text. */
export const VFS_MAGIC = 'LP1C';

/** The only version understood by this reader. */
export const VFS_SUPPORTED_VERSION: readonly number[] = Object.freeze([0, 0, 0, 0]);

/** Magic (4) + version (4) + file count (4). */
export const VFS_HEADER_SIZE = 12;

export const FILE_COUNT_FIELD_SIZE = 4;

/** Width of the name length prefix of an entry. */
export const NAME_LENGTH_FIELD_SIZE = 1;

export const FILE_SIZE_FIELD_SIZE = 4;
export const FILE_OFFSET_FIELD_SIZE = 4;

/**
 * Bytes following an entry's name: file size (4) + file offset (4) + 8 reserved bytes.
 * The reserved tail is never interpreted.
 */
export const ENTRY_FIXED_SUFFIX_SIZE = 16;

/** Separator used by entry names inside the archive. */
export const ARCHIVE_PATH_SEPARATOR = '\\';
