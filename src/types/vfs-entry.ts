/**
 * A single directory record of a VFS archive.
 */
export interface VfsEntry {
  /** 1-based position of the entry in archive order. */
  readonly index: number;
  /** Name with archive separators translated to the platform separator. */
  readonly name: string;
  /** Name as stored in the archive, with `\` separators. */
  readonly rawName: string;
  /** Payload size in bytes. */
  readonly size: number;
  /** Absolute payload offset from the archive start. */
  readonly offset: number;
  /** Offset of the entry's name length byte. */
  readonly metadataOffset: number;
}
