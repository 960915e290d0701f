/**
 * Decoded 12-byte VFS archive header.
 */
export interface VfsHeader {
  readonly magic: string;
  readonly version: Buffer;
  readonly fileCount: number;
}
