/**
 * Sequential reader for LP1C VFS archives.
 *
 * The reader owns one file handle and a cursor shared by metadata scanning and
 * payload reads. Payloads may live anywhere in the archive, so callers that jump
 * away from the directory must come back through {@link VfsReader.withCursor}.
 */
import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import {
  ENTRY_FIXED_SUFFIX_SIZE,
  FILE_COUNT_FIELD_SIZE,
  FILE_OFFSET_FIELD_SIZE,
  FILE_SIZE_FIELD_SIZE,
  NAME_LENGTH_FIELD_SIZE,
  VFS_HEADER_SIZE,
  VFS_MAGIC,
  VFS_SUPPORTED_VERSION,
} from './constants/vfs-format.js';
import { errorMessage, VfsFormatError, VfsInternalError, VfsIoError } from './errors.js';
import type { VfsErrorContext } from './errors.js';
import { toPlatformPath } from './paths.js';
import type { Logger } from './types/logger.js';
import type { VfsEntry } from './types/vfs-entry.js';
import type { VfsHeader } from './types/vfs-header.js';

export interface VfsReaderOptions {
  /**
   * Encoding of entry names. Defaults to `utf8`. Names whose bytes do not survive
   * a decode in this encoding are rejected with `INVALID_NAME`.
   */
  readonly nameEncoding?: BufferEncoding;
  /** Receives warnings about secondary failures while closing. Defaults to `console`. */
  readonly logger?: Pick<Logger, 'warn'>;
}

const MAGIC_BYTES = Buffer.from(VFS_MAGIC, 'ascii');
const SUPPORTED_VERSION_BYTES = Buffer.from(VFS_SUPPORTED_VERSION);

function describeBytes(bytes: Iterable<number>): string {
  return `[${Array.from(bytes).join(', ')}]`;
}

/**
 * Checks that an entry's payload lies inside the archive.
 * JavaScript numbers are exact far beyond 2^32, so `offset + size` cannot wrap.
 *
 * @throws {VfsFormatError} `OFFSET_OUT_OF_RANGE` or `RANGE_EXCEEDS_ARCHIVE`
 */
export function validateRange(entry: Pick<VfsEntry, 'index' | 'name' | 'size' | 'offset'>, totalSize: number): void {
  const context: VfsErrorContext = { entryIndex: entry.index, entryName: entry.name, offset: entry.offset };
  if (entry.offset > totalSize) {
    throw new VfsFormatError(
      'OFFSET_OUT_OF_RANGE',
      `invalid data offset ${entry.offset} (0x${entry.offset.toString(16).toUpperCase()}) exceeds archive size ${totalSize}`,
      context
    );
  }
  const end = entry.offset + entry.size;
  if (end > totalSize) {
    throw new VfsFormatError(
      'RANGE_EXCEEDS_ARCHIVE',
      `invalid data range: offset ${entry.offset} + size ${entry.size} (${end}) exceeds archive size ${totalSize}`,
      context
    );
  }
}

/**
 * Reader over a single open VFS archive.
 */
export class VfsReader {
  private position = 0;
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    readonly filePath: string,
    /** Archive size captured when the reader was opened. */
    readonly totalSize: number,
    private readonly nameEncoding: BufferEncoding,
    private readonly logger: Pick<Logger, 'warn'>
  ) {}

  /**
   * Opens an archive and captures its size.
   *
   * @throws {VfsIoError} `OPEN_FAILED` if the file cannot be opened or stat'ed
   * @throws {VfsFormatError} `TOO_SMALL` if the file cannot hold a header
   */
  static async open({ filePath, nameEncoding = 'utf8', logger = console }: { readonly filePath: string } & VfsReaderOptions): Promise<VfsReader> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r');
    } catch (error) {
      throw new VfsIoError('OPEN_FAILED', `failed to open archive "${filePath}": ${errorMessage(error)}`, {}, error);
    }

    let totalSize: number;
    try {
      totalSize = (await handle.stat()).size;
    } catch (error) {
      await VfsReader.closeHandleAfterFailure(handle, filePath, logger);
      throw new VfsIoError('OPEN_FAILED', `failed to stat archive "${filePath}": ${errorMessage(error)}`, {}, error);
    }

    if (totalSize < VFS_HEADER_SIZE) {
      await VfsReader.closeHandleAfterFailure(handle, filePath, logger);
      throw new VfsFormatError(
        'TOO_SMALL',
        `archive "${filePath}" is too small (${totalSize} bytes, minimum ${VFS_HEADER_SIZE})`
      );
    }

    return new VfsReader(handle, filePath, totalSize, nameEncoding, logger);
  }

  /**
   * Opens an archive, hands the reader to `fn` and closes it on every exit path.
   * When `fn` fails, a close failure is only logged so the original error propagates.
   */
  static async using<T>(filePath: string, fn: (reader: VfsReader) => Promise<T>, options: VfsReaderOptions = {}): Promise<T> {
    const reader = await VfsReader.open({ filePath, ...options });
    let result: T;
    try {
      result = await fn(reader);
    } catch (error) {
      if (!reader.closed) {
        reader.closed = true;
        await VfsReader.closeHandleAfterFailure(reader.handle, filePath, reader.logger);
      }
      throw error;
    }
    await reader.close();
    return result;
  }

  private static async closeHandleAfterFailure(handle: FileHandle, filePath: string, logger: Pick<Logger, 'warn'>): Promise<void> {
    try {
      await handle.close();
    } catch (closeError) {
      logger.warn(`Warning: failed to close archive "${filePath}": ${errorMessage(closeError)}`);
    }
  }

  tell(): number {
    return this.position;
  }

  /**
   * Moves the cursor to an absolute position. Positions past the end are
   * allowed; reads there return no bytes.
   */
  seek(position: number): void {
    if (!Number.isSafeInteger(position) || position < 0) {
      throw new VfsInternalError(`invalid seek position ${position}`);
    }
    this.position = position;
  }

  /**
   * Reads up to `length` bytes at the cursor and advances past them.
   * The result is shorter than `length` only when the end of the archive was reached.
   *
   * @throws {VfsIoError} `READ_FAILED` if the underlying read fails
   */
  async read(length: number, context: VfsErrorContext = {}): Promise<Buffer> {
    this.assertOpen();
    const buffer = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      let bytesRead: number;
      try {
        ({ bytesRead } = await this.handle.read(buffer, filled, length - filled, this.position + filled));
      } catch (error) {
        throw new VfsIoError(
          'READ_FAILED',
          `failed to read ${length} bytes from archive: ${errorMessage(error)}`,
          { ...context, offset: this.position + filled },
          error
        );
      }
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
    }
    this.position += filled;
    return filled < length ? buffer.subarray(0, filled) : buffer;
  }

  /**
   * Runs `fn` and puts the cursor back where it was, whether `fn` succeeds or not.
   */
  async withCursor<T>(fn: () => Promise<T>): Promise<T> {
    const resumePosition = this.position;
    try {
      return await fn();
    } finally {
      this.position = resumePosition;
    }
  }

  private async readField(length: number, field: string, context: VfsErrorContext): Promise<Buffer> {
    const start = this.position;
    const bytes = await this.read(length, context);
    if (bytes.length < length) {
      throw new VfsFormatError(
        'TRUNCATED',
        `unexpected end of archive while reading ${field} (needed ${length} bytes, got ${bytes.length}; data ends at offset ${start + bytes.length})`,
        { ...context, offset: start }
      );
    }
    return bytes;
  }

  /**
   * Decodes the 12-byte header. Leaves the cursor at the first entry.
   *
   * @throws {VfsFormatError} `BAD_MAGIC`, `UNSUPPORTED_VERSION` or `TRUNCATED`
   */
  async readHeader(): Promise<VfsHeader> {
    this.seek(0);

    const magic = await this.readField(MAGIC_BYTES.length, 'magic bytes', {});
    if (!magic.equals(MAGIC_BYTES)) {
      throw new VfsFormatError(
        'BAD_MAGIC',
        `invalid magic bytes ${describeBytes(magic)} ('${magic.toString('latin1')}'), expected '${VFS_MAGIC}'`,
        { offset: 0 }
      );
    }

    const versionOffset = this.position;
    const version = await this.readField(SUPPORTED_VERSION_BYTES.length, 'version bytes', {});
    if (!version.equals(SUPPORTED_VERSION_BYTES)) {
      throw new VfsFormatError(
        'UNSUPPORTED_VERSION',
        `unsupported format version ${describeBytes(version)}, expected ${describeBytes(VFS_SUPPORTED_VERSION)}`,
        { offset: versionOffset }
      );
    }

    const fileCount = (await this.readField(FILE_COUNT_FIELD_SIZE, 'file count', {})).readUInt32LE(0);
    return { magic: magic.toString('ascii'), version, fileCount };
  }

  /**
   * Decodes the entry at the cursor up to and including its offset field.
   * The 8 reserved bytes are left in place; skip them with {@link skipFixedSuffix}
   * after any payload detour.
   *
   * @param index - 1-based entry index, used in error context
   * @throws {VfsFormatError} `ZERO_LENGTH_NAME`, `INVALID_NAME` or `TRUNCATED`
   */
  async readEntry(index: number): Promise<VfsEntry> {
    const metadataOffset = this.position;

    const nameLength = (await this.readField(NAME_LENGTH_FIELD_SIZE, 'name length', { entryIndex: index })).readUInt8(0);
    if (nameLength === 0) {
      throw new VfsFormatError('ZERO_LENGTH_NAME', 'invalid name length (0)', { entryIndex: index, offset: metadataOffset });
    }

    const nameOffset = this.position;
    const nameBytes = await this.readField(nameLength, `name (${nameLength} bytes)`, { entryIndex: index });
    const rawName = nameBytes.toString(this.nameEncoding);
    // A decode that does not round-trip would let distinct names share a destination.
    if (!Buffer.from(rawName, this.nameEncoding).equals(nameBytes)) {
      throw new VfsFormatError(
        'INVALID_NAME',
        `name bytes ${describeBytes(nameBytes)} are not valid ${this.nameEncoding}; choose another name encoding (e.g. latin1)`,
        { entryIndex: index, offset: nameOffset }
      );
    }
    const name = toPlatformPath(rawName);

    const fieldContext: VfsErrorContext = { entryIndex: index, entryName: name };
    const size = (await this.readField(FILE_SIZE_FIELD_SIZE, 'file size', fieldContext)).readUInt32LE(0);
    const offset = (await this.readField(FILE_OFFSET_FIELD_SIZE, 'file offset', fieldContext)).readUInt32LE(0);

    return { index, name, rawName, size, offset, metadataOffset };
  }

  /**
   * Validates an entry's payload range against this archive's size.
   */
  validateRange(entry: VfsEntry): void {
    validateRange(entry, this.totalSize);
  }

  /**
   * Skips the reserved bytes after an entry's offset field so the cursor lands on
   * the next entry's name length. Landing exactly at the end of the archive after
   * the last entry is normal.
   *
   * @returns The new cursor position
   */
  skipFixedSuffix(): number {
    const reserved = ENTRY_FIXED_SUFFIX_SIZE - FILE_SIZE_FIELD_SIZE - FILE_OFFSET_FIELD_SIZE;
    if (reserved < 0) {
      throw new VfsInternalError(`negative number of bytes to skip (${reserved})`, { offset: this.position });
    }
    this.seek(this.position + reserved);
    return this.position;
  }

  /**
   * Walks the directory in archive order. Each entry is decoded and range-checked
   * before it is yielded; the reserved suffix is skipped when iteration resumes, so
   * consumers may move the cursor while handling an entry as long as they restore it.
   */
  async *entries(header: VfsHeader): AsyncGenerator<VfsEntry, void, undefined> {
    this.seek(VFS_HEADER_SIZE);
    for (let index = 1; index <= header.fileCount; index++) {
      const entry = await this.readEntry(index);
      this.validateRange(entry);
      yield entry;
      this.skipFixedSuffix();
    }
  }

  /**
   * Releases the file handle. Safe to call more than once.
   *
   * @throws {VfsIoError} `CLOSE_FAILED`
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.handle.close();
    } catch (error) {
      throw new VfsIoError('CLOSE_FAILED', `failed to close archive "${this.filePath}": ${errorMessage(error)}`, {}, error);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new VfsInternalError(`archive reader for "${this.filePath}" is closed`);
    }
  }
}
