/**
 * Extraction orchestrator - materializes every file of a VFS archive on disk.
 *
 * Entries are processed one at a time in archive order. For each entry the
 * payload is read through a cursor detour, written below the output root, and the
 * directory scan resumes where it left off.
 */

import { mkdir, open, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { errorMessage, VfsFormatError, VfsIoError } from './errors.js';
import type { VfsErrorContext } from './errors.js';
import { entryDestination, isInsideRoot } from './paths.js';
import type { Logger } from './types/logger.js';
import type { VfsEntry } from './types/vfs-entry.js';
import { VfsReader } from './vfs-reader.js';

export interface ExtractOptions {
  /** Progress and warning sink. Defaults to `console`. */
  readonly logger?: Logger;
  /** Encoding of entry names. Defaults to `utf8`. */
  readonly nameEncoding?: BufferEncoding;
}

export interface ExtractSummary {
  readonly outputDir: string;
  /** Entry count declared by the header. */
  readonly fileCount: number;
  readonly filesWritten: number;
  /** Sum of the declared sizes of all written entries. */
  readonly bytesWritten: number;
}

function entryContext(entry: VfsEntry): VfsErrorContext {
  return { entryIndex: entry.index, entryName: entry.name, offset: entry.offset };
}

/**
 * Creates a directory and its parents.
 *
 * @throws {VfsIoError} `CREATE_DIR_FAILED`
 */
async function ensureDirectory(dir: string, context: VfsErrorContext = {}): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new VfsIoError('CREATE_DIR_FAILED', `failed to create output directory "${dir}": ${errorMessage(error)}`, context, error);
  }
}

/**
 * Best-effort removal of a partially written file. Failures are logged as warnings.
 */
async function discardPartialFile(output: FileHandle, destination: string, logger: Logger): Promise<void> {
  try {
    await output.close();
  } catch (error) {
    logger.warn(`Warning: failed to close partial output file "${destination}": ${errorMessage(error)}`);
  }
  try {
    await rm(destination, { force: true });
  } catch (error) {
    logger.warn(`Warning: failed to remove partial output file "${destination}": ${errorMessage(error)}`);
  }
}

/**
 * Creates or truncates `destination` and writes `data` to it.
 * A failed close is logged as a warning.
 *
 * @throws {VfsIoError} `CREATE_FILE_FAILED` or `WRITE_FAILED`
 */
async function writeEntryFile(destination: string, data: Buffer, context: VfsErrorContext, logger: Logger): Promise<void> {
  let output: FileHandle;
  try {
    output = await open(destination, 'w');
  } catch (error) {
    throw new VfsIoError('CREATE_FILE_FAILED', `failed to create output file "${destination}": ${errorMessage(error)}`, context, error);
  }

  try {
    await output.writeFile(data);
  } catch (error) {
    await discardPartialFile(output, destination, logger);
    throw new VfsIoError('WRITE_FAILED', `failed to write data to "${destination}": ${errorMessage(error)}`, context, error);
  }

  try {
    await output.close();
  } catch (error) {
    logger.warn(`Warning: failed to close output file "${destination}": ${errorMessage(error)}`);
  }
}

/**
 * Drives a {@link VfsReader} across all entries and writes them below `outputRoot`.
 */
export class Extractor {
  private readonly logger: Logger;

  constructor(
    private readonly reader: VfsReader,
    private readonly outputRoot: string,
    options: Pick<ExtractOptions, 'logger'> = {}
  ) {
    this.logger = options.logger ?? console;
  }

  /**
   * Reads the header and extracts every entry. The first failure aborts the run.
   * An empty archive succeeds without creating the output directory.
   */
  async run(): Promise<ExtractSummary> {
    const header = await this.reader.readHeader();
    this.logger.log(`Detected VFS format version: [${Array.from(header.version).join(', ')}] (supported)`);
    this.logger.log(`Archive contains ${header.fileCount} files.`);

    if (header.fileCount === 0) {
      this.logger.log('No files to extract.');
      return { outputDir: this.outputRoot, fileCount: 0, filesWritten: 0, bytesWritten: 0 };
    }

    this.logger.log(`Creating output directory: ${this.outputRoot}`);
    await ensureDirectory(this.outputRoot);

    let filesWritten = 0;
    let bytesWritten = 0;
    for await (const entry of this.reader.entries(header)) {
      await this.extractEntry(entry, header.fileCount);
      filesWritten++;
      bytesWritten += entry.size;
    }

    if (this.reader.tell() === this.reader.totalSize) {
      this.logger.log("Reached end of archive after the last entry's metadata.");
    }
    this.logger.log('Unpacking finished successfully.');

    return { outputDir: this.outputRoot, fileCount: header.fileCount, filesWritten, bytesWritten };
  }

  private async extractEntry(entry: VfsEntry, fileCount: number): Promise<void> {
    const context = entryContext(entry);

    const data = await this.reader.withCursor(async () => {
      this.reader.seek(entry.offset);
      return this.reader.read(entry.size, context);
    });
    if (data.length < entry.size) {
      throw new VfsIoError(
        'UNEXPECTED_EOF',
        `failed to read full data (expected ${entry.size} bytes, read ${data.length}, archive size ${this.reader.totalSize}): ` +
        'unexpected end of file, archive might be corrupt',
        context
      );
    }

    const destination = entryDestination(this.outputRoot, entry.name);
    if (!isInsideRoot(this.outputRoot, destination)) {
      throw new VfsFormatError('UNSAFE_PATH', `entry name resolves outside the output directory: "${destination}"`, context);
    }

    await ensureDirectory(dirname(destination), context);
    await writeEntryFile(destination, data, context, this.logger);

    this.logger.log(`Extracted (${entry.index}/${fileCount}): ${entry.name} (${entry.size} bytes)`);
  }
}

/**
 * Extracts a VFS archive into `outputDir`.
 *
 * The archive handle is held for the whole run and released on every exit path.
 *
 * @param archivePath - Path to the `.vfs` archive
 * @param outputDir - Directory that receives the extracted tree
 * @throws {VfsFormatError} If the archive is malformed
 * @throws {VfsIoError} If reading the archive or writing output fails
 */
export async function extractArchive(archivePath: string, outputDir: string, options: ExtractOptions = {}): Promise<ExtractSummary> {
  const logger = options.logger ?? console;
  const resolvedArchive = resolve(archivePath);
  const resolvedOutputDir = resolve(outputDir);

  return VfsReader.using(
    resolvedArchive,
    (reader) => new Extractor(reader, resolvedOutputDir, { logger }).run(),
    { nameEncoding: options.nameEncoding, logger }
  );
}
