/**
 * Command definitions for the vfs-unpack CLI.
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import { errorMessage } from './errors.js';
import { extractArchive } from './extract.js';
import { listArchive } from './list.js';
import { defaultOutputDir } from './paths.js';
import type { Logger } from './types/logger.js';

// Version is set at build time
const version = '0.1.0';

export interface ProgramOptions {
  readonly logger?: Logger;
  /** Base for relative paths. Defaults to `process.cwd()`. */
  readonly cwd?: string;
  /** Called with a non-zero code when a command fails. Defaults to `process.exit`. */
  readonly exit?: (code: number) => void;
}

interface ExtractCommandOptions {
  readonly encoding: BufferEncoding;
  readonly quiet?: boolean;
}

interface ListCommandOptions {
  readonly encoding: BufferEncoding;
}

function parseEncoding(value: string): BufferEncoding {
  if (!Buffer.isEncoding(value)) {
    throw new InvalidArgumentError(`Unknown encoding "${value}".`);
  }
  return value;
}

function quietLogger(logger: Logger): Logger {
  return {
    log: () => {},
    warn: (message) => logger.warn(message),
    error: (message) => logger.error(message),
  };
}

/**
 * Builds the commander program. `extract` is the default command, so
 * `vfs-unpack Sounds.vfs` and `vfs-unpack extract Sounds.vfs` are equivalent.
 */
export function createProgram({ logger = console, cwd = process.cwd(), exit = (code) => process.exit(code) }: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('vfs-unpack')
    .description('Extract files from LP1C VFS game archives')
    .version(version);

  program
    .command('extract', { isDefault: true })
    .description('Extract every file of a VFS archive into a directory tree')
    .argument('<archive>', 'Path to the .vfs archive')
    .argument('[output-dir]', 'Output directory (default: archive name without extension, in the current directory)')
    .option('-e, --encoding <encoding>', 'Encoding of entry names', parseEncoding, 'utf8')
    .option('-q, --quiet', 'Only report warnings and errors')
    .addHelpText('after', [
      '',
      'Examples:',
      '  $ vfs-unpack "D:\\Games\\data\\Sounds.vfs"',
      '  $ vfs-unpack Sounds.vfs extracted_sounds',
      '  $ vfs-unpack extract --encoding latin1 Textures.vfs',
    ].join('\n'))
    .action(async (archive: string, outputDir: string | undefined, options: ExtractCommandOptions) => {
      const runLogger = options.quiet ? quietLogger(logger) : logger;
      try {
        const resolvedArchive = resolve(cwd, archive);
        const resolvedOutputDir = outputDir ? resolve(cwd, outputDir) : defaultOutputDir(resolvedArchive, cwd);

        runLogger.log(`Input VFS: ${resolvedArchive}`);
        runLogger.log(`Output directory: ${resolvedOutputDir}`);
        runLogger.log('');

        const summary = await extractArchive(resolvedArchive, resolvedOutputDir, {
          logger: runLogger,
          nameEncoding: options.encoding,
        });

        runLogger.log('');
        runLogger.log(`✅ Extracted ${summary.filesWritten} of ${summary.fileCount} files (${summary.bytesWritten} bytes).`);
      } catch (error) {
        runLogger.error(`❌ Extraction failed: ${errorMessage(error)}`);
        exit(1);
      }
    });

  program
    .command('list')
    .description('Print the directory of a VFS archive without extracting it')
    .argument('<archive>', 'Path to the .vfs archive')
    .option('-e, --encoding <encoding>', 'Encoding of entry names', parseEncoding, 'utf8')
    .action(async (archive: string, options: ListCommandOptions) => {
      try {
        const listing = await listArchive(resolve(cwd, archive), { nameEncoding: options.encoding, logger });

        logger.log(`Archive: ${listing.archivePath} (${listing.totalSize} bytes)`);
        logger.log(`Files: ${listing.header.fileCount}`);
        for (const entry of listing.entries) {
          logger.log(`  ${entry.index}. ${entry.name} (${entry.size} bytes at offset ${entry.offset})`);
        }
      } catch (error) {
        logger.error(`❌ Listing failed: ${errorMessage(error)}`);
        exit(1);
      }
    });

  return program;
}
