/**
 * Path helpers shared by the extractor and the CLI.
 */
import { basename, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { ARCHIVE_PATH_SEPARATOR } from './constants/vfs-format.js';

/**
 * Translates an archive entry name (`Textures\stone.dds`) to the platform separator.
 */
export function toPlatformPath(rawName: string, separator: string = sep): string {
  return rawName.split(ARCHIVE_PATH_SEPARATOR).join(separator);
}

/**
 * Joins the output root with a normalized entry name.
 */
export function entryDestination(outputRoot: string, entryName: string): string {
  return join(outputRoot, entryName);
}

/**
 * Whether `destination` lies strictly below `outputRoot` once both are resolved.
 */
export function isInsideRoot(outputRoot: string, destination: string): boolean {
  const rel = relative(resolve(outputRoot), resolve(destination));
  if (rel === '' || isAbsolute(rel)) {
    return false;
  }
  return rel !== '..' && !rel.startsWith(`..${sep}`);
}

/**
 * Output directory used when none is given: the archive's file name without
 * its extension, resolved against `cwd`.
 *
 * @example defaultOutputDir('/games/data/Sounds.vfs', '/tmp') === '/tmp/Sounds'
 */
export function defaultOutputDir(archivePath: string, cwd: string = process.cwd()): string {
  const base = basename(archivePath);
  return resolve(cwd, base.slice(0, base.length - extname(base).length));
}
