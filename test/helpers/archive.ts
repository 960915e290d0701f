import { mkdtemp, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Logger } from '../../src/types/logger.js';

export const RESERVED_FILL = 0xee;

export interface RecordSpec {
  /** Raw name; strings are encoded as UTF-8. */
  readonly name: string | Buffer;
  readonly size: number;
  readonly offset: number;
}

export interface PackedFile {
  /** Raw name; strings are encoded as UTF-8. */
  readonly name: string | Buffer;
  readonly data: Buffer;
}

export function headerBytes(fileCount: number, magic = 'LP1C', version: readonly number[] = [0, 0, 0, 0]): Buffer {
  const buffer = Buffer.alloc(12);
  buffer.write(magic, 0, 4, 'latin1');
  Buffer.from(version).copy(buffer, 4);
  buffer.writeUInt32LE(fileCount, 8);
  return buffer;
}

function nameBytes(name: string | Buffer): Buffer {
  return typeof name === 'string' ? Buffer.from(name, 'utf8') : name;
}

export function recordSize(name: string | Buffer): number {
  return 1 + nameBytes(name).length + 16;
}

/** Name length, name, size, offset and 8 reserved bytes. */
export function entryRecord({ name, size, offset }: RecordSpec): Buffer {
  const encoded = nameBytes(name);
  const buffer = Buffer.alloc(recordSize(name), RESERVED_FILL);
  buffer.writeUInt8(encoded.length, 0);
  encoded.copy(buffer, 1);
  buffer.writeUInt32LE(size, 1 + encoded.length);
  buffer.writeUInt32LE(offset, 5 + encoded.length);
  return buffer;
}

/**
 * Header, every record, then the payloads in the same order.
 */
export function packArchive(files: readonly PackedFile[]): Buffer {
  let dataOffset = 12 + files.reduce((sum, file) => sum + recordSize(file.name), 0);
  const records = files.map((file) => {
    const record = entryRecord({ name: file.name, size: file.data.length, offset: dataOffset });
    dataOffset += file.data.length;
    return record;
  });
  return Buffer.concat([headerBytes(files.length), ...records, ...files.map((file) => file.data)]);
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), 'vfs-unpack-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export async function writeArchive(dir: string, bytes: Buffer, fileName = 'game.vfs'): Promise<string> {
  const archivePath = path.join(dir, fileName);
  await writeFile(archivePath, bytes);
  return archivePath;
}

/** Relative paths of all regular files below `root`, sorted. */
export async function listFiles(root: string): Promise<string[]> {
  const names = await readdir(root, { recursive: true });
  const files: string[] = [];
  for (const name of names) {
    if ((await stat(path.join(root, name))).isFile()) {
      files.push(name);
    }
  }
  return files.sort();
}

export async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

export class RecordingLogger implements Logger {
  readonly logs: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: string[] = [];

  log = (message: string): void => {
    this.logs.push(message);
  };

  warn = (message: string): void => {
    this.warnings.push(message);
  };

  error = (message: string): void => {
    this.errors.push(message);
  };
}
