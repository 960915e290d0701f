import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { listArchive } from '../src/list.js';
import { entryRecord, headerBytes, listFiles, packArchive, withTempDir, writeArchive } from './helpers/archive.js';

test('listArchive returns every entry without writing files', async () => {
  await withTempDir(async (dir) => {
    const bytes = packArchive([
      { name: 'readme.txt', data: Buffer.from('hello') },
      { name: 'Textures\\stone.dds', data: Buffer.from('DDS ') },
    ]);
    const archivePath = await writeArchive(dir, bytes);

    const listing = await listArchive(archivePath);

    assert.equal(listing.archivePath, archivePath);
    assert.equal(listing.totalSize, bytes.length);
    assert.equal(listing.header.fileCount, 2);
    // 12 header + 27 + 35 record bytes
    assert.deepEqual(listing.entries, [
      { index: 1, name: 'readme.txt', size: 5, offset: 74 },
      { index: 2, name: path.join('Textures', 'stone.dds'), size: 4, offset: 79 },
    ]);
    assert.deepEqual(await listFiles(dir), ['game.vfs']);
  });
});

test('listArchive of an empty archive has no entries', async () => {
  await withTempDir(async (dir) => {
    const archivePath = await writeArchive(dir, headerBytes(0));
    const listing = await listArchive(archivePath);
    assert.deepEqual(listing.entries, []);
  });
});

test('listArchive stops at the first invalid entry', async () => {
  await withTempDir(async (dir) => {
    const bytes = Buffer.concat([
      headerBytes(2),
      entryRecord({ name: 'ok.bin', size: 1, offset: 0 }),
      entryRecord({ name: 'bad.bin', size: 1, offset: 9999 }),
    ]);
    const archivePath = await writeArchive(dir, bytes);

    await assert.rejects(listArchive(archivePath), { code: 'OFFSET_OUT_OF_RANGE', entryIndex: 2, entryName: 'bad.bin' });
  });
});
