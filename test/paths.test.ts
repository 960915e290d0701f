import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { defaultOutputDir, entryDestination, isInsideRoot, toPlatformPath } from '../src/paths.js';

test('toPlatformPath translates archive separators to the platform separator', () => {
  assert.equal(toPlatformPath('Textures\\stone.dds'), path.join('Textures', 'stone.dds'));
  assert.equal(toPlatformPath('a\\b\\c\\d.txt', '/'), 'a/b/c/d.txt');
  assert.equal(toPlatformPath('a\\b\\c\\d.txt', '\\'), 'a\\b\\c\\d.txt');
  assert.equal(toPlatformPath('plain.txt'), 'plain.txt');
});

test('entryDestination joins the output root with every name component', () => {
  const root = path.resolve('out');
  assert.equal(entryDestination(root, toPlatformPath('Textures\\stone.dds')), path.join(root, 'Textures', 'stone.dds'));
  assert.equal(entryDestination(root, toPlatformPath('a\\b\\c\\d.txt')), path.join(root, 'a', 'b', 'c', 'd.txt'));
});

test('isInsideRoot accepts only paths strictly below the root', () => {
  const root = path.resolve('out');
  assert.equal(isInsideRoot(root, path.join(root, 'a.txt')), true);
  assert.equal(isInsideRoot(root, path.join(root, '..foo')), true);
  assert.equal(isInsideRoot(root, root), false);
  assert.equal(isInsideRoot(root, path.join(root, '..', 'a.txt')), false);
  assert.equal(isInsideRoot(root, path.join(root, 'a', '..', '..')), false);
});

test('defaultOutputDir strips the extension and resolves against cwd', () => {
  const cwd = path.resolve('work');
  assert.equal(defaultOutputDir(path.join('games', 'data', 'Sounds.vfs'), cwd), path.join(cwd, 'Sounds'));
  assert.equal(defaultOutputDir('bundle.tar.vfs', cwd), path.join(cwd, 'bundle.tar'));
  assert.equal(defaultOutputDir('Textures', cwd), path.join(cwd, 'Textures'));
});
