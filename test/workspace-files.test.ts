import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { join } from 'node:path';
import { enumerateBackupFiles, resolveInside } from '../src/workspace-files.js';
import { makeTmpRoot, removeTmpRoot, writeFiles } from './support/fixtures.js';

describe('workspace files', () => {
  let root: string;

  before(async () => {
    root = await makeTmpRoot('files');
    await writeFiles(root, {
      'notes.txt': 'aaaaaaaaaa',
      'docs/report.md': 'bbbbbbbbbbbbbbbbbbbb',
      'docs/deep/z.bin': 'ccccc',
      'backups/BASE1/config.json': '{}',
      'backup-config/providers/BASE1/config.json': '{}',
      '.git/HEAD': 'ref: refs/heads/main',
      'node_modules/x/index.js': '',
      'updates/pending.bin': 'u',
      'identity.json': '{}',
    });
  });

  after(async () => {
    await removeTmpRoot(root);
  });

  it('should enumerate files sorted by relative path, skipping internal directories', async () => {
    const files = await enumerateBackupFiles(root, ['identity.json']);
    assert.deepStrictEqual(
      files.map(f => [f.relativePath, f.size]),
      [
        ['docs/deep/z.bin', 5],
        ['docs/report.md', 20],
        ['notes.txt', 10],
      ],
    );
    assert.strictEqual(files[2].absolutePath, join(root, 'notes.txt'));
  });

  it('should include extra names only when not excluded', async () => {
    const files = await enumerateBackupFiles(root);
    assert.deepStrictEqual(
      files.map(f => f.relativePath),
      ['docs/deep/z.bin', 'docs/report.md', 'identity.json', 'notes.txt'],
    );
  });

  it('should give an empty list for a missing directory', async () => {
    assert.deepStrictEqual(await enumerateBackupFiles(join(root, 'missing')), []);
  });

  it('should resolve relative paths inside the root only', () => {
    assert.strictEqual(resolveInside(root, 'docs/report.md'), join(root, 'docs', 'report.md'));
    assert.strictEqual(resolveInside(root, 'docs/../notes.txt'), join(root, 'notes.txt'));
    assert.strictEqual(resolveInside(root, '../outside.txt'), null);
    assert.strictEqual(resolveInside(root, 'docs/../../outside.txt'), null);
    assert.strictEqual(resolveInside(root, '/etc/passwd'), null);
    assert.strictEqual(resolveInside(root, ''), null);
    assert.strictEqual(resolveInside(root, '.'), null);
  });
});
