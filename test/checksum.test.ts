import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isBlobName, isSnapshotId, newBlobName, randomHex, sha256, snapshotIdFor } from '../src/checksum.js';

describe('checksum', () => {
  it('should compute sha256 of a string', () => {
    const hash = sha256('hello');
    assert.strictEqual(hash, '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('should compute sha256 of a buffer', () => {
    const hash = sha256(Buffer.from('hello'));
    assert.strictEqual(hash, '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('should produce hex of twice the byte length', () => {
    assert.match(randomHex(32), /^[0-9a-f]{64}$/);
  });

  it('should name snapshots by local calendar date', () => {
    assert.strictEqual(snapshotIdFor(new Date(2026, 1, 2, 0, 0, 1)), '2026-02-02');
    assert.strictEqual(snapshotIdFor(new Date(2026, 1, 2, 23, 59, 59)), '2026-02-02');
    assert.strictEqual(snapshotIdFor(new Date(2026, 11, 31, 12, 0, 0)), '2026-12-31');
  });

  it('should recognise snapshot ids', () => {
    assert.strictEqual(isSnapshotId('2026-02-02'), true);
    assert.strictEqual(isSnapshotId('2026-2-2'), false);
    assert.strictEqual(isSnapshotId('..'), false);
  });

  it('should generate distinct, valid blob names', () => {
    const a = newBlobName();
    const b = newBlobName();
    assert.notStrictEqual(a, b);
    assert.strictEqual(isBlobName(a), true);
    assert.strictEqual(a.length, 36);
  });

  it('should reject blob names that could escape a directory', () => {
    assert.strictEqual(isBlobName('../config.json'), false);
    assert.strictEqual(isBlobName('0123456789abcdef0123456789abcdef.txt'), false);
  });
});
