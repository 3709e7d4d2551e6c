import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { access, copyFile, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Identity } from '../src/identity.js';
import { parseManifest, type BackupManifest } from '../src/manifest.js';
import { backupPaths } from '../src/transport.js';
import {
  FIXED_NOW,
  SNAPSHOT_ID,
  makeNode,
  makeTmpRoot,
  removeTmpRoot,
  writeFiles,
  type TestNode,
} from './support/fixtures.js';
import { MemoryNetwork } from './support/memory-network.js';

const FILES = {
  'notes.txt': 'a'.repeat(10),
  'docs/report.md': 'b'.repeat(20),
  'z.bin': 'c'.repeat(5),
};

/** Per-file overhead of a sealed blob: ephemeral key, nonce, tag. */
const SEAL_OVERHEAD = 32 + 12 + 16;

async function pair(network: MemoryNetwork, root: string): Promise<{ alfa: TestNode; base1: TestNode }> {
  const alfa = await makeNode(network, root, 'ALFA');
  const base1 = await makeNode(network, root, 'BASE1', { contacts: ['ALFA'] });
  await base1.node.relationships.updateProviderSettings({ enabled: true, autoAcceptFromContacts: true });
  const invited = await alfa.node.relationships.sendInvite('BASE1');
  assert.strictEqual(invited.ok, true);
  await writeFiles(alfa.dataDir, FILES);
  return { alfa, base1 };
}

async function runBackup(alfa: TestNode): Promise<void> {
  alfa.node.backup.startBackup('BASE1');
  await alfa.node.backup.idle();
  assert.strictEqual(alfa.node.backup.status.current.status, 'complete');
}

async function storedManifest(base1: TestNode, alfa: TestNode, snapshotId = SNAPSHOT_ID): Promise<BackupManifest> {
  const sealed = await base1.node.context.snapshots.readManifest('ALFA', snapshotId);
  assert.ok(sealed);
  return parseManifest(alfa.identity.decryptManifest(sealed));
}

function blobPath(base1: TestNode, blobName: string): string {
  return join(base1.dataDir, 'backups', 'ALFA', SNAPSHOT_ID, 'files', blobName);
}

/** The same identity on a fresh device with an empty data directory. */
async function newDevice(network: MemoryNetwork, root: string, alfa: TestNode, base1: TestNode): Promise<TestNode> {
  const device = await makeNode(network, root, 'ALFA', {
    identity: Identity.fromSecret('ALFA', alfa.identity.secretKey),
    dataDir: join(root, 'alfa-new'),
  });
  await device.node.relationships.adoptProvider({
    callsign: 'BASE1',
    publicKey: base1.identity.publicKey,
    maxStorageBytes: 0,
    snapshotCount: 1,
    latestSnapshotId: SNAPSHOT_ID,
  });
  return device;
}

describe('backup', () => {
  let root: string;
  let network: MemoryNetwork;
  let alfa: TestNode;
  let base1: TestNode;

  beforeEach(async () => {
    root = await makeTmpRoot('backup');
    network = new MemoryNetwork();
    ({ alfa, base1 } = await pair(network, root));
  });

  afterEach(async () => {
    await removeTmpRoot(root);
  });

  it('should back up three files and report progress after each one', async () => {
    const seen: number[] = [];
    alfa.node.backup.status.subscribe(s => seen.push(s.progressPercent));

    const started = alfa.node.backup.startBackup('base1');
    assert.strictEqual(started.status, 'in_progress');
    assert.strictEqual(started.peerCallsign, 'BASE1');
    assert.strictEqual(started.snapshotId, SNAPSHOT_ID);

    await alfa.node.backup.idle();
    const final = alfa.node.backup.status.current;
    assert.strictEqual(final.status, 'complete');
    assert.strictEqual(final.filesTotal, 3);
    assert.strictEqual(final.filesTransferred, 3);
    assert.strictEqual(final.bytesTotal, 35);
    assert.strictEqual(final.bytesTransferred, 35);
    assert.strictEqual(final.error, null);
    assert.deepStrictEqual(seen, [0, 0, 33, 66, 100, 100]);
  });

  it('should leave an encrypted manifest and per-file blobs on the provider', async () => {
    await runBackup(alfa);

    const manifest = await storedManifest(base1, alfa);
    assert.strictEqual(manifest.clientCallsign, 'ALFA');
    assert.strictEqual(manifest.clientPublicKey, alfa.identity.publicKey);
    assert.strictEqual(manifest.totalFiles, 3);
    assert.strictEqual(manifest.totalBytes, 35);
    assert.deepStrictEqual(
      manifest.files.map(f => [f.relativePath, f.plaintextSize, f.encryptedSize]),
      [
        ['docs/report.md', 20, 20 + SEAL_OVERHEAD],
        ['notes.txt', 10, 10 + SEAL_OVERHEAD],
        ['z.bin', 5, 5 + SEAL_OVERHEAD],
      ],
    );

    const notes = manifest.files[1];
    const blob = await readFile(blobPath(base1, notes.encryptedBlobName));
    assert.strictEqual(blob.length, 70);
    assert.strictEqual(blob.includes(FILES['notes.txt']), false);
  });

  it('should account storage and record the snapshot on the provider', async () => {
    await runBackup(alfa);

    const client = base1.node.relationships.getClient('ALFA');
    assert.strictEqual(client?.currentStorageBytes, 35 + 3 * SEAL_OVERHEAD);
    assert.strictEqual(client?.snapshotCount, 1);
    assert.strictEqual(client?.lastBackupStatus, 'complete');
    assert.strictEqual(client?.lastBackupAt, FIXED_NOW.toISOString());

    assert.deepStrictEqual(await base1.node.relationships.getSnapshots('ALFA'), [
      {
        snapshotId: SNAPSHOT_ID,
        status: 'complete',
        totalFiles: 3,
        totalBytes: 35,
        startedAt: FIXED_NOW.toISOString(),
        completedAt: FIXED_NOW.toISOString(),
      },
    ]);
  });

  it('should schedule the next backup one interval after success', async () => {
    await runBackup(alfa);

    const provider = alfa.node.relationships.getProvider('BASE1');
    assert.strictEqual(provider?.lastSuccessfulBackup, FIXED_NOW.toISOString());
    assert.strictEqual(
      provider?.nextScheduledBackup,
      new Date(FIXED_NOW.getTime() + 3 * 24 * 60 * 60 * 1000).toISOString(),
    );
  });

  it('should run only one backup at a time', async () => {
    const first = alfa.node.backup.startBackup('BASE1');
    const second = alfa.node.backup.startBackup('BASE1');

    assert.strictEqual(first.status, 'in_progress');
    assert.strictEqual(second.status, 'in_progress');
    assert.strictEqual(second.errorCode, 'AlreadyInProgress');
    await alfa.node.backup.idle();

    const third = alfa.node.backup.startBackup('BASE1');
    assert.strictEqual(third.errorCode, null);
    await alfa.node.backup.idle();
  });

  it('should replace the manifest when backing up twice on one day', async () => {
    await runBackup(alfa);
    const first = await storedManifest(base1, alfa);
    await runBackup(alfa);
    const second = await storedManifest(base1, alfa);

    const firstBlobs = new Set(first.files.map(f => f.encryptedBlobName));
    assert.strictEqual(second.files.some(f => firstBlobs.has(f.encryptedBlobName)), false);
    assert.strictEqual((await base1.node.relationships.getSnapshots('ALFA')).length, 1);
    assert.strictEqual(base1.node.relationships.getClient('ALFA')?.currentStorageBytes, 35 + 3 * SEAL_OVERHEAD);
    await assert.rejects(access(blobPath(base1, first.files[0].encryptedBlobName)));
  });

  it('should fail fast for an unknown provider and release the gate', async () => {
    const rejected = alfa.node.backup.startBackup('NOPE');
    assert.strictEqual(rejected.status, 'failed');
    assert.strictEqual(rejected.errorCode, 'ProviderNotFound');
    assert.strictEqual(rejected.error, 'no provider relationship with NOPE');
    assert.strictEqual(alfa.node.backup.status.current.errorCode, 'ProviderNotFound');

    assert.strictEqual(alfa.node.backup.startBackup('BASE1').status, 'in_progress');
    await alfa.node.backup.idle();
  });

  it('should refuse a provider that is no longer active', async () => {
    await alfa.node.relationships.removeProvider('BASE1');
    const rejected = alfa.node.backup.startBackup('BASE1');
    assert.strictEqual(rejected.errorCode, 'ProviderNotActive');
    assert.strictEqual(rejected.error, 'provider BASE1 is terminated');
  });

  it('should fail with UploadFailed when the provider cannot be reached', async () => {
    network.setOnline('BASE1', false);
    alfa.node.backup.startBackup('BASE1');
    await alfa.node.backup.idle();

    const final = alfa.node.backup.status.current;
    assert.strictEqual(final.status, 'failed');
    assert.strictEqual(final.errorCode, 'UploadFailed');
    assert.strictEqual(final.filesTransferred, 0);
    assert.deepStrictEqual(alfa.logger.warnings, [`Could not announce snapshot ${SNAPSHOT_ID} to BASE1`]);
    assert.strictEqual(alfa.node.relationships.getProvider('BASE1')?.lastSuccessfulBackup, null);
  });
});

describe('restore', () => {
  let root: string;
  let network: MemoryNetwork;
  let alfa: TestNode;
  let base1: TestNode;

  beforeEach(async () => {
    root = await makeTmpRoot('restore');
    network = new MemoryNetwork();
    ({ alfa, base1 } = await pair(network, root));
    await runBackup(alfa);
  });

  afterEach(async () => {
    await removeTmpRoot(root);
  });

  it('should restore every file onto a new device holding the same identity', async () => {
    const device = await newDevice(network, root, alfa, base1);
    const seen: number[] = [];
    device.node.restore.status.subscribe(s => seen.push(s.progressPercent));

    device.node.restore.startRestore('BASE1', SNAPSHOT_ID);
    await device.node.restore.idle();

    const final = device.node.restore.status.current;
    assert.strictEqual(final.status, 'complete');
    assert.strictEqual(final.filesTransferred, 3);
    assert.strictEqual(final.bytesTransferred, 35);
    assert.deepStrictEqual(seen, [0, 0, 33, 66, 100, 100]);
    for (const [relativePath, content] of Object.entries(FILES)) {
      assert.strictEqual(await readFile(join(device.dataDir, relativePath), 'utf8'), content);
    }
  });

  it('should stop at a corrupted blob and keep the files before it', async () => {
    const manifest = await storedManifest(base1, alfa);
    const path = blobPath(base1, manifest.files[1].encryptedBlobName);
    const blob = await readFile(path);
    blob[40] ^= 0x01;
    await writeFile(path, blob);

    const device = await newDevice(network, root, alfa, base1);
    device.node.restore.startRestore('BASE1', SNAPSHOT_ID);
    await device.node.restore.idle();

    const final = device.node.restore.status.current;
    assert.strictEqual(final.status, 'failed');
    assert.strictEqual(final.errorCode, 'HashMismatch');
    assert.strictEqual(final.filesTransferred, 1);
    assert.strictEqual(await readFile(join(device.dataDir, 'docs/report.md'), 'utf8'), FILES['docs/report.md']);
    await assert.rejects(access(join(device.dataDir, 'notes.txt')));
    await assert.rejects(access(join(device.dataDir, 'z.bin')));
  });

  it('should detect a blob swapped for another valid one', async () => {
    const manifest = await storedManifest(base1, alfa);
    await copyFile(
      blobPath(base1, manifest.files[2].encryptedBlobName),
      blobPath(base1, manifest.files[1].encryptedBlobName),
    );

    const device = await newDevice(network, root, alfa, base1);
    device.node.restore.startRestore('BASE1', SNAPSHOT_ID);
    await device.node.restore.idle();

    const final = device.node.restore.status.current;
    assert.strictEqual(final.errorCode, 'HashMismatch');
    assert.strictEqual(final.error, 'notes.txt does not match its recorded hash');
  });

  it('should refuse manifest paths outside the data directory', async () => {
    const manifest = await storedManifest(base1, alfa);
    const evil: BackupManifest = {
      ...manifest,
      snapshotId: '2026-01-15',
      files: [{ ...manifest.files[0], relativePath: '../evil.txt' }],
    };
    await base1.node.context.snapshots.saveManifest(
      'ALFA',
      '2026-01-15',
      alfa.identity.encryptManifest(JSON.stringify(evil)),
    );

    const device = await newDevice(network, root, alfa, base1);
    device.node.restore.startRestore('BASE1', '2026-01-15');
    await device.node.restore.idle();

    assert.strictEqual(device.node.restore.status.current.errorCode, 'PathRejected');
    await assert.rejects(access(join(root, 'evil.txt')));
  });

  it('should report a missing snapshot as a manifest download failure', async () => {
    alfa.node.restore.startRestore('BASE1', '2020-01-01');
    await alfa.node.restore.idle();

    const final = alfa.node.restore.status.current;
    assert.strictEqual(final.errorCode, 'ManifestDownloadFailed');
    assert.strictEqual(final.error, 'download of /api/backup/clients/ALFA/snapshots/2020-01-01 failed with status 404');
  });

  it('should refuse an unknown provider and a second concurrent restore', async () => {
    assert.strictEqual(alfa.node.restore.startRestore('NOPE', SNAPSHOT_ID).errorCode, 'ProviderNotFound');

    const first = alfa.node.restore.startRestore('BASE1', SNAPSHOT_ID);
    const second = alfa.node.restore.startRestore('BASE1', SNAPSHOT_ID);
    assert.strictEqual(first.errorCode, null);
    assert.strictEqual(second.errorCode, 'AlreadyInProgress');
    await alfa.node.restore.idle();
    assert.strictEqual(alfa.node.restore.status.current.status, 'complete');
  });
});

describe('storage endpoint', () => {
  let root: string;
  let network: MemoryNetwork;
  let alfa: TestNode;
  let base1: TestNode;

  beforeEach(async () => {
    root = await makeTmpRoot('endpoint');
    network = new MemoryNetwork();
    ({ alfa, base1 } = await pair(network, root));
  });

  afterEach(async () => {
    await removeTmpRoot(root);
  });

  it('should list snapshots for the client itself', async () => {
    await runBackup(alfa);
    const res = await base1.node.serve('alfa', { method: 'GET', path: backupPaths.snapshots('ALFA') });
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { snapshots: await base1.node.relationships.getSnapshots('ALFA') });
  });

  it('should forbid access to another client', async () => {
    const res = await base1.node.serve('MALLORY', { method: 'GET', path: backupPaths.snapshots('ALFA') });
    assert.deepStrictEqual(res, { status: 403, body: { error: 'Forbidden' } });
  });

  it('should forbid clients that are no longer active', async () => {
    await base1.node.relationships.removeClient('ALFA');
    const res = await base1.node.serve('ALFA', { method: 'GET', path: backupPaths.snapshots('ALFA') });
    assert.deepStrictEqual(res, { status: 403, body: { error: 'No active backup relationship' } });
  });

  it('should delete a snapshot on request of its client and free the space', async () => {
    await runBackup(alfa);
    const manifest = await storedManifest(base1, alfa);

    assert.strictEqual(await alfa.node.relationships.deleteRemoteSnapshot('BASE1', SNAPSHOT_ID), true);
    const client = base1.node.relationships.getClient('ALFA');
    assert.strictEqual(client?.currentStorageBytes, 0);
    assert.strictEqual(client?.snapshotCount, 0);
    assert.deepStrictEqual(await base1.node.relationships.getSnapshots('ALFA'), []);
    await assert.rejects(access(blobPath(base1, manifest.files[0].encryptedBlobName)));

    assert.strictEqual(await alfa.node.relationships.deleteRemoteSnapshot('BASE1', SNAPSHOT_ID), false);
    assert.strictEqual(alfa.logger.warnings.at(-1), `BASE1 did not delete snapshot ${SNAPSHOT_ID}: 404`);
  });

  it('should let the provider delete a stored snapshot', async () => {
    await runBackup(alfa);

    assert.strictEqual(await base1.node.relationships.deleteSnapshot('alfa', SNAPSHOT_ID), true);
    assert.strictEqual(base1.node.relationships.getClient('ALFA')?.currentStorageBytes, 0);
    assert.strictEqual(await base1.node.relationships.deleteSnapshot('NOPE', SNAPSHOT_ID), false);
  });

  it('should not delete single blobs', async () => {
    await runBackup(alfa);
    const [entry] = (await storedManifest(base1, alfa)).files;
    const res = await base1.node.serve('ALFA', {
      method: 'DELETE',
      path: backupPaths.file('ALFA', SNAPSHOT_ID, entry.encryptedBlobName),
    });
    assert.deepStrictEqual(res, { status: 405, body: { error: 'Method not allowed' } });
  });

  it('should reject malformed paths and bodies', async () => {
    assert.deepStrictEqual(
      await base1.node.serve('ALFA', { method: 'GET', path: '/api/backup/clients/ALFA/snapshots/latest' }),
      { status: 400, body: { error: 'Invalid backup path' } },
    );
    assert.deepStrictEqual(
      await base1.node.serve('ALFA', { method: 'PUT', path: backupPaths.manifest('ALFA', SNAPSHOT_ID), body: {} }),
      { status: 400, body: { error: 'Missing data' } },
    );
    assert.deepStrictEqual(
      await base1.node.serve('ALFA', { method: 'PUT', path: backupPaths.snapshots('ALFA'), body: {} }),
      { status: 405, body: { error: 'Method not allowed' } },
    );
    assert.deepStrictEqual(
      await base1.node.serve('ALFA', { method: 'GET', path: backupPaths.manifest('ALFA', '2020-01-01') }),
      { status: 404, body: { error: 'Not found' } },
    );
  });
});
