import { readFile } from 'node:fs/promises';
import { newBlobName, sha256, snapshotIdFor } from './checksum.js';
import { BACKUP_GATE, type NodeContext } from './context.js';
import { BackupError, errorCode, errorMessage } from './errors.js';
import type { BackupManifest, FileEntry } from './manifest.js';
import {
  idleStatus,
  normalizeCallsign,
  progressPercent,
  type ProviderRelationship,
  type TransferStatus,
} from './models.js';
import { StatusChannel } from './status-channel.js';
import { backupPaths, encodeTransfer } from './transport.js';
import { enumerateBackupFiles } from './workspace-files.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Runs one backup of the data directory to an active provider.
 *
 * `startBackup` returns at once; the run continues as a detached task and
 * reports through `status`. Every file is sealed to this node's own key
 * before it leaves, so the provider only ever holds ciphertext.
 */
export class BackupExecutor {
  readonly status = new StatusChannel<TransferStatus>(idleStatus());
  private task: Promise<void> = Promise.resolve();

  constructor(
    private readonly ctx: NodeContext,
    private readonly exclude: readonly string[] = [],
  ) {}

  startBackup(providerCallsign: string): TransferStatus {
    if (!this.ctx.gate.tryAcquire(BACKUP_GATE)) {
      return { ...this.status.current, error: 'a backup is already in progress', errorCode: 'AlreadyInProgress' };
    }

    const callsign = normalizeCallsign(providerCallsign);
    const now = this.ctx.clock();
    const initial: TransferStatus = {
      ...idleStatus(),
      peerCallsign: callsign,
      snapshotId: snapshotIdFor(now),
      status: 'in_progress',
      startedAt: now.toISOString(),
    };

    const provider = this.ctx.relationships.getProvider(callsign);
    if (!provider) {
      return this.reject(initial, new BackupError('ProviderNotFound', `no provider relationship with ${callsign}`));
    }
    if (provider.status !== 'active') {
      return this.reject(initial, new BackupError('ProviderNotActive', `provider ${callsign} is ${provider.status}`));
    }

    this.status.publish(initial);
    this.task = this.run(provider, initial).finally(() => this.ctx.gate.release(BACKUP_GATE));
    return initial;
  }

  /** Resolves once the current run (if any) has finished. */
  idle(): Promise<void> {
    return this.task;
  }

  private reject(initial: TransferStatus, err: BackupError): TransferStatus {
    const failed: TransferStatus = { ...initial, status: 'failed', error: err.message, errorCode: err.code };
    this.status.publish(failed);
    this.ctx.gate.release(BACKUP_GATE);
    return failed;
  }

  private async run(provider: ProviderRelationship, initial: TransferStatus): Promise<void> {
    const { identity, transport, logger } = this.ctx;
    const target = provider.providerCallsign;
    const snapshotId = initial.snapshotId ?? snapshotIdFor(this.ctx.clock());
    let current = initial;
    const update = (patch: Partial<TransferStatus>): void => {
      current = { ...current, ...patch };
      this.status.publish(current);
    };

    try {
      if (!identity.canSign) {
        throw new BackupError('IdentityUnavailable', 'backup needs a secret key to seal files');
      }

      const files = await enumerateBackupFiles(this.ctx.dataDir, this.exclude);
      update({ filesTotal: files.length, bytesTotal: files.reduce((sum, f) => sum + f.size, 0) });
      logger.info(`Backing up ${files.length} files to ${target} as snapshot ${snapshotId}`);

      if (!(await transport.send(target, { type: 'backup_start', snapshot_id: snapshotId }))) {
        logger.warn(`Could not announce snapshot ${snapshotId} to ${target}`);
      }

      const entries: FileEntry[] = [];
      let bytesTransferred = 0;
      for (const file of files) {
        const plaintext = await readFile(file.absolutePath);
        const sealed = identity.sealFile(plaintext);
        const blobName = newBlobName();
        await this.upload(target, backupPaths.file(identity.callsign, snapshotId, blobName), sealed);

        entries.push({
          relativePath: file.relativePath,
          contentHash: sha256(plaintext),
          plaintextSize: plaintext.length,
          encryptedSize: sealed.length,
          encryptedBlobName: blobName,
          modifiedAt: file.modifiedAt.toISOString(),
        });
        bytesTransferred += plaintext.length;
        update({
          filesTransferred: entries.length,
          bytesTransferred,
          progressPercent: progressPercent(entries.length, files.length),
        });
      }

      const completedAt = this.ctx.clock();
      const manifest: BackupManifest = {
        version: '1.0',
        snapshotId,
        clientPublicKey: identity.publicKey,
        clientCallsign: identity.callsign,
        files: entries,
        totalFiles: entries.length,
        totalBytes: bytesTransferred,
        startedAt: initial.startedAt ?? completedAt.toISOString(),
        completedAt: completedAt.toISOString(),
      };
      await this.upload(
        target,
        backupPaths.manifest(identity.callsign, snapshotId),
        identity.encryptManifest(JSON.stringify(manifest)),
      );

      if (
        !(await transport.send(target, {
          type: 'backup_complete',
          snapshot_id: snapshotId,
          total_files: manifest.totalFiles,
          total_bytes: manifest.totalBytes,
        }))
      ) {
        logger.warn(`Could not report completion of ${snapshotId} to ${target}`);
      }

      await this.ctx.relationships.updateProvider(target, p => ({
        ...p,
        lastSuccessfulBackup: manifest.completedAt,
        nextScheduledBackup: new Date(completedAt.getTime() + p.backupIntervalDays * DAY_MS).toISOString(),
      }));

      update({ status: 'complete', progressPercent: 100 });
      logger.info(`Backup ${snapshotId} to ${target} complete: ${manifest.totalFiles} files, ${manifest.totalBytes} bytes`);
    } catch (err) {
      logger.error(`Backup ${snapshotId} to ${target} failed: ${errorMessage(err)}`);
      update({ status: 'failed', error: errorMessage(err), errorCode: errorCode(err) ?? 'UploadFailed' });
    }
  }

  private async upload(target: string, path: string, data: Buffer): Promise<void> {
    let status: number;
    try {
      ({ status } = await this.ctx.transport.request(target, { method: 'PUT', path, body: encodeTransfer(data) }));
    } catch (err) {
      throw new BackupError('UploadFailed', `upload to ${path} failed: ${errorMessage(err)}`);
    }
    if (status !== 200) {
      throw new BackupError('UploadFailed', `upload to ${path} failed with status ${status}`);
    }
  }
}
