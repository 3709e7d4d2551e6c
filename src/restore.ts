import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { sha256 } from './checksum.js';
import { RESTORE_GATE, type NodeContext } from './context.js';
import { BackupError, errorCode, errorMessage, type BackupErrorCode } from './errors.js';
import { parseManifest, type FileEntry } from './manifest.js';
import { idleStatus, normalizeCallsign, progressPercent, type TransferStatus } from './models.js';
import { StatusChannel } from './status-channel.js';
import { backupPaths, decodeTransfer, type PeerResponse } from './transport.js';
import { resolveInside } from './workspace-files.js';

/**
 * Pulls a snapshot back from a provider into the data directory.
 *
 * Files are written in manifest order as each one verifies. A failure
 * stops the run; files already written stay in place.
 */
export class RestoreExecutor {
  readonly status = new StatusChannel<TransferStatus>(idleStatus());
  private task: Promise<void> = Promise.resolve();

  constructor(private readonly ctx: NodeContext) {}

  startRestore(providerCallsign: string, snapshotId: string): TransferStatus {
    if (!this.ctx.gate.tryAcquire(RESTORE_GATE)) {
      return { ...this.status.current, error: 'a restore is already in progress', errorCode: 'AlreadyInProgress' };
    }

    const callsign = normalizeCallsign(providerCallsign);
    const initial: TransferStatus = {
      ...idleStatus(),
      peerCallsign: callsign,
      snapshotId,
      status: 'in_progress',
      startedAt: this.ctx.clock().toISOString(),
    };

    if (!this.ctx.relationships.getProvider(callsign)) {
      const failed: TransferStatus = {
        ...initial,
        status: 'failed',
        error: `no provider relationship with ${callsign}`,
        errorCode: 'ProviderNotFound',
      };
      this.status.publish(failed);
      this.ctx.gate.release(RESTORE_GATE);
      return failed;
    }

    this.status.publish(initial);
    this.task = this.run(callsign, snapshotId, initial).finally(() => this.ctx.gate.release(RESTORE_GATE));
    return initial;
  }

  idle(): Promise<void> {
    return this.task;
  }

  private async run(provider: string, snapshotId: string, initial: TransferStatus): Promise<void> {
    const { identity, logger } = this.ctx;
    let current = initial;
    const update = (patch: Partial<TransferStatus>): void => {
      current = { ...current, ...patch };
      this.status.publish(current);
    };

    try {
      if (!identity.canSign) {
        throw new BackupError('IdentityUnavailable', 'restore needs the secret key the backup was sealed with');
      }

      const sealedManifest = await this.download(
        provider,
        backupPaths.manifest(identity.callsign, snapshotId),
        'ManifestDownloadFailed',
      );
      const manifest = parseManifest(identity.decryptManifest(sealedManifest));
      update({ filesTotal: manifest.files.length, bytesTotal: manifest.totalBytes });
      logger.info(`Restoring ${manifest.files.length} files of snapshot ${snapshotId} from ${provider}`);

      let bytesTransferred = 0;
      for (const [index, entry] of manifest.files.entries()) {
        await this.restoreFile(provider, snapshotId, entry);
        bytesTransferred += entry.plaintextSize;
        update({
          filesTransferred: index + 1,
          bytesTransferred,
          progressPercent: progressPercent(index + 1, manifest.files.length),
        });
      }

      update({ status: 'complete', progressPercent: 100 });
      logger.info(`Restore of ${snapshotId} from ${provider} complete`);
    } catch (err) {
      logger.error(`Restore of ${snapshotId} from ${provider} failed: ${errorMessage(err)}`);
      update({ status: 'failed', error: errorMessage(err), errorCode: errorCode(err) ?? 'DownloadFailed' });
    }
  }

  private async restoreFile(provider: string, snapshotId: string, entry: FileEntry): Promise<void> {
    const { identity } = this.ctx;
    const target = resolveInside(this.ctx.dataDir, entry.relativePath);
    if (!target) {
      throw new BackupError('PathRejected', `refusing to write outside the data directory: ${entry.relativePath}`);
    }

    const sealed = await this.download(
      provider,
      backupPaths.file(identity.callsign, snapshotId, entry.encryptedBlobName),
      'DownloadFailed',
    );

    // An authentication failure means the blob is not the one that was stored
    let plaintext: Buffer;
    try {
      plaintext = identity.openFile(sealed);
    } catch (err) {
      throw new BackupError('HashMismatch', `${entry.relativePath} failed to decrypt: ${errorMessage(err)}`);
    }
    if (sha256(plaintext) !== entry.contentHash) {
      throw new BackupError('HashMismatch', `${entry.relativePath} does not match its recorded hash`);
    }

    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, plaintext);
  }

  private async download(provider: string, path: string, failure: BackupErrorCode): Promise<Buffer> {
    let response: PeerResponse;
    try {
      response = await this.ctx.transport.request(provider, { method: 'GET', path });
    } catch (err) {
      throw new BackupError(failure, `download of ${path} failed: ${errorMessage(err)}`);
    }
    const data = response.status === 200 ? decodeTransfer(response.body) : null;
    if (!data) {
      throw new BackupError(failure, `download of ${path} failed with status ${response.status}`);
    }
    return data;
  }
}
