import { setTimeout as delay } from 'node:timers/promises';
import { randomHex } from './checksum.js';
import type { NodeContext } from './context.js';
import { BackupError, errorMessage } from './errors.js';
import { getTag } from './event.js';
import type { MessageOf } from './messages.js';
import { normalizeCallsign, type DiscoveryStatus } from './models.js';

/** Completed runs kept for status queries; older ones are forgotten. */
export const MAX_FINISHED_RUNS = 32;

interface DiscoveryRun {
  status: DiscoveryStatus;
  challenge: string;
  responders: Set<string>;
}

function snapshotOf(status: DiscoveryStatus): DiscoveryStatus {
  return { ...status, providersFound: status.providersFound.map(p => ({ ...p })) };
}

/**
 * Asks every online peer whether it holds backups for this identity.
 *
 * Each run carries a fresh random challenge; only responses that echo it
 * in their signed tags count. A run is frozen once its timeout elapses.
 */
export class DiscoveryCoordinator {
  private readonly runs = new Map<string, DiscoveryRun>();
  private readonly completions = new Map<string, Promise<DiscoveryStatus>>();
  private readonly finished: string[] = [];

  constructor(private readonly ctx: NodeContext) {}

  /** Starts a run and returns its id without waiting for answers. */
  startDiscovery(timeoutSeconds: number): string {
    if (!this.ctx.identity.canSign) {
      throw new BackupError('IdentityUnavailable', 'discovery needs a secret key to sign the challenge');
    }

    const discoveryId = randomHex(16);
    const run: DiscoveryRun = {
      status: {
        discoveryId,
        status: 'in_progress',
        devicesToQuery: 0,
        devicesQueried: 0,
        devicesResponded: 0,
        providersFound: [],
      },
      challenge: randomHex(32),
      responders: new Set(),
    };
    this.runs.set(discoveryId, run);
    this.completions.set(discoveryId, this.run(run, timeoutSeconds));
    return discoveryId;
  }

  getDiscoveryStatus(discoveryId: string): DiscoveryStatus | null {
    const run = this.runs.get(discoveryId);
    return run ? snapshotOf(run.status) : null;
  }

  /** Resolves with the final status once the run's timeout has elapsed. */
  async whenComplete(discoveryId: string): Promise<DiscoveryStatus | null> {
    return (await this.completions.get(discoveryId)) ?? null;
  }

  handleResponse(from: string, message: MessageOf<'backup_discovery_response'>): void {
    const { logger } = this.ctx;
    const run = this.runs.get(message.discovery_id);
    if (!run) {
      logger.warn(`Ignoring discovery response from ${from} for unknown run ${message.discovery_id}`);
      return;
    }
    if (run.status.status === 'complete') {
      logger.warn(`Ignoring late discovery response from ${from}`);
      return;
    }
    if (getTag(message.event, 'challenge') !== run.challenge) {
      logger.warn(`Ignoring discovery response from ${from}: challenge mismatch`);
      return;
    }

    const callsign = normalizeCallsign(from);
    if (run.responders.has(callsign)) return;
    run.responders.add(callsign);
    run.status.devicesResponded++;

    if (message.has_backups) {
      run.status.providersFound.push({
        callsign,
        publicKey: message.event.pubkey,
        maxStorageBytes: message.max_storage_bytes ?? 0,
        snapshotCount: message.snapshot_count ?? 0,
        latestSnapshotId: message.latest_snapshot ?? null,
      });
      logger.info(`Discovery ${run.status.discoveryId}: ${callsign} holds backups`);
    }
  }

  private async run(run: DiscoveryRun, timeoutSeconds: number): Promise<DiscoveryStatus> {
    const { identity, transport, directory, logger } = this.ctx;
    try {
      const peers = (await directory.list()).filter(
        p => p.online && normalizeCallsign(p.callsign) !== identity.callsign,
      );
      run.status.devicesToQuery = peers.length;
      logger.info(`Discovery ${run.status.discoveryId}: querying ${peers.length} peers`);

      await Promise.all(
        peers.map(async peer => {
          const event = identity.sign(
            {
              tags: [
                ['action', 'discovery_query'],
                ['target', identity.publicKey],
                ['challenge', run.challenge],
                ['callsign', identity.callsign],
                ['target_callsign', normalizeCallsign(peer.callsign)],
              ],
              content: '',
            },
            this.ctx.clock(),
          );
          try {
            const sent = await transport.send(peer.callsign, {
              type: 'backup_discovery_challenge',
              event,
              discovery_id: run.status.discoveryId,
            });
            if (sent) run.status.devicesQueried++;
          } catch (err) {
            logger.warn(`Discovery challenge to ${peer.callsign} failed: ${errorMessage(err)}`);
          }
        }),
      );

      await delay(timeoutSeconds * 1000);
    } catch (err) {
      logger.error(`Discovery ${run.status.discoveryId} failed: ${errorMessage(err)}`);
    }

    run.status.status = 'complete';
    this.forgetOldRuns(run.status.discoveryId);
    logger.info(
      `Discovery ${run.status.discoveryId} complete: ${run.status.devicesResponded} responded, ` +
        `${run.status.providersFound.length} providers`,
    );
    return snapshotOf(run.status);
  }

  private forgetOldRuns(completedId: string): void {
    this.finished.push(completedId);
    while (this.finished.length > MAX_FINISHED_RUNS) {
      const oldest = this.finished.shift();
      if (oldest === undefined) break;
      this.runs.delete(oldest);
      this.completions.delete(oldest);
    }
  }
}
