import type { NodeContext } from './context.js';
import type { DiscoveryCoordinator } from './discovery.js';
import { errorMessage } from './errors.js';
import { FRESHNESS_WINDOW_SECONDS, getTag, isFresh, type SignedEvent } from './event.js';
import { verifyEvent } from './identity.js';
import { isSigned, parseControlMessage, type ControlMessage, type MessageOf } from './messages.js';
import { normalizeCallsign, type Snapshot } from './models.js';
import type { RelationshipService } from './relationships.js';

function assertNever(value: never): never {
  throw new Error(`unhandled message ${JSON.stringify(value)}`);
}

/**
 * Entry point for every inbound control message. Messages that fail to
 * parse or verify are dropped with a warning; `handle` never rejects.
 */
export class ProtocolRouter {
  constructor(
    private readonly ctx: NodeContext,
    private readonly relationships: RelationshipService,
    private readonly discovery: DiscoveryCoordinator,
    private readonly freshnessWindowSeconds = FRESHNESS_WINDOW_SECONDS,
  ) {}

  async handle(from: string, raw: unknown): Promise<void> {
    const { logger } = this.ctx;
    const sender = normalizeCallsign(from);
    const message = parseControlMessage(raw);
    if (!message) {
      logger.warn(`Dropping malformed message from ${sender}`);
      return;
    }
    if (isSigned(message) && !this.verify(sender, message.type, message.event)) return;

    try {
      await this.dispatch(sender, message);
    } catch (err) {
      logger.error(`Handling ${message.type} from ${sender} failed: ${errorMessage(err)}`);
    }
  }

  private verify(sender: string, type: string, event: SignedEvent): boolean {
    if (!verifyEvent(event)) {
      this.ctx.logger.warn(`Dropping ${type} from ${sender}: invalid signature`);
      return false;
    }
    if (!isFresh(event, this.ctx.clock(), this.freshnessWindowSeconds)) {
      this.ctx.logger.warn(`Dropping ${type} from ${sender}: event is stale`);
      return false;
    }
    return true;
  }

  private async dispatch(from: string, message: ControlMessage): Promise<void> {
    switch (message.type) {
      case 'backup_invite': {
        const target = getTag(message.event, 'target');
        if (target !== undefined && normalizeCallsign(target) !== this.ctx.identity.callsign) {
          this.ctx.logger.warn(`Dropping invite from ${from} addressed to ${target}`);
          return;
        }
        const signedCallsign = getTag(message.event, 'callsign');
        if (signedCallsign === undefined || normalizeCallsign(signedCallsign) !== from) {
          this.ctx.logger.warn(`Dropping invite from ${from}: signed callsign ${signedCallsign ?? '(none)'} does not match`);
          return;
        }
        return this.relationships.receiveInvite(from, message.event);
      }
      case 'backup_invite_response':
        return this.relationships.receiveInviteResponse(from, message);
      case 'backup_start':
        return this.recordSnapshot(
          from,
          message.snapshot_id,
          () => ({
            snapshotId: message.snapshot_id,
            status: 'in_progress',
            totalFiles: 0,
            totalBytes: 0,
            startedAt: this.ctx.clock().toISOString(),
            completedAt: null,
          }),
          true,
        );
      case 'backup_complete':
        return this.recordSnapshot(from, message.snapshot_id, current => ({
          snapshotId: message.snapshot_id,
          status: 'complete',
          totalFiles: message.total_files,
          totalBytes: message.total_bytes,
          startedAt: current?.startedAt ?? null,
          completedAt: this.ctx.clock().toISOString(),
        }));
      case 'backup_discovery_challenge':
        return this.answerChallenge(from, message);
      case 'backup_discovery_response':
        this.discovery.handleResponse(from, message);
        return;
      case 'backup_status_change':
        await this.relationships.applyStatusChange(from, message.status);
        return;
      default:
        return assertNever(message);
    }
  }

  private async recordSnapshot(
    client: string,
    snapshotId: string,
    build: (current: Snapshot | null) => Snapshot,
    replace = false,
  ): Promise<void> {
    const { relationships, snapshots, logger } = this.ctx;
    if (relationships.getClient(client)?.status !== 'active') {
      logger.warn(`Ignoring snapshot ${snapshotId} report from ${client}: not an active client`);
      return;
    }
    // A rerun on the same day starts from an empty snapshot directory.
    if (replace) await snapshots.deleteSnapshot(client, snapshotId);
    const current = replace ? null : await snapshots.getSnapshot(client, snapshotId);
    const next = build(current);
    await snapshots.updateSnapshotStatus(client, next);
    logger.info(`Snapshot ${snapshotId} from ${client} is ${next.status}`);
  }

  /**
   * Every challenge is answered. Detail fields are filled in only when the
   * challenger's key has an active client relationship here.
   */
  private async answerChallenge(from: string, message: MessageOf<'backup_discovery_challenge'>): Promise<void> {
    const { identity, relationships, snapshots, transport, logger } = this.ctx;
    if (!identity.canSign) {
      logger.warn(`Cannot answer discovery from ${from} without a secret key`);
      return;
    }

    const challenge = getTag(message.event, 'challenge') ?? '';
    const client = relationships.findActiveClientByPublicKey(message.event.pubkey);
    const hasBackups = client !== undefined;

    const event = identity.sign(
      {
        tags: [
          ['action', 'discovery_response'],
          ['challenge', challenge],
          ['has_backups', String(hasBackups)],
        ],
        content: '',
      },
      this.ctx.clock(),
    );

    const response: MessageOf<'backup_discovery_response'> = {
      type: 'backup_discovery_response',
      event,
      discovery_id: message.discovery_id,
      has_backups: hasBackups,
    };
    if (client) {
      const [latest] = await snapshots.listSnapshots(client.clientCallsign);
      response.max_storage_bytes = client.maxStorageBytes;
      response.snapshot_count = client.snapshotCount;
      if (latest) response.latest_snapshot = latest.snapshotId;
    }

    if (!(await transport.send(from, response))) {
      logger.warn(`Could not deliver discovery response to ${from}`);
    }
  }
}
