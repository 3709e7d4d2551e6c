import { setTimeout as delay } from 'node:timers/promises';
import type { NodeContext } from './context.js';
import { BackupError, errorMessage } from './errors.js';
import type { SignedEvent } from './event.js';
import type { ControlMessage, MessageOf } from './messages.js';
import { backupPaths } from './transport.js';
import {
  canTransition,
  normalizeCallsign,
  type ClientRelationship,
  type DiscoveredProvider,
  type ProviderRelationship,
  type ProviderSettings,
  type RelationshipStatus,
  type Snapshot,
} from './models.js';

export const DEFAULT_INVITE_TIMEOUT_MS = 60_000;
export const DEFAULT_BACKUP_INTERVAL_DAYS = 3;

export type InviteResult =
  | { ok: true; provider: ProviderRelationship }
  | { ok: false; error: BackupError; provider?: ProviderRelationship };

type InviteResponse = MessageOf<'backup_invite_response'>;

/**
 * Relationship lifecycle for both roles: invites out to providers, invites
 * in from clients, and the status changes either side may announce.
 *
 * Records are persisted before any message acknowledging them goes out.
 * Operations on an unknown callsign do nothing and report failure.
 */
export class RelationshipService {
  private readonly waiters = new Map<string, (response: InviteResponse) => void>();

  constructor(
    private readonly ctx: NodeContext,
    private readonly inviteTimeoutMs = DEFAULT_INVITE_TIMEOUT_MS,
  ) {}

  // ── Provider settings ────────────────────────────────────────

  getSettings(): ProviderSettings {
    return this.ctx.relationships.getSettings();
  }

  async enableProviderMode(): Promise<ProviderSettings> {
    return this.updateProviderSettings({ enabled: true });
  }

  async disableProviderMode(): Promise<ProviderSettings> {
    return this.updateProviderSettings({ enabled: false });
  }

  async updateProviderSettings(changes: Partial<ProviderSettings>): Promise<ProviderSettings> {
    const next = { ...this.ctx.relationships.getSettings(), ...changes };
    await this.ctx.relationships.saveSettings(next);
    return next;
  }

  // ── Provider role ────────────────────────────────────────────

  listClients(): ClientRelationship[] {
    return this.ctx.relationships.listClients();
  }

  getClient(callsign: string): ClientRelationship | undefined {
    return this.ctx.relationships.getClient(callsign);
  }

  async acceptInvite(
    clientCallsign: string,
    maxStorageBytes?: number,
    maxSnapshots?: number,
  ): Promise<ClientRelationship | null> {
    const callsign = normalizeCallsign(clientCallsign);
    await this.ctx.relationships.refresh(callsign);
    const client = this.ctx.relationships.getClient(callsign);
    if (!client || !canTransition(client.status, 'active')) {
      this.ctx.logger.warn(`No pending invite from ${callsign} to accept`);
      return null;
    }

    const updated = await this.ctx.relationships.updateClient(callsign, c => ({
      ...c,
      status: 'active',
      maxStorageBytes: maxStorageBytes ?? c.maxStorageBytes,
      maxSnapshots: maxSnapshots ?? c.maxSnapshots,
    }));
    if (!updated) return null;

    await this.respond(callsign, true, updated);
    this.ctx.logger.info(`Accepted ${callsign} as a backup client`);
    return updated;
  }

  async declineInvite(clientCallsign: string): Promise<boolean> {
    const callsign = normalizeCallsign(clientCallsign);
    await this.ctx.relationships.refresh(callsign);
    const client = this.ctx.relationships.getClient(callsign);
    if (!client || !canTransition(client.status, 'declined')) {
      this.ctx.logger.warn(`No pending invite from ${callsign} to decline`);
      return false;
    }

    await this.ctx.relationships.updateClient(callsign, c => ({ ...c, status: 'declined' }));
    await this.respond(callsign, false);
    this.ctx.logger.info(`Declined invite from ${callsign}`);
    return true;
  }

  /**
   * Ends a client relationship and tells the client. With `erase`, the
   * record and every stored snapshot are deleted as well.
   */
  async removeClient(clientCallsign: string, erase = false): Promise<boolean> {
    const callsign = normalizeCallsign(clientCallsign);
    await this.ctx.relationships.refresh(callsign);
    const client = this.ctx.relationships.getClient(callsign);
    if (!client) return false;

    if (canTransition(client.status, 'terminated')) {
      await this.ctx.relationships.updateClient(callsign, c => ({ ...c, status: 'terminated' }));
      await this.notify(callsign, { type: 'backup_status_change', status: 'terminated' });
    }
    if (erase) await this.ctx.relationships.deleteClient(callsign);
    this.ctx.logger.info(`Removed backup client ${callsign}${erase ? ' and erased its data' : ''}`);
    return true;
  }

  async getSnapshots(clientCallsign: string): Promise<Snapshot[]> {
    if (!this.ctx.relationships.getClient(clientCallsign)) return [];
    return this.ctx.snapshots.listSnapshots(normalizeCallsign(clientCallsign));
  }

  /** Deletes one snapshot held for a client and frees its storage. */
  async deleteSnapshot(clientCallsign: string, snapshotId: string): Promise<boolean> {
    const callsign = normalizeCallsign(clientCallsign);
    if (!this.ctx.relationships.getClient(callsign)) return false;
    return this.ctx.snapshots.deleteSnapshot(callsign, snapshotId);
  }

  hasQuotaAvailable(clientCallsign: string, additionalBytes: number): boolean {
    return this.ctx.relationships.hasQuotaAvailable(clientCallsign, additionalBytes);
  }

  /** Applies the invite policy to an incoming, already verified invite. */
  async receiveInvite(from: string, event: SignedEvent): Promise<void> {
    const { relationships, logger } = this.ctx;
    const callsign = normalizeCallsign(from);
    const settings = relationships.getSettings();
    const existing = relationships.getClient(callsign);

    if (existing && existing.clientPublicKey !== event.pubkey) {
      // An answer would reach the real holder of the callsign, so none is sent.
      logger.warn(`Dropping invite from ${callsign}: signed by a different key than the existing relationship`);
      return;
    }
    if (existing?.status === 'active') {
      await this.respond(callsign, true, existing);
      return;
    }
    if (existing && (existing.status === 'declined' || existing.status === 'terminated')) {
      logger.info(`Declining repeated invite from ${callsign} (${existing.status})`);
      await this.respond(callsign, false);
      return;
    }
    if (!settings.enabled) {
      logger.info(`Declining invite from ${callsign}: provider mode is disabled`);
      await this.respond(callsign, false);
      return;
    }

    if (!existing) {
      await relationships.saveClient({
        clientPublicKey: event.pubkey,
        clientCallsign: callsign,
        maxStorageBytes: settings.defaultMaxClientStorageBytes,
        maxSnapshots: settings.defaultMaxSnapshots,
        currentStorageBytes: 0,
        snapshotCount: 0,
        status: 'pending',
        createdAt: this.ctx.clock().toISOString(),
        lastBackupAt: null,
        lastBackupStatus: null,
      });
    }

    if (settings.autoAcceptFromContacts && this.ctx.directory.isKnown(callsign)) {
      await this.acceptInvite(callsign);
    } else {
      logger.info(`Invite from ${callsign} is waiting for a decision`);
    }
  }

  // ── Client role ──────────────────────────────────────────────

  listProviders(): ProviderRelationship[] {
    return this.ctx.relationships.listProviders();
  }

  getProvider(callsign: string): ProviderRelationship | undefined {
    return this.ctx.relationships.getProvider(callsign);
  }

  /**
   * Invites a peer to hold backups for this node and waits for its answer.
   * Without an answer in time the record stays `pending`.
   */
  async sendInvite(providerCallsign: string, intervalDays = DEFAULT_BACKUP_INTERVAL_DAYS): Promise<InviteResult> {
    const { identity, relationships, transport, logger } = this.ctx;
    const callsign = normalizeCallsign(providerCallsign);
    if (!identity.canSign) {
      return { ok: false, error: new BackupError('IdentityUnavailable', 'inviting needs a secret key to sign') };
    }

    if (this.waiters.has(callsign)) {
      return this.inviteFailed(
        callsign,
        new BackupError('AlreadyInProgress', `an invite to ${callsign} is already waiting for an answer`),
      );
    }
    const existing = relationships.getProvider(callsign);
    if (existing?.status === 'declined' || existing?.status === 'terminated') {
      return this.inviteFailed(
        callsign,
        new BackupError('InvalidTransition', `the relationship with ${callsign} is ${existing.status}`),
      );
    }

    // Claimed before the first await so a second invite sees it.
    const answered = new Promise<InviteResponse>(resolve => this.waiters.set(callsign, resolve));
    const timer = new AbortController();
    try {
      if (existing) {
        await relationships.updateProvider(callsign, p => ({ ...p, backupIntervalDays: intervalDays }));
      } else {
        await relationships.saveProvider({
          providerPublicKey: '',
          providerCallsign: callsign,
          backupIntervalDays: intervalDays,
          status: 'pending',
          maxStorageBytes: 0,
          maxSnapshots: 0,
          createdAt: this.ctx.clock().toISOString(),
          lastSuccessfulBackup: null,
          nextScheduledBackup: null,
        });
      }

      const event = identity.sign(
        {
          tags: [
            ['action', 'backup_invite'],
            ['target', callsign],
            ['callsign', identity.callsign],
            ['interval_days', String(intervalDays)],
          ],
          content: '',
        },
        this.ctx.clock(),
      );

      if (!(await transport.send(callsign, { type: 'backup_invite', event }))) {
        return this.inviteFailed(callsign, new BackupError('Timeout', `${callsign} could not be reached`));
      }
      logger.info(`Invited ${callsign} to hold backups`);

      const response = await Promise.race([
        answered,
        delay(this.inviteTimeoutMs, null, { signal: timer.signal }),
      ]);
      if (!response) {
        return this.inviteFailed(callsign, new BackupError('Timeout', `no answer from ${callsign}`));
      }

      const provider = relationships.getProvider(callsign);
      if (response.accepted && provider?.status === 'active') return { ok: true, provider };
      return this.inviteFailed(callsign, new BackupError('ProviderNotActive', `${callsign} declined the invite`));
    } finally {
      timer.abort();
      this.waiters.delete(callsign);
    }
  }

  /** Records the provider's answer and wakes a waiting `sendInvite`. */
  async receiveInviteResponse(from: string, response: InviteResponse): Promise<void> {
    const callsign = normalizeCallsign(from);
    const provider = this.ctx.relationships.getProvider(callsign);
    if (!provider) {
      this.ctx.logger.warn(`Ignoring invite response from ${callsign}: no invite was sent`);
      return;
    }

    if (response.accepted && (provider.status === 'active' || canTransition(provider.status, 'active'))) {
      await this.ctx.relationships.updateProvider(callsign, p => ({
        ...p,
        status: 'active',
        providerPublicKey: response.provider_npub,
        maxStorageBytes: response.max_storage_bytes,
        maxSnapshots: response.max_snapshots,
      }));
      this.ctx.logger.info(`${callsign} accepted the backup invite`);
    } else if (!response.accepted && canTransition(provider.status, 'declined')) {
      await this.ctx.relationships.updateProvider(callsign, p => ({ ...p, status: 'declined' }));
      this.ctx.logger.info(`${callsign} declined the backup invite`);
    } else {
      this.ctx.logger.warn(`Ignoring invite response from ${callsign} in status ${provider.status}`);
    }

    this.waiters.get(callsign)?.(response);
  }

  /** Asks an active provider to delete one of this node's snapshots. */
  async deleteRemoteSnapshot(providerCallsign: string, snapshotId: string): Promise<boolean> {
    const { relationships, transport, identity, logger } = this.ctx;
    const callsign = normalizeCallsign(providerCallsign);
    if (relationships.getProvider(callsign)?.status !== 'active') {
      logger.warn(`Cannot delete snapshot ${snapshotId}: ${callsign} is not an active provider`);
      return false;
    }

    try {
      const res = await transport.request(callsign, {
        method: 'DELETE',
        path: backupPaths.manifest(identity.callsign, snapshotId),
      });
      if (res.status !== 200) {
        logger.warn(`${callsign} did not delete snapshot ${snapshotId}: ${res.status}`);
        return false;
      }
    } catch (err) {
      logger.warn(`Deleting snapshot ${snapshotId} on ${callsign} failed: ${errorMessage(err)}`);
      return false;
    }
    logger.info(`Deleted snapshot ${snapshotId} on ${callsign}`);
    return true;
  }

  async removeProvider(providerCallsign: string): Promise<boolean> {
    const callsign = normalizeCallsign(providerCallsign);
    await this.ctx.relationships.refresh(callsign);
    const provider = this.ctx.relationships.getProvider(callsign);
    if (!provider) return false;
    if (canTransition(provider.status, 'terminated')) {
      await this.ctx.relationships.updateProvider(callsign, p => ({ ...p, status: 'terminated' }));
      await this.notify(callsign, { type: 'backup_status_change', status: 'terminated' });
    }
    this.ctx.logger.info(`Removed backup provider ${callsign}`);
    return true;
  }

  /**
   * Records a provider found by discovery as active, so a fresh device
   * holding the same identity can restore from it.
   */
  async adoptProvider(found: DiscoveredProvider): Promise<ProviderRelationship> {
    const { relationships } = this.ctx;
    const callsign = normalizeCallsign(found.callsign);
    const existing = relationships.getProvider(callsign);
    if (existing?.status === 'active') return existing;

    const record: ProviderRelationship = {
      providerPublicKey: found.publicKey,
      providerCallsign: callsign,
      backupIntervalDays: existing?.backupIntervalDays ?? DEFAULT_BACKUP_INTERVAL_DAYS,
      status: 'active',
      maxStorageBytes: found.maxStorageBytes,
      maxSnapshots: existing?.maxSnapshots ?? 0,
      createdAt: this.ctx.clock().toISOString(),
      lastSuccessfulBackup: null,
      nextScheduledBackup: null,
    };
    await relationships.saveProvider(record);
    this.ctx.logger.info(`Adopted ${callsign} as backup provider`);
    return record;
  }

  // ── Both roles ───────────────────────────────────────────────

  /**
   * Applies a peer's announced status to whichever of our records with it
   * allow the transition. A peer may only end a relationship; acceptance
   * and refusal arrive as signed invite traffic.
   */
  async applyStatusChange(from: string, status: RelationshipStatus): Promise<boolean> {
    const { relationships, logger } = this.ctx;
    const callsign = normalizeCallsign(from);
    if (status !== 'terminated') {
      logger.warn(`Ignoring status change to ${status} from ${callsign}: peers may only announce terminated`);
      return false;
    }
    let applied = false;

    const client = relationships.getClient(callsign);
    if (client && canTransition(client.status, status)) {
      await relationships.updateClient(callsign, c => ({ ...c, status }));
      applied = true;
    }
    const provider = relationships.getProvider(callsign);
    if (provider && canTransition(provider.status, status)) {
      await relationships.updateProvider(callsign, p => ({ ...p, status }));
      applied = true;
    }

    if (applied) {
      logger.info(`${callsign} changed our relationship to ${status}`);
    } else {
      logger.warn(`Ignoring status change to ${status} from ${callsign}: no relationship allows it`);
    }
    return applied;
  }

  private inviteFailed(callsign: string, error: BackupError): InviteResult {
    this.ctx.logger.warn(`Invite to ${callsign}: ${error.message}`);
    const provider = this.ctx.relationships.getProvider(callsign);
    return provider ? { ok: false, error, provider } : { ok: false, error };
  }

  private async respond(callsign: string, accepted: boolean, client?: ClientRelationship): Promise<void> {
    await this.notify(callsign, {
      type: 'backup_invite_response',
      accepted,
      provider_npub: this.ctx.identity.publicKey,
      max_storage_bytes: accepted && client ? client.maxStorageBytes : 0,
      max_snapshots: accepted && client ? client.maxSnapshots : 0,
    });
  }

  private async notify(callsign: string, message: ControlMessage): Promise<void> {
    try {
      if (!(await this.ctx.transport.send(callsign, message))) {
        this.ctx.logger.warn(`Could not deliver ${message.type} to ${callsign}`);
      }
    } catch (err) {
      this.ctx.logger.warn(`Could not deliver ${message.type} to ${callsign}: ${errorMessage(err)}`);
    }
  }
}
