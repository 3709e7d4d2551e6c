import { readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { isSnapshotId } from './checksum.js';
import { readFileOrNull, readJson, writeBytes, writeJson } from './fs-json.js';
import { KeyedLock } from './lock.js';
import type { Logger } from './log.js';
import {
  ClientRelationshipSchema,
  DEFAULT_PROVIDER_SETTINGS,
  ProviderRelationshipSchema,
  ProviderSettingsSchema,
  SnapshotSchema,
  normalizeCallsign,
  type ClientRelationship,
  type ProviderRelationship,
  type ProviderSettings,
  type Snapshot,
} from './models.js';

export const BACKUPS_DIR = 'backups';
export const BACKUP_CONFIG_DIR = 'backup-config';

async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries.filter(e => e.isDirectory()).map(e => e.name);
  } catch {
    return [];
  }
}

/** Total size of the regular files directly inside a directory. */
async function filesSize(dirPath: string): Promise<number> {
  let total = 0;
  try {
    for (const entry of await readdir(dirPath, { withFileTypes: true })) {
      if (entry.isFile()) total += (await stat(join(dirPath, entry.name))).size;
    }
  } catch {
    return total;
  }
  return total;
}

function cache<T>(index: Map<string, T>, key: string, record: T | null): void {
  if (record) index.set(key, record);
  else index.delete(key);
}

/**
 * Durable relationship records for both roles plus the provider settings.
 *
 * The files on disk are the source of truth: another process on the same
 * data directory (the CLI next to `serve`) may change them, so updates
 * re-read the record inside the per-record lock and `refresh` re-reads the
 * records of one peer. Every write reaches disk before the in-memory index
 * changes.
 */
export class RelationshipStore {
  private settings: ProviderSettings = { ...DEFAULT_PROVIDER_SETTINGS };
  private readonly clients = new Map<string, ClientRelationship>();
  private readonly providers = new Map<string, ProviderRelationship>();
  private readonly lock = new KeyedLock();

  constructor(
    private readonly dataDir: string,
    private readonly logger: Logger = console,
  ) {}

  private get settingsPath(): string {
    return join(this.dataDir, BACKUPS_DIR, 'settings.json');
  }

  clientDir(callsign: string): string {
    return join(this.dataDir, BACKUPS_DIR, normalizeCallsign(callsign));
  }

  private providerConfigPath(callsign: string): string {
    return join(this.dataDir, BACKUP_CONFIG_DIR, 'providers', normalizeCallsign(callsign), 'config.json');
  }

  private readClient(callsign: string): Promise<ClientRelationship | null> {
    return readJson(join(this.clientDir(callsign), 'config.json'), ClientRelationshipSchema, this.logger);
  }

  private readProvider(callsign: string): Promise<ProviderRelationship | null> {
    return readJson(this.providerConfigPath(callsign), ProviderRelationshipSchema, this.logger);
  }

  async load(): Promise<void> {
    await this.refreshSettings();

    this.clients.clear();
    for (const name of await listDirectories(join(this.dataDir, BACKUPS_DIR))) {
      const record = await this.readClient(name);
      if (record) this.clients.set(normalizeCallsign(record.clientCallsign), record);
    }

    this.providers.clear();
    for (const name of await listDirectories(join(this.dataDir, BACKUP_CONFIG_DIR, 'providers'))) {
      const record = await this.readProvider(name);
      if (record) this.providers.set(normalizeCallsign(record.providerCallsign), record);
    }
  }

  /** Re-reads the settings and both records held for one peer. */
  async refresh(callsign: string): Promise<void> {
    const key = normalizeCallsign(callsign);
    await this.refreshSettings();
    await this.lock.run(`client:${key}`, async () => cache(this.clients, key, await this.readClient(key)));
    await this.lock.run(`provider:${key}`, async () => cache(this.providers, key, await this.readProvider(key)));
  }

  private async refreshSettings(): Promise<void> {
    const stored = await readJson(this.settingsPath, ProviderSettingsSchema, this.logger);
    this.settings = stored ?? { ...DEFAULT_PROVIDER_SETTINGS };
  }

  // ── Provider settings ────────────────────────────────────────

  getSettings(): ProviderSettings {
    return { ...this.settings };
  }

  async saveSettings(settings: ProviderSettings): Promise<void> {
    await writeJson(this.settingsPath, settings);
    this.settings = { ...settings };
  }

  // ── Client relationships (provider role) ─────────────────────

  listClients(): ClientRelationship[] {
    return [...this.clients.values()].sort((a, b) => a.clientCallsign.localeCompare(b.clientCallsign));
  }

  getClient(callsign: string): ClientRelationship | undefined {
    return this.clients.get(normalizeCallsign(callsign));
  }

  findActiveClientByPublicKey(publicKey: string): ClientRelationship | undefined {
    return this.listClients().find(c => c.clientPublicKey === publicKey && c.status === 'active');
  }

  async saveClient(record: ClientRelationship): Promise<void> {
    const key = normalizeCallsign(record.clientCallsign);
    await this.lock.run(`client:${key}`, () => this.writeClient(record));
  }

  /** Read-modify-write of one client record; null when it does not exist. */
  async updateClient(
    callsign: string,
    change: (current: ClientRelationship) => ClientRelationship,
  ): Promise<ClientRelationship | null> {
    const key = normalizeCallsign(callsign);
    return this.lock.run(`client:${key}`, async () => {
      const current = await this.readClient(key);
      cache(this.clients, key, current);
      if (!current) return null;
      const next = change(current);
      await this.writeClient(next);
      return next;
    });
  }

  /** Removes the record together with all of the client's stored data. */
  async deleteClient(callsign: string): Promise<void> {
    const key = normalizeCallsign(callsign);
    await this.lock.run(`client:${key}`, async () => {
      await rm(this.clientDir(key), { recursive: true, force: true });
      this.clients.delete(key);
    });
  }

  hasQuotaAvailable(callsign: string, additionalBytes: number): boolean {
    const client = this.getClient(callsign);
    if (!client) return false;
    return client.currentStorageBytes + additionalBytes <= client.maxStorageBytes;
  }

  private async writeClient(record: ClientRelationship): Promise<void> {
    const normalized = { ...record, clientCallsign: normalizeCallsign(record.clientCallsign) };
    await writeJson(join(this.clientDir(normalized.clientCallsign), 'config.json'), normalized);
    this.clients.set(normalized.clientCallsign, normalized);
  }

  // ── Provider relationships (client role) ─────────────────────

  listProviders(): ProviderRelationship[] {
    return [...this.providers.values()].sort((a, b) => a.providerCallsign.localeCompare(b.providerCallsign));
  }

  getProvider(callsign: string): ProviderRelationship | undefined {
    return this.providers.get(normalizeCallsign(callsign));
  }

  async saveProvider(record: ProviderRelationship): Promise<void> {
    const key = normalizeCallsign(record.providerCallsign);
    await this.lock.run(`provider:${key}`, () => this.writeProvider(record));
  }

  async updateProvider(
    callsign: string,
    change: (current: ProviderRelationship) => ProviderRelationship,
  ): Promise<ProviderRelationship | null> {
    const key = normalizeCallsign(callsign);
    return this.lock.run(`provider:${key}`, async () => {
      const current = await this.readProvider(key);
      cache(this.providers, key, current);
      if (!current) return null;
      const next = change(current);
      await this.writeProvider(next);
      return next;
    });
  }

  private async writeProvider(record: ProviderRelationship): Promise<void> {
    const normalized = { ...record, providerCallsign: normalizeCallsign(record.providerCallsign) };
    await writeJson(this.providerConfigPath(normalized.providerCallsign), normalized);
    this.providers.set(normalized.providerCallsign, normalized);
  }
}

/**
 * Provider-side storage of client snapshots: encrypted manifests, status
 * records and opaque blobs, with per-client storage accounting.
 */
export class SnapshotStore {
  constructor(
    private readonly relationships: RelationshipStore,
    private readonly logger: Logger = console,
  ) {}

  private snapshotDir(client: string, snapshotId: string): string {
    return join(this.relationships.clientDir(client), snapshotId);
  }

  /** Newest first. */
  async listSnapshots(client: string): Promise<Snapshot[]> {
    const snapshots: Snapshot[] = [];
    for (const name of await listDirectories(this.relationships.clientDir(client))) {
      if (!isSnapshotId(name)) continue;
      const snapshot = await readJson(join(this.snapshotDir(client, name), 'status.json'), SnapshotSchema, this.logger);
      if (snapshot) snapshots.push(snapshot);
    }
    return snapshots.sort((a, b) => b.snapshotId.localeCompare(a.snapshotId));
  }

  async getSnapshot(client: string, snapshotId: string): Promise<Snapshot | null> {
    return readJson(join(this.snapshotDir(client, snapshotId), 'status.json'), SnapshotSchema, this.logger);
  }

  async readManifest(client: string, snapshotId: string): Promise<Buffer | null> {
    return readFileOrNull(join(this.snapshotDir(client, snapshotId), 'manifest.json'));
  }

  async saveManifest(client: string, snapshotId: string, data: Buffer): Promise<void> {
    await writeBytes(join(this.snapshotDir(client, snapshotId), 'manifest.json'), data);
  }

  async readBlob(client: string, snapshotId: string, blobName: string): Promise<Buffer | null> {
    return readFileOrNull(join(this.snapshotDir(client, snapshotId), 'files', blobName));
  }

  /** Stores a blob and adds its size to the client's storage count. */
  async saveBlob(client: string, snapshotId: string, blobName: string, data: Buffer): Promise<void> {
    await writeBytes(join(this.snapshotDir(client, snapshotId), 'files', blobName), data);
    await this.relationships.updateClient(client, current => ({
      ...current,
      currentStorageBytes: current.currentStorageBytes + data.length,
    }));
  }

  async updateSnapshotStatus(client: string, snapshot: Snapshot): Promise<void> {
    await writeJson(join(this.snapshotDir(client, snapshot.snapshotId), 'status.json'), snapshot);
    const snapshots = await this.listSnapshots(client);
    await this.relationships.updateClient(client, current => ({
      ...current,
      snapshotCount: snapshots.length,
      lastBackupAt: snapshot.completedAt ?? snapshot.startedAt,
      lastBackupStatus: snapshot.status,
    }));
  }

  /**
   * Removes one snapshot with its manifest and blobs, and gives the space
   * back to the client's storage count. False when there is no such snapshot.
   */
  async deleteSnapshot(client: string, snapshotId: string): Promise<boolean> {
    const snapshots = await listDirectories(this.relationships.clientDir(client));
    if (!isSnapshotId(snapshotId) || !snapshots.includes(snapshotId)) return false;

    const dir = this.snapshotDir(client, snapshotId);
    const freed = await filesSize(join(dir, 'files'));
    await rm(dir, { recursive: true, force: true });
    const remaining = await this.listSnapshots(client);
    await this.relationships.updateClient(client, current => ({
      ...current,
      currentStorageBytes: Math.max(0, current.currentStorageBytes - freed),
      snapshotCount: remaining.length,
    }));
    this.logger.info(`Deleted snapshot ${snapshotId} of ${normalizeCallsign(client)}, ${freed} bytes freed`);
    return true;
  }
}
