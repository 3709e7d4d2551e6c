import { BackupExecutor } from './backup.js';
import type { NodeContext } from './context.js';
import { DiscoveryCoordinator } from './discovery.js';
import { FRESHNESS_WINDOW_SECONDS } from './event.js';
import type { Identity } from './identity.js';
import { SingleFlight } from './lock.js';
import type { Logger } from './log.js';
import { isCallsign } from './models.js';
import { DEFAULT_INVITE_TIMEOUT_MS, RelationshipService } from './relationships.js';
import { RestoreExecutor } from './restore.js';
import { ProtocolRouter } from './router.js';
import { StorageEndpoint } from './storage-endpoint.js';
import { RelationshipStore, SnapshotStore } from './store.js';
import type { PeerDirectory, PeerRequest, PeerResponse, PeerTransport } from './transport.js';

export interface BackupNodeOptions {
  /** Directory that is backed up, restored into, and holds the node's state */
  dataDir: string;
  identity: Identity;
  transport: PeerTransport;
  directory: PeerDirectory;
  /** Extra file or directory names left out of backups */
  exclude?: string[];
  inviteTimeoutMs?: number;
  freshnessWindowSeconds?: number;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * One backup node per identity: stores, executors, router and storage
 * endpoint wired over a shared context. Inbound traffic enters through
 * `receive` (control messages) and `serve` (storage requests).
 */
export class BackupNode {
  readonly relationships: RelationshipService;
  readonly backup: BackupExecutor;
  readonly restore: RestoreExecutor;
  readonly discovery: DiscoveryCoordinator;
  private readonly router: ProtocolRouter;
  private readonly storage: StorageEndpoint;

  private constructor(
    readonly context: NodeContext,
    options: BackupNodeOptions,
  ) {
    this.relationships = new RelationshipService(context, options.inviteTimeoutMs ?? DEFAULT_INVITE_TIMEOUT_MS);
    this.backup = new BackupExecutor(context, options.exclude ?? []);
    this.restore = new RestoreExecutor(context);
    this.discovery = new DiscoveryCoordinator(context);
    this.router = new ProtocolRouter(
      context,
      this.relationships,
      this.discovery,
      options.freshnessWindowSeconds ?? FRESHNESS_WINDOW_SECONDS,
    );
    this.storage = new StorageEndpoint(context);
  }

  /** Builds a node and loads its persisted relationships. */
  static async open(options: BackupNodeOptions): Promise<BackupNode> {
    const logger = options.logger ?? console;
    const relationships = new RelationshipStore(options.dataDir, logger);
    await relationships.load();
    const context: NodeContext = {
      dataDir: options.dataDir,
      identity: options.identity,
      relationships,
      snapshots: new SnapshotStore(relationships, logger),
      transport: options.transport,
      directory: options.directory,
      gate: new SingleFlight(),
      clock: options.clock ?? (() => new Date()),
      logger,
    };
    return new BackupNode(context, options);
  }

  get callsign(): string {
    return this.context.identity.callsign;
  }

  /**
   * Inbound traffic first re-reads the sender's records, which a second
   * process on the same data directory may have changed.
   */
  async receive(from: string, message: unknown): Promise<void> {
    if (isCallsign(from)) await this.context.relationships.refresh(from);
    return this.router.handle(from, message);
  }

  async serve(from: string, req: PeerRequest): Promise<PeerResponse> {
    if (isCallsign(from)) await this.context.relationships.refresh(from);
    return this.storage.handle(from, req);
  }
}
