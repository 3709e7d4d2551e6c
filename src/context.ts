import type { Identity } from './identity.js';
import type { SingleFlight } from './lock.js';
import type { Logger } from './log.js';
import type { RelationshipStore, SnapshotStore } from './store.js';
import type { PeerDirectory, PeerTransport } from './transport.js';

/** Collaborators shared by the components of one backup node. */
export interface NodeContext {
  dataDir: string;
  identity: Identity;
  relationships: RelationshipStore;
  snapshots: SnapshotStore;
  transport: PeerTransport;
  directory: PeerDirectory;
  /** Process-wide single-flight gate for backup and restore runs */
  gate: SingleFlight;
  clock: () => Date;
  logger: Logger;
}

export const BACKUP_GATE = 'backup';
export const RESTORE_GATE = 'restore';
