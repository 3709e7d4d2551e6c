export { BackupNode, type BackupNodeOptions } from './node.js';
export { BackupExecutor } from './backup.js';
export { RestoreExecutor } from './restore.js';
export { DiscoveryCoordinator, MAX_FINISHED_RUNS } from './discovery.js';
export {
  RelationshipService,
  DEFAULT_BACKUP_INTERVAL_DAYS,
  DEFAULT_INVITE_TIMEOUT_MS,
  type InviteResult,
} from './relationships.js';
export { ProtocolRouter } from './router.js';
export { StorageEndpoint } from './storage-endpoint.js';
export { RelationshipStore, SnapshotStore, BACKUPS_DIR, BACKUP_CONFIG_DIR } from './store.js';
export { StatusChannel, type StatusListener } from './status-channel.js';
export { Identity, sealTo, verifyEvent } from './identity.js';
export {
  FRESHNESS_WINDOW_SECONDS,
  SignedEventSchema,
  eventId,
  getTag,
  isFresh,
  type EventTemplate,
  type SignedEvent,
} from './event.js';
export {
  ControlMessageSchema,
  parseControlMessage,
  type ControlMessage,
  type ControlMessageType,
  type MessageOf,
} from './messages.js';
export { FileEntrySchema, ManifestSchema, parseManifest, type BackupManifest, type FileEntry } from './manifest.js';
export { BackupError, type BackupErrorCode } from './errors.js';
export * from './models.js';
export {
  backupPaths,
  parseBackupPath,
  TransferBodySchema,
  type PeerDirectory,
  type PeerInfo,
  type PeerRequest,
  type PeerResponse,
  type PeerTransport,
  type TransferBody,
} from './transport.js';
export { enumerateBackupFiles, resolveInside, EXCLUDE, type LocalFile } from './workspace-files.js';
export { createPeerServer, type PeerServer, type PeerServerOptions } from './server.js';
export { HttpPeerTransport, type HttpPeerTransportOptions, type PeerEndpoint } from './client.js';
export {
  ConfigSchema,
  loadConfig,
  writeConfig,
  loadIdentity,
  writeIdentityFile,
  DEFAULT_PORT,
  type PeerbakConfig,
} from './config.js';
export type { Logger } from './log.js';
