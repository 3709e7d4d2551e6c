import { z } from 'zod';
import type { BackupErrorCode } from './errors.js';

export const RELATIONSHIP_STATUSES = ['pending', 'active', 'declined', 'terminated'] as const;

export const RelationshipStatusSchema = z.enum(RELATIONSHIP_STATUSES);

export type RelationshipStatus = z.infer<typeof RelationshipStatusSchema>;

export function isRelationshipStatus(value: unknown): value is RelationshipStatus {
  return RelationshipStatusSchema.safeParse(value).success;
}

const TRANSITIONS: Record<RelationshipStatus, readonly RelationshipStatus[]> = {
  pending: ['active', 'declined', 'terminated'],
  active: ['terminated'],
  declined: [],
  terminated: [],
};

/** Nothing re-enters `pending`; `declined` and `terminated` are final. */
export function canTransition(from: RelationshipStatus, to: RelationshipStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Letters, digits, `-` and `_`, as storage paths accept them. */
export function isCallsign(value: string): boolean {
  return /^[A-Za-z0-9_-]{1,64}$/.test(value.trim());
}

/** Callsigns key every record in upper case. */
export function normalizeCallsign(callsign: string): string {
  return callsign.trim().toUpperCase();
}

const count = z.number().int().nonnegative();

/** Fields missing from a stored settings file take their defaults. */
export const ProviderSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  maxTotalStorageBytes: count.default(10 * 1024 ** 3),
  defaultMaxClientStorageBytes: count.default(1024 ** 3),
  defaultMaxSnapshots: count.default(10),
  autoAcceptFromContacts: z.boolean().default(false),
});

export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

export const DEFAULT_PROVIDER_SETTINGS: ProviderSettings = ProviderSettingsSchema.parse({});

export const SnapshotStatusSchema = z.enum(['in_progress', 'complete', 'failed']);

export type SnapshotStatus = z.infer<typeof SnapshotStatusSchema>;

export const SnapshotSchema = z.object({
  /** Calendar date of the run, YYYY-MM-DD */
  snapshotId: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  status: SnapshotStatusSchema,
  totalFiles: count,
  totalBytes: count,
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

/** Provider's record of a peer that backs up to it. */
export const ClientRelationshipSchema = z.object({
  clientPublicKey: z.string(),
  clientCallsign: z.string().min(1),
  maxStorageBytes: count,
  maxSnapshots: count,
  currentStorageBytes: count,
  snapshotCount: count,
  status: RelationshipStatusSchema,
  createdAt: z.string(),
  lastBackupAt: z.string().nullable(),
  lastBackupStatus: SnapshotStatusSchema.nullable(),
});

export type ClientRelationship = z.infer<typeof ClientRelationshipSchema>;

/** Client's record of a peer it backs up to. */
export const ProviderRelationshipSchema = z.object({
  /** Empty until the provider answers the invite */
  providerPublicKey: z.string(),
  providerCallsign: z.string().min(1),
  backupIntervalDays: z.number().positive(),
  status: RelationshipStatusSchema,
  maxStorageBytes: count,
  maxSnapshots: count,
  createdAt: z.string(),
  lastSuccessfulBackup: z.string().nullable(),
  nextScheduledBackup: z.string().nullable(),
});

export type ProviderRelationship = z.infer<typeof ProviderRelationshipSchema>;

export type TransferState = 'idle' | 'in_progress' | 'complete' | 'failed';

/** Live progress of a backup or restore run. */
export interface TransferStatus {
  peerCallsign: string | null;
  snapshotId: string | null;
  status: TransferState;
  filesTotal: number;
  filesTransferred: number;
  bytesTotal: number;
  bytesTransferred: number;
  progressPercent: number;
  error: string | null;
  errorCode: BackupErrorCode | null;
  startedAt: string | null;
}

export function idleStatus(): TransferStatus {
  return {
    peerCallsign: null,
    snapshotId: null,
    status: 'idle',
    filesTotal: 0,
    filesTransferred: 0,
    bytesTotal: 0,
    bytesTransferred: 0,
    progressPercent: 0,
    error: null,
    errorCode: null,
    startedAt: null,
  };
}

export function progressPercent(done: number, total: number): number {
  if (total <= 0) return 100;
  return Math.min(100, Math.floor((done * 100) / total));
}

export interface DiscoveredProvider {
  callsign: string;
  publicKey: string;
  maxStorageBytes: number;
  snapshotCount: number;
  latestSnapshotId: string | null;
}

export interface DiscoveryStatus {
  discoveryId: string;
  status: 'in_progress' | 'complete';
  devicesToQuery: number;
  devicesQueried: number;
  devicesResponded: number;
  providersFound: DiscoveredProvider[];
}
