import { z } from 'zod';
import type { ControlMessage } from './messages.js';
import { isBlobName, isSnapshotId } from './checksum.js';
import { normalizeCallsign } from './models.js';

export type PeerMethod = 'GET' | 'PUT' | 'DELETE';

export interface PeerRequest {
  method: PeerMethod;
  path: string;
  body?: unknown;
}

export interface PeerResponse {
  status: number;
  body: unknown;
}

/**
 * Delivers control messages to a peer by callsign and performs
 * request/response transfers against its backup storage paths.
 */
export interface PeerTransport {
  /** Resolves false when the peer could not be reached. */
  send(target: string, message: ControlMessage): Promise<boolean>;
  request(target: string, req: PeerRequest): Promise<PeerResponse>;
}

export interface PeerInfo {
  callsign: string;
  online: boolean;
}

/** Known peers and their reachability. */
export interface PeerDirectory {
  list(): Promise<PeerInfo[]>;
  isKnown(callsign: string): boolean;
}

/** Transfer body for uploads and downloads. */
export const TransferBodySchema = z.object({ data: z.string() });

export type TransferBody = z.infer<typeof TransferBodySchema>;

export function encodeTransfer(data: Buffer): TransferBody {
  return { data: data.toString('base64') };
}

/** Decodes a `{ data: <base64> }` body, or null if it has no data. */
export function decodeTransfer(body: unknown): Buffer | null {
  const parsed = TransferBodySchema.safeParse(body);
  return parsed.success ? Buffer.from(parsed.data.data, 'base64') : null;
}

const PREFIX = '/api/backup/clients';

export const backupPaths = {
  snapshots: (client: string) => `${PREFIX}/${encodeURIComponent(client)}/snapshots`,
  manifest: (client: string, snapshotId: string) =>
    `${PREFIX}/${encodeURIComponent(client)}/snapshots/${encodeURIComponent(snapshotId)}`,
  file: (client: string, snapshotId: string, blobName: string) =>
    `${PREFIX}/${encodeURIComponent(client)}/snapshots/${encodeURIComponent(snapshotId)}/files/${encodeURIComponent(blobName)}`,
};

export type BackupPath =
  | { kind: 'snapshots'; client: string }
  | { kind: 'manifest'; client: string; snapshotId: string }
  | { kind: 'file'; client: string; snapshotId: string; blobName: string };

/** Parses a storage path, rejecting any segment that is not a plain id. */
export function parseBackupPath(path: string): BackupPath | null {
  const match = path.match(/^\/api\/backup\/clients\/([A-Za-z0-9_-]{1,64})\/snapshots(?:\/([^/]+)(?:\/files\/([^/]+))?)?$/);
  if (!match) return null;
  const client = normalizeCallsign(match[1]);
  const snapshotId = match[2];
  const blobName = match[3];

  if (snapshotId === undefined) return { kind: 'snapshots', client };
  if (!isSnapshotId(snapshotId)) return null;
  if (blobName === undefined) return { kind: 'manifest', client, snapshotId };
  if (!isBlobName(blobName)) return null;
  return { kind: 'file', client, snapshotId, blobName };
}
