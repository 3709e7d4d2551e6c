import { createHash, randomBytes } from 'node:crypto';

/**
 * Compute SHA-256 hex digest of a buffer.
 */
export function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

export function randomHex(bytes: number): string {
  return randomBytes(bytes).toString('hex');
}

/**
 * Snapshot ids are the local calendar date, so two runs on the same day
 * share an id and the later one replaces the earlier manifest.
 */
export function snapshotIdFor(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function isSnapshotId(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value);
}

/** Random blob name; carries nothing of the file's path. */
export function newBlobName(): string {
  return `${randomHex(16)}.enc`;
}

export function isBlobName(value: string): boolean {
  return /^[0-9a-f]{32}\.enc$/.test(value);
}
