import { z } from 'zod';
import { BackupError } from './errors.js';

const size = z.number().int().nonnegative();

export const FileEntrySchema = z.object({
  /** Path relative to the data directory, `/`-separated */
  relativePath: z.string().min(1),
  /** SHA-256 hex digest of the plaintext */
  contentHash: z.string(),
  plaintextSize: size,
  encryptedSize: size,
  /** Random name of the sealed blob on the provider */
  encryptedBlobName: z.string().min(1),
  modifiedAt: z.string(),
});

/**
 * Backup manifest: the index of one snapshot. Stored on the provider
 * encrypted under the client's own key.
 */
export const ManifestSchema = z.object({
  /** Manifest format version */
  version: z.literal('1.0'),
  snapshotId: z.string(),
  clientPublicKey: z.string(),
  clientCallsign: z.string(),
  /** Entries in upload order */
  files: z.array(FileEntrySchema),
  totalFiles: size,
  /** Sum of plaintext sizes */
  totalBytes: size,
  startedAt: z.string(),
  completedAt: z.string(),
});

export type FileEntry = z.infer<typeof FileEntrySchema>;
export type BackupManifest = z.infer<typeof ManifestSchema>;

function malformed(detail: string): BackupError {
  return new BackupError('MalformedManifest', `malformed manifest: ${detail}`);
}

export function parseManifest(json: string): BackupManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw malformed('not JSON');
  }
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw malformed(issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'invalid');
  }
  return parsed.data;
}
