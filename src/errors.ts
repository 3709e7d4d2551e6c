export type BackupErrorCode =
  | 'IdentityUnavailable'
  | 'ProviderNotFound'
  | 'ProviderNotActive'
  | 'ClientNotFound'
  | 'InvalidTransition'
  | 'SignatureInvalid'
  | 'EventStale'
  | 'MalformedMessage'
  | 'MalformedManifest'
  | 'Timeout'
  | 'UploadFailed'
  | 'ManifestDownloadFailed'
  | 'DownloadFailed'
  | 'DecryptFailed'
  | 'HashMismatch'
  | 'PathRejected'
  | 'AlreadyInProgress';

export class BackupError extends Error {
  readonly code: BackupErrorCode;

  constructor(code: BackupErrorCode, message: string) {
    super(message);
    this.name = 'BackupError';
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Error code of a BackupError, or null for anything else. */
export function errorCode(err: unknown): BackupErrorCode | null {
  return err instanceof BackupError ? err.code : null;
}
