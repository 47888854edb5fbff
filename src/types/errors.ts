/**
 * Installation error taxonomy
 * Errors that halt a run are values carried in a Result, not exceptions.
 */

export type InstallErrorKind =
  /** Environment unsuitable; nothing ran */
  | 'PreflightFailure'
  /** Resume configuration or phase list differs from the persisted run */
  | 'ConfigDrift'
  /** Transient phase failure; absorbed by the retry engine unless retries run out */
  | 'PhaseRetryableFailure'
  /** Phase failed for good; later phases never ran */
  | 'PhaseFatalFailure'
  /** Backup before a destructive phase failed; the phase never ran */
  | 'BackupError'
  /** Backup verification or restore failed; live files untouched */
  | 'RestoreError'
  /** State file unreadable or from a newer version */
  | 'StateCorrupt'
  /** State file could not be written */
  | 'StateIOFailure'
  /** Another run holds the lock */
  | 'LockUnavailable'
  /** Operator interrupt */
  | 'Cancelled';

export interface InstallError {
  kind: InstallErrorKind;
  message: string;
  /** Phase the error belongs to, if any */
  phase?: string;
  /** Structured detail for automation (differing config paths, failed artifacts...) */
  details?: Record<string, unknown>;
  cause?: Error;
}

export function createInstallError(
  kind: InstallErrorKind,
  message: string,
  extra: Omit<InstallError, 'kind' | 'message'> = {}
): InstallError {
  return { kind, message, ...extra };
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
