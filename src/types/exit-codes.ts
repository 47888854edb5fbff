/**
 * Process exit codes
 * Each halting error kind maps to its own code so wrappers can tell a
 * pre-flight refusal from a phase failure or a state problem.
 */

import { InstallErrorKind } from './errors';

export const ExitCode = {
  /** All phases succeeded / command completed */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage or invalid deployment file */
  USAGE_ERROR: 2,
  /** Pre-flight checks failed */
  PREFLIGHT_FAILURE: 3,
  /** A phase failed fatally or exhausted its retries */
  PHASE_FAILURE: 4,
  /** Resume configuration differs from the persisted run */
  CONFIG_DRIFT: 5,
  /** State file unreadable, unwritable, or locked by another run */
  STATE_ERROR: 6,
  /** Backup before a destructive phase failed */
  BACKUP_ERROR: 7,
  /** Restore refused or failed */
  RESTORE_ERROR: 8,
  /** Interrupted by the operator */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForError(kind: InstallErrorKind): ExitCode {
  switch (kind) {
    case 'PreflightFailure':
      return ExitCode.PREFLIGHT_FAILURE;
    case 'ConfigDrift':
      return ExitCode.CONFIG_DRIFT;
    case 'PhaseRetryableFailure':
    case 'PhaseFatalFailure':
      return ExitCode.PHASE_FAILURE;
    case 'BackupError':
      return ExitCode.BACKUP_ERROR;
    case 'RestoreError':
      return ExitCode.RESTORE_ERROR;
    case 'StateCorrupt':
    case 'StateIOFailure':
    case 'LockUnavailable':
      return ExitCode.STATE_ERROR;
    case 'Cancelled':
      return ExitCode.INTERRUPTED;
  }
}
