/**
 * Core module - state, backups, retries and phase sequencing.
 * Nothing here talks to the terminal or spawns processes directly.
 */

// Phase list and state transitions
export { buildPhaseList, phaseNames, InvalidPhaseListError } from './phase-list';
export {
  isValidPhaseTransition,
  createPendingRecord,
  createInitialState,
  applyPhaseEvent,
  recordRunError,
  recordBackup,
  markRunComplete,
  isPhaseDone,
  summarizeProgress,
} from './phase-transitions';
export type { PhaseEvent, PhaseTransitionResult, InitialStateInput, ProgressSummary } from './phase-transitions';

// Persistence
export { StateStore, createStateStore, STATE_FILE_NAME, ARCHIVE_DIR_NAME } from './state-store';
export type { StateStoreOptions } from './state-store';
export { RunLock, createRunLock, isProcessAlive, LOCK_FILE_NAME, DEFAULT_LOCK_STALE_AFTER_MS } from './run-lock';
export type { RunLockOptions, LockHandle } from './run-lock';
export { canonicalJson, fingerprintConfig, diffConfigPaths, checkResumeCompatibility } from './config-drift';

// Backups
export {
  BackupManager,
  createBackupManager,
  backupNameFor,
  compareNewestFirst,
  MANIFEST_FILE_NAME,
} from './backup-manager';
export type { BackupManagerOptions, ArtifactFailure, RestoreReport, PruneOptions } from './backup-manager';
export { sha256 } from './checksum';

// Retries
export { computeBackoffDelay, hasAttemptsRemaining, DEFAULT_BACKOFF_POLICY } from './retry-policy';
export type { BackoffPolicy } from './retry-policy';
export { RetryEngine, createRetryEngine } from './retry-engine';
export type { RetryEngineOptions, AttemptOptions, EngineOutcome } from './retry-engine';

// Orchestrator
export { PhaseOrchestrator, createPhaseOrchestrator, generateRunId } from './orchestrator';
export type {
  OrchestratorDependencies,
  RunObserver,
  RunOptions,
  RunResult,
  PhaseRunSummary,
} from './orchestrator';
