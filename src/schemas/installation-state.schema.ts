/**
 * Persisted document types: the installation state file and backup manifests
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Version written by this release; newer files are refused */
export const STATE_SCHEMA_VERSION = 1;
export const MANIFEST_SCHEMA_VERSION = 1;

export type PhaseStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

export type RunStatus = 'in_progress' | 'failed' | 'complete';

export interface RecordedError {
  kind: string;
  phase: string | null;
  message: string;
}

export interface PhaseRecord {
  status: PhaseStatus;
  /** Attempts made across all invocations (diagnostic only) */
  attempts: number;
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number | null;
  lastError: string | null;
}

export interface InstallationState {
  schemaVersion: number;
  runId: string;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  lastPhaseIndex: number | null;
  lastPhaseName: string | null;
  /** Names of the phase list this state belongs to, in order */
  phaseOrder: string[];
  phases: Record<string, PhaseRecord>;
  /** Resolved operator configuration the run started with */
  configSnapshot: JsonObject;
  /** sha256 of the canonical configSnapshot */
  configFingerprint: string;
  lastError: RecordedError | null;
  /** Backups captured during this run, oldest first */
  backups: string[];
}

export type BackupArtifactKind = 'file' | 'dump';

export interface BackupArtifact {
  label: string;
  kind: BackupArtifactKind;
  /** Live path (relative to the target directory) for files; null for dumps */
  sourcePath: string | null;
  /** Path inside the backup directory */
  storedPath: string;
  sha256: string;
  size: number;
  /** Permission bits of the live file, restored with it */
  mode: number | null;
}

export interface BackupTrigger {
  phase: string;
  runId: string;
}

export interface BackupRecord {
  schemaVersion: number;
  name: string;
  createdAt: string;
  triggeredBy: BackupTrigger | null;
  artifacts: BackupArtifact[];
  totalSize: number;
  stateSnapshot: InstallationState | null;
}
