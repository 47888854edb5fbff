/**
 * Persisted document types
 */
export { STATE_SCHEMA_VERSION, MANIFEST_SCHEMA_VERSION } from './installation-state.schema';
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  PhaseStatus,
  RunStatus,
  RecordedError,
  PhaseRecord,
  InstallationState,
  BackupArtifactKind,
  BackupArtifact,
  BackupTrigger,
  BackupRecord,
} from './installation-state.schema';

/**
 * zod validators
 */
export {
  PHASE_NAME_PATTERN,
  readSchemaVersion,
  validateInstallationState,
  parseInstallationState,
  validateBackupRecord,
  parseBackupRecord,
  validateUserConfig,
  parseUserConfig,
  validateDeploymentPlan,
  parseDeploymentPlan,
  parseLockInfo,
} from './validators';
export type {
  ValidationResult,
  OrchestratorSettings,
  UserConfig,
  CommandPhaseSpec,
  ArtifactSpec,
  DumpSpec,
  PreflightSpec,
  DeploymentPlan,
  LockInfo,
} from './validators';
