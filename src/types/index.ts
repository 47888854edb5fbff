/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for typed error handling
export { ok, err } from './result';
export type { Result, Ok, Err } from './result';

// Errors and exit codes
export { createInstallError, describeError } from './errors';
export type { InstallError, InstallErrorKind } from './errors';
export { ExitCode, exitCodeForError } from './exit-codes';

// Phases
export type {
  ActionResult,
  PhaseContext,
  PhaseAction,
  PhaseDefinition,
  PhaseDescriptor,
  FailureClassification,
  RetryContext,
  PhaseOutcome,
} from './phase';
export type { CheckOutcome, CheckResult, PreflightCheck, PreflightReport } from './preflight';

// Configuration
export { DEFAULT_CONFIG, DEFAULT_STATE_DIR } from './effective-config';
export type {
  EffectiveConfig,
  BackoffConfig,
  RetentionConfig,
  VerbosityConfig,
  PathConfig,
  ConfigSource,
} from './effective-config';

// Injectable interfaces
export { SystemClock, MockClock } from './clock';
export type { Clock } from './clock';
export { shouldLog, getEventLevel, redactSecrets, DEFAULT_REDACT_PATTERNS } from './logger';
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export { createFileSystemError, globToRegex } from './file-system';
export type {
  FileSystem,
  FileSystemError,
  FileSystemErrorCode,
  FileStats,
  WriteOptions,
  ListOptions,
} from './file-system';
export type { ProcessRunner, SpawnOptions, SpawnResult } from './process-runner';
export { createPrompterError } from './prompter';
export type {
  Prompter,
  PrompterError,
  PrompterErrorCode,
  ConfirmOptions,
  SelectOptions,
  SelectChoice,
} from './prompter';
