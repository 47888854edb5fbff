/**
 * EffectiveConfig type
 * Centralized orchestrator configuration, resolved once per command
 */

/**
 * Backoff between retryable attempts
 */
export interface BackoffConfig {
  /** Delay after the first failed attempt */
  baseDelayMs: number;
  /** Ceiling for a single delay */
  maxDelayMs: number;
}

/**
 * Backup retention used by `backups prune`
 */
export interface RetentionConfig {
  /** Number of backups to keep */
  maxCount: number;
  /** Backups older than this are pruned (the newest is always kept) */
  maxAgeDays: number;
}

/**
 * Logging and verbosity configuration
 */
export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  jsonOutput: boolean;
}

export interface PathConfig {
  workingDirectory: string;
  /** Directory holding state.json, the lock and the state archive */
  stateDir: string;
  backupDir: string;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'cli' | 'deployment' | 'user' | 'default';

export interface EffectiveConfig {
  schemaVersion: '1.0.0';

  paths: PathConfig;

  backoff: BackoffConfig;

  /** How long an in-flight phase gets to settle after cancellation */
  cancelGraceMs: number;

  /** Age after which a run lock is treated as abandoned */
  lockStaleAfterMs: number;

  retention: RetentionConfig;

  verbosity: VerbosityConfig;

  interactive: boolean;

  /** ISO 8601 */
  resolvedAt: string;

  /** Where each resolved value came from */
  sources: Partial<Record<string, ConfigSource>>;
}

export const DEFAULT_STATE_DIR = '.phaseguard';

export const DEFAULT_CONFIG = {
  stateDir: DEFAULT_STATE_DIR,
  backoff: {
    baseDelayMs: 2000,
    maxDelayMs: 60000,
  },
  cancelGraceMs: 5000,
  lockStaleAfterMs: 6 * 60 * 60 * 1000,
  retention: {
    maxCount: 10,
    maxAgeDays: 30,
  },
  verbosity: {
    verbose: false,
    debug: false,
    jsonOutput: false,
  },
  interactive: true,
} as const;
