/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

/** Subcommands */
export type CommandName = 'install' | 'status' | 'reset' | 'backups' | 'restore';

export const COMMAND_NAMES: readonly CommandName[] = ['install', 'status', 'reset', 'backups', 'restore'];

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Subcommand (default: install) */
  command: CommandName;

  /** Positional arguments after the subcommand */
  positionals: string[];

  /** Deployment file path */
  configPath: string;

  /** State directory override */
  stateDir: string | null;

  /** Continue the interrupted installation */
  resume: boolean;

  /** Skip the pre-flight gate */
  skipChecks: boolean;

  /** Succeeded non-idempotent phases to run again */
  forceRerun: string[];

  /** Phases to mark skipped */
  skipPhases: string[];

  /** backups prune: number of backups to keep */
  keep: number | null;

  /** backups prune: maximum backup age in days */
  maxAgeDays: number | null;

  /** restore: pick the newest backup */
  latest: boolean;

  /** restore: do not ask for confirmation */
  yes: boolean;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;

  /** Disable interactive prompts; use defaults or fail */
  noInteractive: boolean;

  /** Enable verbose output with more progress details */
  verbose: boolean;

  /** Enable debug mode with full diagnostics */
  debug: boolean;

  /** Output machine-readable JSON */
  jsonOutput: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  command: 'install',
  positionals: [],
  configPath: 'phaseguard.json',
  stateDir: null,
  resume: false,
  skipChecks: false,
  forceRerun: [],
  skipPhases: [],
  keep: null,
  maxAgeDays: null,
  latest: false,
  yes: false,
  help: false,
  version: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  jsonOutput: false,
};

/** Result of parsing arguments */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
