/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > deployment file `orchestrator` section > user config > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { EffectiveConfig, DEFAULT_CONFIG, ConfigSource } from '../types/effective-config';
import { OrchestratorSettings, UserConfig, parseUserConfig } from '../schemas/validators';
import { Result, ok, err } from '../types/result';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  stateDir?: string;
  verbose?: boolean;
  debug?: boolean;
  jsonOutput?: boolean;
  noInteractive?: boolean;
}

export interface ResolveConfigOptions {
  workingDirectory: string;
  /** Defaults to ~/.config/phaseguard/config.json */
  userConfigPath?: string;
  /** ISO 8601 resolution time */
  now?: string;
}

export function defaultUserConfigPath(): string {
  return join(homedir(), '.config', 'phaseguard', 'config.json');
}

/**
 * Load the user config file. A missing file is not an error; an
 * unreadable or invalid one is.
 */
export function loadUserConfig(path: string): Result<UserConfig | null, string> {
  if (!existsSync(path)) {
    return ok(null);
  }
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    return err(`Cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = parseUserConfig(content);
  if (!parsed.success) {
    return err(`Invalid user config ${path}: ${parsed.errors.join('; ')}`);
  }
  return ok(parsed.data);
}

/**
 * Resolve configuration from all sources with explicit precedence
 */
export function resolveConfig(
  cliFlags: CliFlags,
  deployment: OrchestratorSettings | undefined,
  options: ResolveConfigOptions
): Result<EffectiveConfig, string> {
  const cwd = options.workingDirectory;
  const loaded = loadUserConfig(options.userConfigPath ?? defaultUserConfigPath());
  if (!loaded.ok) {
    return loaded;
  }
  const userConfig = loaded.value;

  // Track sources for debugging
  const sources: Partial<Record<string, ConfigSource>> = {};

  // Helper to resolve a value with precedence
  function resolveValue<T>(
    key: string,
    cli: T | undefined,
    fromDeployment: T | undefined,
    user: T | undefined,
    defaultVal: T
  ): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (fromDeployment !== undefined) {
      sources[key] = 'deployment';
      return fromDeployment;
    }
    if (user !== undefined) {
      sources[key] = 'user';
      return user;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const stateDir = resolve(
    cwd,
    resolveValue('stateDir', cliFlags.stateDir, deployment?.stateDir, userConfig?.stateDir, DEFAULT_CONFIG.stateDir)
  );
  const backupDir = resolve(
    cwd,
    resolveValue(
      'backupDir',
      undefined,
      deployment?.backupDir,
      userConfig?.backupDir,
      join(stateDir, 'backups')
    )
  );

  const baseDelayMs = resolveValue(
    'baseDelayMs',
    undefined,
    deployment?.baseDelayMs,
    userConfig?.baseDelayMs,
    DEFAULT_CONFIG.backoff.baseDelayMs
  );
  const maxDelayMs = resolveValue(
    'maxDelayMs',
    undefined,
    deployment?.maxDelayMs,
    userConfig?.maxDelayMs,
    DEFAULT_CONFIG.backoff.maxDelayMs
  );
  if (maxDelayMs < baseDelayMs) {
    return err(`maxDelayMs (${maxDelayMs}) must not be smaller than baseDelayMs (${baseDelayMs})`);
  }

  const config: EffectiveConfig = {
    schemaVersion: '1.0.0',
    paths: {
      workingDirectory: cwd,
      stateDir,
      backupDir,
    },
    backoff: { baseDelayMs, maxDelayMs },
    cancelGraceMs: resolveValue(
      'cancelGraceMs',
      undefined,
      deployment?.cancelGraceMs,
      userConfig?.cancelGraceMs,
      DEFAULT_CONFIG.cancelGraceMs
    ),
    lockStaleAfterMs: resolveValue(
      'lockStaleAfterMs',
      undefined,
      deployment?.lockStaleAfterMs,
      userConfig?.lockStaleAfterMs,
      DEFAULT_CONFIG.lockStaleAfterMs
    ),
    retention: {
      maxCount: resolveValue(
        'retention.maxCount',
        undefined,
        deployment?.retention?.maxCount,
        userConfig?.retention?.maxCount,
        DEFAULT_CONFIG.retention.maxCount
      ),
      maxAgeDays: resolveValue(
        'retention.maxAgeDays',
        undefined,
        deployment?.retention?.maxAgeDays,
        userConfig?.retention?.maxAgeDays,
        DEFAULT_CONFIG.retention.maxAgeDays
      ),
    },
    verbosity: {
      verbose: resolveValue('verbose', cliFlags.verbose, undefined, undefined, DEFAULT_CONFIG.verbosity.verbose),
      debug: resolveValue('debug', cliFlags.debug, undefined, undefined, DEFAULT_CONFIG.verbosity.debug),
      jsonOutput: resolveValue(
        'jsonOutput',
        cliFlags.jsonOutput,
        undefined,
        undefined,
        DEFAULT_CONFIG.verbosity.jsonOutput
      ),
    },
    interactive: resolveValue(
      'interactive',
      cliFlags.noInteractive ? false : undefined,
      undefined,
      userConfig?.interactive,
      DEFAULT_CONFIG.interactive
    ),
    resolvedAt: options.now ?? new Date().toISOString(),
    sources,
  };

  return ok(config);
}
