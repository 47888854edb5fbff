/**
 * Tests for CLI Argument Parser
 */

import { describe, it, expect } from 'vitest';
import { parseArgs } from './arg-parser';

const argv = (...args: string[]): string[] => ['node', 'phaseguard', ...args];

describe('parseArgs', () => {
  describe('basic functionality', () => {
    it('should default to the install command', () => {
      const result = parseArgs(argv());
      expect(result.success).toBe(true);
      expect(result.args?.command).toBe('install');
      expect(result.args?.configPath).toBe('phaseguard.json');
      expect(result.args?.stateDir).toBeNull();
    });

    it('should parse a subcommand', () => {
      const result = parseArgs(argv('status'));
      expect(result.args?.command).toBe('status');
    });

    it('should reject an unknown command', () => {
      const result = parseArgs(argv('deploy'));
      expect(result.success).toBe(false);
      expect(result.error).toBe('Error: Unknown command: deploy');
    });

    it('should set help flag with -h', () => {
      const result = parseArgs(argv('-h'));
      expect(result.args?.help).toBe(true);
    });

    it('should set version flag with --version', () => {
      const result = parseArgs(argv('--version'));
      expect(result.args?.version).toBe(true);
    });

    it('should reject unknown options', () => {
      const result = parseArgs(argv('install', '--fast'));
      expect(result.error).toBe('Error: Unknown option: --fast');
    });
  });

  describe('value options', () => {
    it('should parse --config with a space', () => {
      const result = parseArgs(argv('--config', 'deploy/prod.json'));
      expect(result.args?.configPath).toBe('deploy/prod.json');
    });

    it('should parse --state-dir with equals', () => {
      const result = parseArgs(argv('status', '--state-dir=/var/lib/phaseguard'));
      expect(result.args?.stateDir).toBe('/var/lib/phaseguard');
    });

    it('should reject a missing value', () => {
      const result = parseArgs(argv('--config', '--resume'));
      expect(result.error).toBe('Error: --config requires a value');
    });

    it('should reject an empty value after equals', () => {
      const result = parseArgs(argv('--state-dir='));
      expect(result.error).toBe('Error: --state-dir= requires a value');
    });

    it('should parse --keep as a positive integer', () => {
      const result = parseArgs(argv('backups', 'prune', '--keep', '3'));
      expect(result.args?.keep).toBe(3);
      expect(result.args?.positionals).toEqual(['prune']);
    });

    it('should reject a non-positive --max-age-days', () => {
      const result = parseArgs(argv('backups', 'prune', '--max-age-days', '0'));
      expect(result.error).toBe('Error: --max-age-days must be a positive integer');
    });
  });

  describe('phase lists', () => {
    it('should split comma-separated phase names and accumulate repeats', () => {
      const result = parseArgs(argv('--resume', '--skip-phase', 'a, b', '--skip-phase=c'));
      expect(result.args?.resume).toBe(true);
      expect(result.args?.skipPhases).toEqual(['a', 'b', 'c']);
    });

    it('should reject an invalid phase name', () => {
      const result = parseArgs(argv('--force-rerun', 'Build Step'));
      expect(result.error).toBe('Error: Invalid phase name "Build Step" in --force-rerun');
    });

    it('should reject a list with no names', () => {
      const result = parseArgs(argv('--force-rerun', ','));
      expect(result.error).toBe('Error: --force-rerun requires at least one phase name');
    });

    it('should reject a phase that is both forced and skipped', () => {
      const result = parseArgs(argv('--force-rerun', 'seed', '--skip-phase', 'seed'));
      expect(result.error).toBe('Error: Phase "seed" cannot be both force-rerun and skipped');
    });

    it('should not share list state between calls', () => {
      parseArgs(argv('--skip-phase', 'a'));
      const result = parseArgs(argv());
      expect(result.args?.skipPhases).toEqual([]);
    });
  });

  describe('subcommand arguments', () => {
    it('should accept backups verify with a name', () => {
      const result = parseArgs(argv('backups', 'verify', 'backup-20250101-000000-000'));
      expect(result.args?.positionals).toEqual(['verify', 'backup-20250101-000000-000']);
    });

    it('should require a name for backups verify', () => {
      const result = parseArgs(argv('backups', 'verify'));
      expect(result.error).toBe('Error: Usage: backups verify <name>');
    });

    it('should reject an unknown backups action', () => {
      const result = parseArgs(argv('backups', 'delete'));
      expect(result.error).toBe('Error: Unknown backups action: delete');
    });

    it('should reject positionals on install', () => {
      const result = parseArgs(argv('install', 'now'));
      expect(result.error).toBe('Error: Unexpected argument: now');
    });

    it('should reject restore with both a name and --latest', () => {
      const result = parseArgs(argv('restore', 'backup-1', '--latest'));
      expect(result.error).toBe('Error: Give either a backup name or --latest, not both');
    });

    it('should parse restore flags', () => {
      const result = parseArgs(argv('restore', '--latest', '-y', '--no-interactive', '--json'));
      expect(result.args).toMatchObject({
        command: 'restore',
        latest: true,
        yes: true,
        noInteractive: true,
        jsonOutput: true,
      });
    });

    it('should skip combination checks when help is requested', () => {
      const result = parseArgs(argv('install', 'extra', '--help'));
      expect(result.success).toBe(true);
      expect(result.args?.help).toBe(true);
    });
  });
});
