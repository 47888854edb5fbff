import { describe, it, expect } from 'vitest';
import { formatDuration, formatRunSummary, formatStatePlan, toRunSummaryJson } from './run-summary';
import { RunResult } from '../core/orchestrator';
import { InstallationState } from '../schemas/installation-state.schema';

const haltedRun: RunResult = {
  status: 'failed',
  runId: '20250101T000000-abc123',
  resumed: true,
  elapsedMs: 65_000,
  phases: [
    { name: 'fetch', label: 'fetch', status: 'succeeded', attempts: 0, durationMs: 1500, executed: false },
    { name: 'build', label: 'build', status: 'failed', attempts: 3, durationMs: 3000, executed: true },
    { name: 'seed', label: 'seed', status: 'pending', attempts: 0, durationMs: null, executed: false },
  ],
  backups: ['backup-20250101-000000-000'],
  error: { kind: 'PhaseFatalFailure', message: 'Phase build failed', phase: 'build' },
};

describe('formatRunSummary', () => {
  it('should list phases, backups and the resume command of a halted run', () => {
    expect(formatRunSummary(haltedRun, 'phaseguard install --resume')).toBe(
      [
        '',
        'Installation halted (run 20250101T000000-abc123)',
        'Elapsed: 1m 5s (resumed)',
        '',
        '  ✓ fetch  succeeded 1s (earlier run)',
        '  ✗ build  failed    3s (3 attempts)',
        '  · seed   pending',
        '',
        'Backups: backup-20250101-000000-000',
        '',
        'PhaseFatalFailure: Phase build failed',
        'Resume by running: phaseguard install --resume',
        '',
      ].join('\n')
    );
  });

  it('should not offer a resume for configuration drift', () => {
    const drift: RunResult = {
      ...haltedRun,
      phases: [],
      backups: [],
      error: { kind: 'ConfigDrift', message: 'Configuration changed since the run started: settings.domain' },
    };
    expect(formatRunSummary(drift, 'phaseguard install --resume')).toBe(
      [
        '',
        'Installation halted (run 20250101T000000-abc123)',
        'Elapsed: 1m 5s (resumed)',
        '',
        '',
        'ConfigDrift: Configuration changed since the run started: settings.domain',
        '',
      ].join('\n')
    );
  });

  it('should report a complete run', () => {
    const done: RunResult = {
      status: 'succeeded',
      runId: 'run-1',
      resumed: false,
      elapsedMs: 250,
      phases: [{ name: 'build', label: 'build', status: 'succeeded', attempts: 1, durationMs: 250, executed: true }],
      backups: [],
    };
    expect(formatRunSummary(done, 'unused')).toBe(
      ['', 'Installation complete (run run-1)', 'Elapsed: 250ms', '', '  ✓ build  succeeded 250ms', ''].join('\n')
    );
  });
});

describe('toRunSummaryJson', () => {
  it('should serialize the error with a null phase when none is set', () => {
    const json = toRunSummaryJson({
      status: 'failed',
      runId: null,
      resumed: false,
      elapsedMs: 0,
      phases: [],
      backups: [],
      error: { kind: 'LockUnavailable', message: 'held' },
    });
    expect(json).toEqual({
      schemaVersion: '1.0.0',
      status: 'failed',
      runId: null,
      resumed: false,
      elapsedMs: 0,
      phases: [],
      backups: [],
      error: { kind: 'LockUnavailable', message: 'held', phase: null, details: undefined },
    });
  });
});

describe('formatStatePlan', () => {
  it('should mark the next phase and the last error', () => {
    const state: InstallationState = {
      schemaVersion: 1,
      runId: 'run-1',
      status: 'failed',
      createdAt: '2025-01-01T00:00:00.000Z',
      updatedAt: '2025-01-01T00:05:00.000Z',
      lastPhaseIndex: 1,
      lastPhaseName: 'build',
      phaseOrder: ['fetch', 'build', 'seed'],
      phases: {
        fetch: { status: 'succeeded', attempts: 1, startedAt: null, finishedAt: null, durationMs: 2000, lastError: null },
        build: { status: 'failed', attempts: 3, startedAt: null, finishedAt: null, durationMs: null, lastError: 'exited with code 1' },
        seed: { status: 'pending', attempts: 0, startedAt: null, finishedAt: null, durationMs: null, lastError: null },
      },
      configSnapshot: {},
      configFingerprint: 'f',
      lastError: { kind: 'PhaseFatalFailure', phase: 'build', message: 'exited with code 1' },
      backups: [],
    };

    expect(formatStatePlan(state)).toBe(
      [
        'Run run-1: failed',
        'Started 2025-01-01T00:00:00.000Z, last updated 2025-01-01T00:05:00.000Z',
        '1/3 phases done',
        '',
        '  ✓ fetch succeeded 2s',
        '  ✗ build failed  <- next',
        '  · seed pending',
        '',
        'Last error (PhaseFatalFailure, build): exited with code 1',
      ].join('\n')
    );
  });
});

describe('formatDuration', () => {
  it('should pick the largest sensible units', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(1000)).toBe('1s');
    expect(formatDuration(65_000)).toBe('1m 5s');
    expect(formatDuration(3_723_000)).toBe('1h 2m');
  });
});
