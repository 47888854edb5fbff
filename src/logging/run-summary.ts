/**
 * Run Summary
 * Operator-facing report of a run: outcome, per-phase elapsed time,
 * backups taken and, on a halt, how to resume.
 */

import { RunResult, PhaseRunSummary } from '../core/orchestrator';
import { InstallationState, PhaseStatus } from '../schemas/installation-state.schema';
import { summarizeProgress } from '../core/phase-transitions';

const STATUS_SYMBOLS: Record<PhaseStatus, string> = {
  pending: '·',
  running: '…',
  succeeded: '✓',
  failed: '✗',
  skipped: '-',
};

/**
 * Serializable form of a RunResult (for --json)
 */
export interface RunSummaryJson {
  schemaVersion: '1.0.0';
  status: RunResult['status'];
  runId: string | null;
  resumed: boolean;
  elapsedMs: number;
  phases: PhaseRunSummary[];
  backups: string[];
  error: { kind: string; message: string; phase: string | null; details?: Record<string, unknown> } | null;
}

export function toRunSummaryJson(result: RunResult): RunSummaryJson {
  return {
    schemaVersion: '1.0.0',
    status: result.status,
    runId: result.runId,
    resumed: result.resumed,
    elapsedMs: result.elapsedMs,
    phases: result.phases,
    backups: result.backups,
    error: result.error
      ? {
          kind: result.error.kind,
          message: result.error.message,
          phase: result.error.phase ?? null,
          details: result.error.details,
        }
      : null,
  };
}

/**
 * Format a run result for the terminal
 * @param resumeCommand - command line shown when the run can be resumed
 */
export function formatRunSummary(result: RunResult, resumeCommand: string): string {
  const heading =
    result.status === 'succeeded'
      ? 'Installation complete'
      : result.status === 'cancelled'
        ? 'Installation interrupted'
        : 'Installation halted';

  const lines: string[] = [
    '',
    `${heading}${result.runId ? ` (run ${result.runId})` : ''}`,
    `Elapsed: ${formatDuration(result.elapsedMs)}${result.resumed ? ' (resumed)' : ''}`,
    '',
  ];

  const width = Math.max(5, ...result.phases.map((p) => p.name.length));
  for (const phase of result.phases) {
    const timing = phase.durationMs !== null ? formatDuration(phase.durationMs) : '';
    const attempts = phase.attempts > 1 ? ` (${phase.attempts} attempts)` : '';
    const note = phase.executed || phase.status !== 'succeeded' ? '' : ' (earlier run)';
    lines.push(
      `  ${STATUS_SYMBOLS[phase.status]} ${phase.name.padEnd(width)}  ${phase.status.padEnd(9)} ${timing}${attempts}${note}`.trimEnd()
    );
  }

  if (result.backups.length > 0) {
    lines.push('');
    lines.push(`Backups: ${result.backups.join(', ')}`);
  }

  if (result.error) {
    lines.push('');
    lines.push(`${result.error.kind}: ${result.error.message}`);
    if (result.runId !== null && result.error.kind !== 'ConfigDrift' && result.error.kind !== 'StateCorrupt') {
      lines.push(`Resume by running: ${resumeCommand}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Per-phase plan of a saved state (status command, resume banner)
 */
export function formatStatePlan(state: InstallationState): string {
  const progress = summarizeProgress(state);
  const lines: string[] = [
    `Run ${state.runId}: ${state.status}`,
    `Started ${state.createdAt}, last updated ${state.updatedAt}`,
    `${progress.counts.succeeded + progress.counts.skipped}/${progress.total} phases done`,
    '',
  ];
  for (const name of state.phaseOrder) {
    const record = state.phases[name];
    if (!record) {
      continue;
    }
    const timing = record.durationMs !== null ? ` ${formatDuration(record.durationMs)}` : '';
    const marker = name === progress.nextPhase ? '  <- next' : '';
    lines.push(`  ${STATUS_SYMBOLS[record.status]} ${name} ${record.status}${timing}${marker}`);
  }
  if (state.lastError) {
    lines.push('');
    lines.push(`Last error (${state.lastError.kind}${state.lastError.phase ? `, ${state.lastError.phase}` : ''}): ${state.lastError.message}`);
  }
  return lines.join('\n');
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}
