import { describe, it, expect, vi, afterEach } from 'vitest';
import { PhaseProgressReporter } from './phase-progress';
import { SpinnerService } from './spinner-service';
import { PhaseDescriptor } from '../types/phase';

const phase: PhaseDescriptor = {
  index: 1,
  name: 'reset-database',
  label: 'Reset database',
  action: async () => ({ status: 'success' }),
  destructive: true,
  idempotent: false,
  timeoutMs: 1000,
  maxRetries: 1,
  timeoutFatal: true,
};

describe('PhaseProgressReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function textReporter(): { reporter: PhaseProgressReporter; lines: string[] } {
    const lines: string[] = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      lines.push(String(chunk));
      return true;
    });
    const spinners = new SpinnerService({ quiet: false, isTTY: false, stream: process.stderr });
    return { reporter: new PhaseProgressReporter(spinners, (text) => lines.push(text)), lines };
  }

  it('should print one line per update without a terminal', () => {
    const { reporter, lines } = textReporter();

    reporter.backupStarted(phase);
    reporter.phaseStarted(phase);
    reporter.phaseFinished(phase, {
      name: phase.name,
      label: phase.label,
      status: 'succeeded',
      attempts: 1,
      durationMs: 2500,
      executed: true,
    });

    expect(lines).toEqual([
      '> Backing up before "Reset database"\n',
      '> [2] Reset database\n',
      '✅ [2] Reset database (2s)\n',
    ]);
  });

  it('should mark skipped and failed phases', () => {
    const { reporter, lines } = textReporter();
    const summary = { name: phase.name, label: phase.label, attempts: 0, durationMs: null, executed: false };

    reporter.phaseFinished(phase, { ...summary, status: 'skipped' });
    reporter.phaseStarted(phase);
    reporter.phaseFinished(phase, { ...summary, status: 'failed' });

    expect(lines).toEqual([
      '> [2] Reset database\n',
      'ℹ️  [2] Reset database skipped\n',
      '> [2] Reset database\n',
      '❌ [2] Reset database\n',
    ]);
  });
});
