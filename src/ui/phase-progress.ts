/**
 * Spinner-backed RunObserver for the install command
 */

import { RunObserver, PhaseRunSummary } from '../core/orchestrator';
import { PhaseDescriptor } from '../types/phase';
import { InstallationState } from '../schemas/installation-state.schema';
import { formatDuration, formatStatePlan } from '../logging/run-summary';
import { SpinnerService, Spinner } from './spinner-service';

export class PhaseProgressReporter implements RunObserver {
  private readonly spinners: SpinnerService;
  private readonly write: (text: string) => void;
  private current: Spinner | null = null;

  /**
   * @param write - sink for the resume banner (stderr in the CLI)
   */
  constructor(spinners: SpinnerService, write: (text: string) => void) {
    this.spinners = spinners;
    this.write = write;
  }

  runStarted(state: InstallationState, resumed: boolean): void {
    if (resumed) {
      this.write(`Resuming previous installation\n${formatStatePlan(state)}\n\n`);
    }
  }

  backupStarted(phase: PhaseDescriptor): void {
    this.current = this.spinners.start(`Backing up before "${phase.label}"`, 'yellow');
  }

  phaseStarted(phase: PhaseDescriptor): void {
    const text = `[${phase.index + 1}] ${phase.label}`;
    if (this.current?.isSpinning) {
      this.current.setText(text);
    } else {
      this.current = this.spinners.start(text, 'cyan');
    }
  }

  phaseFinished(phase: PhaseDescriptor, summary: PhaseRunSummary): void {
    const timing = summary.durationMs !== null ? ` (${formatDuration(summary.durationMs)})` : '';
    const text = `[${phase.index + 1}] ${phase.label}${timing}`;
    const spinner = this.current ?? this.spinners.start(text);
    switch (summary.status) {
      case 'succeeded':
        spinner.succeed(text);
        break;
      case 'skipped':
        spinner.info(`${text} skipped`);
        break;
      case 'failed':
        spinner.fail(text);
        break;
      default:
        spinner.stop();
    }
    this.current = null;
  }

  /**
   * Stop whatever is still spinning (halt or cancellation)
   */
  finish(): void {
    this.spinners.stopAll();
    this.current = null;
  }
}
