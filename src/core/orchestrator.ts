/**
 * Phase Orchestrator
 *
 * Sequences a fixed, ordered phase list: acquires the run lock, loads or
 * creates the installation state, refuses to resume under a changed
 * configuration, gates on pre-flight checks, captures a backup before every
 * destructive phase and drives each phase through the retry engine. The
 * state is persisted after every transition; a run that halts for any
 * reason can be resumed with `resume: true`.
 */

import { randomBytes } from 'crypto';
import { Clock } from '../types/clock';
import { Logger } from '../types/logger';
import { InstallError, createInstallError } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { PhaseDescriptor } from '../types/phase';
import { PreflightReport } from '../types/preflight';
import {
  InstallationState,
  JsonObject,
  PhaseStatus,
} from '../schemas/installation-state.schema';
import { StateStore } from './state-store';
import { RunLock } from './run-lock';
import { BackupManager } from './backup-manager';
import { RetryEngine } from './retry-engine';
import { checkResumeCompatibility } from './config-drift';
import { phaseNames } from './phase-list';
import {
  PhaseEvent,
  applyPhaseEvent,
  createInitialState,
  markRunComplete,
  recordBackup,
  recordRunError,
} from './phase-transitions';

/**
 * Optional callbacks for progress display
 */
export interface RunObserver {
  runStarted?(state: InstallationState, resumed: boolean): void;
  backupStarted?(phase: PhaseDescriptor): void;
  phaseStarted?(phase: PhaseDescriptor): void;
  phaseFinished?(phase: PhaseDescriptor, summary: PhaseRunSummary): void;
}

export interface OrchestratorDependencies {
  stateStore: StateStore;
  runLock: RunLock;
  backupManager: BackupManager;
  retryEngine: RetryEngine;
  clock: Clock;
  logger: Logger;
  /** Pre-flight gate; no gate when omitted */
  preflight?: () => Promise<PreflightReport>;
  /** Asked when pre-flight fails and the run was not started with an override */
  confirmPreflightOverride?: (report: PreflightReport) => Promise<boolean>;
  observer?: RunObserver;
  generateRunId?: () => string;
}

export interface RunOptions {
  resume: boolean;
  /** Resolved operator configuration; compared against the saved one on resume */
  configSnapshot: JsonObject;
  /** Re-execute these succeeded phases (non-idempotent phases only) */
  forceRerun?: string[];
  /** Mark these phases skipped instead of running them */
  skipPhases?: string[];
  skipChecks?: boolean;
  /** Continue past a failing pre-flight report */
  allowPreflightFailure?: boolean;
  signal?: AbortSignal;
}

export interface PhaseRunSummary {
  name: string;
  label: string;
  status: PhaseStatus;
  /** Attempts made in this run */
  attempts: number;
  /** Elapsed time in this run, or the recorded time for phases not executed */
  durationMs: number | null;
  /** Whether the action was invoked in this run */
  executed: boolean;
}

export interface RunResult {
  status: 'succeeded' | 'failed' | 'cancelled';
  /** Null when the run halted before a state existed */
  runId: string | null;
  resumed: boolean;
  phases: PhaseRunSummary[];
  elapsedMs: number;
  /** Backups captured in this run */
  backups: string[];
  error?: InstallError;
}

interface PhaseExecution {
  attempts: number;
  durationMs: number;
}

/**
 * `20250101T000000-1a2b3c`: sortable, unique enough for a single host
 */
export function generateRunId(clock: Clock): string {
  const stamp = clock.iso().replace(/[-:]/g, '').replace(/\.\d+Z$/, '');
  return `${stamp}-${randomBytes(3).toString('hex')}`;
}

export class PhaseOrchestrator {
  private readonly deps: OrchestratorDependencies;

  constructor(deps: OrchestratorDependencies) {
    this.deps = deps;
  }

  async run(phases: readonly PhaseDescriptor[], options: RunOptions): Promise<RunResult> {
    const { runLock, logger } = this.deps;
    const startedAt = this.deps.clock.timestamp();

    const lock = await runLock.acquire(null);
    if (!lock.ok) {
      return this.result('failed', phases, null, { startedAt, error: lock.error });
    }

    try {
      return await this.runLocked(phases, options, startedAt);
    } finally {
      await lock.value.release();
      logger.clearContext();
    }
  }

  private async runLocked(
    phases: readonly PhaseDescriptor[],
    options: RunOptions,
    startedAt: number
  ): Promise<RunResult> {
    const { stateStore, clock, logger, observer } = this.deps;
    const phaseOrder = phaseNames(phases);
    this.warnUnknownNames(phaseOrder, options);

    // Resume: load and check before anything is written
    let state: InstallationState | null = null;
    if (options.resume) {
      const loaded = await stateStore.load();
      if (!loaded.ok) {
        logger.error(loaded.error.message);
        return this.result('failed', phases, null, { startedAt, error: loaded.error });
      }
      if (loaded.value === null) {
        logger.warn('No saved installation state found; starting a fresh run');
      } else {
        const compatible = checkResumeCompatibility(loaded.value, phaseOrder, options.configSnapshot);
        if (!compatible.ok) {
          logger.event('config_drift', compatible.error.message, {
            runId: loaded.value.runId,
            ...compatible.error.details,
          });
          return this.result('failed', phases, loaded.value, {
            startedAt,
            resumed: true,
            error: compatible.error,
          });
        }
        state = loaded.value;
      }
    }
    const resumed = state !== null;

    const gate = await this.preflightGate(options);
    if (!gate.ok) {
      return this.result('failed', phases, state, { startedAt, resumed, error: gate.error });
    }

    if (state === null) {
      const archived = await stateStore.archive('superseded');
      if (!archived.ok) {
        return this.result('failed', phases, null, { startedAt, error: archived.error });
      }
      state = createInitialState({
        runId: this.deps.generateRunId?.() ?? generateRunId(clock),
        phaseOrder,
        configSnapshot: options.configSnapshot,
        now: clock.iso(),
      });
      const saved = await stateStore.save(state);
      if (!saved.ok) {
        return this.result('failed', phases, state, { startedAt, error: saved.error });
      }
    }

    logger.setContext({ runId: state.runId });
    logger.event(
      'run_started',
      resumed ? `Resuming run ${state.runId} (started ${state.createdAt})` : `Starting run ${state.runId}`,
      { phases: phaseOrder.length }
    );
    observer?.runStarted?.(state, resumed);

    return this.runPhases(phases, options, state, { startedAt, resumed });
  }

  private async runPhases(
    phases: readonly PhaseDescriptor[],
    options: RunOptions,
    initial: InstallationState,
    run: { startedAt: number; resumed: boolean }
  ): Promise<RunResult> {
    const { stateStore, backupManager, retryEngine, clock, logger, observer } = this.deps;
    const forceRerun = new Set(options.forceRerun ?? []);
    const skipPhases = new Set(options.skipPhases ?? []);
    const executions = new Map<string, PhaseExecution>();
    const backups: string[] = [];
    let state = initial;

    const finish = (
      status: RunResult['status'],
      error?: InstallError
    ): RunResult =>
      this.result(status, phases, state, { ...run, error, executions, backups });

    const persist = async (): Promise<Result<void, InstallError>> => stateStore.save(state);

    const cancel = async (phase: PhaseDescriptor): Promise<RunResult> => {
      const saved = await persist();
      if (!saved.ok) {
        return finish('failed', saved.error);
      }
      const error = createInstallError(
        'Cancelled',
        `Cancelled during "${phase.label}"; resume with "phaseguard install --resume"`,
        { phase: phase.name }
      );
      logger.event('run_cancelled', error.message, { phase: phase.name });
      return finish('cancelled', error);
    };

    for (const phase of phases) {
      const record = state.phases[phase.name];
      if (record === undefined) {
        throw new Error(`State has no record for phase "${phase.name}"`);
      }

      if (record.status === 'succeeded') {
        const rerun = forceRerun.has(phase.name);
        if (!rerun || phase.idempotent) {
          if (rerun) {
            logger.warn(`Ignoring forced rerun of idempotent phase "${phase.name}"`, { phase: phase.name });
          }
          logger.debug(`Phase "${phase.label}" already succeeded`, { phase: phase.name });
          continue;
        }
        logger.info(`Re-running "${phase.label}" on operator request`, { phase: phase.name });
      } else if (record.status === 'skipped') {
        continue;
      } else if (skipPhases.has(phase.name)) {
        state = this.apply(state, phase.name, { type: 'SKIPPED' });
        const saved = await persist();
        if (!saved.ok) {
          return finish('failed', saved.error);
        }
        logger.event('phase_skipped', `Skipped "${phase.label}" on operator request`, { phase: phase.name });
        observer?.phaseFinished?.(phase, this.summarize(phase, state, executions));
        continue;
      }

      if (options.signal?.aborted) {
        return cancel(phase);
      }

      if (phase.destructive) {
        observer?.backupStarted?.(phase);
        const backup = await backupManager.captureBefore(phase.name, state, options.signal);
        if (!backup.ok) {
          if (options.signal?.aborted) {
            return cancel(phase);
          }
          const error = { ...backup.error, phase: phase.name };
          state = recordRunError(state, { kind: error.kind, phase: phase.name, message: error.message }, clock.iso());
          const saved = await persist();
          return finish('failed', saved.ok ? error : saved.error);
        }
        state = recordBackup(state, backup.value.name, clock.iso());
        backups.push(backup.value.name);
      }

      logger.event('phase_started', `Starting "${phase.label}"`, { phase: phase.name });
      observer?.phaseStarted?.(phase);

      const outcome = await retryEngine.attempt(phase, {
        config: options.configSnapshot,
        signal: options.signal,
        beforeAttempt: async (attempt) => {
          state = this.apply(state, phase.name, { type: 'ATTEMPT_STARTED', attempt });
          return persist();
        },
      });
      executions.set(phase.name, { attempts: outcome.attempts, durationMs: outcome.durationMs });

      if (outcome.haltError) {
        return finish('failed', outcome.haltError);
      }

      if (outcome.status === 'cancelled') {
        return cancel(phase);
      }

      if (outcome.status === 'succeeded') {
        state = this.apply(state, phase.name, { type: 'SUCCEEDED', durationMs: outcome.durationMs });
        const saved = await persist();
        if (!saved.ok) {
          return finish('failed', saved.error);
        }
        logger.event('phase_succeeded', `"${phase.label}" succeeded`, {
          phase: phase.name,
          attempts: outcome.attempts,
          durationMs: outcome.durationMs,
        });
        observer?.phaseFinished?.(phase, this.summarize(phase, state, executions));
        continue;
      }

      const reason = outcome.reason ?? 'unknown failure';
      const error = createInstallError('PhaseFatalFailure', `Phase "${phase.label}" failed: ${reason}`, {
        phase: phase.name,
        details: {
          attempts: outcome.attempts,
          classification: outcome.classification,
          exhausted: outcome.exhausted === true,
        },
      });
      state = this.apply(state, phase.name, {
        type: 'FAILED',
        durationMs: outcome.durationMs,
        error: { kind: error.kind, phase: phase.name, message: reason },
      });
      const saved = await persist();
      logger.event('phase_failed', error.message, { phase: phase.name, attempts: outcome.attempts });
      observer?.phaseFinished?.(phase, this.summarize(phase, state, executions));
      if (!saved.ok) {
        return finish('failed', saved.error);
      }
      logger.event('run_failed', `Run halted at "${phase.label}"`, { phase: phase.name });
      return finish('failed', error);
    }

    state = markRunComplete(state, clock.iso());
    const saved = await persist();
    if (!saved.ok) {
      return finish('failed', saved.error);
    }
    const archived = await stateStore.archive('complete', state.runId);
    if (!archived.ok) {
      logger.warn(`Installation complete but the state file could not be archived: ${archived.error.message}`);
    }
    logger.event('run_completed', `Run ${state.runId} complete`, {
      elapsedMs: clock.timestamp() - run.startedAt,
    });
    return finish('succeeded');
  }

  private async preflightGate(options: RunOptions): Promise<Result<void, InstallError>> {
    const { preflight, confirmPreflightOverride, logger } = this.deps;
    if (!preflight) {
      return ok(undefined);
    }
    if (options.skipChecks) {
      logger.warn('Pre-flight checks skipped');
      return ok(undefined);
    }

    const report = await preflight();
    for (const check of report.results) {
      logger.event('preflight_check', `${check.name}: ${check.message}`, {
        check: check.name,
        passed: check.passed,
        warning: check.warning === true,
      });
    }
    if (report.passed) {
      return ok(undefined);
    }

    const failed = report.results.filter((r) => !r.passed).map((r) => r.name);
    const override =
      options.allowPreflightFailure === true ||
      (confirmPreflightOverride !== undefined && (await confirmPreflightOverride(report)));
    if (override) {
      logger.warn(`Continuing despite failed pre-flight checks: ${failed.join(', ')}`);
      return ok(undefined);
    }
    return err(
      createInstallError('PreflightFailure', `Pre-flight checks failed: ${failed.join(', ')}`, {
        details: { failed, results: report.results },
      })
    );
  }

  private apply(state: InstallationState, phaseName: string, event: PhaseEvent): InstallationState {
    const result = applyPhaseEvent(state, phaseName, event, this.deps.clock.iso());
    if (!result.valid) {
      throw new Error(result.description);
    }
    return result.state;
  }

  private warnUnknownNames(phaseOrder: string[], options: RunOptions): void {
    const known = new Set(phaseOrder);
    for (const [flag, names] of [
      ['forceRerun', options.forceRerun ?? []],
      ['skipPhases', options.skipPhases ?? []],
    ] as const) {
      for (const name of names) {
        if (!known.has(name)) {
          this.deps.logger.warn(`${flag} names unknown phase "${name}"`);
        }
      }
    }
  }

  private summarize(
    phase: PhaseDescriptor,
    state: InstallationState | null,
    executions: Map<string, PhaseExecution>
  ): PhaseRunSummary {
    const record = state?.phases[phase.name];
    const execution = executions.get(phase.name);
    return {
      name: phase.name,
      label: phase.label,
      status: record?.status ?? 'pending',
      attempts: execution?.attempts ?? 0,
      durationMs: execution?.durationMs ?? record?.durationMs ?? null,
      executed: execution !== undefined && execution.attempts > 0,
    };
  }

  private result(
    status: RunResult['status'],
    phases: readonly PhaseDescriptor[],
    state: InstallationState | null,
    extra: {
      startedAt: number;
      resumed?: boolean;
      error?: InstallError;
      executions?: Map<string, PhaseExecution>;
      backups?: string[];
    }
  ): RunResult {
    const executions = extra.executions ?? new Map<string, PhaseExecution>();
    return {
      status,
      runId: state?.runId ?? null,
      resumed: extra.resumed ?? false,
      phases: phases.map((phase) => this.summarize(phase, state, executions)),
      elapsedMs: this.deps.clock.timestamp() - extra.startedAt,
      backups: extra.backups ?? [],
      error: extra.error,
    };
  }
}

export function createPhaseOrchestrator(deps: OrchestratorDependencies): PhaseOrchestrator {
  return new PhaseOrchestrator(deps);
}
