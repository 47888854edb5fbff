/**
 * Installation state transitions
 *
 * Every change to InstallationState goes through a pure function in this
 * module. The orchestrator threads the returned state through the run and
 * persists it; nothing mutates state in place.
 */

import {
  InstallationState,
  PhaseRecord,
  PhaseStatus,
  RecordedError,
  JsonObject,
  STATE_SCHEMA_VERSION,
} from '../schemas/installation-state.schema';
import { fingerprintConfig } from './config-drift';

/**
 * Allowed phase status changes.
 * running -> running is a re-attempt of a phase interrupted by a crash;
 * succeeded -> running is an operator-forced rerun.
 * Anything not yet succeeded can be skipped by the operator.
 */
const VALID_TRANSITIONS: Record<PhaseStatus, PhaseStatus[]> = {
  pending: ['running', 'skipped'],
  running: ['running', 'succeeded', 'failed', 'skipped'],
  failed: ['running', 'skipped'],
  succeeded: ['running'],
  skipped: [],
};

export type PhaseEvent =
  | { type: 'ATTEMPT_STARTED'; attempt: number }
  | { type: 'SUCCEEDED'; durationMs: number }
  | { type: 'FAILED'; durationMs: number; error: RecordedError }
  | { type: 'SKIPPED' };

export interface PhaseTransitionResult {
  state: InstallationState;
  valid: boolean;
  description: string;
}

export function isValidPhaseTransition(from: PhaseStatus, to: PhaseStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

function targetStatus(event: PhaseEvent): PhaseStatus {
  switch (event.type) {
    case 'ATTEMPT_STARTED':
      return 'running';
    case 'SUCCEEDED':
      return 'succeeded';
    case 'FAILED':
      return 'failed';
    case 'SKIPPED':
      return 'skipped';
  }
}

export function createPendingRecord(): PhaseRecord {
  return {
    status: 'pending',
    attempts: 0,
    startedAt: null,
    finishedAt: null,
    durationMs: null,
    lastError: null,
  };
}

export interface InitialStateInput {
  runId: string;
  phaseOrder: readonly string[];
  configSnapshot: JsonObject;
  now: string;
}

export function createInitialState(input: InitialStateInput): InstallationState {
  const phases: Record<string, PhaseRecord> = {};
  for (const name of input.phaseOrder) {
    phases[name] = createPendingRecord();
  }
  return {
    schemaVersion: STATE_SCHEMA_VERSION,
    runId: input.runId,
    status: 'in_progress',
    createdAt: input.now,
    updatedAt: input.now,
    lastPhaseIndex: null,
    lastPhaseName: null,
    phaseOrder: [...input.phaseOrder],
    phases,
    configSnapshot: input.configSnapshot,
    configFingerprint: fingerprintConfig(input.configSnapshot),
    lastError: null,
    backups: [],
  };
}

/**
 * Apply a phase event and return the resulting state.
 * Invalid transitions return the original state with `valid: false`.
 */
export function applyPhaseEvent(
  state: InstallationState,
  phaseName: string,
  event: PhaseEvent,
  now: string
): PhaseTransitionResult {
  const index = state.phaseOrder.indexOf(phaseName);
  const current = state.phases[phaseName];
  if (index === -1 || current === undefined) {
    return { state, valid: false, description: `Unknown phase "${phaseName}"` };
  }

  const to = targetStatus(event);
  if (!isValidPhaseTransition(current.status, to)) {
    return {
      state,
      valid: false,
      description: `Phase "${phaseName}" cannot go from ${current.status} to ${to}`,
    };
  }

  let record: PhaseRecord;
  let runUpdate: Partial<InstallationState> = {};
  let description: string;

  switch (event.type) {
    case 'ATTEMPT_STARTED':
      record = {
        ...current,
        status: 'running',
        attempts: current.attempts + 1,
        startedAt: current.status === 'running' && event.attempt > 1 ? current.startedAt : now,
        finishedAt: null,
        durationMs: null,
      };
      runUpdate = { status: 'in_progress', lastPhaseIndex: index, lastPhaseName: phaseName };
      description = `Phase "${phaseName}" attempt ${event.attempt} started`;
      break;

    case 'SUCCEEDED':
      record = {
        ...current,
        status: 'succeeded',
        finishedAt: now,
        durationMs: event.durationMs,
        lastError: null,
      };
      description = `Phase "${phaseName}" succeeded`;
      break;

    case 'FAILED':
      record = {
        ...current,
        status: 'failed',
        finishedAt: now,
        durationMs: event.durationMs,
        lastError: event.error.message,
      };
      runUpdate = { status: 'failed', lastError: event.error };
      description = `Phase "${phaseName}" failed: ${event.error.message}`;
      break;

    case 'SKIPPED':
      record = { ...current, status: 'skipped', finishedAt: now };
      description = `Phase "${phaseName}" skipped`;
      break;
  }

  return {
    state: {
      ...state,
      ...runUpdate,
      phases: { ...state.phases, [phaseName]: record },
      updatedAt: now,
    },
    valid: true,
    description,
  };
}

/**
 * Record a run-level failure that did not come from a phase attempt
 * (e.g. the backup before a destructive phase)
 */
export function recordRunError(
  state: InstallationState,
  error: RecordedError,
  now: string
): InstallationState {
  return { ...state, status: 'failed', lastError: error, updatedAt: now };
}

export function recordBackup(
  state: InstallationState,
  backupName: string,
  now: string
): InstallationState {
  return { ...state, backups: [...state.backups, backupName], updatedAt: now };
}

export function markRunComplete(state: InstallationState, now: string): InstallationState {
  return { ...state, status: 'complete', lastError: null, updatedAt: now };
}

export function isPhaseDone(status: PhaseStatus): boolean {
  return status === 'succeeded' || status === 'skipped';
}

export interface ProgressSummary {
  total: number;
  counts: Record<PhaseStatus, number>;
  /** First phase that is not succeeded or skipped */
  nextPhase: string | null;
}

export function summarizeProgress(state: InstallationState): ProgressSummary {
  const counts: Record<PhaseStatus, number> = {
    pending: 0,
    running: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
  };
  let nextPhase: string | null = null;
  for (const name of state.phaseOrder) {
    const status = state.phases[name]?.status ?? 'pending';
    counts[status] += 1;
    if (nextPhase === null && !isPhaseDone(status)) {
      nextPhase = name;
    }
  }
  return { total: state.phaseOrder.length, counts, nextPhase };
}
