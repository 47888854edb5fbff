/**
 * status: show the saved installation state
 */

import { Runtime } from '../orchestration/orchestrator-factory';
import { ExitCode } from '../types/exit-codes';
import { InstallationState } from '../schemas/installation-state.schema';
import { formatStatePlan } from '../logging/run-summary';
import { summarizeProgress } from '../core/phase-transitions';
import { CommandOutput, reportError } from './command-output';

/**
 * State as printed by `status --json`. The configuration snapshot may hold
 * secrets and is left out.
 */
export type StatusJson = Omit<InstallationState, 'configSnapshot'> & {
  nextPhase: string | null;
  archives: string[];
};

export function toStatusJson(state: InstallationState, archives: string[]): StatusJson {
  const { configSnapshot, ...rest } = state;
  void configSnapshot;
  return { ...rest, nextPhase: summarizeProgress(state).nextPhase, archives };
}

export async function runStatusCommand(runtime: Runtime, output: CommandOutput): Promise<ExitCode> {
  const { stateStore, config } = runtime;

  const loaded = await stateStore.load();
  if (!loaded.ok) {
    return reportError(output, loaded.error);
  }
  const archives = await stateStore.listArchives();
  if (!archives.ok) {
    return reportError(output, archives.error);
  }

  const state = loaded.value;
  if (config.verbosity.jsonOutput) {
    const body = state === null ? { state: null, archives: archives.value } : toStatusJson(state, archives.value);
    output.stdout(`${JSON.stringify(body, null, 2)}\n`);
    return ExitCode.SUCCESS;
  }

  if (state === null) {
    output.stdout(`No installation in progress (${stateStore.statePath} does not exist)\n`);
  } else {
    output.stdout(`${formatStatePlan(state)}\n`);
  }
  if (archives.value.length > 0) {
    output.stdout(`\n${archives.value.length} archived run(s) in ${config.paths.stateDir}\n`);
  }
  return ExitCode.SUCCESS;
}
