/**
 * reset: archive the saved state so the next install starts fresh
 */

import { Runtime } from '../orchestration/orchestrator-factory';
import { ExitCode } from '../types/exit-codes';
import { CommandOutput, reportError } from './command-output';

export async function runResetCommand(runtime: Runtime, output: CommandOutput): Promise<ExitCode> {
  const { stateStore, runLock } = runtime;

  // Never archive under a running install
  const lock = await runLock.acquire(null);
  if (!lock.ok) {
    return reportError(output, lock.error);
  }

  try {
    const archived = await stateStore.archive('reset');
    if (!archived.ok) {
      return reportError(output, archived.error);
    }
    if (archived.value === null) {
      output.stdout('No installation state to reset\n');
    } else {
      output.stdout(`State archived to ${archived.value}\nThe next install starts from the first phase.\n`);
    }
    return ExitCode.SUCCESS;
  } finally {
    await lock.value.release();
  }
}
