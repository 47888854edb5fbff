/**
 * restore: put the deployment files of a backup back in place
 */

import { Runtime } from '../orchestration/orchestrator-factory';
import { ParsedArgs } from '../cli/types';
import { ExitCode } from '../types/exit-codes';
import { InstallError, createInstallError } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { BackupRecord } from '../schemas/installation-state.schema';
import { CommandOutput, reportError } from './command-output';

type Selection = { record: BackupRecord } | { exitCode: ExitCode };

async function chooseBackup(
  runtime: Runtime,
  args: ParsedArgs,
  output: CommandOutput
): Promise<Result<Selection, InstallError>> {
  const { backupManager, prompter } = runtime;
  const name = args.positionals[0];

  if (name !== undefined) {
    const found = await backupManager.findByName(name);
    return found.ok ? ok({ record: found.value }) : found;
  }

  const listed = await backupManager.listAvailable();
  if (!listed.ok) {
    return listed;
  }
  const newest = listed.value[0];
  if (newest === undefined) {
    return err(createInstallError('RestoreError', `No backups in ${runtime.config.paths.backupDir}`));
  }
  if (args.latest) {
    return ok({ record: newest });
  }

  if (!prompter.isInteractive()) {
    output.stderr('Error: Give a backup name or --latest when prompts are disabled\n');
    return ok({ exitCode: ExitCode.USAGE_ERROR });
  }
  const picked = await prompter.select<BackupRecord>({
    message: 'Restore which backup?',
    choices: listed.value.map((record) => ({
      name: record.name,
      value: record,
      description: record.triggeredBy ? `before ${record.triggeredBy.phase}` : undefined,
    })),
    default: newest,
  });
  if (!picked.ok) {
    output.stderr(`${picked.error.message}\n`);
    return ok({ exitCode: picked.error.code === 'CANCELLED' ? ExitCode.INTERRUPTED : ExitCode.USAGE_ERROR });
  }
  return ok({ record: picked.value });
}

export async function runRestoreCommand(
  runtime: Runtime,
  args: ParsedArgs,
  output: CommandOutput
): Promise<ExitCode> {
  const { backupManager, runLock, prompter, config } = runtime;

  if (!args.yes && !prompter.isInteractive()) {
    output.stderr('Error: restore replaces live files; pass --yes when prompts are disabled\n');
    return ExitCode.USAGE_ERROR;
  }

  // Never restore under a running install
  const lock = await runLock.acquire(null);
  if (!lock.ok) {
    return reportError(output, lock.error);
  }

  try {
    const selection = await chooseBackup(runtime, args, output);
    if (!selection.ok) {
      return reportError(output, selection.error);
    }
    if ('exitCode' in selection.value) {
      return selection.value.exitCode;
    }
    const record = selection.value.record;

    if (!args.yes) {
      const files = record.artifacts.filter((a) => a.kind === 'file').length;
      const confirmed = await prompter.confirm({
        message: `Replace ${files} live file(s) with the copies from ${record.name}?`,
        default: false,
      });
      if (!confirmed.ok) {
        output.stderr(`${confirmed.error.message}\n`);
        return confirmed.error.code === 'CANCELLED' ? ExitCode.INTERRUPTED : ExitCode.USAGE_ERROR;
      }
      if (!confirmed.value) {
        output.stdout('Nothing restored\n');
        return ExitCode.SUCCESS;
      }
    }

    const restored = await backupManager.restore(record);
    if (!restored.ok) {
      return reportError(output, restored.error);
    }

    const report = restored.value;
    if (config.verbosity.jsonOutput) {
      output.stdout(`${JSON.stringify({ name: record.name, ...report }, null, 2)}\n`);
      return ExitCode.SUCCESS;
    }
    output.stdout(`Restored ${report.restored.length} file(s) from ${record.name}\n`);
    for (const path of report.restored) {
      output.stdout(`  ✓ ${path}\n`);
    }
    if (report.manual.length > 0) {
      output.stdout('Apply these dumps by hand:\n');
      for (const path of report.manual) {
        output.stdout(`  ${path}\n`);
      }
    }
    return ExitCode.SUCCESS;
  } finally {
    await lock.value.release();
  }
}
