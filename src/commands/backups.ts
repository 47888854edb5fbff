/**
 * backups: list, verify and prune captured backups
 */

import { Runtime } from '../orchestration/orchestrator-factory';
import { ParsedArgs } from '../cli/types';
import { ExitCode } from '../types/exit-codes';
import { BackupRecord } from '../schemas/installation-state.schema';
import { CommandOutput, reportError } from './command-output';

export interface BackupListEntry {
  name: string;
  createdAt: string;
  phase: string | null;
  runId: string | null;
  artifacts: number;
  totalSize: number;
}

export function toBackupListEntry(record: BackupRecord): BackupListEntry {
  return {
    name: record.name,
    createdAt: record.createdAt,
    phase: record.triggeredBy?.phase ?? null,
    runId: record.triggeredBy?.runId ?? null,
    artifacts: record.artifacts.length,
    totalSize: record.totalSize,
  };
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

async function listBackups(runtime: Runtime, output: CommandOutput): Promise<ExitCode> {
  const listed = await runtime.backupManager.listAvailable();
  if (!listed.ok) {
    return reportError(output, listed.error);
  }

  if (runtime.config.verbosity.jsonOutput) {
    output.stdout(`${JSON.stringify(listed.value.map(toBackupListEntry), null, 2)}\n`);
    return ExitCode.SUCCESS;
  }

  if (listed.value.length === 0) {
    output.stdout(`No backups in ${runtime.config.paths.backupDir}\n`);
    return ExitCode.SUCCESS;
  }
  for (const entry of listed.value.map(toBackupListEntry)) {
    const trigger = entry.phase !== null ? `before ${entry.phase}` : 'manual';
    output.stdout(
      `${entry.name}  ${entry.createdAt}  ${trigger}  ${entry.artifacts} artifact(s), ${formatSize(entry.totalSize)}\n`
    );
  }
  return ExitCode.SUCCESS;
}

async function verifyBackup(runtime: Runtime, name: string, output: CommandOutput): Promise<ExitCode> {
  const found = await runtime.backupManager.findByName(name);
  if (!found.ok) {
    return reportError(output, found.error);
  }

  const failures = await runtime.backupManager.verify(found.value);
  if (runtime.config.verbosity.jsonOutput) {
    output.stdout(`${JSON.stringify({ name, intact: failures.length === 0, failures }, null, 2)}\n`);
  } else if (failures.length === 0) {
    output.stdout(`${name}: ${found.value.artifacts.length} artifact(s) intact\n`);
  } else {
    output.stdout(`${name}: ${failures.length} artifact(s) failed verification\n`);
    for (const failure of failures) {
      output.stdout(`  ✗ ${failure.label} (${failure.storedPath}): ${failure.problem}\n`);
    }
  }
  return failures.length === 0 ? ExitCode.SUCCESS : ExitCode.RESTORE_ERROR;
}

async function pruneBackups(runtime: Runtime, args: ParsedArgs, output: CommandOutput): Promise<ExitCode> {
  const { backupManager, runLock, config } = runtime;

  const lock = await runLock.acquire(null);
  if (!lock.ok) {
    return reportError(output, lock.error);
  }

  try {
    const pruned = await backupManager.prune({
      maxCount: args.keep ?? config.retention.maxCount,
      maxAgeDays: args.maxAgeDays ?? config.retention.maxAgeDays,
    });
    if (!pruned.ok) {
      return reportError(output, pruned.error);
    }
    if (config.verbosity.jsonOutput) {
      output.stdout(`${JSON.stringify({ removed: pruned.value }, null, 2)}\n`);
    } else if (pruned.value.length === 0) {
      output.stdout('Nothing to prune\n');
    } else {
      output.stdout(`Pruned ${pruned.value.length} backup(s): ${pruned.value.join(', ')}\n`);
    }
    return ExitCode.SUCCESS;
  } finally {
    await lock.value.release();
  }
}

export async function runBackupsCommand(
  runtime: Runtime,
  args: ParsedArgs,
  output: CommandOutput
): Promise<ExitCode> {
  const [action = 'list', name] = args.positionals;
  switch (action) {
    case 'list':
      return listBackups(runtime, output);
    case 'verify':
      if (name === undefined) {
        output.stderr('Error: Usage: backups verify <name>\n');
        return ExitCode.USAGE_ERROR;
      }
      return verifyBackup(runtime, name, output);
    case 'prune':
      return pruneBackups(runtime, args, output);
    default:
      output.stderr(`Error: Unknown backups action: ${action}\n`);
      return ExitCode.USAGE_ERROR;
  }
}
