/**
 * CLI dispatch: parse arguments, build the runtime, run one command.
 * Never exits the process; returns the exit code instead.
 */

import { resolve } from 'path';
import { parseArgs } from './arg-parser';
import { getUsageText } from './help';
import { ParsedArgs } from './types';
import { ExitCode } from '../types/exit-codes';
import { VERSION } from '../version';
import { CommandOutput } from '../commands/command-output';
import { runInstallCommand } from '../commands/install';
import { runStatusCommand } from '../commands/status';
import { runResetCommand } from '../commands/reset';
import { runBackupsCommand } from '../commands/backups';
import { runRestoreCommand } from '../commands/restore';
import { CliFlags } from '../config/resolve-config';
import { Runtime, RuntimeOverrides, createRuntime } from '../orchestration/orchestrator-factory';
import { SpinnerService } from '../ui/spinner-service';
import { SystemProbe } from '../preflight/system-checks';

export interface CliEnvironment {
  cwd: string;
  output: CommandOutput;
  /** Aborted on SIGINT/SIGTERM */
  signal?: AbortSignal;
  overrides?: RuntimeOverrides;
  spinners?: SpinnerService;
  probe?: SystemProbe;
}

function cliFlagsFor(args: ParsedArgs, cwd: string): CliFlags {
  return {
    stateDir: args.stateDir !== null ? resolve(cwd, args.stateDir) : undefined,
    verbose: args.verbose ? true : undefined,
    debug: args.debug ? true : undefined,
    jsonOutput: args.jsonOutput ? true : undefined,
    noInteractive: args.noInteractive ? true : undefined,
  };
}

async function dispatch(runtime: Runtime, args: ParsedArgs, env: CliEnvironment): Promise<ExitCode> {
  switch (args.command) {
    case 'install':
      return runInstallCommand(runtime, {
        args,
        output: env.output,
        signal: env.signal,
        spinners: env.spinners,
        probe: env.probe,
      });
    case 'status':
      return runStatusCommand(runtime, env.output);
    case 'reset':
      return runResetCommand(runtime, env.output);
    case 'backups':
      return runBackupsCommand(runtime, args, env.output);
    case 'restore':
      return runRestoreCommand(runtime, args, env.output);
  }
}

export async function runCli(argv: string[], env: CliEnvironment): Promise<ExitCode> {
  const parsed = parseArgs(argv);
  if (!parsed.success || !parsed.args) {
    env.output.stderr(`${parsed.error ?? 'Error: Invalid arguments'}\n\n${getUsageText()}\n`);
    return ExitCode.USAGE_ERROR;
  }
  const args = parsed.args;

  if (args.help) {
    env.output.stdout(`${getUsageText()}\n`);
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    env.output.stdout(`${VERSION}\n`);
    return ExitCode.SUCCESS;
  }

  const runtime = createRuntime({
    workingDirectory: env.cwd,
    deploymentPath: args.configPath,
    cliFlags: cliFlagsFor(args, env.cwd),
    ...env.overrides,
  });
  if (!runtime.ok) {
    env.output.stderr(`Error: ${runtime.error}\n`);
    return ExitCode.USAGE_ERROR;
  }

  return dispatch(runtime.value, args, env);
}
