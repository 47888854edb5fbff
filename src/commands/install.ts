/**
 * install: run the deployment phases, fresh or resumed
 */

import { Runtime, createInstallOrchestrator } from '../orchestration/orchestrator-factory';
import { ParsedArgs } from '../cli/types';
import { ExitCode, exitCodeForError } from '../types/exit-codes';
import { PreflightReport } from '../types/preflight';
import { RunResult } from '../core/orchestrator';
import { SystemProbe } from '../preflight/system-checks';
import { formatRunSummary, toRunSummaryJson } from '../logging/run-summary';
import { SpinnerService, createSpinnerService } from '../ui/spinner-service';
import { PhaseProgressReporter } from '../ui/phase-progress';
import { CommandOutput, resumeCommandFor } from './command-output';

export interface InstallCommandOptions {
  args: ParsedArgs;
  output: CommandOutput;
  /** Operator interrupt */
  signal?: AbortSignal;
  spinners?: SpinnerService;
  probe?: SystemProbe;
}

export async function runInstallCommand(runtime: Runtime, options: InstallCommandOptions): Promise<ExitCode> {
  const { args, output } = options;
  const { config, prompter, logger } = runtime;
  const spinners = options.spinners ?? createSpinnerService({ quiet: config.verbosity.jsonOutput });
  const progress = new PhaseProgressReporter(spinners, output.stderr);

  const confirmPreflightOverride = async (report: PreflightReport): Promise<boolean> => {
    if (!prompter.isInteractive()) {
      return false;
    }
    spinners.stopAll();
    output.stderr('Pre-flight checks failed:\n');
    for (const check of report.results.filter((r) => !r.passed)) {
      output.stderr(`  ✗ ${check.name}: ${check.message}\n`);
    }
    const answer = await prompter.confirm({ message: 'Continue the installation anyway?', default: false });
    if (!answer.ok) {
      logger.warn(answer.error.message);
      return false;
    }
    return answer.value;
  };

  const built = createInstallOrchestrator(runtime, {
    observer: progress,
    probe: options.probe,
    confirmPreflightOverride,
  });
  if (!built.ok) {
    output.stderr(`Error: ${built.error}\n`);
    return ExitCode.USAGE_ERROR;
  }

  let result: RunResult;
  try {
    result = await built.value.orchestrator.run(built.value.phases, {
      resume: args.resume,
      configSnapshot: runtime.deployment.plan.settings,
      forceRerun: args.forceRerun,
      skipPhases: args.skipPhases,
      skipChecks: args.skipChecks,
      signal: options.signal,
    });
  } finally {
    progress.finish();
  }

  if (config.verbosity.jsonOutput) {
    output.stdout(`${JSON.stringify(toRunSummaryJson(result), null, 2)}\n`);
  } else {
    output.stdout(formatRunSummary(result, resumeCommandFor(args)));
  }

  return result.error ? exitCodeForError(result.error.kind) : ExitCode.SUCCESS;
}
