/**
 * Orchestrator Factory
 * Wires the deployment file, the resolved configuration and the real (or
 * injected) collaborators into the objects every command works with.
 */

import { resolve } from 'path';
import { EffectiveConfig } from '../types/effective-config';
import { Clock, SystemClock } from '../types/clock';
import { FileSystem } from '../types/file-system';
import { Logger, LogLevel } from '../types/logger';
import { ProcessRunner } from '../types/process-runner';
import { Prompter } from '../types/prompter';
import { PhaseDescriptor } from '../types/phase';
import { PreflightReport } from '../types/preflight';
import { Result, ok, err } from '../types/result';
import { createConsoleLogger } from '../logging/console-logger';
import { createRealFileSystem } from '../io/real-file-system';
import { loadDeploymentPlan, LoadedDeploymentPlan } from '../io/load-deployment-plan';
import { createRealProcessRunner } from '../process/real-process-runner';
import { createInquirerPrompter } from '../ui/inquirer-prompter';
import { resolveConfig, CliFlags } from '../config/resolve-config';
import { StateStore, createStateStore } from '../core/state-store';
import { RunLock, createRunLock } from '../core/run-lock';
import { BackupManager, createBackupManager } from '../core/backup-manager';
import { createRetryEngine } from '../core/retry-engine';
import { buildPhaseList, InvalidPhaseListError } from '../core/phase-list';
import { PhaseOrchestrator, RunObserver, createPhaseOrchestrator } from '../core/orchestrator';
import { buildCommandPhases } from '../phases/command-phase';
import { createDefaultChecks, runPreflight, SystemProbe } from '../preflight/system-checks';

/**
 * Collaborators a command may replace (tests inject fakes here)
 */
export interface RuntimeOverrides {
  fileSystem?: FileSystem;
  clock?: Clock;
  logger?: Logger;
  processRunner?: ProcessRunner;
  prompter?: Prompter;
  /** Defaults to ~/.config/phaseguard/config.json */
  userConfigPath?: string;
}

export interface RuntimeOptions extends RuntimeOverrides {
  workingDirectory: string;
  /** Deployment file, relative to the working directory */
  deploymentPath: string;
  cliFlags: CliFlags;
}

export interface Runtime {
  config: EffectiveConfig;
  deployment: LoadedDeploymentPlan;
  fileSystem: FileSystem;
  clock: Clock;
  logger: Logger;
  processRunner: ProcessRunner;
  prompter: Prompter;
  stateStore: StateStore;
  runLock: RunLock;
  backupManager: BackupManager;
}

export interface InstallOrchestratorOptions {
  observer?: RunObserver;
  /** Replaces the host probe used by the default pre-flight checks */
  probe?: SystemProbe;
  /** Asked when pre-flight fails in an interactive session */
  confirmPreflightOverride?: (report: PreflightReport) => Promise<boolean>;
}

function logLevelFor(config: EffectiveConfig): LogLevel {
  if (config.verbosity.debug) return 'debug';
  if (config.verbosity.verbose) return 'info';
  return 'warn';
}

/**
 * Load the deployment file, resolve configuration and build the shared
 * collaborators. Errors are operator mistakes (usage exit code).
 */
export function createRuntime(options: RuntimeOptions): Result<Runtime, string> {
  const loaded = loadDeploymentPlan(options.deploymentPath, options.workingDirectory);
  if (!loaded.ok) {
    return loaded;
  }
  const deployment = loaded.value;

  const resolved = resolveConfig(options.cliFlags, deployment.plan.orchestrator, {
    workingDirectory: deployment.baseDir,
    userConfigPath: options.userConfigPath,
  });
  if (!resolved.ok) {
    return resolved;
  }
  const config = resolved.value;

  const logger =
    options.logger ??
    createConsoleLogger({ minLevel: logLevelFor(config), jsonOutput: config.verbosity.jsonOutput });
  const fileSystem = options.fileSystem ?? createRealFileSystem();
  const clock = options.clock ?? new SystemClock();
  const processRunner = options.processRunner ?? createRealProcessRunner();
  const prompter = options.prompter ?? createInquirerPrompter({ interactive: config.interactive });

  const stateStore = createStateStore({ stateDir: config.paths.stateDir, fileSystem, clock, logger });
  const runLock = createRunLock({
    stateDir: config.paths.stateDir,
    fileSystem,
    clock,
    logger,
    staleAfterMs: config.lockStaleAfterMs,
  });
  const backupManager = createBackupManager({
    fileSystem,
    processRunner,
    clock,
    logger,
    targetDir: resolve(deployment.baseDir, deployment.plan.backup.targetDir),
    backupDir: config.paths.backupDir,
    artifacts: deployment.plan.backup.artifacts,
    dumps: deployment.plan.backup.dumps,
  });

  return ok({
    config,
    deployment,
    fileSystem,
    clock,
    logger,
    processRunner,
    prompter,
    stateStore,
    runLock,
    backupManager,
  });
}

/**
 * Build the orchestrator and the phase list of the deployment file
 */
export function createInstallOrchestrator(
  runtime: Runtime,
  options: InstallOrchestratorOptions = {}
): Result<{ orchestrator: PhaseOrchestrator; phases: readonly PhaseDescriptor[] }, string> {
  const { deployment, config } = runtime;

  let phases: readonly PhaseDescriptor[];
  try {
    phases = buildPhaseList(
      buildCommandPhases(deployment.plan.phases, {
        processRunner: runtime.processRunner,
        baseDir: deployment.baseDir,
        resolvePath: resolve,
      })
    );
  } catch (error) {
    if (error instanceof InvalidPhaseListError) {
      return err(`Invalid phase list in ${deployment.path}: ${error.message}`);
    }
    throw error;
  }

  const checks = createDefaultChecks(deployment.plan.preflight, {
    processRunner: runtime.processRunner,
    cwd: deployment.baseDir,
    probe: options.probe,
  });

  const orchestrator = createPhaseOrchestrator({
    stateStore: runtime.stateStore,
    runLock: runtime.runLock,
    backupManager: runtime.backupManager,
    retryEngine: createRetryEngine({
      clock: runtime.clock,
      logger: runtime.logger,
      backoff: config.backoff,
      cancelGraceMs: config.cancelGraceMs,
    }),
    clock: runtime.clock,
    logger: runtime.logger,
    preflight: () => runPreflight(checks),
    confirmPreflightOverride: options.confirmPreflightOverride,
    observer: options.observer,
  });

  return ok({ orchestrator, phases });
}
