/**
 * Runs the CLI in-process against a temp directory
 */

import { join } from 'node:path';
import { runCli } from '../../src/cli/run-cli';
import { ExitCode } from '../../src/types/exit-codes';
import { BufferLogger } from '../../src/logging/buffer-logger';
import { createSpinnerService } from '../../src/ui/spinner-service';
import { SystemProbe } from '../../src/preflight/system-checks';
import { FakeProcessRunner } from './fake-process-runner';
import { FakePrompter } from './fake-prompter';
import { CapturedOutput, captureOutput } from './captured-output';
import { TempDirContext } from './temp-directory';

const GB = 1024 * 1024 * 1024;

export const healthyProbe: SystemProbe = {
  freeDiskBytes: async () => 100 * GB,
  totalMemoryBytes: () => 16 * GB,
  cpuCount: () => 8,
  portState: async () => 'free',
};

export interface CliRun {
  code: ExitCode;
  output: CapturedOutput;
  logger: BufferLogger;
}

export interface CliHarnessOptions {
  processRunner: FakeProcessRunner;
  prompter?: FakePrompter;
  probe?: SystemProbe;
  signal?: AbortSignal;
}

export async function runPhaseguard(
  temp: TempDirContext,
  args: string[],
  options: CliHarnessOptions
): Promise<CliRun> {
  const output = captureOutput();
  const logger = new BufferLogger();
  const code = await runCli(['node', 'phaseguard', ...args], {
    cwd: temp.path,
    output,
    signal: options.signal,
    spinners: createSpinnerService({ quiet: true }),
    probe: options.probe ?? healthyProbe,
    overrides: {
      processRunner: options.processRunner,
      prompter: options.prompter ?? new FakePrompter({ interactive: false }),
      logger,
      userConfigPath: join(temp.path, 'user-config.json'),
    },
  });
  return { code, output, logger };
}
