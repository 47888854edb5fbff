#!/usr/bin/env node

import { runCli } from './run-cli';
import { processOutput } from '../commands/command-output';
import { createRealProcessRunner } from '../process/real-process-runner';
import { ExitCode } from '../types/exit-codes';
import { describeError } from '../types/errors';

async function main(): Promise<void> {
  const controller = new AbortController();
  const processRunner = createRealProcessRunner();
  let interrupts = 0;

  // First signal: cancel and let the current step settle. Second: kill children and leave.
  const onSignal = (signal: NodeJS.Signals): void => {
    interrupts += 1;
    if (interrupts === 1) {
      process.stderr.write(`\nReceived ${signal}; stopping after the current step (repeat to force)\n`);
      controller.abort();
      return;
    }
    processRunner.killAll?.('SIGKILL');
    process.exit(ExitCode.INTERRUPTED);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    process.exitCode = await runCli(process.argv, {
      cwd: process.cwd(),
      output: processOutput,
      signal: controller.signal,
      overrides: { processRunner },
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main().catch((error: unknown) => {
  console.error(`Unexpected error: ${describeError(error)}`);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = ExitCode.UNEXPECTED_ERROR;
});
