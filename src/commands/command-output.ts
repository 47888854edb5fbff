/**
 * Output sinks shared by the commands
 */

import { InstallError } from '../types/errors';
import { ExitCode, exitCodeForError } from '../types/exit-codes';
import { ParsedArgs, DEFAULT_ARGS } from '../cli/types';

export interface CommandOutput {
  /** Results (summaries, JSON) */
  stdout(text: string): void;
  /** Progress, prompts and errors */
  stderr(text: string): void;
}

export const processOutput: CommandOutput = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/**
 * Print a halting error and return its exit code
 */
export function reportError(output: CommandOutput, error: InstallError): ExitCode {
  output.stderr(`${error.kind}: ${error.message}\n`);
  return exitCodeForError(error.kind);
}

function quote(value: string): string {
  return /^[A-Za-z0-9_./:=-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * The command line that resumes the current installation
 */
export function resumeCommandFor(args: ParsedArgs): string {
  const parts = ['phaseguard', 'install', '--resume'];
  if (args.configPath !== DEFAULT_ARGS.configPath) {
    parts.push('--config', quote(args.configPath));
  }
  if (args.stateDir !== null) {
    parts.push('--state-dir', quote(args.stateDir));
  }
  return parts.join(' ');
}
