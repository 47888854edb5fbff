/**
 * ProcessRunner interface
 * Subprocess execution for command-backed phases, backup dumps and
 * pre-flight probes.
 */

import { Writable } from 'stream';

export interface SpawnOptions {
  /** Arguments passed to the command (no shell) */
  args: string[];
  /** Working directory */
  cwd: string;
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
  /** Kill the process when this signal aborts */
  signal?: AbortSignal;
  /**
   * Pipe stdout into this stream (for dumps) instead of keeping a tail.
   * The stream is ended when stdout closes.
   */
  stdoutTo?: Writable;
  /** Number of lines kept in the tail buffers (default: 50) */
  tailLines?: number;
  onStdout?: (data: string) => void;
  onStderr?: (data: string) => void;
}

export interface SpawnResult {
  exitCode: number;
  durationMs: number;
  /** Last lines of stdout, empty when stdout was piped */
  stdoutTail: string[];
  /** Last lines of stderr */
  stderrTail: string[];
  /** Terminated by a signal, including an abort */
  interrupted: boolean;
  /** Signal that terminated the process, if any */
  signal?: string;
}

export interface ProcessRunner {
  /**
   * Run a command to completion.
   * Rejects only when the process cannot be started (e.g. ENOENT).
   */
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;

  /**
   * Kill every process this runner started that is still running
   */
  killAll?(signal?: NodeJS.Signals): void;
}
