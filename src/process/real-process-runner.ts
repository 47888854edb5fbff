/**
 * Real ProcessRunner
 * child_process.spawn without a shell, with line tails, optional stdout
 * piping and abort support.
 */

import { spawn, ChildProcess } from 'child_process';
import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Keeps the last N complete lines of a stream
 */
export class TailBuffer {
  private lines: string[] = [];
  private partial = '';
  private readonly maxLines: number;

  constructor(maxLines: number = 50) {
    this.maxLines = maxLines;
  }

  append(data: string): void {
    this.partial += data;
    const parts = this.partial.split('\n');
    this.partial = parts.pop() ?? '';
    for (const line of parts) {
      this.lines.push(line);
      if (this.lines.length > this.maxLines) {
        this.lines.shift();
      }
    }
  }

  getLines(): string[] {
    const lines = this.partial ? [...this.lines, this.partial] : [...this.lines];
    return lines.slice(-this.maxLines);
  }
}

export class RealProcessRunner implements ProcessRunner {
  private runningProcesses: Set<ChildProcess> = new Set();

  spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();
    const tailLines = options.tailLines ?? 50;
    const stdoutTail = new TailBuffer(tailLines);
    const stderrTail = new TailBuffer(tailLines);

    return new Promise((resolve, reject) => {
      const env = options.env ? { ...process.env, ...options.env } : process.env;

      const child = spawn(command, options.args, {
        cwd: options.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
        signal: options.signal,
      });
      this.runningProcesses.add(child);

      const sink = options.stdoutTo;
      if (sink && child.stdout) {
        const stdout = child.stdout;
        stdout.pipe(sink);
        // Keep draining a failed sink so the child cannot block on a full pipe
        sink.once('error', () => {
          stdout.unpipe(sink);
          stdout.resume();
        });
      } else {
        child.stdout?.on('data', (data: Buffer) => {
          const str = data.toString();
          stdoutTail.append(str);
          options.onStdout?.(str);
        });
      }

      child.stderr?.on('data', (data: Buffer) => {
        const str = data.toString();
        stderrTail.append(str);
        options.onStderr?.(str);
      });

      let spawnError: Error | null = null;

      child.on('error', (error) => {
        // An abort surfaces as an AbortError followed by 'close'; anything
        // else means the process never started.
        if (error.name === 'AbortError') {
          return;
        }
        spawnError = error;
        this.runningProcesses.delete(child);
        reject(error);
      });

      child.on('close', (code, sig) => {
        this.runningProcesses.delete(child);
        if (spawnError) {
          return;
        }
        const interrupted = sig !== null || options.signal?.aborted === true;
        resolve({
          exitCode: code ?? (interrupted ? 130 : 1),
          durationMs: Date.now() - startTime,
          stdoutTail: stdoutTail.getLines(),
          stderrTail: stderrTail.getLines(),
          interrupted,
          signal: sig ?? undefined,
        });
      });
    });
  }

  killAll(signal: NodeJS.Signals = 'SIGTERM'): void {
    for (const child of this.runningProcesses) {
      child.kill(signal);
    }
    this.runningProcesses.clear();
  }
}

export function createRealProcessRunner(): ProcessRunner {
  return new RealProcessRunner();
}
