/**
 * Scripted ProcessRunner for tests
 *
 * Responses are keyed by command name; every call is recorded.
 */

import { ProcessRunner, SpawnOptions, SpawnResult } from '../../src/types/process-runner';

export interface FakeResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  /** Never settle until the spawn signal aborts, then report an interrupted exit */
  hang?: boolean;
  /** Reject as if the binary could not be started */
  spawnError?: string;
}

export type FakeHandler = (options: SpawnOptions) => FakeResponse | Promise<FakeResponse>;

export interface FakeCall {
  command: string;
  options: SpawnOptions;
}

function lines(text: string | undefined): string[] {
  return (text ?? '').split('\n').filter((line) => line.length > 0);
}

export class FakeProcessRunner implements ProcessRunner {
  readonly calls: FakeCall[] = [];
  private readonly handlers = new Map<string, FakeHandler>();
  private fallback: FakeHandler = () => ({ exitCode: 0 });
  killAllCalls = 0;

  /**
   * Respond to `command` with a fixed response, a queue of responses (one per
   * call, the last one repeating), or a handler
   */
  on(command: string, response: FakeResponse | FakeResponse[] | FakeHandler): this {
    if (typeof response === 'function') {
      this.handlers.set(command, response);
    } else if (Array.isArray(response)) {
      const queue = [...response];
      this.handlers.set(command, () => (queue.length > 1 ? queue.shift() : queue[0]) ?? { exitCode: 0 });
    } else {
      this.handlers.set(command, () => response);
    }
    return this;
  }

  otherwise(handler: FakeHandler): this {
    this.fallback = handler;
    return this;
  }

  callsTo(command: string): FakeCall[] {
    return this.calls.filter((call) => call.command === command);
  }

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    this.calls.push({ command, options });
    const handler = this.handlers.get(command) ?? this.fallback;
    const response = await handler(options);

    if (response.spawnError !== undefined) {
      throw new Error(response.spawnError);
    }
    if (response.hang) {
      await new Promise<void>((resolve) => {
        if (options.signal?.aborted) {
          resolve();
          return;
        }
        options.signal?.addEventListener('abort', () => resolve(), { once: true });
      });
      return {
        exitCode: 130,
        durationMs: 0,
        stdoutTail: [],
        stderrTail: [],
        interrupted: true,
        signal: 'SIGTERM',
      };
    }

    if (options.stdoutTo) {
      options.stdoutTo.end(response.stdout ?? '');
    }
    return {
      exitCode: response.exitCode ?? 0,
      durationMs: 0,
      stdoutTail: options.stdoutTo ? [] : lines(response.stdout),
      stderrTail: lines(response.stderr),
      interrupted: false,
    };
  }

  killAll(): void {
    this.killAllCalls += 1;
  }
}
