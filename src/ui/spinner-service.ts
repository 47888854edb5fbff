/**
 * Spinner Service
 * Phase progress on the terminal: ora in a TTY, one line per update
 * otherwise, nothing at all in quiet or JSON mode.
 */

import ora, { Ora } from 'ora';

export type SpinnerColor = 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

export interface Spinner {
  start(): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  info(text?: string): void;
  setText(text: string): void;
  stop(): void;
  readonly isSpinning: boolean;
}

export interface SpinnerServiceConfig {
  /** Whether TTY output is available */
  isTTY: boolean;
  /** Suppress all output */
  quiet: boolean;
  /** Progress goes to stderr so stdout stays clean for results */
  stream: NodeJS.WriteStream;
}

/**
 * A no-op spinner for quiet mode
 */
class NullSpinner implements Spinner {
  private spinning = false;

  start(): void {
    this.spinning = true;
  }
  succeed(): void {
    this.spinning = false;
  }
  fail(): void {
    this.spinning = false;
  }
  warn(): void {
    this.spinning = false;
  }
  info(): void {
    this.spinning = false;
  }
  setText(): void {
    // Nothing to update
  }
  stop(): void {
    this.spinning = false;
  }
  get isSpinning(): boolean {
    return this.spinning;
  }
}

/**
 * Line-per-update output for logs and CI
 */
class TextSpinner implements Spinner {
  private spinning = false;
  private text: string;
  private readonly stream: NodeJS.WriteStream;

  constructor(text: string, stream: NodeJS.WriteStream) {
    this.text = text;
    this.stream = stream;
  }

  start(): void {
    this.spinning = true;
    this.stream.write(`> ${this.text}\n`);
  }

  succeed(text?: string): void {
    this.finish('✅', text);
  }

  fail(text?: string): void {
    this.finish('❌', text);
  }

  warn(text?: string): void {
    this.finish('⚠️ ', text);
  }

  info(text?: string): void {
    this.finish('ℹ️ ', text);
  }

  setText(text: string): void {
    this.text = text;
    if (this.spinning) {
      this.stream.write(`> ${text}\n`);
    }
  }

  stop(): void {
    this.spinning = false;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }

  private finish(symbol: string, text?: string): void {
    this.spinning = false;
    this.stream.write(`${symbol} ${text ?? this.text}\n`);
  }
}

class OraSpinner implements Spinner {
  private readonly oraInstance: Ora;

  constructor(text: string, stream: NodeJS.WriteStream, color?: SpinnerColor) {
    this.oraInstance = ora({ text, color, stream });
  }

  start(): void {
    this.oraInstance.start();
  }

  succeed(text?: string): void {
    this.oraInstance.succeed(text);
  }

  fail(text?: string): void {
    this.oraInstance.fail(text);
  }

  warn(text?: string): void {
    this.oraInstance.warn(text);
  }

  info(text?: string): void {
    this.oraInstance.info(text);
  }

  setText(text: string): void {
    this.oraInstance.text = text;
  }

  stop(): void {
    this.oraInstance.stop();
  }

  get isSpinning(): boolean {
    return this.oraInstance.isSpinning;
  }
}

export class SpinnerService {
  private readonly config: SpinnerServiceConfig;
  private activeSpinner: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    const stream = config.stream ?? process.stderr;
    this.config = {
      isTTY: config.isTTY ?? stream.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream,
    };
  }

  /**
   * Create and start a spinner, stopping any active one
   */
  start(text: string, color?: SpinnerColor): Spinner {
    if (this.activeSpinner?.isSpinning) {
      this.activeSpinner.stop();
    }

    let spinner: Spinner;
    if (this.config.quiet) {
      spinner = new NullSpinner();
    } else if (this.config.isTTY) {
      spinner = new OraSpinner(text, this.config.stream, color);
    } else {
      spinner = new TextSpinner(text, this.config.stream);
    }

    this.activeSpinner = spinner;
    spinner.start();
    return spinner;
  }

  /**
   * Stop any active spinner
   */
  stopAll(): void {
    if (this.activeSpinner?.isSpinning) {
      this.activeSpinner.stop();
    }
    this.activeSpinner = null;
  }

  getActive(): Spinner | null {
    return this.activeSpinner;
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
