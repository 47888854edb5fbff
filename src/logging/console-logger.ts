/**
 * Console Logger
 * Pretty single-line output for operators, or JSON lines with --json.
 */

import { Logger, LogLevel, LogMetadata, LogEvent, LoggerOptions } from '../types/logger';
import { BaseLogger } from './base-logger';

const LEVEL_INDICATORS: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
};

const PLAIN_EVENT_TYPES = new Set(['debug', 'info', 'warn', 'error']);

export class ConsoleLogger extends BaseLogger {
  constructor(options: LoggerOptions = {}) {
    super({ includeTimestamp: true, jsonOutput: false, ...options }, 'info');
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new ConsoleLogger(this.options);
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  protected output(event: LogEvent): void {
    const line = this.options.jsonOutput ? JSON.stringify(event) : this.formatPretty(event);

    // JSON output keeps stdout for the final run summary
    if (event.level === 'error' || this.options.jsonOutput) {
      console.error(line);
    } else if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      parts.push(`[${new Date(event.timestamp).toLocaleTimeString()}]`);
    }
    parts.push(LEVEL_INDICATORS[event.level]);
    if (!PLAIN_EVENT_TYPES.has(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }
    parts.push(event.message);

    const { runId, phase, attempt } = event.metadata;
    const metaParts: string[] = [];
    if (runId) metaParts.push(`run=${runId}`);
    if (phase) metaParts.push(`phase=${phase}`);
    if (attempt !== undefined) metaParts.push(`attempt=${attempt}`);
    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    return parts.join(' ');
  }
}

export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
