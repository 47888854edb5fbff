/**
 * Buffer Logger
 * Keeps events in memory with no output; used by tests and by commands
 * that print their own report.
 */

import { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from '../types/logger';
import { BaseLogger } from './base-logger';

export class BufferLogger extends BaseLogger {
  private readonly sink: LogEvent[];

  /**
   * @param sink - shared event list; children append to their parent's sink
   */
  constructor(options: LoggerOptions = {}, sink?: LogEvent[]) {
    super(options, 'debug');
    this.sink = sink ?? this.events;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new BufferLogger(this.options, this.sink);
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  protected output(event: LogEvent): void {
    if (this.sink !== this.events) {
      this.sink.push(event);
    }
  }

  getEvents(): LogEvent[] {
    return [...this.sink];
  }

  clear(): void {
    this.sink.length = 0;
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.sink.filter((e) => e.level === level);
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.sink.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.sink.some((e) => e.eventType === eventType);
  }

  getEventsMatching(pattern: RegExp): LogEvent[] {
    return this.sink.filter((e) => pattern.test(e.message));
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
