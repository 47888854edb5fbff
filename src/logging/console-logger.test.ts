import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger } from './console-logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print a pretty line with the event type and context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ includeTimestamp: false });

    logger.child({ runId: 'run-1' }).event('phase_started', 'Starting build', { phase: 'build', attempt: 2 });

    expect(log).toHaveBeenCalledWith('ℹ️ (phase_started) Starting build {run=run-1, phase=build, attempt=2}');
  });

  it('should route warnings and errors to their console methods', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ includeTimestamp: false });

    logger.warn('disk is low');
    logger.error('phase failed');

    expect(warn).toHaveBeenCalledWith('⚠️ disk is low');
    expect(error).toHaveBeenCalledWith('❌ phase failed');
  });

  it('should write JSON lines to stderr in JSON mode', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ jsonOutput: true });

    logger.info('hello', { phase: 'build' });

    const line = error.mock.calls[0]?.[0];
    expect(typeof line).toBe('string');
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'info',
      eventType: 'info',
      message: 'hello',
      metadata: { phase: 'build' },
    });
  });

  it('should not print debug events at the default level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    new ConsoleLogger({ includeTimestamp: false }).debug('noise');
    expect(log).not.toHaveBeenCalled();
  });
});
