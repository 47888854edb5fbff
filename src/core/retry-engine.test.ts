import { describe, it, expect, beforeEach } from 'vitest';
import { RetryEngine, createRetryEngine } from './retry-engine';
import { buildPhaseList } from './phase-list';
import { MockClock } from '../types/clock';
import { BufferLogger } from '../logging/buffer-logger';
import { PhaseDefinition, PhaseDescriptor } from '../types/phase';
import { createInstallError } from '../types/errors';
import { ok, err } from '../types/result';
import { drive } from '../../tests/utils/drive';
import { scriptedPhase, hangUntilAborted, ScriptStep } from '../../tests/fixtures/phases';

describe('RetryEngine', () => {
  let clock: MockClock;
  let logger: BufferLogger;
  let engine: RetryEngine;

  const single = (
    steps: ScriptStep[],
    overrides: Partial<Omit<PhaseDefinition, 'name' | 'action'>> = {}
  ): { phase: PhaseDescriptor; calls: () => number } => {
    const scripted = scriptedPhase('configure', steps, overrides);
    const [phase] = buildPhaseList([scripted.definition]);
    if (!phase) throw new Error('expected a phase');
    return { phase, calls: () => scripted.calls.length };
  };

  beforeEach(() => {
    clock = new MockClock();
    logger = new BufferLogger();
    engine = createRetryEngine({
      clock,
      logger,
      backoff: { baseDelayMs: 100, maxDelayMs: 1000 },
      cancelGraceMs: 500,
    });
  });

  it('should succeed on the first attempt without waiting', async () => {
    const { phase } = single([{ status: 'success' }]);
    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));
    expect(outcome).toEqual({ status: 'succeeded', attempts: 1, durationMs: 0 });
  });

  it('should retry retryable failures with exponential backoff', async () => {
    const { phase, calls } = single([
      { status: 'retryable', reason: 'mirror busy' },
      { status: 'retryable', reason: 'mirror busy' },
      { status: 'success' },
    ]);

    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));

    expect(outcome).toEqual({ status: 'succeeded', attempts: 3, durationMs: 300 });
    expect(calls()).toBe(3);
    expect(logger.getEventsByType('retry_scheduled').map((e) => e.metadata.delayMs)).toEqual([100, 200]);
    expect(logger.getEventsByType('attempt_failed').map((e) => e.message)).toEqual([
      'Attempt 1/3 failed: mirror busy',
      'Attempt 2/3 failed: mirror busy',
    ]);
  });

  it('should give up after maxRetries attempts', async () => {
    const { phase, calls } = single([{ status: 'retryable', reason: 'connection reset' }], { maxRetries: 4 });

    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));

    expect(outcome).toEqual({
      status: 'failed',
      attempts: 4,
      durationMs: 700,
      reason: 'Gave up after 4 attempt(s): connection reset',
      classification: 'retryable',
      exhausted: true,
    });
    expect(calls()).toBe(4);
  });

  it('should make exactly one attempt when maxRetries is 1', async () => {
    const { phase, calls } = single([{ status: 'retryable', reason: 'busy' }], { maxRetries: 1 });
    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));
    expect(outcome.status).toBe('failed');
    expect(outcome.attempts).toBe(1);
    expect(calls()).toBe(1);
    expect(logger.hasEventType('retry_scheduled')).toBe(false);
  });

  it('should stop at a fatal failure without retrying', async () => {
    const { phase, calls } = single([{ status: 'fatal', reason: 'bad credentials' }]);

    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));

    expect(outcome).toEqual({
      status: 'failed',
      attempts: 1,
      durationMs: 0,
      reason: 'bad credentials',
      classification: 'fatal',
    });
    expect(calls()).toBe(1);
  });

  it('should treat a throwing action as fatal', async () => {
    const { phase } = single([
      async () => {
        throw new Error('boom');
      },
    ]);
    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));
    expect(outcome.status).toBe('failed');
    expect(outcome.classification).toBe('fatal');
    expect(outcome.reason).toBe('Action threw: boom');
  });

  it('should treat a malformed result as fatal', async () => {
    const { phase } = single([async () => JSON.parse('{"status": "done"}')]);
    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));
    expect(outcome.reason).toBe('Action returned an invalid result');
    expect(outcome.classification).toBe('fatal');
  });

  it('should retry timed-out attempts of a non-destructive phase', async () => {
    const { phase, calls } = single([hangUntilAborted], { timeoutMs: 1000, maxRetries: 2 });

    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));

    expect(outcome).toEqual({
      status: 'failed',
      attempts: 2,
      durationMs: 2100,
      reason: 'Gave up after 2 attempt(s): Attempt timed out after 1000ms',
      classification: 'timeout',
      exhausted: true,
    });
    expect(calls()).toBe(2);
  });

  it('should abort the attempt signal on timeout', async () => {
    const seen: boolean[] = [];
    const { phase } = single(
      [
        (context) =>
          new Promise((resolve) => {
            context.signal.addEventListener('abort', () => {
              seen.push(context.signal.aborted);
              resolve({ status: 'retryable', reason: 'aborted' });
            });
          }),
      ],
      { timeoutMs: 1000, maxRetries: 1 }
    );
    await drive(clock, engine.attempt(phase, { config: {} }));
    expect(seen).toEqual([true]);
  });

  it('should treat timeouts of destructive phases as fatal by default', async () => {
    const { phase, calls } = single([hangUntilAborted], { timeoutMs: 1000, destructive: true, idempotent: false });

    const outcome = await drive(clock, engine.attempt(phase, { config: {} }));

    expect(outcome.status).toBe('failed');
    expect(outcome.classification).toBe('fatal');
    expect(outcome.attempts).toBe(1);
    expect(outcome.reason).toBe('Attempt timed out after 1000ms');
    expect(calls()).toBe(1);
  });

  it('should pass config, attempt number and phase identity to the action', async () => {
    const scripted = scriptedPhase('configure', [{ status: 'retryable', reason: 'x' }, { status: 'success' }], {
      label: 'Configure services',
    });
    const [phase] = buildPhaseList([scripted.definition]);
    if (!phase) throw new Error('expected a phase');

    await drive(clock, engine.attempt(phase, { config: { domain: 'example.test' } }));

    expect(scripted.calls.map((c) => c.attempt)).toEqual([1, 2]);
    expect(scripted.calls[0]?.config).toEqual({ domain: 'example.test' });
    expect(scripted.calls[0]?.phase).toEqual({ index: 0, name: 'configure', label: 'Configure services' });
  });

  describe('beforeAttempt', () => {
    it('should run before every attempt', async () => {
      const { phase } = single([{ status: 'retryable', reason: 'x' }, { status: 'success' }]);
      const seen: number[] = [];

      await drive(
        clock,
        engine.attempt(phase, {
          config: {},
          beforeAttempt: async (attempt) => {
            seen.push(attempt);
            return ok(undefined);
          },
        })
      );

      expect(seen).toEqual([1, 2]);
    });

    it('should halt without running the action when it fails', async () => {
      const { phase, calls } = single([{ status: 'success' }]);
      const failure = createInstallError('StateIOFailure', 'disk full');

      const outcome = await drive(
        clock,
        engine.attempt(phase, { config: {}, beforeAttempt: async () => err(failure) })
      );

      expect(outcome).toEqual({
        status: 'failed',
        attempts: 0,
        durationMs: 0,
        reason: 'disk full',
        classification: 'fatal',
        haltError: failure,
      });
      expect(calls()).toBe(0);
    });
  });

  describe('cancellation', () => {
    it('should not start when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const { phase, calls } = single([{ status: 'success' }]);

      const outcome = await drive(clock, engine.attempt(phase, { config: {}, signal: controller.signal }));

      expect(outcome).toEqual({ status: 'cancelled', attempts: 0, durationMs: 0, reason: 'Cancelled' });
      expect(calls()).toBe(0);
    });

    it('should report cancelled when the action stops on the abort signal', async () => {
      const controller = new AbortController();
      const { phase } = single([
        (context) => {
          controller.abort();
          return hangUntilAborted(context);
        },
      ]);

      const outcome = await drive(clock, engine.attempt(phase, { config: {}, signal: controller.signal }));

      expect(outcome).toEqual({ status: 'cancelled', attempts: 1, durationMs: 0, reason: 'Cancelled' });
    });

    it('should honour a success that arrives within the grace period', async () => {
      const controller = new AbortController();
      const { phase } = single([
        (context) => {
          controller.abort();
          return new Promise((resolve) => {
            context.signal.addEventListener('abort', () => resolve({ status: 'success' }), { once: true });
          });
        },
      ]);

      const outcome = await drive(clock, engine.attempt(phase, { config: {}, signal: controller.signal }));

      expect(outcome.status).toBe('succeeded');
    });

    it('should stop waiting for an action that ignores cancellation after the grace period', async () => {
      const controller = new AbortController();
      const { phase } = single([
        () => {
          controller.abort();
          return new Promise(() => undefined);
        },
      ]);

      const outcome = await drive(clock, engine.attempt(phase, { config: {}, signal: controller.signal }));

      expect(outcome).toEqual({ status: 'cancelled', attempts: 1, durationMs: 500, reason: 'Cancelled' });
    });

    it('should stop during the backoff wait', async () => {
      const controller = new AbortController();
      const { phase, calls } = single([{ status: 'retryable', reason: 'busy' }]);
      void clock.delay(50).then(() => controller.abort());

      const outcome = await drive(clock, engine.attempt(phase, { config: {}, signal: controller.signal }));

      expect(outcome).toEqual({ status: 'cancelled', attempts: 1, durationMs: 50, reason: 'Cancelled' });
      expect(calls()).toBe(1);
    });
  });
});
