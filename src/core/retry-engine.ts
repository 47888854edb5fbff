/**
 * Retry/Recovery Engine
 *
 * Drives one phase invocation: runs the action with a per-attempt timeout,
 * honours the action's own retryable/fatal classification, waits out the
 * backoff between attempts and gives up after `maxRetries` attempts.
 * Retry bookkeeping lives only in memory; a resumed phase starts counting
 * from one again.
 */

import { Clock } from '../types/clock';
import { Logger } from '../types/logger';
import { InstallError, describeError } from '../types/errors';
import { Result } from '../types/result';
import {
  ActionResult,
  FailureClassification,
  PhaseContext,
  PhaseDescriptor,
  PhaseOutcome,
  RetryContext,
} from '../types/phase';
import { JsonObject } from '../schemas/installation-state.schema';
import { BackoffPolicy, computeBackoffDelay, hasAttemptsRemaining } from './retry-policy';

export interface RetryEngineOptions {
  clock: Clock;
  logger: Logger;
  backoff: BackoffPolicy;
  /** How long an in-flight action gets to settle after cancellation */
  cancelGraceMs: number;
}

export interface AttemptOptions {
  config: JsonObject;
  /** Operator cancellation */
  signal?: AbortSignal;
  /**
   * Called before every attempt. An error stops the invocation; the
   * orchestrator uses it to persist the attempt before running it.
   */
  beforeAttempt?: (attempt: number) => Promise<Result<void, InstallError>>;
}

export interface EngineOutcome extends PhaseOutcome {
  /** Set when `beforeAttempt` failed; the action was not run for that attempt */
  haltError?: InstallError;
}

type AttemptResult =
  | { type: 'success' }
  | { type: 'failure'; classification: FailureClassification; reason: string }
  | { type: 'cancelled' };

type Settled = { type: 'settled'; result: ActionResult } | { type: 'thrown'; message: string };

function isActionResult(value: unknown): value is ActionResult {
  if (typeof value !== 'object' || value === null || !('status' in value)) {
    return false;
  }
  if (value.status === 'success') {
    return true;
  }
  return (
    (value.status === 'retryable' || value.status === 'fatal') &&
    'reason' in value &&
    typeof value.reason === 'string'
  );
}

/**
 * Promise that resolves when `signal` aborts, plus a disposer for the listener
 */
function abortPromise(signal: AbortSignal | undefined): { promise: Promise<'aborted'>; dispose: () => void } {
  if (!signal) {
    return { promise: new Promise<'aborted'>(() => undefined), dispose: () => undefined };
  }
  let onAbort: () => void = () => undefined;
  const promise = new Promise<'aborted'>((resolve) => {
    if (signal.aborted) {
      resolve('aborted');
      return;
    }
    onAbort = () => resolve('aborted');
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

export class RetryEngine {
  private readonly options: RetryEngineOptions;

  constructor(options: RetryEngineOptions) {
    this.options = options;
  }

  async attempt(phase: PhaseDescriptor, options: AttemptOptions): Promise<EngineOutcome> {
    const { clock, logger, backoff } = this.options;
    const startedAt = clock.timestamp();
    const retry: RetryContext = { attempt: 0, lastClassification: null, nextDelayMs: 0 };
    const elapsed = (): number => clock.timestamp() - startedAt;

    while (true) {
      if (options.signal?.aborted) {
        return { status: 'cancelled', attempts: retry.attempt, durationMs: elapsed(), reason: 'Cancelled' };
      }

      retry.attempt += 1;
      if (options.beforeAttempt) {
        const prepared = await options.beforeAttempt(retry.attempt);
        if (!prepared.ok) {
          return {
            status: 'failed',
            attempts: retry.attempt - 1,
            durationMs: elapsed(),
            reason: prepared.error.message,
            classification: 'fatal',
            haltError: prepared.error,
          };
        }
      }

      const result = await this.runAttempt(phase, retry.attempt, options);

      if (result.type === 'success') {
        return { status: 'succeeded', attempts: retry.attempt, durationMs: elapsed() };
      }
      if (result.type === 'cancelled') {
        return { status: 'cancelled', attempts: retry.attempt, durationMs: elapsed(), reason: 'Cancelled' };
      }

      retry.lastClassification = result.classification;
      logger.event('attempt_failed', `Attempt ${retry.attempt}/${phase.maxRetries} failed: ${result.reason}`, {
        phase: phase.name,
        attempt: retry.attempt,
        classification: result.classification,
      });

      if (result.classification === 'fatal') {
        return {
          status: 'failed',
          attempts: retry.attempt,
          durationMs: elapsed(),
          reason: result.reason,
          classification: 'fatal',
        };
      }

      if (!hasAttemptsRemaining(retry.attempt, phase.maxRetries)) {
        return {
          status: 'failed',
          attempts: retry.attempt,
          durationMs: elapsed(),
          reason: `Gave up after ${retry.attempt} attempt(s): ${result.reason}`,
          classification: result.classification,
          exhausted: true,
        };
      }

      retry.nextDelayMs = computeBackoffDelay(retry.attempt, backoff);
      logger.event('retry_scheduled', `Retrying "${phase.label}" in ${retry.nextDelayMs}ms`, {
        phase: phase.name,
        attempt: retry.attempt,
        delayMs: retry.nextDelayMs,
      });
      await clock.delay(retry.nextDelayMs, options.signal);
    }
  }

  private async runAttempt(
    phase: PhaseDescriptor,
    attempt: number,
    options: AttemptOptions
  ): Promise<AttemptResult> {
    const { clock, logger, cancelGraceMs } = this.options;
    const attemptController = new AbortController();
    const timeoutController = new AbortController();
    const cancellation = abortPromise(options.signal);
    void cancellation.promise.then(
      () => attemptController.abort(),
      () => undefined
    );

    const context: PhaseContext = {
      config: options.config,
      phase: { index: phase.index, name: phase.name, label: phase.label },
      attempt,
      signal: attemptController.signal,
      logger: logger.child({ phase: phase.name, attempt }),
    };

    // Never rejects: a throwing action is a fatal failure
    const settled: Promise<Settled> = Promise.resolve()
      .then(() => phase.action(context))
      .then(
        (result): Settled => ({ type: 'settled', result }),
        (error: unknown): Settled => ({ type: 'thrown', message: describeError(error) })
      );

    const timeout = clock
      .delay(phase.timeoutMs, timeoutController.signal)
      .then(() => 'timeout' as const);

    try {
      const first = await Promise.race([settled, timeout, cancellation.promise]);

      if (first === 'timeout') {
        if (timeoutController.signal.aborted) {
          // Delay was released by cancellation or settlement racing it
          return this.interpret(await settled);
        }
        attemptController.abort();
        return {
          type: 'failure',
          classification: phase.timeoutFatal ? 'fatal' : 'timeout',
          reason: `Attempt timed out after ${phase.timeoutMs}ms`,
        };
      }

      if (first === 'aborted') {
        timeoutController.abort();
        const graceController = new AbortController();
        const grace = clock.delay(cancelGraceMs, graceController.signal).then(() => 'grace' as const);
        const afterCancel = await Promise.race([settled, grace]);
        graceController.abort();
        if (afterCancel !== 'grace' && afterCancel.type === 'settled' && afterCancel.result.status === 'success') {
          return { type: 'success' };
        }
        return { type: 'cancelled' };
      }

      return this.interpret(first);
    } finally {
      timeoutController.abort();
      cancellation.dispose();
    }
  }

  private interpret(settled: Settled): AttemptResult {
    if (settled.type === 'thrown') {
      return { type: 'failure', classification: 'fatal', reason: `Action threw: ${settled.message}` };
    }
    const result: unknown = settled.result;
    if (!isActionResult(result)) {
      return { type: 'failure', classification: 'fatal', reason: 'Action returned an invalid result' };
    }
    switch (result.status) {
      case 'success':
        return { type: 'success' };
      case 'retryable':
        return { type: 'failure', classification: 'retryable', reason: result.reason };
      case 'fatal':
        return { type: 'failure', classification: 'fatal', reason: result.reason };
    }
  }
}

export function createRetryEngine(options: RetryEngineOptions): RetryEngine {
  return new RetryEngine(options);
}
