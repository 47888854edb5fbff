/**
 * Phase contract
 * A phase is an opaque action plus the declarative flags the orchestrator
 * needs to sequence it: whether it is destructive (needs a backup first),
 * whether it is idempotent, and its timeout and attempt budget.
 */

import type { Logger } from './logger';
import type { JsonObject } from '../schemas/installation-state.schema';

/**
 * What a phase action reports for one attempt.
 * Only the action knows whether its failure is transient, so it classifies.
 */
export type ActionResult =
  | { status: 'success'; detail?: string }
  | { status: 'retryable'; reason: string }
  | { status: 'fatal'; reason: string };

export interface PhaseContext {
  /** Resolved operator configuration for this run */
  config: JsonObject;
  phase: { index: number; name: string; label: string };
  /** 1-based attempt number within this invocation */
  attempt: number;
  /** Aborts on attempt timeout or operator cancellation */
  signal: AbortSignal;
  logger: Logger;
}

export type PhaseAction = (context: PhaseContext) => Promise<ActionResult>;

/**
 * Phase as declared by callers, before it is placed in a list
 */
export interface PhaseDefinition {
  name: string;
  label?: string;
  action: PhaseAction;
  destructive: boolean;
  idempotent: boolean;
  /** Per-attempt time bound */
  timeoutMs: number;
  /** Maximum attempts including the first */
  maxRetries: number;
  /** Treat an attempt timeout as fatal (default: same as `destructive`) */
  timeoutFatal?: boolean;
}

export interface PhaseDescriptor {
  readonly index: number;
  readonly name: string;
  readonly label: string;
  readonly action: PhaseAction;
  readonly destructive: boolean;
  readonly idempotent: boolean;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly timeoutFatal: boolean;
}

export type FailureClassification = 'retryable' | 'fatal' | 'timeout';

/**
 * In-memory retry bookkeeping for one phase invocation
 */
export interface RetryContext {
  attempt: number;
  lastClassification: FailureClassification | null;
  nextDelayMs: number;
}

/**
 * Terminal result of driving one phase through the retry engine
 */
export interface PhaseOutcome {
  status: 'succeeded' | 'failed' | 'cancelled';
  /** Attempts made in this invocation */
  attempts: number;
  durationMs: number;
  /** Failure reason of the last attempt */
  reason?: string;
  classification?: FailureClassification;
  /** Failed because the attempt budget ran out on retryable failures */
  exhausted?: boolean;
}
