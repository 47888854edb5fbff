/**
 * Builds the frozen, validated phase list for a run.
 * An invalid list is a programming or deployment-file error and throws.
 */

import { PhaseDefinition, PhaseDescriptor } from '../types/phase';
import { PHASE_NAME_PATTERN } from '../schemas/validators';

export class InvalidPhaseListError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid phase list:\n  - ${problems.join('\n  - ')}`);
    this.name = 'InvalidPhaseListError';
    this.problems = problems;
  }
}

function checkDefinition(def: PhaseDefinition, position: number, seen: Set<string>): string[] {
  const problems: string[] = [];
  const where = `phase ${position + 1} (${def.name || '<unnamed>'})`;

  if (!PHASE_NAME_PATTERN.test(def.name)) {
    problems.push(`${where}: invalid name`);
  } else if (seen.has(def.name)) {
    problems.push(`${where}: duplicate name`);
  }
  if (typeof def.action !== 'function') {
    problems.push(`${where}: action must be a function`);
  }
  // Both flags must be stated; JavaScript callers and loose configs can omit them
  if (typeof def.destructive !== 'boolean') {
    problems.push(`${where}: destructive must be declared`);
  }
  if (typeof def.idempotent !== 'boolean') {
    problems.push(`${where}: idempotent must be declared`);
  }
  if (!Number.isInteger(def.maxRetries) || def.maxRetries < 1) {
    problems.push(`${where}: maxRetries must be an integer >= 1`);
  }
  if (!Number.isFinite(def.timeoutMs) || def.timeoutMs <= 0) {
    problems.push(`${where}: timeoutMs must be > 0`);
  }
  return problems;
}

export function buildPhaseList(definitions: readonly PhaseDefinition[]): readonly PhaseDescriptor[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  if (definitions.length === 0) {
    problems.push('at least one phase is required');
  }

  const descriptors = definitions.map((def, index): PhaseDescriptor => {
    problems.push(...checkDefinition(def, index, seen));
    seen.add(def.name);
    return Object.freeze({
      index,
      name: def.name,
      label: def.label ?? def.name,
      action: def.action,
      destructive: def.destructive,
      idempotent: def.idempotent,
      timeoutMs: def.timeoutMs,
      maxRetries: def.maxRetries,
      timeoutFatal: def.timeoutFatal ?? def.destructive,
    });
  });

  if (problems.length > 0) {
    throw new InvalidPhaseListError(problems);
  }
  return Object.freeze(descriptors);
}

/**
 * Phase names of a list, in order
 */
export function phaseNames(phases: readonly PhaseDescriptor[]): string[] {
  return phases.map((p) => p.name);
}
