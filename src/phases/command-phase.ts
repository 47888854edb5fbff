/**
 * Command-backed phases
 * Turns the `phases` section of a deployment file into phase definitions
 * whose actions run a command through the ProcessRunner and classify its
 * exit status.
 */

import { ProcessRunner, SpawnResult } from '../types/process-runner';
import { ActionResult, PhaseAction, PhaseContext, PhaseDefinition } from '../types/phase';
import { CommandPhaseSpec } from '../schemas/validators';
import { JsonObject, JsonValue } from '../schemas/installation-state.schema';
import { describeError } from '../types/errors';
import { Result, ok, err } from '../types/result';

const PLACEHOLDER = /\$\{settings\.([A-Za-z0-9_.-]+)\}/g;

export interface CommandPhaseOptions {
  processRunner: ProcessRunner;
  /** Directory the phase `cwd` values are relative to */
  baseDir: string;
  /** Resolves a phase `cwd` against `baseDir` (path.resolve) */
  resolvePath: (base: string, path: string) => string;
}

function lookup(config: JsonObject, path: string): JsonValue | undefined {
  let current: JsonValue | undefined = config;
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null || Array.isArray(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Replace `${settings.a.b}` references with configuration values
 */
export function substituteSettings(template: string, config: JsonObject): Result<string, string> {
  const missing: string[] = [];
  const value = template.replace(PLACEHOLDER, (_match, path: string) => {
    const found = lookup(config, path);
    if (found === undefined) {
      missing.push(path);
      return '';
    }
    return typeof found === 'string' ? found : JSON.stringify(found);
  });
  if (missing.length > 0) {
    return err(`unresolved setting(s): ${missing.map((p) => `settings.${p}`).join(', ')}`);
  }
  return ok(value);
}

function substituteAll(values: string[], config: JsonObject): Result<string[], string> {
  const out: string[] = [];
  for (const value of values) {
    const substituted = substituteSettings(value, config);
    if (!substituted.ok) {
      return substituted;
    }
    out.push(substituted.value);
  }
  return ok(out);
}

function tail(result: SpawnResult): string {
  const lines = result.stderrTail.length > 0 ? result.stderrTail : result.stdoutTail;
  const last = lines.filter((l) => l.trim()).slice(-3).join(' | ');
  return last ? `: ${last}` : '';
}

/**
 * Map a finished process onto the phase outcome classification
 */
export function classifyExit(result: SpawnResult, retryableExitCodes: number[]): ActionResult {
  if (result.interrupted) {
    return { status: 'retryable', reason: `interrupted${result.signal ? ` by ${result.signal}` : ''}` };
  }
  if (result.exitCode === 0) {
    return { status: 'success' };
  }
  const reason = `exited with code ${result.exitCode}${tail(result)}`;
  return retryableExitCodes.includes(result.exitCode)
    ? { status: 'retryable', reason }
    : { status: 'fatal', reason };
}

export function createCommandPhaseAction(spec: CommandPhaseSpec, options: CommandPhaseOptions): PhaseAction {
  return async (context: PhaseContext): Promise<ActionResult> => {
    const args = substituteAll(spec.args, context.config);
    if (!args.ok) {
      return { status: 'fatal', reason: args.error };
    }
    let env: Record<string, string> | undefined;
    if (spec.env) {
      const names = Object.keys(spec.env);
      const values = substituteAll(Object.values(spec.env), context.config);
      if (!values.ok) {
        return { status: 'fatal', reason: values.error };
      }
      env = Object.fromEntries(names.map((name, i) => [name, values.value[i] ?? '']));
    }

    const cwd = spec.cwd ? options.resolvePath(options.baseDir, spec.cwd) : options.baseDir;
    context.logger.debug(`Running ${spec.command} ${spec.args.join(' ')}`, { cwd });

    let result: SpawnResult;
    try {
      result = await options.processRunner.spawn(spec.command, {
        args: args.value,
        cwd,
        env,
        signal: context.signal,
        onStderr: (data) => context.logger.debug(data.trimEnd()),
      });
    } catch (error) {
      return { status: 'fatal', reason: `cannot start ${spec.command}: ${describeError(error)}` };
    }

    return classifyExit(result, spec.retryableExitCodes);
  };
}

/**
 * Phase definitions for every command phase of a deployment file, in order
 */
export function buildCommandPhases(specs: CommandPhaseSpec[], options: CommandPhaseOptions): PhaseDefinition[] {
  return specs.map((spec) => ({
    name: spec.name,
    label: spec.label,
    action: createCommandPhaseAction(spec, options),
    destructive: spec.destructive,
    idempotent: spec.idempotent,
    timeoutMs: spec.timeoutMs,
    maxRetries: spec.maxRetries,
    timeoutFatal: spec.timeoutFatal,
  }));
}
