/**
 * Configuration drift detection
 * The configuration snapshot is fingerprinted over a canonical (key-sorted)
 * JSON encoding, so key order in the deployment file does not count as drift.
 */

import { JsonValue, JsonObject, InstallationState } from '../schemas/installation-state.schema';
import { InstallError, createInstallError } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { sha256 } from './checksum';

export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const keys = Object.keys(value).sort();
  return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(',')}}`;
}

export function fingerprintConfig(snapshot: JsonObject): string {
  return sha256(canonicalJson(snapshot));
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Dotted paths whose values differ between two snapshots.
 * Values themselves are never returned; snapshots hold secrets.
 */
export function diffConfigPaths(
  before: JsonValue | undefined,
  after: JsonValue | undefined,
  prefix = ''
): string[] {
  if (isJsonObject(before) && isJsonObject(after)) {
    const keys = Array.from(new Set([...Object.keys(before), ...Object.keys(after)])).sort();
    return keys.flatMap((key) =>
      diffConfigPaths(before[key], after[key], prefix ? `${prefix}.${key}` : key)
    );
  }
  if (Array.isArray(before) && Array.isArray(after) && before.length === after.length) {
    return before.flatMap((item, index) => diffConfigPaths(item, after[index], `${prefix}[${index}]`));
  }
  const same =
    before !== undefined &&
    after !== undefined &&
    canonicalJson(before) === canonicalJson(after);
  return same ? [] : [prefix || '<root>'];
}

/**
 * Verify a persisted state can be resumed with the given phase list and
 * configuration. Any mismatch is ConfigDrift.
 */
export function checkResumeCompatibility(
  state: InstallationState,
  phaseOrder: readonly string[],
  configSnapshot: JsonObject
): Result<void, InstallError> {
  const samePhases =
    state.phaseOrder.length === phaseOrder.length &&
    state.phaseOrder.every((name, i) => name === phaseOrder[i]);

  if (!samePhases) {
    return err(
      createInstallError(
        'ConfigDrift',
        `Phase list changed since run ${state.runId} started ` +
          `(was: ${state.phaseOrder.join(', ')}; now: ${phaseOrder.join(', ')})`,
        { details: { previousPhases: state.phaseOrder, requestedPhases: [...phaseOrder] } }
      )
    );
  }

  if (fingerprintConfig(configSnapshot) !== state.configFingerprint) {
    const changed = diffConfigPaths(state.configSnapshot, configSnapshot);
    return err(
      createInstallError(
        'ConfigDrift',
        `Configuration differs from the one run ${state.runId} started with ` +
          `(changed: ${changed.length > 0 ? changed.join(', ') : 'unknown'})`,
        { details: { changedPaths: changed } }
      )
    );
  }

  return ok(undefined);
}
