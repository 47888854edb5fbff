/**
 * State Store
 *
 * Durable persistence of InstallationState at `<stateDir>/state.json`.
 * Saves are atomic (temp file + rename). Loads never repair or discard a
 * bad file: anything unreadable or from a newer release is StateCorrupt and
 * left on disk for the operator.
 */

import {
  InstallationState,
  STATE_SCHEMA_VERSION,
} from '../schemas/installation-state.schema';
import { parseInstallationState, readSchemaVersion } from '../schemas/validators';
import { FileSystem, FileSystemError } from '../types/file-system';
import { Clock } from '../types/clock';
import { Logger } from '../types/logger';
import { InstallError, createInstallError } from '../types/errors';
import { Result, ok, err } from '../types/result';

export const STATE_FILE_NAME = 'state.json';
export const ARCHIVE_DIR_NAME = 'archive';

/** The state file holds the resolved configuration, secrets included */
const STATE_FILE_MODE = 0o600;

export interface StateStoreOptions {
  stateDir: string;
  fileSystem: FileSystem;
  clock: Clock;
  logger: Logger;
}

function ioFailure(action: string, error: FileSystemError): InstallError {
  return createInstallError('StateIOFailure', `Failed to ${action} ${error.path}: ${error.message}`, {
    details: { path: error.path, code: error.code },
    cause: error.cause,
  });
}

function corrupt(path: string, reason: string): InstallError {
  return createInstallError(
    'StateCorrupt',
    `State file ${path} is not usable: ${reason}. ` +
      'It has been left untouched; inspect it, or archive it with "phaseguard reset".',
    { details: { path } }
  );
}

export class StateStore {
  readonly stateDir: string;
  readonly statePath: string;
  private readonly fs: FileSystem;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: StateStoreOptions) {
    this.fs = options.fileSystem;
    this.clock = options.clock;
    this.logger = options.logger;
    this.stateDir = options.stateDir;
    this.statePath = this.fs.join(options.stateDir, STATE_FILE_NAME);
  }

  /**
   * Load the persisted state; `null` when there is none
   */
  async load(): Promise<Result<InstallationState | null, InstallError>> {
    const read = await this.fs.readFile(this.statePath);
    if (!read.ok) {
      if (read.error.code === 'NOT_FOUND') {
        return ok(null);
      }
      return err(ioFailure('read', read.error));
    }

    return this.decode(read.value);
  }

  /**
   * Decode state file content without touching the disk
   */
  decode(content: string): Result<InstallationState, InstallError> {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (e) {
      return err(corrupt(this.statePath, `invalid JSON (${e instanceof Error ? e.message : String(e)})`));
    }

    const version = readSchemaVersion(raw);
    if (version === null) {
      return err(corrupt(this.statePath, 'missing schemaVersion'));
    }
    if (version > STATE_SCHEMA_VERSION) {
      return err(
        corrupt(
          this.statePath,
          `written by a newer release (schema version ${version}, this release understands ${STATE_SCHEMA_VERSION})`
        )
      );
    }
    if (version !== STATE_SCHEMA_VERSION) {
      return err(corrupt(this.statePath, `unsupported schema version ${version}`));
    }

    const parsed = parseInstallationState(content);
    if (!parsed.success) {
      return err(corrupt(this.statePath, parsed.errors.join('; ')));
    }
    return ok(parsed.data);
  }

  async save(state: InstallationState): Promise<Result<void, InstallError>> {
    const dir = await this.fs.mkdir(this.stateDir, true);
    if (!dir.ok) {
      return err(ioFailure('create state directory', dir.error));
    }

    const written = await this.fs.writeFile(this.statePath, JSON.stringify(state, null, 2) + '\n', {
      atomic: true,
      mode: STATE_FILE_MODE,
    });
    if (!written.ok) {
      return err(ioFailure('write', written.error));
    }

    this.logger.event('state_saved', 'State saved', {
      runId: state.runId,
      status: state.status,
      lastPhase: state.lastPhaseName,
    });
    return ok(undefined);
  }

  /**
   * Move the state file into `<stateDir>/archive/`.
   * Returns the archive path, or null when there was no state file.
   */
  async archive(reason: string, runId?: string): Promise<Result<string | null, InstallError>> {
    if (!(await this.fs.exists(this.statePath))) {
      return ok(null);
    }

    const archiveDir = this.fs.join(this.stateDir, ARCHIVE_DIR_NAME);
    const dir = await this.fs.mkdir(archiveDir, true);
    if (!dir.ok) {
      return err(ioFailure('create archive directory', dir.error));
    }

    const stamp = this.clock.iso().replace(/[:.]/g, '-');
    const name = ['state', stamp, runId, reason].filter((part) => part).join('-') + '.json';
    const archivePath = this.fs.join(archiveDir, name);

    const moved = await this.fs.rename(this.statePath, archivePath);
    if (!moved.ok) {
      return err(ioFailure('archive', moved.error));
    }

    this.logger.event('state_archived', `State archived to ${archivePath}`, { runId, reason });
    return ok(archivePath);
  }

  /**
   * Archived state file names, oldest first
   */
  async listArchives(): Promise<Result<string[], InstallError>> {
    const listed = await this.fs.list(this.fs.join(this.stateDir, ARCHIVE_DIR_NAME), {
      pattern: 'state-*.json',
    });
    if (!listed.ok) {
      return listed.error.code === 'NOT_FOUND' ? ok([]) : err(ioFailure('list', listed.error));
    }
    return ok(listed.value);
  }
}

export function createStateStore(options: StateStoreOptions): StateStore {
  return new StateStore(options);
}
