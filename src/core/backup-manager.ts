/**
 * Backup/Restore Subsystem
 *
 * Captures protective copies of the live deployment files (and command
 * dumps such as a database export) before destructive phases. Every
 * artifact is checksummed from its source bytes and verified by read-back;
 * `manifest.json` is written last, so a directory without one is an
 * incomplete capture and is never offered for restore.
 */

import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { createHash } from 'crypto';
import { FileSystem, FileSystemError } from '../types/file-system';
import { ProcessRunner, SpawnResult } from '../types/process-runner';
import { Clock } from '../types/clock';
import { Logger } from '../types/logger';
import { InstallError, InstallErrorKind, createInstallError, describeError } from '../types/errors';
import { Result, ok, err } from '../types/result';
import {
  BackupArtifact,
  BackupRecord,
  InstallationState,
  MANIFEST_SCHEMA_VERSION,
} from '../schemas/installation-state.schema';
import { ArtifactSpec, DumpSpec, parseBackupRecord, readSchemaVersion } from '../schemas/validators';
import { sha256 } from './checksum';

export const MANIFEST_FILE_NAME = 'manifest.json';
const FILES_DIR = 'files';
const DUMPS_DIR = 'dumps';
const MAX_NAME_SUFFIX = 100;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface BackupManagerOptions {
  fileSystem: FileSystem;
  processRunner: ProcessRunner;
  clock: Clock;
  logger: Logger;
  /** Directory holding the live deployment files */
  targetDir: string;
  backupDir: string;
  artifacts: ArtifactSpec[];
  dumps: DumpSpec[];
}

export interface ArtifactFailure {
  label: string;
  storedPath: string;
  problem: string;
}

export interface RestoreReport {
  /** Live paths that were replaced, relative to the target directory */
  restored: string[];
  /** Dump files the operator has to apply by hand */
  manual: string[];
}

export interface PruneOptions {
  maxCount?: number;
  maxAgeDays?: number;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `backup-YYYYMMDD-HHMMSS-mmm` in UTC
 */
export function backupNameFor(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `backup-${day}-${time}-${pad(date.getUTCMilliseconds(), 3)}`;
}

/**
 * Newest first: by creation time, then by name
 */
export function compareNewestFirst(a: BackupRecord, b: BackupRecord): number {
  const byTime = Date.parse(b.createdAt) - Date.parse(a.createdAt);
  if (byTime !== 0) {
    return byTime;
  }
  return b.name < a.name ? -1 : b.name > a.name ? 1 : 0;
}

class CaptureFailure {
  constructor(readonly message: string, readonly cause?: Error) {}
}

export class BackupManager {
  readonly backupDir: string;
  private readonly options: BackupManagerOptions;
  private readonly fs: FileSystem;

  constructor(options: BackupManagerOptions) {
    this.options = options;
    this.fs = options.fileSystem;
    this.backupDir = options.backupDir;
  }

  // ===========================================================================
  // Capture
  // ===========================================================================

  /**
   * Capture every configured artifact before `phase` runs.
   * On failure nothing is left behind in the backup directory.
   */
  async captureBefore(
    phase: string | null,
    state: InstallationState | null,
    signal?: AbortSignal
  ): Promise<Result<BackupRecord, InstallError>> {
    const { clock, logger } = this.options;
    const createdAt = clock.iso();

    const dir = await this.fs.mkdir(this.backupDir, true);
    if (!dir.ok) {
      return err(this.fail('BackupError', `Cannot create backup directory: ${dir.error.message}`, phase));
    }

    const reserved = await this.reserveDirectory(clock.now());
    if (!reserved.ok) {
      return err(this.fail('BackupError', reserved.error.message, phase));
    }
    const name = reserved.value;
    const recordDir = this.fs.join(this.backupDir, name);

    logger.event('backup_started', `Capturing backup ${name}`, { phase: phase ?? undefined });

    try {
      const artifacts: BackupArtifact[] = [];
      for (const spec of this.options.artifacts) {
        artifacts.push(...(await this.captureArtifact(spec, recordDir)));
      }
      for (const spec of this.options.dumps) {
        const dump = await this.captureDump(spec, recordDir, signal);
        if (dump) {
          artifacts.push(dump);
        }
      }

      const record: BackupRecord = {
        schemaVersion: MANIFEST_SCHEMA_VERSION,
        name,
        createdAt,
        triggeredBy: phase !== null && state !== null ? { phase, runId: state.runId } : null,
        artifacts,
        totalSize: artifacts.reduce((sum, a) => sum + a.size, 0),
        stateSnapshot: state,
      };

      const manifestPath = this.fs.join(recordDir, MANIFEST_FILE_NAME);
      const written = await this.fs.writeFile(manifestPath, JSON.stringify(record, null, 2) + '\n', {
        atomic: true,
        mode: 0o600,
      });
      if (!written.ok) {
        throw new CaptureFailure(`Cannot write manifest: ${written.error.message}`, written.error.cause);
      }
      const readBack = await this.readManifest(name);
      if (!readBack.ok) {
        throw new CaptureFailure(`Manifest did not read back: ${readBack.error.message}`);
      }

      logger.event('backup_completed', `Backup ${name} captured (${artifacts.length} artifacts)`, {
        phase: phase ?? undefined,
        backup: name,
        totalSize: record.totalSize,
      });
      return ok(record);
    } catch (error) {
      if (!(error instanceof CaptureFailure)) {
        throw error;
      }
      await this.discardPartial(recordDir);
      const failure = this.fail('BackupError', `Backup ${name} failed: ${error.message}`, phase, error.cause);
      logger.event('backup_failed', failure.message, { phase: phase ?? undefined, backup: name });
      return err(failure);
    }
  }

  private async reserveDirectory(now: Date): Promise<Result<string, FileSystemError>> {
    const base = backupNameFor(now);
    for (let n = 0; n < MAX_NAME_SUFFIX; n++) {
      const candidate = n === 0 ? base : `${base}-${n}`;
      const created = await this.fs.mkdir(this.fs.join(this.backupDir, candidate), false);
      if (created.ok) {
        return ok(candidate);
      }
      if (created.error.code !== 'ALREADY_EXISTS') {
        return created;
      }
    }
    return err({
      code: 'ALREADY_EXISTS',
      path: this.fs.join(this.backupDir, base),
      message: `No free backup name for ${base}`,
    });
  }

  private async captureArtifact(spec: ArtifactSpec, recordDir: string): Promise<BackupArtifact[]> {
    const source = this.livePath(spec.path);
    if (source === null) {
      throw new CaptureFailure(`Artifact "${spec.label}" (${spec.path}) is outside the target directory`);
    }

    const stats = await this.fs.stat(source);
    if (!stats.ok) {
      if (stats.error.code === 'NOT_FOUND' && !spec.required) {
        this.options.logger.warn(`Optional artifact "${spec.label}" not found, skipping`, { path: spec.path });
        return [];
      }
      throw new CaptureFailure(`Artifact "${spec.label}" unavailable: ${stats.error.message}`, stats.error.cause);
    }

    if (!stats.value.isDirectory) {
      return [await this.copyVerified(spec.label, source, recordDir, stats.value.mode)];
    }

    const listed = await this.fs.list(source, { recursive: true });
    if (!listed.ok) {
      throw new CaptureFailure(`Cannot list "${spec.label}": ${listed.error.message}`, listed.error.cause);
    }
    const artifacts: BackupArtifact[] = [];
    for (const entry of listed.value) {
      const path = this.fs.join(source, entry);
      const entryStats = await this.fs.stat(path);
      if (!entryStats.ok) {
        throw new CaptureFailure(`Cannot stat ${path}: ${entryStats.error.message}`, entryStats.error.cause);
      }
      if (entryStats.value.isFile) {
        artifacts.push(await this.copyVerified(spec.label, path, recordDir, entryStats.value.mode));
      }
    }
    return artifacts;
  }

  private async copyVerified(
    label: string,
    source: string,
    recordDir: string,
    mode: number
  ): Promise<BackupArtifact> {
    const bytes = await this.fs.readBytes(source);
    if (!bytes.ok) {
      throw new CaptureFailure(`Cannot read ${source}: ${bytes.error.message}`, bytes.error.cause);
    }
    const sourcePath = this.fs.relative(this.fs.resolve(this.options.targetDir), source);
    const storedPath = this.fs.join(FILES_DIR, sourcePath);
    const checksum = sha256(bytes.value);
    const permissions = mode & 0o777;

    await this.storeVerified(recordDir, storedPath, bytes.value, checksum, permissions);
    return {
      label,
      kind: 'file',
      sourcePath,
      storedPath,
      sha256: checksum,
      size: bytes.value.length,
      mode: permissions,
    };
  }

  private async captureDump(
    spec: DumpSpec,
    recordDir: string,
    signal?: AbortSignal
  ): Promise<BackupArtifact | null> {
    const { processRunner, clock, logger, targetDir } = this.options;
    const storedPath = this.fs.join(DUMPS_DIR, spec.fileName);
    const target = this.fs.join(recordDir, storedPath);

    const opened = await this.fs.openWriteStream(target, { createParents: true, mode: 0o600 });
    if (!opened.ok) {
      throw new CaptureFailure(`Cannot store ${storedPath}: ${opened.error.message}`, opened.error.cause);
    }

    // Hashed as it streams to disk; a dump is never held in memory
    const hash = createHash('sha256');
    let size = 0;
    const hashing = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        hash.update(chunk);
        size += chunk.length;
        callback(null, chunk);
      },
    });
    const stored = pipeline(hashing, opened.value).then(
      () => null,
      (error: unknown) => describeError(error)
    );

    const killer = new AbortController();
    const timer = new AbortController();
    const onAbort = (): void => killer.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    let timedOut = false;
    void clock.delay(spec.timeoutMs, timer.signal).then(() => {
      if (!timer.signal.aborted) {
        timedOut = true;
        killer.abort();
      }
    });

    let result: SpawnResult | null = null;
    let problem: string | null = null;
    try {
      result = await processRunner.spawn(spec.command, {
        args: spec.args,
        cwd: spec.cwd ? this.fs.join(targetDir, spec.cwd) : targetDir,
        signal: killer.signal,
        stdoutTo: hashing,
      });
    } catch (error) {
      problem = `could not start ${spec.command}: ${describeError(error)}`;
    } finally {
      timer.abort();
      signal?.removeEventListener('abort', onAbort);
      if (!hashing.writableEnded && !hashing.destroyed) {
        hashing.end();
      }
    }
    const storeProblem = await stored;

    if (result !== null) {
      if (timedOut) {
        problem = `timed out after ${spec.timeoutMs}ms`;
      } else if (result.interrupted) {
        problem = 'interrupted';
      } else if (result.exitCode !== 0) {
        const tail = result.stderrTail.slice(-3).join(' | ');
        problem = `exited with code ${result.exitCode}${tail ? `: ${tail}` : ''}`;
      }
    }
    if (problem === null && storeProblem !== null) {
      problem = `cannot store ${storedPath}: ${storeProblem}`;
    }

    if (problem !== null || result === null) {
      const message = `Dump "${spec.label}" failed: ${problem ?? 'no result'}`;
      if (spec.required) {
        throw new CaptureFailure(message);
      }
      logger.warn(`${message}; skipping optional dump`);
      const removed = await this.fs.remove(target);
      if (!removed.ok && removed.error.code !== 'NOT_FOUND') {
        logger.warn(`Could not remove partial dump ${storedPath}: ${removed.error.message}`);
      }
      return null;
    }

    const checksum = hash.digest('hex');
    await this.verifyStored(recordDir, storedPath, checksum, size);
    return {
      label: spec.label,
      kind: 'dump',
      sourcePath: null,
      storedPath,
      sha256: checksum,
      size,
      mode: null,
    };
  }

  private async storeVerified(
    recordDir: string,
    storedPath: string,
    bytes: Buffer,
    checksum: string,
    mode: number
  ): Promise<void> {
    const target = this.fs.join(recordDir, storedPath);
    const written = await this.fs.writeFile(target, bytes, { atomic: false, createParents: true, mode });
    if (!written.ok) {
      throw new CaptureFailure(`Cannot store ${storedPath}: ${written.error.message}`, written.error.cause);
    }
    await this.verifyStored(recordDir, storedPath, checksum, bytes.length);
  }

  private async verifyStored(recordDir: string, storedPath: string, checksum: string, size: number): Promise<void> {
    const readBack = await this.fs.digest(this.fs.join(recordDir, storedPath));
    if (!readBack.ok) {
      throw new CaptureFailure(`Cannot read back ${storedPath}: ${readBack.error.message}`, readBack.error.cause);
    }
    if (readBack.value.size !== size || readBack.value.sha256 !== checksum) {
      throw new CaptureFailure(`Checksum mismatch on read-back of ${storedPath}`);
    }
  }

  private async discardPartial(recordDir: string): Promise<void> {
    const removed = await this.fs.rmdir(recordDir, true);
    if (!removed.ok && removed.error.code !== 'NOT_FOUND') {
      this.options.logger.warn(`Could not remove incomplete backup ${recordDir}: ${removed.error.message}`);
    }
  }

  // ===========================================================================
  // Catalogue
  // ===========================================================================

  /**
   * Complete backups, newest first
   */
  async listAvailable(): Promise<Result<BackupRecord[], InstallError>> {
    const listed = await this.fs.list(this.backupDir, { pattern: 'backup-*' });
    if (!listed.ok) {
      if (listed.error.code === 'NOT_FOUND') {
        return ok([]);
      }
      return err(this.fail('RestoreError', `Cannot list backups: ${listed.error.message}`, null));
    }

    const records: BackupRecord[] = [];
    for (const name of listed.value) {
      const record = await this.readManifest(name);
      if (record.ok) {
        records.push(record.value);
      } else if (record.error.code === 'NOT_FOUND') {
        this.options.logger.debug(`Ignoring ${name}: no manifest`);
      } else {
        this.options.logger.warn(`Ignoring ${name}: ${record.error.message}`);
      }
    }
    return ok(records.sort(compareNewestFirst));
  }

  async findByName(name: string): Promise<Result<BackupRecord, InstallError>> {
    const record = await this.readManifest(name);
    if (!record.ok) {
      const reason = record.error.code === 'NOT_FOUND' ? 'not found' : record.error.message;
      return err(this.fail('RestoreError', `Backup ${name}: ${reason}`, null));
    }
    return ok(record.value);
  }

  async latest(): Promise<Result<BackupRecord | null, InstallError>> {
    const records = await this.listAvailable();
    if (!records.ok) {
      return records;
    }
    return ok(records.value[0] ?? null);
  }

  private async readManifest(
    name: string
  ): Promise<Result<BackupRecord, { code: 'NOT_FOUND' | 'INVALID'; message: string }>> {
    if (name.includes('/') || name.includes('\\') || name === '..' || name === '.') {
      return err({ code: 'INVALID', message: 'invalid backup name' });
    }
    const read = await this.fs.readFile(this.fs.join(this.backupDir, name, MANIFEST_FILE_NAME));
    if (!read.ok) {
      return err({ code: read.error.code === 'NOT_FOUND' ? 'NOT_FOUND' : 'INVALID', message: read.error.message });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(read.value);
    } catch (e) {
      return err({ code: 'INVALID', message: `invalid manifest JSON (${describeError(e)})` });
    }
    const version = readSchemaVersion(raw);
    if (version !== MANIFEST_SCHEMA_VERSION) {
      return err({ code: 'INVALID', message: `unsupported manifest schema version ${String(version)}` });
    }

    const parsed = parseBackupRecord(read.value);
    if (!parsed.success) {
      return err({ code: 'INVALID', message: parsed.errors.join('; ') });
    }
    if (parsed.data.name !== name) {
      return err({ code: 'INVALID', message: `manifest names ${parsed.data.name}` });
    }
    return ok(parsed.data);
  }

  // ===========================================================================
  // Verify / Restore
  // ===========================================================================

  /**
   * Re-check every stored artifact against its manifest checksum.
   * An empty array means the backup is intact.
   */
  async verify(record: BackupRecord): Promise<ArtifactFailure[]> {
    const failures: ArtifactFailure[] = [];
    const recordDir = this.fs.join(this.backupDir, record.name);

    for (const artifact of record.artifacts) {
      const fail = (problem: string): void => {
        failures.push({ label: artifact.label, storedPath: artifact.storedPath, problem });
      };

      const stored = this.containedPath(recordDir, artifact.storedPath);
      if (stored === null) {
        fail('stored path escapes the backup directory');
        continue;
      }
      if (artifact.kind === 'file' && (artifact.sourcePath === null || this.livePath(artifact.sourcePath) === null)) {
        fail('live path escapes the target directory');
        continue;
      }

      const digest = await this.fs.digest(stored);
      if (!digest.ok) {
        fail(digest.error.code === 'NOT_FOUND' ? 'missing' : digest.error.message);
        continue;
      }
      if (digest.value.size !== artifact.size) {
        fail(`size ${digest.value.size} does not match ${artifact.size}`);
        continue;
      }
      if (digest.value.sha256 !== artifact.sha256) {
        fail('checksum mismatch');
      }
    }
    return failures;
  }

  /**
   * Put every file artifact back in place.
   * Everything is verified first; if anything fails verification no live
   * file is touched.
   */
  async restore(record: BackupRecord): Promise<Result<RestoreReport, InstallError>> {
    const { logger } = this.options;
    const failures = await this.verify(record);
    if (failures.length > 0) {
      const error = this.fail(
        'RestoreError',
        `Backup ${record.name} failed verification: ` +
          failures.map((f) => `${f.label} (${f.storedPath}): ${f.problem}`).join('; '),
        null
      );
      error.details = { backup: record.name, failures };
      logger.event('restore_failed', error.message, { backup: record.name });
      return err(error);
    }

    const recordDir = this.fs.join(this.backupDir, record.name);
    const report: RestoreReport = { restored: [], manual: [] };

    for (const artifact of record.artifacts) {
      const stored = this.fs.join(recordDir, artifact.storedPath);
      if (artifact.kind === 'dump' || artifact.sourcePath === null) {
        report.manual.push(stored);
        continue;
      }

      const live = this.livePath(artifact.sourcePath);
      const bytes = await this.fs.readBytes(stored);
      const written =
        live !== null && bytes.ok && sha256(bytes.value) === artifact.sha256
          ? await this.fs.writeFile(live, bytes.value, {
              atomic: true,
              createParents: true,
              mode: artifact.mode ?? undefined,
            })
          : null;

      if (written === null || !written.ok) {
        const reason = written === null ? 'stored copy changed during restore' : written.error.message;
        const error = this.fail(
          'RestoreError',
          `Restore of ${artifact.sourcePath} from ${record.name} failed: ${reason}` +
            (report.restored.length > 0 ? ` (already restored: ${report.restored.join(', ')})` : ''),
          null
        );
        error.details = { backup: record.name, restored: report.restored, failed: artifact.sourcePath };
        logger.event('restore_failed', error.message, { backup: record.name });
        return err(error);
      }
      report.restored.push(artifact.sourcePath);
    }

    logger.event('restore_completed', `Restored ${report.restored.length} file(s) from ${record.name}`, {
      backup: record.name,
      manual: report.manual.length,
    });
    return ok(report);
  }

  // ===========================================================================
  // Retention
  // ===========================================================================

  /**
   * Delete backups beyond `maxCount` or older than `maxAgeDays`.
   * The newest backup is always kept. Returns the removed names.
   */
  async prune(options: PruneOptions): Promise<Result<string[], InstallError>> {
    const records = await this.listAvailable();
    if (!records.ok) {
      return records;
    }

    const now = this.options.clock.timestamp();
    const removed: string[] = [];
    for (const [index, record] of records.value.entries()) {
      if (index === 0) {
        continue;
      }
      const overCount = options.maxCount !== undefined && index >= options.maxCount;
      const tooOld =
        options.maxAgeDays !== undefined && now - Date.parse(record.createdAt) > options.maxAgeDays * DAY_MS;
      if (!overCount && !tooOld) {
        continue;
      }

      const deleted = await this.delete(record.name);
      if (!deleted.ok) {
        return deleted;
      }
      removed.push(record.name);
    }

    if (removed.length > 0) {
      this.options.logger.event('backup_pruned', `Pruned ${removed.length} backup(s)`, { removed });
    }
    return ok(removed);
  }

  async delete(name: string): Promise<Result<void, InstallError>> {
    const found = await this.findByName(name);
    if (!found.ok) {
      return found;
    }
    const removed = await this.fs.rmdir(this.fs.join(this.backupDir, name), true);
    if (!removed.ok) {
      return err(this.fail('BackupError', `Cannot delete backup ${name}: ${removed.error.message}`, null));
    }
    return ok(undefined);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Absolute live path for a target-relative path, or null if it leaves the target
   */
  private livePath(relativePath: string): string | null {
    return this.containedPath(this.options.targetDir, relativePath);
  }

  private containedPath(root: string, relativePath: string): string | null {
    if (this.fs.isAbsolute(relativePath)) {
      return null;
    }
    const base = this.fs.resolve(root);
    const full = this.fs.resolve(base, relativePath);
    const rel = this.fs.relative(base, full);
    if (rel === '' || rel === '..' || rel.startsWith('../') || this.fs.isAbsolute(rel)) {
      return null;
    }
    return full;
  }

  private fail(kind: InstallErrorKind, message: string, phase: string | null, cause?: Error): InstallError {
    return createInstallError(kind, message, { phase: phase ?? undefined, cause });
  }
}

export function createBackupManager(options: BackupManagerOptions): BackupManager {
  return new BackupManager(options);
}
