/**
 * Run lock
 *
 * Single-writer exclusivity for a state directory. The lock file appears
 * with its complete content or not at all; it records who holds it so a
 * lock left behind by a crashed process can be recognised and replaced.
 * A holder on this host is judged by its pid alone. Age only decides for
 * holders on other hosts, whose pids cannot be checked.
 */

import { hostname as osHostname } from 'os';
import { randomBytes } from 'crypto';
import { FileSystem } from '../types/file-system';
import { Clock } from '../types/clock';
import { Logger } from '../types/logger';
import { InstallError, createInstallError } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { LockInfo, parseLockInfo } from '../schemas/validators';
import { errnoCode } from '../io/real-file-system';

export const LOCK_FILE_NAME = 'phaseguard.lock';

export const DEFAULT_LOCK_STALE_AFTER_MS = 6 * 60 * 60 * 1000;

/** How long a malformed lock file gets to become readable before it counts as stale */
export const MALFORMED_LOCK_GRACE_MS = 2000;

/**
 * Whether a process with this pid exists on this host
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but owned by someone else
    return errnoCode(error) === 'EPERM';
  }
}

export interface RunLockOptions {
  stateDir: string;
  fileSystem: FileSystem;
  clock: Clock;
  logger: Logger;
  /** Age after which a lock held from another host is considered abandoned */
  staleAfterMs?: number;
  isProcessAlive?: (pid: number) => boolean;
  hostname?: string;
  pid?: number;
}

export interface LockHandle {
  readonly info: LockInfo;
  release(): Promise<void>;
}

/** `holder` is null while the lock file is still being written */
type StaleVerdict = { stale: true; reason: string } | { stale: false; holder: LockInfo | null };

type LockRead =
  | { kind: 'missing' }
  | { kind: 'unreadable'; message: string }
  | { kind: 'malformed'; content: string }
  | { kind: 'valid'; holder: LockInfo };

export class RunLock {
  readonly lockPath: string;
  private readonly options: RunLockOptions;
  private readonly staleAfterMs: number;
  private readonly processAlive: (pid: number) => boolean;

  constructor(options: RunLockOptions) {
    this.options = options;
    this.lockPath = options.fileSystem.join(options.stateDir, LOCK_FILE_NAME);
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_LOCK_STALE_AFTER_MS;
    this.processAlive = options.isProcessAlive ?? isProcessAlive;
  }

  async acquire(runId: string | null = null): Promise<Result<LockHandle, InstallError>> {
    const { fileSystem: fs, clock, logger } = this.options;

    const dir = await fs.mkdir(this.options.stateDir, true);
    if (!dir.ok) {
      return err(createInstallError('StateIOFailure', `Cannot create state directory: ${dir.error.message}`));
    }

    const info: LockInfo = {
      pid: this.options.pid ?? process.pid,
      hostname: this.options.hostname ?? osHostname(),
      runId,
      acquiredAt: clock.iso(),
      token: randomBytes(8).toString('hex'),
    };
    const content = JSON.stringify(info, null, 2) + '\n';

    // Second pass only after a stale lock was removed
    for (let pass = 0; pass < 2; pass++) {
      const created = await fs.writeFile(this.lockPath, content, { exclusive: true, mode: 0o600 });
      if (created.ok) {
        logger.event('lock_acquired', `Lock acquired: ${this.lockPath}`, { pid: info.pid });
        return ok(this.createHandle(info));
      }
      if (created.error.code !== 'ALREADY_EXISTS') {
        return err(
          createInstallError('StateIOFailure', `Cannot create lock file ${this.lockPath}: ${created.error.message}`)
        );
      }

      const verdict = await this.inspectExisting();
      if (!verdict.stale) {
        const holder = verdict.holder;
        const who =
          holder === null
            ? 'its holder is still writing it'
            : `pid ${holder.pid} on ${holder.hostname} since ${holder.acquiredAt}`;
        return err(
          createInstallError('LockUnavailable', `Another phaseguard run holds ${this.lockPath} (${who})`, {
            details: { holder },
          })
        );
      }

      logger.warn(`Replacing stale lock: ${verdict.reason}`, { lockPath: this.lockPath });
      const removed = await fs.remove(this.lockPath);
      if (!removed.ok && removed.error.code !== 'NOT_FOUND') {
        return err(
          createInstallError('StateIOFailure', `Cannot remove stale lock ${this.lockPath}: ${removed.error.message}`)
        );
      }
    }

    return err(createInstallError('LockUnavailable', `Lock ${this.lockPath} was re-created by another process`));
  }

  private async readLock(): Promise<LockRead> {
    const read = await this.options.fileSystem.readFile(this.lockPath);
    if (!read.ok) {
      return read.error.code === 'NOT_FOUND' ? { kind: 'missing' } : { kind: 'unreadable', message: read.error.message };
    }
    const parsed = parseLockInfo(read.value);
    return parsed.success ? { kind: 'valid', holder: parsed.data } : { kind: 'malformed', content: read.value };
  }

  private async inspectExisting(): Promise<StaleVerdict> {
    const { clock } = this.options;
    let current = await this.readLock();

    if (current.kind === 'malformed') {
      // A writer without atomic creation may still be filling it in
      const seen = current.content;
      await clock.delay(MALFORMED_LOCK_GRACE_MS);
      current = await this.readLock();
      if (current.kind === 'malformed' && current.content !== seen) {
        return { stale: false, holder: null };
      }
    }

    switch (current.kind) {
      case 'missing':
        return { stale: true, reason: 'lock disappeared' };
      case 'unreadable':
        return { stale: true, reason: `unreadable lock file (${current.message})` };
      case 'malformed':
        return { stale: true, reason: 'malformed lock file' };
      case 'valid':
        break;
    }

    const holder = current.holder;
    const localHost = this.options.hostname ?? osHostname();
    if (holder.hostname === localHost) {
      return this.processAlive(holder.pid)
        ? { stale: false, holder }
        : { stale: true, reason: `process ${holder.pid} is no longer running` };
    }

    const age = clock.timestamp() - Date.parse(holder.acquiredAt);
    if (age > this.staleAfterMs) {
      return { stale: true, reason: `held from ${holder.hostname} for ${Math.round(age / 60000)} minutes` };
    }

    return { stale: false, holder };
  }

  private createHandle(info: LockInfo): LockHandle {
    const { fileSystem: fs, logger } = this.options;
    const lockPath = this.lockPath;
    let released = false;

    return {
      info,
      async release(): Promise<void> {
        if (released) {
          return;
        }
        released = true;

        const read = await fs.readFile(lockPath);
        if (!read.ok) {
          logger.warn(`Lock file vanished before release: ${read.error.message}`);
          return;
        }
        const current = parseLockInfo(read.value);
        if (!current.success || current.data.token !== info.token) {
          logger.warn('Lock file is no longer ours; leaving it in place', { lockPath });
          return;
        }
        const removed = await fs.remove(lockPath);
        if (!removed.ok) {
          logger.warn(`Could not remove lock file: ${removed.error.message}`, { lockPath });
          return;
        }
        logger.event('lock_released', 'Lock released', { lockPath });
      },
    };
  }
}

export function createRunLock(options: RunLockOptions): RunLock {
  return new RunLock(options);
}
