import { describe, it, expect, beforeEach } from 'vitest';
import { RunLock, RunLockOptions, createRunLock } from './run-lock';
import { MemoryFileSystem } from '../io/memory-file-system';
import { BufferLogger } from '../logging/buffer-logger';
import { MockClock } from '../types/clock';
import { drive, flush } from '../../tests/utils/drive';

const LOCK_PATH = '/srv/.phaseguard/phaseguard.lock';

describe('RunLock', () => {
  let fs: MemoryFileSystem;
  let clock: MockClock;
  let logger: BufferLogger;
  let alive: Set<number>;

  const lockFor = (pid: number, overrides: Partial<RunLockOptions> = {}): RunLock =>
    createRunLock({
      stateDir: '/srv/.phaseguard',
      fileSystem: fs,
      clock,
      logger,
      hostname: 'install-host',
      pid,
      isProcessAlive: (p) => alive.has(p),
      staleAfterMs: 60_000,
      ...overrides,
    });

  beforeEach(() => {
    fs = new MemoryFileSystem('/srv');
    clock = new MockClock();
    logger = new BufferLogger();
    alive = new Set([100, 200]);
  });

  it('should create the lock file with the holder details', async () => {
    const result = await lockFor(100).acquire('20250101T000000-abc123');
    expect(result.ok).toBe(true);

    const content = await fs.readFile(LOCK_PATH);
    expect(content.ok).toBe(true);
    if (content.ok) {
      expect(JSON.parse(content.value)).toMatchObject({
        pid: 100,
        hostname: 'install-host',
        runId: '20250101T000000-abc123',
        acquiredAt: '2025-01-01T00:00:00.000Z',
      });
    }
    const stats = await fs.stat(LOCK_PATH);
    expect(stats.ok && stats.value.mode).toBe(0o600);
  });

  it('should refuse a second holder while the first is alive', async () => {
    const first = await lockFor(100).acquire();
    expect(first.ok).toBe(true);

    const second = await lockFor(200).acquire();
    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.error.kind).toBe('LockUnavailable');
      expect(second.error.message).toBe(
        `Another phaseguard run holds ${LOCK_PATH} (pid 100 on install-host since 2025-01-01T00:00:00.000Z)`
      );
    }
  });

  it('should allow a new holder after release', async () => {
    const first = await lockFor(100).acquire();
    if (!first.ok) throw new Error('expected lock');
    await first.value.release();
    expect(await fs.exists(LOCK_PATH)).toBe(false);

    const second = await lockFor(200).acquire();
    expect(second.ok).toBe(true);
    expect(logger.getEventsByType('lock_released')).toHaveLength(1);
  });

  it('should replace a lock whose process is gone', async () => {
    await lockFor(100).acquire();
    alive.delete(100);

    const result = await lockFor(200).acquire();
    expect(result.ok).toBe(true);
    expect(logger.getEventsMatching(/^Replacing stale lock: process 100 is no longer running$/)).toHaveLength(1);
  });

  it('should not judge a remote holder by local pids', async () => {
    await lockFor(100, { hostname: 'other-host' }).acquire();
    alive.delete(100);

    const result = await lockFor(200).acquire();
    expect(result.ok).toBe(false);
  });

  it('should replace a remote lock older than the stale threshold', async () => {
    await lockFor(100, { hostname: 'other-host' }).acquire();
    clock.advance(61_000);

    const result = await lockFor(200).acquire();
    expect(result.ok).toBe(true);
    expect(logger.getEventsMatching(/^Replacing stale lock: held from other-host for 1 minutes$/)).toHaveLength(1);
  });

  it('should keep refusing a live local holder however long it has held the lock', async () => {
    await lockFor(100, { staleAfterMs: undefined }).acquire();
    clock.advance(6 * 60 * 60 * 1000 + 1000);

    const second = await lockFor(200, { staleAfterMs: undefined }).acquire();

    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error.kind).toBe('LockUnavailable');
    expect(logger.getEventsMatching(/^Replacing stale lock/)).toHaveLength(0);
  });

  it('should replace a lock file that stays malformed', async () => {
    await fs.mkdir('/srv/.phaseguard', true);
    await fs.writeFile(LOCK_PATH, 'garbage');

    const result = await drive(clock, lockFor(200).acquire());

    expect(result.ok).toBe(true);
    expect(logger.getEventsMatching(/^Replacing stale lock: malformed lock file$/)).toHaveLength(1);
  });

  it('should not replace a lock file its holder is still writing', async () => {
    await fs.mkdir('/srv/.phaseguard', true);
    await fs.writeFile(LOCK_PATH, '');

    const pending = lockFor(200).acquire();
    await flush();
    await fs.writeFile(
      LOCK_PATH,
      JSON.stringify({
        pid: 100,
        hostname: 'install-host',
        runId: null,
        acquiredAt: '2025-01-01T00:00:00.000Z',
        token: 'holder-token',
      })
    );
    const result = await drive(clock, pending);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        `Another phaseguard run holds ${LOCK_PATH} (pid 100 on install-host since 2025-01-01T00:00:00.000Z)`
      );
    }
    expect(logger.getEventsMatching(/^Replacing stale lock/)).toHaveLength(0);
  });

  it('should leave a lock that is no longer ours on release', async () => {
    const first = await lockFor(100).acquire();
    if (!first.ok) throw new Error('expected lock');
    alive.delete(100);
    const second = await lockFor(200).acquire();
    expect(second.ok).toBe(true);

    await first.value.release();
    expect(await fs.exists(LOCK_PATH)).toBe(true);
    expect(logger.getEventsMatching(/no longer ours/)).toHaveLength(1);
  });

  it('should release only once', async () => {
    const first = await lockFor(100).acquire();
    if (!first.ok) throw new Error('expected lock');
    await first.value.release();
    await first.value.release();
    expect(logger.getEventsByType('lock_released')).toHaveLength(1);
  });
});
