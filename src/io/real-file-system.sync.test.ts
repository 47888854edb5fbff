import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { openSync, fsyncSync } from 'fs';
import { join } from 'path';
import { RealFileSystem, syncDirectorySync } from './real-file-system';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return {
    ...actual,
    openSync: vi.fn(actual.openSync),
    fsyncSync: vi.fn(actual.fsyncSync),
  };
});

describe('directory sync', () => {
  let temp: TempDirContext;
  let fs: RealFileSystem;

  beforeEach(() => {
    temp = createTempDirContext();
    fs = new RealFileSystem(temp.path);
    vi.mocked(openSync).mockClear();
    vi.mocked(fsyncSync).mockClear();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('should fsync the parent directory after an atomic write', async () => {
    await fs.writeFile(join(temp.path, 'state.json'), '{}\n');

    expect(vi.mocked(openSync)).toHaveBeenCalledWith(temp.path, 'r');
    // temp file, then directory
    expect(vi.mocked(fsyncSync)).toHaveBeenCalledTimes(2);
  });

  it('should fsync the parent directory after an exclusive create', async () => {
    await fs.writeFile(join(temp.path, 'phaseguard.lock'), '{}\n', { exclusive: true });

    expect(vi.mocked(openSync)).toHaveBeenCalledWith(temp.path, 'r');
    expect(vi.mocked(fsyncSync)).toHaveBeenCalledTimes(2);
  });

  it('should skip a directory the platform refuses to open', () => {
    vi.mocked(openSync).mockImplementationOnce(() => {
      throw Object.assign(new Error('illegal operation on a directory'), { code: 'EISDIR' });
    });

    expect(() => syncDirectorySync(temp.path)).not.toThrow();
    expect(vi.mocked(fsyncSync)).not.toHaveBeenCalled();
  });

  it('should fail for a directory that does not exist', () => {
    expect(() => syncDirectorySync(join(temp.path, 'absent'))).toThrow(/ENOENT/);
  });
});
