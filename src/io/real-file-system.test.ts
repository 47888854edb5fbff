import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdirSync } from 'fs';
import { join } from 'path';
import { createHash } from 'crypto';
import { RealFileSystem, errnoCode } from './real-file-system';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';

describe('RealFileSystem', () => {
  let temp: TempDirContext;
  let fs: RealFileSystem;

  beforeEach(() => {
    temp = createTempDirContext();
    fs = new RealFileSystem(temp.path);
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('should write atomically with the requested mode and leave no temp file', async () => {
    const path = join(temp.path, 'state', 'state.json');

    const written = await fs.writeFile(path, '{"ok":true}\n', { createParents: true, mode: 0o600 });

    expect(written).toEqual({ ok: true, value: undefined });
    expect(temp.readFile('state/state.json')).toBe('{"ok":true}\n');
    expect(temp.mode('state/state.json')).toBe(0o600);
    expect(readdirSync(join(temp.path, 'state'))).toEqual(['state.json']);
  });

  it('should refuse an exclusive write over an existing file', async () => {
    temp.writeFile('phaseguard.lock', 'held');

    const result = await fs.writeFile(join(temp.path, 'phaseguard.lock'), 'mine', { exclusive: true });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('ALREADY_EXISTS');
    expect(temp.readFile('phaseguard.lock')).toBe('held');
  });

  it('should create an exclusive file with its content and mode and leave no temp file', async () => {
    const path = join(temp.path, 'phaseguard.lock');

    const result = await fs.writeFile(path, '{"pid":1}\n', { exclusive: true, mode: 0o600 });

    expect(result).toEqual({ ok: true, value: undefined });
    expect(temp.readFile('phaseguard.lock')).toBe('{"pid":1}\n');
    expect(temp.mode('phaseguard.lock')).toBe(0o600);
    expect(readdirSync(temp.path)).toEqual(['phaseguard.lock']);
  });

  it('should stream a file to disk and digest it', async () => {
    const path = join(temp.path, 'dumps', 'db.sql');
    const opened = await fs.openWriteStream(path, { createParents: true, mode: 0o600 });
    if (!opened.ok) throw new Error(opened.error.message);

    await new Promise<void>((resolve, reject) => {
      opened.value.on('error', reject);
      opened.value.end('CREATE TABLE users;\n', () => resolve());
    });

    expect(temp.readFile('dumps/db.sql')).toBe('CREATE TABLE users;\n');
    expect(temp.mode('dumps/db.sql')).toBe(0o600);
    expect(await fs.digest(path)).toEqual({
      ok: true,
      value: { sha256: createHash('sha256').update('CREATE TABLE users;\n').digest('hex'), size: 20 },
    });
  });

  it('should report a missing file to digest as NOT_FOUND', async () => {
    const result = await fs.digest(join(temp.path, 'absent.sql'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('NOT_FOUND');
  });

  it('should map a missing file to NOT_FOUND', async () => {
    const result = await fs.readFile(join(temp.path, 'absent.json'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('NOT_FOUND');
  });

  it('should reject paths outside the base path', async () => {
    const result = await fs.readFile(join(temp.path, '..', 'elsewhere.txt'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('PATH_TRAVERSAL');
  });

  it('should list recursively with a pattern', async () => {
    temp.writeFile('ssl/cert.pem', 'c');
    temp.writeFile('ssl/private/key.pem', 'k');
    temp.writeFile('ssl/readme.txt', 'r');

    const listed = await fs.list(join(temp.path, 'ssl'), { recursive: true, pattern: '*.pem' });

    expect(listed).toEqual({ ok: true, value: ['cert.pem', join('private', 'key.pem')] });
  });

  it('should remove a directory tree', async () => {
    temp.writeFile('backups/backup-1/files/.env', 'x');
    expect((await fs.rmdir(join(temp.path, 'backups', 'backup-1'), true)).ok).toBe(true);
    expect(temp.exists('backups/backup-1')).toBe(false);
  });
});

describe('errnoCode', () => {
  it('should read the code of a system error', () => {
    const error = Object.assign(new Error('busy'), { code: 'EADDRINUSE' });
    expect(errnoCode(error)).toBe('EADDRINUSE');
    expect(errnoCode('EADDRINUSE')).toBeUndefined();
  });
});
