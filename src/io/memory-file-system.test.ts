import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryFileSystem } from './memory-file-system';

describe('MemoryFileSystem', () => {
  let fs: MemoryFileSystem;

  beforeEach(() => {
    fs = new MemoryFileSystem('/srv');
  });

  it('should resolve relative paths against the base path', async () => {
    await fs.writeFile('notes.txt', 'hello');
    expect(await fs.exists('/srv/notes.txt')).toBe(true);
    expect(fs.resolve('a', 'b')).toBe('/srv/a/b');
  });

  it('should require a parent directory unless asked to create it', async () => {
    const missing = await fs.writeFile('/srv/a/b/c.txt', 'x');
    expect(missing.ok).toBe(false);
    if (!missing.ok) expect(missing.error.code).toBe('NOT_FOUND');

    const created = await fs.writeFile('/srv/a/b/c.txt', 'x', { createParents: true });
    expect(created.ok).toBe(true);
    expect(fs.paths()).toEqual(['/srv', '/srv/a', '/srv/a/b', '/srv/a/b/c.txt']);
  });

  it('should keep the mode of a replaced file unless a new one is given', async () => {
    await fs.writeFile('/srv/secret', 'a', { mode: 0o600 });
    await fs.writeFile('/srv/secret', 'b');
    const stats = await fs.stat('/srv/secret');
    expect(stats.ok && stats.value.mode).toBe(0o600);
    expect(stats.ok && stats.value.size).toBe(1);
  });

  it('should refuse an exclusive write over an existing file', async () => {
    await fs.writeFile('/srv/lock', 'first');
    const second = await fs.writeFile('/srv/lock', 'second', { exclusive: true });
    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error.code).toBe('ALREADY_EXISTS');
    const content = await fs.readFile('/srv/lock');
    expect(content).toEqual({ ok: true, value: 'first' });
  });

  it('should list direct children or, recursively, every descendant', async () => {
    await fs.writeFile('/srv/ssl/cert.pem', 'c', { createParents: true });
    await fs.writeFile('/srv/ssl/private/key.pem', 'k', { createParents: true });

    expect(await fs.list('/srv/ssl')).toEqual({ ok: true, value: ['cert.pem', 'private'] });
    expect(await fs.list('/srv/ssl', { recursive: true })).toEqual({
      ok: true,
      value: ['cert.pem', 'private', 'private/key.pem'],
    });
    expect(await fs.list('/srv/ssl', { recursive: true, pattern: '*.pem' })).toEqual({
      ok: true,
      value: ['cert.pem', 'private/key.pem'],
    });
  });

  it('should move a directory with its contents', async () => {
    await fs.writeFile('/srv/tmp/data/file.txt', 'x', { createParents: true });
    const moved = await fs.rename('/srv/tmp/data', '/srv/data');
    expect(moved.ok).toBe(true);
    expect(fs.snapshotFiles('/srv')).toEqual({ '/srv/data/file.txt': Buffer.from('x').toString('base64') });
  });

  it('should refuse to remove a non-empty directory without recursion', async () => {
    await fs.writeFile('/srv/dir/file', 'x', { createParents: true });
    const refused = await fs.rmdir('/srv/dir');
    expect(refused.ok).toBe(false);
    expect((await fs.rmdir('/srv/dir', true)).ok).toBe(true);
    expect(fs.paths()).toEqual(['/srv']);
  });

  it('should fail the next matching operation on demand', async () => {
    fs.failNext('writeFile', /state\.json$/);
    const failed = await fs.writeFile('/srv/state.json', '{}');
    expect(failed).toEqual({
      ok: false,
      error: { code: 'IO_ERROR', path: '/srv/state.json', message: 'Injected writeFile failure: /srv/state.json', cause: undefined },
    });
    expect((await fs.writeFile('/srv/state.json', '{}')).ok).toBe(true);
  });

  it('should return a copy of the stored bytes', async () => {
    await fs.writeFile('/srv/data.bin', Buffer.from([1, 2, 3]));
    const first = await fs.readBytes('/srv/data.bin');
    if (first.ok) first.value[0] = 9;
    const second = await fs.readBytes('/srv/data.bin');
    expect(second.ok && [...second.value]).toEqual([1, 2, 3]);
  });

  it('should store streamed content once the stream finishes', async () => {
    const opened = await fs.openWriteStream('/srv/dumps/db.sql', { createParents: true, mode: 0o600 });
    if (!opened.ok) throw new Error(opened.error.message);
    expect(await fs.readFile('/srv/dumps/db.sql')).toEqual({ ok: true, value: '' });

    opened.value.write('CREATE ');
    await new Promise<void>((resolve) => opened.value.end('TABLE;\n', () => resolve()));

    expect(await fs.readFile('/srv/dumps/db.sql')).toEqual({ ok: true, value: 'CREATE TABLE;\n' });
    const digest = await fs.digest('/srv/dumps/db.sql');
    expect(digest.ok && digest.value.size).toBe(14);
    const stats = await fs.stat('/srv/dumps/db.sql');
    expect(stats.ok && stats.value.mode).toBe(0o600);
  });
});
