/**
 * Real FileSystem implementation
 * Node.js fs with atomic (temp + fsync + rename + directory fsync) writes
 * and an optional base-path restriction.
 */

import {
  readFile,
  writeFile,
  stat,
  mkdir,
  unlink,
  rm,
  rmdir,
  readdir,
  copyFile,
  rename,
} from 'fs/promises';
import {
  existsSync,
  mkdirSync,
  openSync,
  writeSync,
  fsyncSync,
  closeSync,
  renameSync,
  linkSync,
  unlinkSync,
  createReadStream,
  createWriteStream,
} from 'fs';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { once } from 'events';
import { resolve, join, dirname, basename, isAbsolute, relative } from 'path';
import { randomBytes, createHash } from 'crypto';
import {
  FileSystem,
  FileStats,
  FileDigest,
  WriteOptions,
  StreamWriteOptions,
  ListOptions,
  FileSystemError,
  FileSystemErrorCode,
  createFileSystemError,
  globToRegex,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

const ERRNO_TO_CODE: Record<string, FileSystemErrorCode> = {
  ENOENT: 'NOT_FOUND',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
  EEXIST: 'ALREADY_EXISTS',
  EISDIR: 'NOT_A_FILE',
  ENOTDIR: 'NOT_A_DIRECTORY',
};

/**
 * Read the errno code off a thrown value, if it carries one
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toFileSystemError(error: unknown, path: string): FileSystemError {
  const code = errnoCode(error);
  const mapped = code !== undefined ? ERRNO_TO_CODE[code] : undefined;
  if (mapped) {
    return createFileSystemError(mapped, path);
  }
  const cause = error instanceof Error ? error : undefined;
  return createFileSystemError('IO_ERROR', path, cause?.message ?? String(error), cause);
}

// Directories some platforms refuse to open or fsync
const UNSYNCABLE_DIRECTORY_ERRORS = new Set(['EISDIR', 'EINVAL', 'EPERM']);

/**
 * fsync a directory so a rename or link inside it survives a power loss
 */
export function syncDirectorySync(dir: string): void {
  let fd: number;
  try {
    fd = openSync(dir, 'r');
  } catch (error) {
    if (UNSYNCABLE_DIRECTORY_ERRORS.has(errnoCode(error) ?? '')) {
      return;
    }
    throw error;
  }
  try {
    fsyncSync(fd);
  } catch (error) {
    if (!UNSYNCABLE_DIRECTORY_ERRORS.has(errnoCode(error) ?? '')) {
      throw error;
    }
  } finally {
    closeSync(fd);
  }
}

function writeTempSync(target: string, content: string | Buffer, mode?: number): string {
  const tempPath = `${target}.${randomBytes(8).toString('hex')}.tmp`;
  const fd = openSync(tempPath, 'wx', mode ?? 0o666);
  let written = false;
  try {
    writeSync(fd, typeof content === 'string' ? Buffer.from(content, 'utf-8') : content);
    fsyncSync(fd);
    written = true;
  } finally {
    closeSync(fd);
    if (!written) {
      removeTempSync(tempPath);
    }
  }
  return tempPath;
}

function removeTempSync(tempPath: string): void {
  if (existsSync(tempPath)) {
    unlinkSync(tempPath);
  }
}

/**
 * Write `content` to `target` through a temp file in the same directory.
 * A crash leaves either the old or the new file, never a truncated one.
 */
function writeAtomicSync(target: string, content: string | Buffer, mode?: number): void {
  let tempPath: string | null = null;
  try {
    tempPath = writeTempSync(target, content, mode);
    renameSync(tempPath, target);
    tempPath = null;
  } finally {
    if (tempPath !== null) {
      removeTempSync(tempPath);
    }
  }
  syncDirectorySync(dirname(target));
}

/**
 * Create `target` with its complete content or fail with EEXIST.
 * The temp file is hard-linked into place, so the target never exists empty.
 */
function writeExclusiveSync(target: string, content: string | Buffer, mode?: number): void {
  const tempPath = writeTempSync(target, content, mode);
  try {
    linkSync(tempPath, target);
  } finally {
    removeTempSync(tempPath);
  }
  syncDirectorySync(dirname(target));
}

export class RealFileSystem implements FileSystem {
  private readonly basePath?: string;

  /**
   * @param basePath - when set, every path must resolve inside it
   */
  constructor(basePath?: string) {
    this.basePath = basePath ? resolve(basePath) : undefined;
  }

  private isWithinBasePath(path: string): boolean {
    if (!this.basePath) {
      return true;
    }
    const relativePath = relative(this.basePath, resolve(path));
    return !relativePath.startsWith('..') && !isAbsolute(relativePath);
  }

  private validatePath(path: string): Result<string, FileSystemError> {
    const normalizedPath = resolve(path);
    if (!this.isWithinBasePath(normalizedPath)) {
      return err(createFileSystemError('PATH_TRAVERSAL', path));
    }
    return ok(normalizedPath);
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    try {
      return ok(await readFile(validatedPath.value, { encoding: 'utf-8' }));
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async readBytes(path: string): Promise<Result<Buffer, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    try {
      return ok(await readFile(validatedPath.value));
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async writeFile(
    path: string,
    content: string | Buffer,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      if (options?.createParents) {
        mkdirSync(dirname(validatedPath.value), { recursive: true });
      }

      if (options?.exclusive) {
        writeExclusiveSync(validatedPath.value, content, options.mode);
      } else if (options?.atomic ?? true) {
        writeAtomicSync(validatedPath.value, content, options?.mode);
      } else {
        await writeFile(validatedPath.value, content, { mode: options?.mode ?? 0o666 });
      }
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async openWriteStream(path: string, options?: StreamWriteOptions): Promise<Result<Writable, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    try {
      if (options?.createParents) {
        mkdirSync(dirname(validatedPath.value), { recursive: true });
      }
      const stream = createWriteStream(validatedPath.value, { mode: options?.mode ?? 0o666 });
      await once(stream, 'open');
      return ok(stream);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async digest(path: string): Promise<Result<FileDigest, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    const hash = createHash('sha256');
    let size = 0;
    try {
      await pipeline(
        createReadStream(validatedPath.value),
        new Writable({
          write(chunk: Buffer, _encoding, callback) {
            hash.update(chunk);
            size += chunk.length;
            callback();
          },
        })
      );
      return ok({ sha256: hash.digest('hex'), size });
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async exists(path: string): Promise<boolean> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return false;
    }
    return existsSync(validatedPath.value);
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    try {
      const stats = await stat(validatedPath.value);
      return ok({
        size: stats.size,
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
        createdAt: stats.birthtime,
        modifiedAt: stats.mtime,
        mode: stats.mode & 0o777,
      });
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    try {
      await mkdir(validatedPath.value, { recursive: recursive ?? false });
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async remove(path: string): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    try {
      await unlink(validatedPath.value);
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async rmdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    try {
      const stats = await stat(validatedPath.value);
      if (!stats.isDirectory()) {
        return err(createFileSystemError('NOT_A_DIRECTORY', path));
      }
      if (recursive) {
        await rm(validatedPath.value, { recursive: true });
      } else {
        await rmdir(validatedPath.value);
      }
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async list(path: string, options?: ListOptions): Promise<Result<string[], FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }
    try {
      let names = await readdir(validatedPath.value, {
        encoding: 'utf-8',
        recursive: options?.recursive ?? false,
      });
      if (options?.pattern) {
        const pattern = globToRegex(options.pattern);
        names = names.filter((name) => pattern.test(name));
      }
      return ok(names.sort());
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async copy(src: string, dest: string): Promise<Result<void, FileSystemError>> {
    const validatedSrc = this.validatePath(src);
    if (!validatedSrc.ok) {
      return validatedSrc;
    }
    const validatedDest = this.validatePath(dest);
    if (!validatedDest.ok) {
      return validatedDest;
    }
    try {
      await copyFile(validatedSrc.value, validatedDest.value);
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, src));
    }
  }

  async rename(oldPath: string, newPath: string): Promise<Result<void, FileSystemError>> {
    const validatedOld = this.validatePath(oldPath);
    if (!validatedOld.ok) {
      return validatedOld;
    }
    const validatedNew = this.validatePath(newPath);
    if (!validatedNew.ok) {
      return validatedNew;
    }
    try {
      await rename(validatedOld.value, validatedNew.value);
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, oldPath));
    }
  }

  resolve(...paths: string[]): string {
    return resolve(...paths);
  }

  join(...paths: string[]): string {
    return join(...paths);
  }

  dirname(path: string): string {
    return dirname(path);
  }

  basename(path: string, ext?: string): string {
    return basename(path, ext);
  }

  relative(from: string, to: string): string {
    return relative(from, to);
  }

  isAbsolute(path: string): boolean {
    return isAbsolute(path);
  }
}

export function createRealFileSystem(basePath?: string): FileSystem {
  return new RealFileSystem(basePath);
}
