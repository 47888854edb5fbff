/**
 * In-memory FileSystem for tests
 */

import { resolve, join, dirname, basename, isAbsolute, relative, sep } from 'path';
import { Writable } from 'stream';
import { createHash } from 'crypto';
import {
  FileSystem,
  FileStats,
  FileDigest,
  WriteOptions,
  StreamWriteOptions,
  ListOptions,
  FileSystemError,
  createFileSystemError,
  globToRegex,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

interface VirtualFile {
  type: 'file';
  content: Buffer;
  mode: number;
  createdAt: Date;
  modifiedAt: Date;
}

interface VirtualDirectory {
  type: 'directory';
  mode: number;
  createdAt: Date;
  modifiedAt: Date;
}

type VirtualEntry = VirtualFile | VirtualDirectory;

/**
 * Operations that can be made to fail on demand, see `failNext`
 */
export type FailableOperation = 'writeFile' | 'rename' | 'readBytes' | 'digest' | 'mkdir' | 'copy';

export class MemoryFileSystem implements FileSystem {
  private entries: Map<string, VirtualEntry> = new Map();
  private readonly basePath: string;
  private injectedFailures: Array<{ operation: FailableOperation; match: RegExp }> = [];

  constructor(basePath: string = '/') {
    this.basePath = basePath;
    this.entries.set(this.normalizePath(basePath), this.newDirectory());
  }

  private newDirectory(): VirtualDirectory {
    const now = new Date();
    return { type: 'directory', mode: 0o755, createdAt: now, modifiedAt: now };
  }

  private normalizePath(path: string): string {
    return resolve(isAbsolute(path) ? path : join(this.basePath, path));
  }

  /**
   * Make the next call of `operation` on a path matching `match` fail with IO_ERROR
   */
  failNext(operation: FailableOperation, match: RegExp): void {
    this.injectedFailures.push({ operation, match });
  }

  private takeFailure(operation: FailableOperation, path: string): FileSystemError | null {
    const index = this.injectedFailures.findIndex(
      (f) => f.operation === operation && f.match.test(path)
    );
    if (index === -1) {
      return null;
    }
    this.injectedFailures.splice(index, 1);
    return createFileSystemError('IO_ERROR', path, `Injected ${operation} failure: ${path}`);
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const bytes = await this.readBytes(path);
    if (!bytes.ok) {
      return bytes;
    }
    return ok(bytes.value.toString('utf-8'));
  }

  async readBytes(path: string): Promise<Result<Buffer, FileSystemError>> {
    const failure = this.takeFailure('readBytes', path);
    if (failure) {
      return err(failure);
    }
    const entry = this.entries.get(this.normalizePath(path));
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return ok(Buffer.from(entry.content));
  }

  async writeFile(
    path: string,
    content: string | Buffer,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const failure = this.takeFailure('writeFile', path);
    if (failure) {
      return err(failure);
    }

    const normalizedPath = this.normalizePath(path);
    const parentDir = dirname(normalizedPath);
    const parentEntry = this.entries.get(parentDir);
    if (!parentEntry) {
      if (!options?.createParents) {
        return err(createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist'));
      }
      const mkdirResult = await this.mkdir(parentDir, true);
      if (!mkdirResult.ok) {
        return mkdirResult;
      }
    } else if (parentEntry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
    }

    const existing = this.entries.get(normalizedPath);
    if (existing?.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    if (existing && options?.exclusive) {
      return err(createFileSystemError('ALREADY_EXISTS', path));
    }

    const now = new Date();
    this.entries.set(normalizedPath, {
      type: 'file',
      content: typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content),
      mode: options?.mode ?? existing?.mode ?? 0o644,
      createdAt: existing?.createdAt ?? now,
      modifiedAt: now,
    });
    return ok(undefined);
  }

  /**
   * The file is created empty on open and receives its content when the
   * stream finishes
   */
  async openWriteStream(path: string, options?: StreamWriteOptions): Promise<Result<Writable, FileSystemError>> {
    const created = await this.writeFile(path, Buffer.alloc(0), options);
    if (!created.ok) {
      return created;
    }
    const chunks: Buffer[] = [];
    return ok(
      new Writable({
        write: (chunk: Buffer, _encoding, callback) => {
          chunks.push(chunk);
          callback();
        },
        final: (callback) => {
          void this.writeFile(path, Buffer.concat(chunks), options).then((written) =>
            callback(written.ok ? null : new Error(written.error.message))
          );
        },
      })
    );
  }

  async digest(path: string): Promise<Result<FileDigest, FileSystemError>> {
    const failure = this.takeFailure('digest', path);
    if (failure) {
      return err(failure);
    }
    const entry = this.entries.get(this.normalizePath(path));
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return ok({
      sha256: createHash('sha256').update(entry.content).digest('hex'),
      size: entry.content.length,
    });
  }

  async exists(path: string): Promise<boolean> {
    return this.entries.has(this.normalizePath(path));
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    const entry = this.entries.get(this.normalizePath(path));
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    return ok({
      size: entry.type === 'file' ? entry.content.length : 0,
      isFile: entry.type === 'file',
      isDirectory: entry.type === 'directory',
      createdAt: entry.createdAt,
      modifiedAt: entry.modifiedAt,
      mode: entry.mode,
    });
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const failure = this.takeFailure('mkdir', path);
    if (failure) {
      return err(failure);
    }

    const normalizedPath = this.normalizePath(path);
    const existing = this.entries.get(normalizedPath);
    if (existing) {
      if (existing.type === 'directory' && recursive) {
        return ok(undefined);
      }
      return err(
        createFileSystemError(existing.type === 'directory' ? 'ALREADY_EXISTS' : 'NOT_A_DIRECTORY', path)
      );
    }

    const parentDir = dirname(normalizedPath);
    if (parentDir !== normalizedPath) {
      const parentEntry = this.entries.get(parentDir);
      if (!parentEntry) {
        if (!recursive) {
          return err(createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist'));
        }
        const mkdirResult = await this.mkdir(parentDir, true);
        if (!mkdirResult.ok) {
          return mkdirResult;
        }
      } else if (parentEntry.type !== 'directory') {
        return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
      }
    }

    this.entries.set(normalizedPath, this.newDirectory());
    return ok(undefined);
  }

  async remove(path: string): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const entry = this.entries.get(normalizedPath);
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    this.entries.delete(normalizedPath);
    return ok(undefined);
  }

  async rmdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const entry = this.entries.get(normalizedPath);
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const children = this.childrenOf(normalizedPath);
    if (children.length > 0) {
      if (!recursive) {
        return err(createFileSystemError('IO_ERROR', path, 'Directory not empty'));
      }
      for (const child of children) {
        this.entries.delete(child);
      }
    }
    this.entries.delete(normalizedPath);
    return ok(undefined);
  }

  async list(path: string, options?: ListOptions): Promise<Result<string[], FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const entry = this.entries.get(normalizedPath);
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    let names = this.childrenOf(normalizedPath)
      .map((child) => relative(normalizedPath, child))
      .filter((name) => options?.recursive || !name.includes(sep));

    if (options?.pattern) {
      const pattern = globToRegex(options.pattern);
      names = names.filter((name) => pattern.test(name));
    }
    return ok(names.sort());
  }

  async copy(src: string, dest: string): Promise<Result<void, FileSystemError>> {
    const failure = this.takeFailure('copy', src);
    if (failure) {
      return err(failure);
    }
    const readResult = await this.readBytes(src);
    if (!readResult.ok) {
      return readResult;
    }
    return this.writeFile(dest, readResult.value, { atomic: false });
  }

  async rename(oldPath: string, newPath: string): Promise<Result<void, FileSystemError>> {
    const failure = this.takeFailure('rename', newPath);
    if (failure) {
      return err(failure);
    }

    const normalizedOld = this.normalizePath(oldPath);
    const normalizedNew = this.normalizePath(newPath);
    const entry = this.entries.get(normalizedOld);
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', oldPath));
    }

    const destParent = this.entries.get(dirname(normalizedNew));
    if (!destParent || destParent.type !== 'directory') {
      return err(createFileSystemError('NOT_FOUND', dirname(normalizedNew), 'Parent directory does not exist'));
    }

    if (entry.type === 'directory') {
      for (const child of this.childrenOf(normalizedOld)) {
        const moved = this.entries.get(child);
        if (moved) {
          this.entries.set(join(normalizedNew, relative(normalizedOld, child)), moved);
          this.entries.delete(child);
        }
      }
    }
    this.entries.delete(normalizedOld);
    this.entries.set(normalizedNew, entry);
    return ok(undefined);
  }

  resolve(...paths: string[]): string {
    return resolve(this.basePath, ...paths);
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

  /**
   * Every path currently stored, files and directories (for assertions)
   */
  paths(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  /**
   * Files and their contents under `root`, for byte-for-byte comparisons in tests
   */
  snapshotFiles(root: string = this.basePath): Record<string, string> {
    const normalizedRoot = this.normalizePath(root);
    const files: Record<string, string> = {};
    for (const [path, entry] of this.entries) {
      if (entry.type === 'file' && (path === normalizedRoot || path.startsWith(normalizedRoot + sep))) {
        files[path] = entry.content.toString('base64');
      }
    }
    return files;
  }

  private childrenOf(dir: string): string[] {
    const prefix = dir === sep ? sep : dir + sep;
    return Array.from(this.entries.keys()).filter((p) => p !== dir && p.startsWith(prefix));
  }
}

export function createMemoryFileSystem(basePath?: string): MemoryFileSystem {
  return new MemoryFileSystem(basePath);
}
