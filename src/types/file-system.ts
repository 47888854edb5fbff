/**
 * FileSystem interface
 * State, lock and backup I/O all go through this abstraction so the
 * orchestrator can run against a real directory or an in-memory tree.
 */

import { Writable } from 'stream';
import { Result } from './result';

export interface WriteOptions {
  /** Write to a temp file in the same directory, then rename over the target (default: true) */
  atomic?: boolean;
  /** Create parent directories if they don't exist */
  createParents?: boolean;
  /** File permission bits for the new file, e.g. 0o600 */
  mode?: number;
  /**
   * Fail with ALREADY_EXISTS instead of replacing an existing file.
   * Other readers never see the file before its content is complete.
   */
  exclusive?: boolean;
}

export type StreamWriteOptions = Pick<WriteOptions, 'createParents' | 'mode'>;

export interface FileDigest {
  sha256: string;
  size: number;
}

export interface ListOptions {
  /** Include entries of subdirectories, as paths relative to the listed directory */
  recursive?: boolean;
  /** Glob-style filter (`*` and `?`) applied to the returned names */
  pattern?: string;
}

export interface FileStats {
  size: number;
  isFile: boolean;
  isDirectory: boolean;
  createdAt: Date;
  modifiedAt: Date;
  /** Permission bits */
  mode: number;
}

export type FileSystemErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'ALREADY_EXISTS'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'PATH_TRAVERSAL'
  | 'IO_ERROR';

export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: Error;
}

export interface FileSystem {
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  /**
   * Read a file's raw bytes
   */
  readBytes(path: string): Promise<Result<Buffer, FileSystemError>>;

  writeFile(
    path: string,
    content: string | Buffer,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>>;

  /**
   * Open a file for streamed writing, created or truncated.
   * The content is complete once the stream has finished.
   */
  openWriteStream(path: string, options?: StreamWriteOptions): Promise<Result<Writable, FileSystemError>>;

  /**
   * sha256 and size of a file, read as a stream
   */
  digest(path: string): Promise<Result<FileDigest, FileSystemError>>;

  exists(path: string): Promise<boolean>;

  stat(path: string): Promise<Result<FileStats, FileSystemError>>;

  mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>>;

  /**
   * Remove a single file
   */
  remove(path: string): Promise<Result<void, FileSystemError>>;

  /**
   * Remove a directory, including its contents when `recursive` is set
   */
  rmdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>>;

  list(path: string, options?: ListOptions): Promise<Result<string[], FileSystemError>>;

  copy(src: string, dest: string): Promise<Result<void, FileSystemError>>;

  rename(oldPath: string, newPath: string): Promise<Result<void, FileSystemError>>;

  resolve(...paths: string[]): string;
  join(...paths: string[]): string;
  dirname(path: string): string;
  basename(path: string, ext?: string): string;
  relative(from: string, to: string): string;
  isAbsolute(path: string): boolean;
}

export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: Error
): FileSystemError {
  const defaultMessages: Record<FileSystemErrorCode, string> = {
    NOT_FOUND: `Path not found: ${path}`,
    PERMISSION_DENIED: `Permission denied: ${path}`,
    ALREADY_EXISTS: `Path already exists: ${path}`,
    NOT_A_FILE: `Not a file: ${path}`,
    NOT_A_DIRECTORY: `Not a directory: ${path}`,
    PATH_TRAVERSAL: `Path traversal detected: ${path}`,
    IO_ERROR: `IO error: ${path}`,
  };

  return {
    code,
    path,
    message: message ?? defaultMessages[code],
    cause,
  };
}

/**
 * Convert a glob pattern (`*`, `?`) to an anchored regex
 */
export function globToRegex(pattern: string): RegExp {
  const escaped = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}
