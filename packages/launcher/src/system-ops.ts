/**
 * SystemOperations — abstraction over the filesystem and process calls
 * the launcher makes.
 *
 * Takes the launcher root at construction time; all paths are relative.
 * Each method declares exactly which errors it can return.
 */

import type {
  Result,
  NotFoundError,
  PermissionDeniedError,
  AlreadyExistsError,
  IOError,
  SpawnError,
} from "./types.js";

export interface SystemOperations {
  /** Absolute launcher root this instance operates on */
  readonly workspace: string;

  /** Check if a path exists (relative path) */
  exists(path: string): Promise<Result<boolean, IOError>>;

  /** Check if a path is a regular file, following symlinks (false for directories) */
  isFile(path: string): Promise<Result<boolean, IOError>>;

  /**
   * Copy a file (relative paths), failing with `already_exists` instead of
   * replacing a destination that is already there.
   */
  copyFileExclusive(
    src: string,
    dest: string,
  ): Promise<Result<void, NotFoundError | PermissionDeniedError | AlreadyExistsError | IOError>>;

  /** Create a directory (relative path). Creates parent dirs if needed. */
  mkdir(path: string): Promise<Result<void, NotFoundError | PermissionDeniedError | IOError>>;

  /**
   * Run a command in the foreground with the terminal attached and wait for
   * it to exit. Resolves to the exit code; a signal death maps to 128 + signo.
   */
  run(command: string, args: string[]): Promise<Result<number, SpawnError>>;
}
