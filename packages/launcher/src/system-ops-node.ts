/**
 * NodeSystemOps — real file and process operations via Node.js APIs.
 *
 * Takes the launcher root; all paths are relative and validated
 * against traversal. Maps errno codes to typed Result errors.
 */

import { resolve, relative, dirname, isAbsolute } from "node:path";
import { mkdir as fsMkdir, copyFile as fsCopyFile, access, stat } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { constants as osConstants } from "node:os";
import { spawn } from "node:child_process";
import type { SystemOperations } from "./system-ops.js";
import type {
  AlreadyExistsError,
  IOError,
  NotFoundError,
  PermissionDeniedError,
  Result,
  SpawnError,
} from "./types.js";
import { ok, err } from "./result.js";

type FileError = NotFoundError | PermissionDeniedError | IOError;

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Map Node.js errno to our typed errors */
function mapError(e: unknown, path: string, operation: string): FileError {
  const code = errnoCode(e);
  if (code === "ENOENT") return { kind: "not_found", path };
  if (code === "EACCES" || code === "EPERM") {
    return { kind: "permission_denied", path, operation };
  }
  return { kind: "io_error", path, message: errorMessage(e) };
}

function mapSpawnError(e: unknown, command: string): SpawnError {
  if (errnoCode(e) === "ENOENT") return { kind: "runtime_not_found", command };
  return { kind: "spawn_failed", command, message: errorMessage(e) };
}

/** Exit status as a POSIX shell would report it */
export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal === null) return 1;
  return 128 + osConstants.signals[signal];
}

const FORWARDED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export class NodeSystemOps implements SystemOperations {
  public readonly workspace: string;

  constructor(workspace: string) {
    this.workspace = resolve(workspace);
  }

  /** Resolve a relative path, rejecting traversal outside workspace */
  private resolvePath(path: string): Result<string, IOError> {
    const full = resolve(this.workspace, path);
    const rel = relative(this.workspace, full);
    if (rel.startsWith("..") || isAbsolute(rel)) {
      return err({
        kind: "io_error",
        path,
        message: "Path traversal outside launcher root",
      });
    }
    return ok(full);
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;
    try {
      await access(resolved.value);
      return ok(true);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return ok(false);
      return err({ kind: "io_error", path, message: `exists: ${errorMessage(e)}` });
    }
  }

  async isFile(path: string): Promise<Result<boolean, IOError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;
    try {
      return ok((await stat(resolved.value)).isFile());
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return ok(false);
      return err({ kind: "io_error", path, message: `isFile: ${errorMessage(e)}` });
    }
  }

  async copyFileExclusive(
    src: string,
    dest: string,
  ): Promise<Result<void, FileError | AlreadyExistsError>> {
    const resolvedSrc = this.resolvePath(src);
    if (!resolvedSrc.ok) return resolvedSrc;
    const resolvedDest = this.resolvePath(dest);
    if (!resolvedDest.ok) return resolvedDest;
    try {
      await fsMkdir(dirname(resolvedDest.value), { recursive: true });
    } catch (e) {
      return err(mapError(e, dest, "mkdir"));
    }
    try {
      await fsCopyFile(resolvedSrc.value, resolvedDest.value, fsConstants.COPYFILE_EXCL);
      return ok(undefined);
    } catch (e) {
      const code = errnoCode(e);
      if (code === "EEXIST") return err({ kind: "already_exists", path: dest });
      // The destination directory exists at this point, so ENOENT is the source
      if (code === "ENOENT") return err({ kind: "not_found", path: src });
      return err(mapError(e, dest, "copyFile"));
    }
  }

  async mkdir(path: string): Promise<Result<void, FileError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;
    try {
      await fsMkdir(resolved.value, { recursive: true });
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "mkdir"));
    }
  }

  async run(command: string, args: string[]): Promise<Result<number, SpawnError>> {
    // The child shares our terminal and gets the same signals; we wait for it
    // instead of dying first.
    const hold = (): void => {};
    for (const signal of FORWARDED_SIGNALS) process.on(signal, hold);

    try {
      return await new Promise<Result<number, SpawnError>>((done) => {
        const child = spawn(command, args, { cwd: this.workspace, stdio: "inherit" });
        child.once("error", (e) => done(err(mapSpawnError(e, command))));
        child.once("close", (code, signal) => done(ok(exitCodeOf(code, signal))));
      });
    } finally {
      for (const signal of FORWARDED_SIGNALS) process.off(signal, hold);
    }
  }
}
