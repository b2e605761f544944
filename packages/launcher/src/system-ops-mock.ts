/**
 * Mock SystemOperations for testing.
 *
 * Takes a launcher root; all paths are relative (resolved internally).
 * Records all mutations and process launches for assertion.
 */

import { resolve } from "node:path";
import type { SystemOperations } from "./system-ops.js";
import type {
  Result,
  NotFoundError,
  PermissionDeniedError,
  AlreadyExistsError,
  IOError,
  SpawnError,
} from "./types.js";
import { ok, err } from "./result.js";

export type RecordedOp =
  | { kind: "copy"; src: string; dest: string }
  | { kind: "mkdir"; path: string }
  | { kind: "run"; command: string; args: string[] };

type CopyError = NotFoundError | PermissionDeniedError | AlreadyExistsError | IOError;

export class MockSystemOps implements SystemOperations {
  public readonly workspace: string;
  private files: Map<string, string> = new Map();
  private dirs: Set<string> = new Set();
  private failures: Map<string, CopyError> = new Map();
  private checkFailures: Map<string, IOError> = new Map();
  private runOutcome: Result<number, SpawnError> = ok(0);
  public ops: RecordedOp[] = [];

  constructor(workspace: string) {
    this.workspace = workspace;
  }

  private resolve(path: string): string {
    return resolve(this.workspace, path);
  }

  /** Add a simulated file (relative path) */
  addFile(path: string, content: string): void {
    this.files.set(this.resolve(path), content);
  }

  /** Add a simulated directory (relative path) */
  addDir(path: string): void {
    this.dirs.add(this.resolve(path));
  }

  /** Make copy/mkdir targeting `path` fail with the given error */
  failOn(path: string, error: CopyError): void {
    this.failures.set(this.resolve(path), error);
  }

  /** Make exists/isFile on `path` fail with the given error */
  failCheckOn(path: string, error: IOError): void {
    this.checkFailures.set(this.resolve(path), error);
  }

  /** Exit code (or spawn error) returned by the next runs */
  setRunOutcome(outcome: Result<number, SpawnError>): void {
    this.runOutcome = outcome;
  }

  /** Current content of a simulated file, if any */
  contentOf(path: string): string | undefined {
    return this.files.get(this.resolve(path));
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    const full = this.resolve(path);
    const failure = this.checkFailures.get(full);
    if (failure) return err(failure);
    return ok(this.files.has(full) || this.dirs.has(full));
  }

  async isFile(path: string): Promise<Result<boolean, IOError>> {
    const full = this.resolve(path);
    const failure = this.checkFailures.get(full);
    if (failure) return err(failure);
    return ok(this.files.has(full));
  }

  async copyFileExclusive(src: string, dest: string): Promise<Result<void, CopyError>> {
    const failure = this.failures.get(this.resolve(dest));
    if (failure) return err(failure);
    const content = this.files.get(this.resolve(src));
    if (content === undefined) return err({ kind: "not_found", path: src });
    const fullDest = this.resolve(dest);
    if (this.files.has(fullDest) || this.dirs.has(fullDest)) {
      return err({ kind: "already_exists", path: dest });
    }
    this.ops.push({ kind: "copy", src, dest });
    this.files.set(fullDest, content);
    return ok(undefined);
  }

  async mkdir(path: string): Promise<Result<void, NotFoundError | PermissionDeniedError | IOError>> {
    const failure = this.failures.get(this.resolve(path));
    if (failure) {
      if (failure.kind === "already_exists") {
        return err({ kind: "io_error", path, message: "file exists" });
      }
      return err(failure);
    }
    this.ops.push({ kind: "mkdir", path });
    this.dirs.add(this.resolve(path));
    return ok(undefined);
  }

  async run(command: string, args: string[]): Promise<Result<number, SpawnError>> {
    this.ops.push({ kind: "run", command, args: [...args] });
    return this.runOutcome;
  }
}
