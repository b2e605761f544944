/**
 * rvmt-launch shared types
 *
 * Error shapes returned by SystemOperations and the settings the CLI
 * hands to the launch pipeline.
 */

export type { Result } from "./result.js";

// ── Errors ─────────────────────────────────────────────────────────────

export type NotFoundError = { kind: "not_found"; path: string };

export type PermissionDeniedError = {
  kind: "permission_denied";
  path: string;
  operation: string;
};

export type AlreadyExistsError = { kind: "already_exists"; path: string };

export type IOError = { kind: "io_error"; path: string; message: string };

export type FileSystemError = NotFoundError | PermissionDeniedError | AlreadyExistsError | IOError;

/** Failure to start a child process (the process itself never ran) */
export type SpawnError =
  | { kind: "runtime_not_found"; command: string }
  | { kind: "spawn_failed"; command: string; message: string };

/** One-line description of a filesystem error */
export function formatFileError(e: FileSystemError): string {
  switch (e.kind) {
    case "not_found":
      return `${e.path}: no such file or directory`;
    case "permission_denied":
      return `${e.path}: permission denied (${e.operation})`;
    case "already_exists":
      return `${e.path}: already exists`;
    case "io_error":
      return `${e.path}: ${e.message}`;
  }
}

// ── Settings ───────────────────────────────────────────────────────────

export type LauncherSettings = {
  /** Absolute launcher root; config, template, out/ and .env live here */
  root: string;
  /** Container runtime binary */
  runtime: string;
  /** Image to run */
  image: string;
  /** Attach an interactive terminal (-it) */
  interactive: boolean;
  /** Print the command instead of running it */
  dryRun: boolean;
};
