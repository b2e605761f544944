/**
 * Launcher root resolution.
 *
 * The root is the package directory holding `utils/`, found from the entry
 * file itself so it does not depend on the caller's working directory.
 */

import { basename, dirname, resolve } from "node:path";
import { realpath } from "node:fs/promises";
import type { IOError, NotFoundError, Result } from "./types.js";
import { ok, err } from "./result.js";

/** Build output and source folders sit one level below the root */
const CODE_DIRS = new Set(["src", "dist"]);

async function real(path: string): Promise<Result<string, NotFoundError | IOError>> {
  try {
    return ok(await realpath(resolve(path)));
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      return err({ kind: "not_found", path });
    }
    return err({ kind: "io_error", path, message: e instanceof Error ? e.message : String(e) });
  }
}

/**
 * Resolve the launcher root from an entry file path (relative paths resolve
 * against the cwd, symlinks are followed).
 */
export async function resolveLauncherRoot(
  entryPath: string,
): Promise<Result<string, NotFoundError | IOError>> {
  const entry = await real(entryPath);
  if (!entry.ok) return entry;

  const dir = dirname(entry.value);
  return ok(CODE_DIRS.has(basename(dir)) ? dirname(dir) : dir);
}

/** Resolve a user-supplied root directory to its absolute real path */
export async function resolveRootOverride(
  dir: string,
): Promise<Result<string, NotFoundError | IOError>> {
  return real(dir);
}
