/**
 * Launch pipeline — prepare the host side of the mounts, then hand the
 * terminal over to the container runtime until it exits.
 *
 * Bootstrap of config.toml happens before this (see bootstrap.ts) so the
 * caller can report it before the container takes over the terminal.
 */

import type { SystemOperations } from "./system-ops.js";
import type { LauncherSettings, Result, SpawnError } from "./types.js";
import { formatFileError } from "./types.js";
import { ok, err } from "./result.js";
import { ENV_FILE, OUTPUT_DIR } from "./constants.js";
import { bindMounts, buildRunArgs } from "./container.js";
import type { BindMount } from "./container.js";

export type LaunchPlan = {
  runtime: string;
  /** Arguments after the runtime binary */
  args: string[];
  mounts: BindMount[];
  /** Whether out/ was created by this launch */
  outputDirCreated: boolean;
  /** Whether .env is a regular file (the runtime creates a directory for a missing one) */
  envFilePresent: boolean;
};

export type PrepareError =
  | { kind: "output_dir_failed"; message: string }
  | { kind: "env_check_failed"; message: string };

export type LaunchOptions = {
  ops: SystemOperations;
  settings: LauncherSettings;
};

/** Command for the given settings, without touching the filesystem */
export function planCommand(settings: LauncherSettings): Pick<LaunchPlan, "runtime" | "args" | "mounts"> {
  const mounts = bindMounts(settings.root);
  return {
    runtime: settings.runtime,
    args: buildRunArgs({ mounts, image: settings.image, interactive: settings.interactive }),
    mounts,
  };
}

export async function prepareLaunch(
  options: LaunchOptions,
): Promise<Result<LaunchPlan, PrepareError>> {
  const { ops, settings } = options;

  // ── 1. Output directory ──────────────────────────────────────────────
  let outputDirCreated = false;
  const outExists = await ops.exists(OUTPUT_DIR);
  if (!outExists.ok) {
    return err({ kind: "output_dir_failed", message: outExists.error.message });
  }
  // A dry run only reports; it leaves the filesystem as it found it
  if (!outExists.value && !settings.dryRun) {
    const made = await ops.mkdir(OUTPUT_DIR);
    if (!made.ok) {
      return err({ kind: "output_dir_failed", message: formatFileError(made.error) });
    }
    outputDirCreated = true;
  }

  // ── 2. Environment file ──────────────────────────────────────────────
  const envIsFile = await ops.isFile(ENV_FILE);
  if (!envIsFile.ok) {
    return err({ kind: "env_check_failed", message: envIsFile.error.message });
  }

  return ok({
    ...planCommand(settings),
    outputDirCreated,
    envFilePresent: envIsFile.value,
  });
}

/** Run the planned command in the foreground; resolves to its exit code */
export async function runContainer(
  ops: SystemOperations,
  plan: LaunchPlan,
): Promise<Result<number, SpawnError>> {
  return ops.run(plan.runtime, plan.args);
}
