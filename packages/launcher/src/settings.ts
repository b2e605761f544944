/**
 * Launcher settings — CLI flags over environment over defaults,
 * validated with Zod.
 */

import { isAbsolute } from "node:path";
import { z } from "zod";
import type { LauncherSettings, Result } from "./types.js";
import { ok, err } from "./result.js";
import { DEFAULT_IMAGE, DEFAULT_RUNTIME, ENV_VARS } from "./constants.js";

/** Flags as commander hands them over; `tty` is false for --no-tty */
export type SettingsFlags = {
  runtime?: string;
  image?: string;
  tty?: boolean;
  dryRun?: boolean;
};

export type SettingsEnv = Record<string, string | undefined>;

export type SettingsError = { kind: "invalid_settings"; message: string };

const commandToken = z
  .string()
  .min(1, "must not be empty")
  .regex(/^\S+$/, "must not contain whitespace");

export const launcherSettingsSchema: z.ZodType<LauncherSettings> = z.object({
  root: z.string().refine((p) => isAbsolute(p), "must be an absolute path"),
  runtime: commandToken,
  image: commandToken,
  interactive: z.boolean(),
  dryRun: z.boolean(),
});

/** Unset and empty environment variables both count as absent */
function fromEnv(env: SettingsEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Root directory the user asked for, if any (--root, then RVMT_HOME).
 * Undefined means "derive it from the entry file".
 */
export function requestedRoot(flagRoot: string | undefined, env: SettingsEnv): string | undefined {
  return flagRoot ?? fromEnv(env, ENV_VARS.home);
}

/**
 * Merge flags, environment and defaults for an already resolved root.
 */
export function loadSettings(
  root: string,
  flags: SettingsFlags,
  env: SettingsEnv,
): Result<LauncherSettings, SettingsError> {
  const parsed = launcherSettingsSchema.safeParse({
    root,
    runtime: flags.runtime ?? fromEnv(env, ENV_VARS.runtime) ?? DEFAULT_RUNTIME,
    image: flags.image ?? fromEnv(env, ENV_VARS.image) ?? DEFAULT_IMAGE,
    interactive: flags.tty ?? true,
    dryRun: flags.dryRun ?? false,
  });

  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return err({ kind: "invalid_settings", message });
  }
  return ok(parsed.data);
}
