/**
 * Config bootstrap — seed config.toml from the bundled template.
 *
 * Idempotent: an existing config.toml is never touched, and the copy is
 * exclusive so a file that appears mid-way is kept as well.
 */

import type { SystemOperations } from "./system-ops.js";
import type { Result } from "./types.js";
import { formatFileError } from "./types.js";
import { ok, err } from "./result.js";
import { CONFIG_FILE, TEMPLATE_FILE } from "./constants.js";

export type BootstrapResult = {
  /** Whether config.toml was written (false if it already existed) */
  configCreated: boolean;
};

export type BootstrapError =
  | { kind: "config_check_failed"; message: string }
  | { kind: "template_missing"; path: string }
  | { kind: "config_copy_failed"; message: string };

export type BootstrapOptions = {
  /** Called once the check has decided to copy, before the copy starts */
  onCopy?: () => void;
};

export async function ensureConfig(
  ops: SystemOperations,
  options: BootstrapOptions = {},
): Promise<Result<BootstrapResult, BootstrapError>> {
  const present = await ops.isFile(CONFIG_FILE);
  if (!present.ok) {
    return err({ kind: "config_check_failed", message: present.error.message });
  }
  if (present.value) return ok({ configCreated: false });

  options.onCopy?.();

  const copied = await ops.copyFileExclusive(TEMPLATE_FILE, CONFIG_FILE);
  if (!copied.ok) {
    const e = copied.error;
    if (e.kind === "already_exists") return ok({ configCreated: false });
    if (e.kind === "not_found" && e.path === TEMPLATE_FILE) {
      return err({ kind: "template_missing", path: TEMPLATE_FILE });
    }
    return err({ kind: "config_copy_failed", message: formatFileError(e) });
  }
  return ok({ configCreated: true });
}
