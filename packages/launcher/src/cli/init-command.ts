/**
 * CLI command: rvmt-launch init
 */

import type { ConsoleOutput } from "../console.js";
import type { SystemOperations } from "../system-ops.js";
import type { BootstrapError } from "../bootstrap.js";
import { ensureConfig } from "../bootstrap.js";
import { CONFIG_FILE, TEMPLATE_FILE } from "../constants.js";

export function reportBootstrapError(e: BootstrapError, out: ConsoleOutput): void {
  switch (e.kind) {
    case "config_check_failed":
      out.error(`Failed to check ${CONFIG_FILE}: ${e.message}`);
      break;
    case "template_missing":
      out.error(`Config template not found: ${e.path}`);
      break;
    case "config_copy_failed":
      out.error(`Failed to copy ${TEMPLATE_FILE} to ${CONFIG_FILE}: ${e.message}`);
      break;
  }
}

export class InitCommand {
  constructor(
    private ops: SystemOperations,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const result = await ensureConfig(this.ops);
    if (!result.ok) {
      reportBootstrapError(result.error, this.out);
      return 1;
    }

    if (result.value.configCreated) {
      this.out.success(`Wrote ${CONFIG_FILE} from ${TEMPLATE_FILE}`);
    } else {
      this.out.info(`${CONFIG_FILE} already exists, leaving it untouched.`);
    }
    return 0;
  }
}
