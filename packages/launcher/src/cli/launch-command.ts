/**
 * LaunchCommand — bootstrap config.toml, prepare the mounts, run the
 * container and pass its exit code through.
 */

import type { ConsoleOutput } from "../console.js";
import type { LaunchOptions } from "../launch.js";
import type { SpawnError } from "../types.js";
import { prepareLaunch, runContainer } from "../launch.js";
import { ensureConfig } from "../bootstrap.js";
import { formatCommand } from "../container.js";
import {
  CONTAINER_ENV_FILE,
  ENV_FILE,
  EXIT_RUNTIME_NOT_FOUND,
  OUTPUT_DIR,
} from "../constants.js";
import { reportBootstrapError } from "./init-command.js";

export class LaunchCommand {
  constructor(
    private opts: LaunchOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const { ops, settings } = this.opts;

    const boot = await ensureConfig(ops, {
      onCopy: () => this.out.step("Copying config template..."),
    });
    if (!boot.ok) {
      reportBootstrapError(boot.error, this.out);
      return 1;
    }

    const prepared = await prepareLaunch(this.opts);
    if (!prepared.ok) {
      const e = prepared.error;
      switch (e.kind) {
        case "output_dir_failed":
          this.out.error(`Failed to create ${OUTPUT_DIR}/: ${e.message}`);
          break;
        case "env_check_failed":
          this.out.error(`Failed to check ${ENV_FILE}: ${e.message}`);
          break;
      }
      return 1;
    }

    const plan = prepared.value;
    if (plan.outputDirCreated) this.out.info(`Created ${OUTPUT_DIR}/`);
    if (!plan.envFilePresent) {
      this.out.warn(
        `${ENV_FILE} is not a file in ${ops.workspace}; ` +
          `${settings.runtime} will mount an empty directory at ${CONTAINER_ENV_FILE} instead.`,
      );
    }

    if (settings.dryRun) {
      this.out.write(formatCommand(plan.runtime, plan.args));
      return 0;
    }

    const ran = await runContainer(ops, plan);
    if (!ran.ok) return this.reportSpawnError(ran.error);
    return ran.value;
  }

  private reportSpawnError(e: SpawnError): number {
    switch (e.kind) {
      case "runtime_not_found":
        this.out.error(`${e.command}: command not found. Is the container runtime installed?`);
        return EXIT_RUNTIME_NOT_FOUND;
      case "spawn_failed":
        this.out.error(`Failed to start ${e.command}: ${e.message}`);
        return 1;
    }
  }
}
