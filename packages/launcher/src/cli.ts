#!/usr/bin/env node
/**
 * rvmt-launch CLI entry point.
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { LiveConsoleOutput } from "./console-live.js";
import { LaunchCommand } from "./cli/launch-command.js";
import { InitCommand } from "./cli/init-command.js";
import { CommandCommand } from "./cli/command-command.js";
import { NodeSystemOps } from "./system-ops-node.js";
import { resolveLauncherRoot, resolveRootOverride } from "./paths.js";
import { loadSettings, requestedRoot } from "./settings.js";
import type { SettingsFlags } from "./settings.js";
import type { LauncherSettings } from "./types.js";
import { formatFileError } from "./types.js";
import { DEFAULT_IMAGE, DEFAULT_RUNTIME, ENV_VARS } from "./constants.js";

type RootFlag = { root?: string };

async function resolveRoot(flagRoot: string | undefined): Promise<string> {
  const requested = requestedRoot(flagRoot, process.env);
  const root =
    requested === undefined
      ? await resolveLauncherRoot(fileURLToPath(import.meta.url))
      : await resolveRootOverride(requested);
  if (!root.ok) {
    throw new Error(`Cannot resolve launcher root: ${formatFileError(root.error)}`);
  }
  return root.value;
}

async function makeSettings(flags: SettingsFlags & RootFlag): Promise<LauncherSettings> {
  const root = await resolveRoot(flags.root);
  const settings = loadSettings(root, flags, process.env);
  if (!settings.ok) throw new Error(`Invalid settings: ${settings.error.message}`);
  return settings.value;
}

const packageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../package.json", import.meta.url), "utf-8"),
    );
    return packageJsonSchema.parse(raw).version;
  } catch {
    return "0.0.0";
  }
}

function withContainerOptions(cmd: Command): Command {
  return cmd
    .option("--root <dir>", `launcher root (default: $${ENV_VARS.home} or the install dir)`)
    .option("--runtime <bin>", `container runtime (default: $${ENV_VARS.runtime} or ${DEFAULT_RUNTIME})`)
    .option("--image <name>", `image to run (default: $${ENV_VARS.image} or ${DEFAULT_IMAGE})`)
    .option("--no-tty", "do not attach an interactive terminal");
}

const program = new Command()
  .name("rvmt-launch")
  .description("Seed config.toml from its template and run the rvmt container")
  .version(getVersion());

withContainerOptions(
  program.command("run", { isDefault: true }).description("Bootstrap config.toml and run the container"),
)
  .option("--dry-run", "print the runtime command instead of running it")
  .action(async (flags: SettingsFlags & RootFlag) => {
    const out = new LiveConsoleOutput();
    try {
      const settings = await makeSettings(flags);
      const cmd = new LaunchCommand({ ops: new NodeSystemOps(settings.root), settings }, out);
      process.exitCode = await cmd.execute();
    } catch (e) {
      out.error(e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    }
  });

program
  .command("init")
  .description("Copy the config template to config.toml if it does not exist")
  .option("--root <dir>", `launcher root (default: $${ENV_VARS.home} or the install dir)`)
  .action(async (flags: RootFlag) => {
    const out = new LiveConsoleOutput();
    try {
      const root = await resolveRoot(flags.root);
      const cmd = new InitCommand(new NodeSystemOps(root), out);
      process.exitCode = await cmd.execute();
    } catch (e) {
      out.error(e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    }
  });

withContainerOptions(
  program.command("command").description("Print the runtime command `run` would execute"),
).action(async (flags: SettingsFlags & RootFlag) => {
  const out = new LiveConsoleOutput();
  try {
    const settings = await makeSettings(flags);
    process.exitCode = new CommandCommand(settings, out).execute();
  } catch (e) {
    out.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  }
});

await program.parseAsync();
