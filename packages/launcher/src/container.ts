/**
 * Container command construction: bind mounts, `run` arguments and a
 * shell rendering of the final command line.
 */

import { join } from "node:path";
import { MOUNT_TABLE } from "./constants.js";

export type BindMount = {
  /** Absolute host path */
  host: string;
  /** Absolute path inside the container */
  container: string;
};

export type RunArgsOptions = {
  mounts: BindMount[];
  image: string;
  interactive: boolean;
};

/** The launcher's mounts, with host paths joined onto an absolute root */
export function bindMounts(root: string): BindMount[] {
  return MOUNT_TABLE.map(({ host, container }) => ({ host: join(root, host), container }));
}

/**
 * Arguments after the runtime binary:
 * `run --rm -v <host>:<container>... [-it] <image>`
 */
export function buildRunArgs(opts: RunArgsOptions): string[] {
  const args = ["run", "--rm"];
  for (const mount of opts.mounts) {
    args.push("-v", `${mount.host}:${mount.container}`);
  }
  if (opts.interactive) args.push("-it");
  args.push(opts.image);
  return args;
}

const SHELL_SAFE = /^[A-Za-z0-9_./:=@%+,-]+$/;

/** Quote one argument for a POSIX shell */
export function shellQuote(arg: string): string {
  if (SHELL_SAFE.test(arg)) return arg;
  return `'${arg.replaceAll("'", `'\\''`)}'`;
}

/** Render a command line that can be pasted into a shell */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(shellQuote).join(" ");
}
