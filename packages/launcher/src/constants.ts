/**
 * Fixed launcher layout. Host paths are relative to the launcher root.
 */

export const CONFIG_FILE = "config.toml";
export const TEMPLATE_FILE = "utils/.config.template.toml";
export const OUTPUT_DIR = "out";
export const ENV_FILE = ".env";

export const CONTAINER_ASSETS_DIR = "/app/assets";
export const CONTAINER_ENV_FILE = "/app/.env";
export const CONTAINER_CONFIG_FILE = "/app/config.toml";

export const DEFAULT_RUNTIME = "docker";
export const DEFAULT_IMAGE = "rvmt";

/** Host → container mount table, in the order passed to the runtime */
export const MOUNT_TABLE = [
  { host: OUTPUT_DIR, container: CONTAINER_ASSETS_DIR },
  { host: ENV_FILE, container: CONTAINER_ENV_FILE },
  { host: CONFIG_FILE, container: CONTAINER_CONFIG_FILE },
] as const;

/** Environment variables read by loadSettings */
export const ENV_VARS = {
  home: "RVMT_HOME",
  runtime: "RVMT_RUNTIME",
  image: "RVMT_IMAGE",
} as const;

/** Shell convention for "command not found" */
export const EXIT_RUNTIME_NOT_FOUND = 127;
