// Shared primitives
export type {
  LauncherSettings,
  FileSystemError,
  NotFoundError,
  PermissionDeniedError,
  AlreadyExistsError,
  IOError,
  SpawnError,
} from "./types.js";
export { formatFileError } from "./types.js";

// Result (generic pattern)
export type { Result } from "./result.js";
export { ok, err } from "./result.js";

// Layout
export {
  CONFIG_FILE,
  TEMPLATE_FILE,
  OUTPUT_DIR,
  ENV_FILE,
  CONTAINER_ASSETS_DIR,
  CONTAINER_ENV_FILE,
  CONTAINER_CONFIG_FILE,
  DEFAULT_IMAGE,
  DEFAULT_RUNTIME,
} from "./constants.js";
export { resolveLauncherRoot, resolveRootOverride } from "./paths.js";

// Settings
export { launcherSettingsSchema, loadSettings, requestedRoot } from "./settings.js";
export type { SettingsFlags, SettingsEnv, SettingsError } from "./settings.js";

// System operations
export type { SystemOperations } from "./system-ops.js";
export { MockSystemOps } from "./system-ops-mock.js";
export type { RecordedOp } from "./system-ops-mock.js";
export { NodeSystemOps, exitCodeOf } from "./system-ops-node.js";

// Bootstrap
export { ensureConfig } from "./bootstrap.js";
export type { BootstrapResult, BootstrapError, BootstrapOptions } from "./bootstrap.js";

// Container command
export { bindMounts, buildRunArgs, formatCommand, shellQuote } from "./container.js";
export type { BindMount, RunArgsOptions } from "./container.js";

// Launch
export { planCommand, prepareLaunch, runContainer } from "./launch.js";
export type { LaunchPlan, LaunchOptions, PrepareError } from "./launch.js";

// Console output
export type { ConsoleOutput } from "./console.js";
export { LiveConsoleOutput } from "./console-live.js";
export { MockConsoleOutput } from "./console-mock.js";

// CLI commands
export { LaunchCommand } from "./cli/launch-command.js";
export { InitCommand } from "./cli/init-command.js";
export { CommandCommand } from "./cli/command-command.js";
