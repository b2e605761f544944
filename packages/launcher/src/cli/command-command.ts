/**
 * CommandCommand — print the runtime invocation `run` would execute.
 */

import type { ConsoleOutput } from "../console.js";
import type { LauncherSettings } from "../types.js";
import { planCommand } from "../launch.js";
import { formatCommand } from "../container.js";

export class CommandCommand {
  constructor(
    private settings: LauncherSettings,
    private out: ConsoleOutput,
  ) {}

  execute(): number {
    const { runtime, args } = planCommand(this.settings);
    this.out.write(formatCommand(runtime, args));
    return 0;
  }
}
