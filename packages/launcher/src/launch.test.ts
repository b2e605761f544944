import { describe, expect, it } from "vitest";
import { isAbsolute } from "node:path";
import { MockSystemOps } from "./system-ops-mock.js";
import { planCommand, prepareLaunch, runContainer } from "./launch.js";
import { ok } from "./result.js";
import type { LauncherSettings } from "./types.js";

const SETTINGS: LauncherSettings = {
  root: "/opt/rvmt",
  runtime: "docker",
  image: "rvmt",
  interactive: true,
  dryRun: false,
};

const EXPECTED_ARGS = [
  "run",
  "--rm",
  "-v",
  "/opt/rvmt/out:/app/assets",
  "-v",
  "/opt/rvmt/.env:/app/.env",
  "-v",
  "/opt/rvmt/config.toml:/app/config.toml",
  "-it",
  "rvmt",
];

describe("planCommand", () => {
  it("mounts absolute host paths", () => {
    const plan = planCommand(SETTINGS);
    expect(plan.runtime).toBe("docker");
    expect(plan.args).toEqual(EXPECTED_ARGS);
    expect(plan.mounts.every((m) => isAbsolute(m.host))).toBe(true);
  });
});

describe("prepareLaunch", () => {
  it("creates out/ and notes a missing .env", async () => {
    const ops = new MockSystemOps("/opt/rvmt");

    const result = await prepareLaunch({ ops, settings: SETTINGS });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.outputDirCreated).toBe(true);
    expect(result.value.envFilePresent).toBe(false);
    expect(result.value.args).toEqual(EXPECTED_ARGS);
    expect(ops.ops).toEqual([{ kind: "mkdir", path: "out" }]);
  });

  it("leaves an existing out/ alone", async () => {
    const ops = new MockSystemOps("/opt/rvmt");
    ops.addDir("out");
    ops.addFile(".env", "REDDIT_CLIENT_ID=test-id\n");

    const result = await prepareLaunch({ ops, settings: SETTINGS });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.outputDirCreated).toBe(false);
    expect(result.value.envFilePresent).toBe(true);
    expect(ops.ops).toEqual([]);
  });

  it("does not count a .env directory as the env file", async () => {
    const ops = new MockSystemOps("/opt/rvmt");
    ops.addDir("out");
    ops.addDir(".env");

    const result = await prepareLaunch({ ops, settings: SETTINGS });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.envFilePresent).toBe(false);
  });

  it("leaves out/ uncreated on a dry run", async () => {
    const ops = new MockSystemOps("/opt/rvmt");

    const result = await prepareLaunch({ ops, settings: { ...SETTINGS, dryRun: true } });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.outputDirCreated).toBe(false);
    expect(result.value.args).toEqual(EXPECTED_ARGS);
    expect(ops.ops).toEqual([]);
  });

  it("reports a failed out/ check", async () => {
    const ops = new MockSystemOps("/opt/rvmt");
    ops.failCheckOn("out", { kind: "io_error", path: "out", message: "EIO" });

    expect(await prepareLaunch({ ops, settings: SETTINGS })).toEqual({
      ok: false,
      error: { kind: "output_dir_failed", message: "EIO" },
    });
  });

  it("reports a failed .env check", async () => {
    const ops = new MockSystemOps("/opt/rvmt");
    ops.addDir("out");
    ops.failCheckOn(".env", { kind: "io_error", path: ".env", message: "EACCES" });

    expect(await prepareLaunch({ ops, settings: SETTINGS })).toEqual({
      ok: false,
      error: { kind: "env_check_failed", message: "EACCES" },
    });
  });

  it("reports a failed mkdir", async () => {
    const ops = new MockSystemOps("/opt/rvmt");
    ops.failOn("out", { kind: "permission_denied", path: "out", operation: "mkdir" });

    const result = await prepareLaunch({ ops, settings: SETTINGS });

    expect(result).toEqual({
      ok: false,
      error: { kind: "output_dir_failed", message: "out: permission denied (mkdir)" },
    });
  });
});

describe("runContainer", () => {
  it("runs the runtime with the planned arguments", async () => {
    const ops = new MockSystemOps("/opt/rvmt");
    ops.setRunOutcome(ok(7));
    const prepared = await prepareLaunch({ ops, settings: SETTINGS });
    if (!prepared.ok) throw new Error("prepare failed");

    const result = await runContainer(ops, prepared.value);

    expect(result).toEqual({ ok: true, value: 7 });
    expect(ops.ops[ops.ops.length - 1]).toEqual({ kind: "run", command: "docker", args: EXPECTED_ARGS });
  });
});
