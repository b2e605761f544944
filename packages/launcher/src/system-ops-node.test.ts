/**
 * Tests for NodeSystemOps against a temporary launcher root.
 *
 * `run` uses the current Node binary as a stand-in container runtime.
 */

import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, readFile, rm, mkdir, stat, realpath } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { NodeSystemOps, exitCodeOf } from "./system-ops-node.js";
import { prepareLaunch } from "./launch.js";

let workspace: string;
let ops: NodeSystemOps;

beforeEach(async () => {
  workspace = await mkdtemp(join(tmpdir(), "rvmt-test-"));
  ops = new NodeSystemOps(workspace);
});

afterEach(async () => {
  await rm(workspace, { recursive: true, force: true });
});

describe("NodeSystemOps", () => {
  // ── exists ──────────────────────────────────────────────────────────

  describe("exists", () => {
    test("true for an existing file", async () => {
      await writeFile(join(workspace, "config.toml"), "x=1");
      expect(await ops.exists("config.toml")).toEqual({ ok: true, value: true });
    });

    test("false for a missing file", async () => {
      expect(await ops.exists("config.toml")).toEqual({ ok: true, value: false });
    });

    test("rejects paths outside the root", async () => {
      const result = await ops.exists("../elsewhere");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("io_error");
    });
  });

  // ── isFile ──────────────────────────────────────────────────────────

  describe("isFile", () => {
    test("true for a regular file", async () => {
      await writeFile(join(workspace, ".env"), "REDDIT_CLIENT_ID=test-id\n");
      expect(await ops.isFile(".env")).toEqual({ ok: true, value: true });
    });

    test("false for a directory", async () => {
      await mkdir(join(workspace, ".env"));
      expect(await ops.isFile(".env")).toEqual({ ok: true, value: false });
    });

    test("false for a missing path", async () => {
      expect(await ops.isFile(".env")).toEqual({ ok: true, value: false });
    });

    test("a .env directory is reported as no env file", async () => {
      await mkdir(join(workspace, ".env"));
      const settings = {
        root: workspace,
        runtime: "docker",
        image: "rvmt",
        interactive: true,
        dryRun: false,
      };

      const result = await prepareLaunch({ ops, settings });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.envFilePresent).toBe(false);
    });
  });

  // ── copyFileExclusive ──────────────────────────────────────────────

  describe("copyFileExclusive", () => {
    test("copies bytes exactly", async () => {
      await mkdir(join(workspace, "utils"));
      await writeFile(join(workspace, "utils", ".config.template.toml"), "[settings]\nzoom = 1\n");

      const result = await ops.copyFileExclusive("utils/.config.template.toml", "config.toml");

      expect(result.ok).toBe(true);
      expect(await readFile(join(workspace, "config.toml"), "utf-8")).toBe("[settings]\nzoom = 1\n");
    });

    test("refuses to replace an existing destination", async () => {
      await writeFile(join(workspace, "template.toml"), "fresh");
      await writeFile(join(workspace, "config.toml"), "x=1");

      const result = await ops.copyFileExclusive("template.toml", "config.toml");

      expect(result).toEqual({ ok: false, error: { kind: "already_exists", path: "config.toml" } });
      expect(await readFile(join(workspace, "config.toml"), "utf-8")).toBe("x=1");
    });

    test("blames the destination when its directory cannot be created", async () => {
      await writeFile(join(workspace, "template.toml"), "fresh");
      await writeFile(join(workspace, "blocker"), "");

      const result = await ops.copyFileExclusive("template.toml", "blocker/config.toml");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("io_error");
      expect(result.error.path).toBe("blocker/config.toml");
    });

    test("returns not_found for a missing source", async () => {
      const result = await ops.copyFileExclusive("missing.toml", "config.toml");
      expect(result).toEqual({ ok: false, error: { kind: "not_found", path: "missing.toml" } });
    });
  });

  // ── mkdir ───────────────────────────────────────────────

  describe("mkdir", () => {
    test("creates nested directories", async () => {
      const result = await ops.mkdir("out/clips");
      expect(result.ok).toBe(true);
      expect((await stat(join(workspace, "out", "clips"))).isDirectory()).toBe(true);
    });
  });

  // ── run ─────────────────────────────────────────────────────────────

  describe("run", () => {
    test("resolves to the child's exit code", async () => {
      const result = await ops.run(process.execPath, ["-e", "process.exit(3)"]);
      expect(result).toEqual({ ok: true, value: 3 });
    });

    test("runs in the launcher root", async () => {
      const result = await ops.run(process.execPath, [
        "-e",
        "require('fs').writeFileSync('marker.txt', process.cwd())",
      ]);
      expect(result).toEqual({ ok: true, value: 0 });
      expect(await readFile(join(workspace, "marker.txt"), "utf-8")).toBe(await realpath(workspace));
    });

    test("maps a signal death to 128 + signo", async () => {
      const result = await ops.run(process.execPath, ["-e", "process.kill(process.pid, 'SIGTERM')"]);
      expect(result).toEqual({ ok: true, value: 143 });
    });

    test("reports a missing runtime binary", async () => {
      const result = await ops.run("rvmt-no-such-runtime", ["run"]);
      expect(result).toEqual({
        ok: false,
        error: { kind: "runtime_not_found", command: "rvmt-no-such-runtime" },
      });
    });

    test("stops holding signals once the child exits", async () => {
      const before = process.listenerCount("SIGINT");
      await ops.run(process.execPath, ["-e", ""]);
      expect(process.listenerCount("SIGINT")).toBe(before);
    });
  });
});

describe("exitCodeOf", () => {
  test("passes exit codes through", () => {
    expect(exitCodeOf(0, null)).toBe(0);
    expect(exitCodeOf(42, null)).toBe(42);
  });

  test("maps signals like a shell", () => {
    expect(exitCodeOf(null, "SIGINT")).toBe(130);
    expect(exitCodeOf(null, "SIGKILL")).toBe(137);
  });
});
